import type { JobList } from '@geoapi/shared';
import type { Services } from '../../../app/services.js';
import { NotFoundError, ResultsNotReadyError, ValidationError } from '../../../lib/http/errors.js';
import { json } from '../../../lib/http/json.js';
import { buildPageLinks, LinkRel, MediaType, pageLinkList, resourceUrl } from '../../../lib/http/links.js';
import { collectQuery, parseLimit, parseOffset, parseOptionalEnumList, parseOptionalString } from '../../../lib/http/parse.js';
import { JOB_STATUSES } from '../../../lib/jobs/model.js';
import { toStatusInfo } from '../../../lib/jobs/presenter.js';
import type { DomainRegistry } from '../../types.js';

const CONF_BASE = 'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf';

export function jobsDomain(services: Services): DomainRegistry {
  const { config, controller, store } = services;
  const publicUrl = config.publicUrl;

  return {
    domain: 'jobs',
    landingLinks: url => [
      {
        href: resourceUrl(url, 'jobs'),
        rel: LinkRel.jobList,
        type: MediaType.json,
        title: 'Jobs of this server',
      },
    ],
    conformance: [`${CONF_BASE}/job-list`, `${CONF_BASE}/dismiss`],
    routes: [
      {
        id: 'jobs.GET./jobs',
        method: 'GET',
        path: '/jobs',
        summary: 'List jobs',
        tags: ['jobs'],
        handler: async (req, res) => {
          const limit = parseLimit(req.query.limit, config.paging.defaultLimit, config.paging.maxLimit);
          if (!limit.ok) throw new ValidationError(limit.error);
          const offset = parseOffset(req.query.offset);
          if (!offset.ok) throw new ValidationError(offset.error);
          const processId = parseOptionalString(req.query.processID, 'processID');
          if (!processId.ok) throw new ValidationError(processId.error);
          const status = parseOptionalEnumList(req.query.status, JOB_STATUSES, 'status');
          if (!status.ok) throw new ValidationError(status.error);

          const page = await store.list(
            { processId: processId.value, status: status.value },
            { limit: limit.value, offset: offset.value }
          );
          const links = buildPageLinks({
            baseUrl: resourceUrl(publicUrl, 'jobs'),
            query: collectQuery(req.query, ['limit', 'offset']),
            total: page.total,
            limit: limit.value,
            offset: offset.value,
          });
          const body: JobList = {
            jobs: page.jobs.map(job => toStatusInfo(job, publicUrl)),
            links: pageLinkList(links),
            numberMatched: page.total,
            numberReturned: page.jobs.length,
          };
          return json(res, body);
        }
      },
      {
        id: 'jobs.GET./jobs/:jobId',
        method: 'GET',
        path: '/jobs/:jobId',
        summary: 'Job status',
        tags: ['jobs'],
        handler: async (req, res) => {
          const job = await store.get(req.params.jobId);
          return json(res, toStatusInfo(job, publicUrl));
        }
      },
      {
        id: 'jobs.GET./jobs/:jobId/results',
        method: 'GET',
        path: '/jobs/:jobId/results',
        summary: 'Job results',
        tags: ['jobs'],
        handler: async (req, res) => {
          const job = await store.get(req.params.jobId);
          switch (job.status) {
            case 'successful':
              return json(res, job.result ?? {});
            case 'failed':
              throw new ResultsNotReadyError(
                job.message ? `Job "${job.jobId}" failed: ${job.message}` : `Job "${job.jobId}" failed`
              );
            case 'dismissed':
              throw new NotFoundError('job', job.jobId);
            default:
              throw new ResultsNotReadyError(`Job "${job.jobId}" is ${job.status}; results are not available yet`);
          }
        }
      },
      {
        id: 'jobs.DELETE./jobs/:jobId',
        method: 'DELETE',
        path: '/jobs/:jobId',
        summary: 'Dismiss a job',
        tags: ['jobs'],
        handler: async (req, res) => {
          await controller.dismiss(req.params.jobId);
          res.status(204).end();
        }
      }
    ]
  };
}
