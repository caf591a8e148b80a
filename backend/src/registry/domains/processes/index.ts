import type { JobControlOption, Link, Process, ProcessList, ProcessSummary } from '@geoapi/shared';
import type { Request } from 'express';
import type { Services } from '../../../app/services.js';
import { JobFailedError, NotFoundError, ValidationError } from '../../../lib/http/errors.js';
import { json } from '../../../lib/http/json.js';
import { buildPageLinks, LinkRel, MediaType, pageLinkList, resourceUrl } from '../../../lib/http/links.js';
import { collectQuery, parseLimit, parseOffset } from '../../../lib/http/parse.js';
import { toStatusInfo } from '../../../lib/jobs/presenter.js';
import { parseExecuteRequest } from '../../../lib/processes/validate.js';
import type { ProcessDescription } from '../../../lib/processes/types.js';
import type { DomainRegistry } from '../../types.js';

const CONF_BASE = 'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf';

type ExecutionMode = Extract<JobControlOption, 'async-execute' | 'sync-execute'>;

function summaryOf(process: ProcessDescription, publicUrl: string): ProcessSummary {
  const { inputs: _inputs, outputs: _outputs, ...summary } = process;
  return {
    ...summary,
    links: [
      {
        href: resourceUrl(publicUrl, 'processes', process.id),
        rel: LinkRel.self,
        type: MediaType.json,
        title: 'Process description',
      },
    ],
  };
}

function describe(process: ProcessDescription, publicUrl: string): Process {
  const self = resourceUrl(publicUrl, 'processes', process.id);
  const links: Link[] = [
    { href: self, rel: LinkRel.self, type: MediaType.json, title: 'Process description' },
    { href: resourceUrl(publicUrl, 'processes'), rel: LinkRel.up, type: MediaType.json, title: 'Process list' },
    { href: `${self}/execution`, rel: LinkRel.execute, type: MediaType.json, title: 'Execute endpoint' },
  ];
  return { ...process, links };
}

/** Preference tokens of the Prefer header, lower-cased without parameters. */
function preferences(req: Request): string[] {
  const header = req.header('Prefer');
  if (!header) return [];
  return header
    .split(',')
    .map(part => part.split(/[;=]/)[0].trim().toLowerCase())
    .filter(Boolean);
}

/**
 * Asynchronous unless the client sends `Prefer: wait` (without
 * `respond-async`) or the process cannot run any other way.
 */
function chooseExecutionMode(options: readonly JobControlOption[], prefs: readonly string[]): ExecutionMode | null {
  const canAsync = options.includes('async-execute');
  const canSync = options.includes('sync-execute');
  const wantsSync = prefs.includes('wait') && !prefs.includes('respond-async');
  if (wantsSync && canSync) return 'sync-execute';
  if (canAsync) return 'async-execute';
  if (canSync) return 'sync-execute';
  return null;
}

export function processesDomain(services: Services): DomainRegistry {
  const { config, controller, registry } = services;
  const publicUrl = config.publicUrl;

  return {
    domain: 'processes',
    landingLinks: url => [
      {
        href: resourceUrl(url, 'processes'),
        rel: LinkRel.processes,
        type: MediaType.json,
        title: 'Metadata about the processes',
      },
    ],
    conformance: [`${CONF_BASE}/ogc-process-description`],
    routes: [
      {
        id: 'processes.GET./processes',
        method: 'GET',
        path: '/processes',
        summary: 'List processes',
        tags: ['processes'],
        handler: async (req, res) => {
          const limit = parseLimit(req.query.limit, config.paging.defaultLimit, config.paging.maxLimit);
          if (!limit.ok) throw new ValidationError(limit.error);
          const offset = parseOffset(req.query.offset);
          if (!offset.ok) throw new ValidationError(offset.error);

          const page = await registry.list({ limit: limit.value, offset: offset.value });
          const links = buildPageLinks({
            baseUrl: resourceUrl(publicUrl, 'processes'),
            query: collectQuery(req.query, ['limit', 'offset']),
            total: page.total,
            limit: limit.value,
            offset: offset.value,
          });
          const body: ProcessList = {
            processes: page.processes.map(process => summaryOf(process, publicUrl)),
            links: pageLinkList(links),
            numberMatched: page.total,
            numberReturned: page.processes.length,
          };
          return json(res, body);
        }
      },
      {
        id: 'processes.GET./processes/:processId',
        method: 'GET',
        path: '/processes/:processId',
        summary: 'Describe a process',
        tags: ['processes'],
        handler: async (req, res) => {
          const process = await registry.get(req.params.processId);
          return json(res, describe(process, publicUrl));
        }
      },
      {
        id: 'processes.POST./processes/:processId/execution',
        method: 'POST',
        path: '/processes/:processId/execution',
        summary: 'Execute a process',
        tags: ['processes', 'jobs'],
        handler: async (req, res) => {
          const { processId } = req.params;
          const process = await registry.get(processId);
          const execute = parseExecuteRequest(req.body);
          const prefs = preferences(req);
          const prefersAsync = prefs.includes('respond-async');
          const mode = chooseExecutionMode(process.jobControlOptions, prefs);
          if (!mode) {
            throw new ValidationError(`Process "${processId}" cannot be executed`);
          }

          const job = await controller.submit(processId, execute, { mode });
          const location = resourceUrl(publicUrl, 'jobs', job.jobId);
          if (mode === 'async-execute') {
            if (prefersAsync) res.setHeader('Preference-Applied', 'respond-async');
            res.setHeader('Location', location);
            return json(res, toStatusInfo(job, publicUrl), 202);
          }

          const final = await controller.awaitTerminal(job.jobId, config.jobs.syncTimeoutMs);
          switch (final.status) {
            case 'successful':
              res.setHeader('Location', location);
              return json(res, final.result ?? {});
            case 'failed':
              throw new JobFailedError(final.jobId, final.message);
            case 'dismissed':
              throw new NotFoundError('job', final.jobId);
            default:
              res.setHeader('Location', location);
              return json(res, toStatusInfo(final, publicUrl), 202);
          }
        }
      }
    ]
  };
}
