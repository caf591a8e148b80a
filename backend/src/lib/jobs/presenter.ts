import type { Link, StatusInfo } from '@geoapi/shared';
import { LinkRel, MediaType, resourceUrl } from '../http/links.js';
import type { Job } from './model.js';

export function jobLinks(job: Job, publicUrl: string): Link[] {
  const self = resourceUrl(publicUrl, 'jobs', job.jobId);
  const links: Link[] = [
    { href: self, rel: LinkRel.self, type: MediaType.json, title: 'Job status' },
  ];
  if (job.status === 'successful') {
    links.push({
      href: resourceUrl(publicUrl, 'jobs', job.jobId, 'results'),
      rel: LinkRel.results,
      type: MediaType.json,
      title: 'Job results',
    });
  }
  return links;
}

/** Status document without links, as pushed over the websocket. */
export function toStatusCore(job: Job): Omit<StatusInfo, 'links'> {
  const info: Omit<StatusInfo, 'links'> = {
    jobID: job.jobId,
    processID: job.processId,
    type: 'process',
    status: job.status,
    created: job.created,
    updated: job.updated,
  };
  if (job.message !== null) info.message = job.message;
  if (job.started !== null) info.started = job.started;
  if (job.finished !== null) info.finished = job.finished;
  if (job.progress !== null) info.progress = job.progress;
  return info;
}

export function toStatusInfo(job: Job, publicUrl: string): StatusInfo {
  return { ...toStatusCore(job), links: jobLinks(job, publicUrl) };
}
