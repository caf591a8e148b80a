import { InvalidTransitionError, NotFoundError } from '../lib/http/errors.js';
import type { Job } from '../lib/jobs/model.js';
import type { JobStore } from '../lib/jobs/store.js';
import { logger } from '../lib/logger/logger.js';

export const RESTART_MESSAGE = 'Server restarted before the job completed';
export const STALLED_MESSAGE = 'Job stopped reporting progress';

export type StalledSweepOptions = {
  stalledThresholdMs: number;
  stalledSweepMs: number;
  onFailed?: (job: Job) => void;
  now?: () => Date;
};

async function failJobs(store: JobStore, jobs: Job[], message: string, onFailed?: (job: Job) => void) {
  let failed = 0;
  for (const job of jobs) {
    try {
      const updated = await store.transition(job.jobId, ['accepted', 'running'], 'failed', { message });
      failed += 1;
      onFailed?.(updated);
    } catch (err) {
      if (err instanceof InvalidTransitionError || err instanceof NotFoundError) {
        // Finished or dismissed since the scan.
        continue;
      }
      throw err;
    }
  }
  return failed;
}

/**
 * Tasks live in process memory, so anything still pending when the server
 * starts was lost with the previous process.
 */
export async function recoverOrphanedJobs(store: JobStore, onFailed?: (job: Job) => void): Promise<number> {
  const orphaned: Job[] = [];
  const pageSize = 500;
  for (let offset = 0; ; offset += pageSize) {
    const page = await store.list({ status: ['accepted', 'running'] }, { limit: pageSize, offset });
    orphaned.push(...page.jobs);
    if (offset + pageSize >= page.total) break;
  }
  const failed = await failJobs(store, orphaned, RESTART_MESSAGE, onFailed);
  if (failed > 0) {
    logger.warn('Failed jobs orphaned by a restart', { failed });
  }
  return failed;
}

/** One pass: fails running jobs whose heartbeat is older than the threshold. */
export async function sweepStalledJobs(store: JobStore, options: StalledSweepOptions): Promise<number> {
  const now = options.now ?? (() => new Date());
  const before = new Date(now().getTime() - options.stalledThresholdMs);
  const stalled = await store.listStalled(before);
  if (stalled.length === 0) return 0;
  const failed = await failJobs(store, stalled, STALLED_MESSAGE, options.onFailed);
  logger.warn('Failed stalled jobs', { failed, jobIds: stalled.map(job => job.jobId) });
  return failed;
}

export function startStalledJobSweep(store: JobStore, options: StalledSweepOptions): () => void {
  let running = false;
  const timer = setInterval(() => {
    if (running) return;
    running = true;
    sweepStalledJobs(store, options)
      .catch(err => {
        logger.error('Stalled job sweep failed', { error: err });
      })
      .finally(() => {
        running = false;
      });
  }, options.stalledSweepMs);
  timer.unref();
  return () => clearInterval(timer);
}
