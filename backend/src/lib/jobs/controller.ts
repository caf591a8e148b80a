import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Execute } from '@geoapi/shared';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../http/errors.js';
import { logger } from '../logger/logger.js';
import type { ProcessRegistry } from '../processes/registry.js';
import { validateInputs } from '../processes/validate.js';
import { runJobTask } from '../../workers/jobWorker.js';
import type { TaskCallbacks } from '../../workers/jobWorker.js';
import type { Job, JobResult } from './model.js';
import { isTerminal } from './model.js';
import type { JobTask, TaskQueue } from './queue.js';
import type { JobStore } from './store.js';

export type StatusListener = (job: Job) => void;

export type JobExecutionControllerOptions = {
  store: JobStore;
  registry: ProcessRegistry;
  queue: TaskQueue;
  heartbeatIntervalMs: number;
  onStatusChange?: StatusListener;
  now?: () => Date;
  generateId?: () => string;
};

export type SubmitOptions = {
  /** Job control mode the caller asked for; checked against the process. */
  mode?: 'async-execute' | 'sync-execute';
};

// A write that lost a race to dismissal or deletion is dropped, not an error.
function isLostRace(err: unknown) {
  return err instanceof InvalidTransitionError || err instanceof NotFoundError;
}

/**
 * Owns the lifetime of every job: creates the record, hands the task to the
 * queue, writes the worker's outcome back, and handles dismissal.
 */
export class JobExecutionController {
  private readonly store: JobStore;
  private readonly registry: ProcessRegistry;
  private readonly queue: TaskQueue;
  private readonly heartbeatIntervalMs: number;
  private readonly onStatusChange?: StatusListener;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly inFlight = new Map<string, AbortController>();

  constructor(options: JobExecutionControllerOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.queue = options.queue;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs;
    this.onStatusChange = options.onStatusChange;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.queue.consume(task => this.runTask(task));
  }

  async submit(processId: string, execute: Execute, options: SubmitOptions = {}): Promise<Job> {
    const process = await this.registry.get(processId);
    const mode = options.mode ?? 'async-execute';
    if (!process.jobControlOptions.includes(mode)) {
      throw new ValidationError(`Process "${processId}" does not support ${mode}`);
    }
    const inputs = execute.inputs ?? {};
    validateInputs(process, inputs);

    const job = await this.store.create({
      jobId: this.generateId(),
      processId,
      inputs,
      created: this.now().toISOString(),
    });

    const abort = new AbortController();
    this.inFlight.set(job.jobId, abort);
    try {
      this.queue.enqueue({ jobId: job.jobId, processId, inputs, signal: abort.signal });
    } catch (err) {
      this.inFlight.delete(job.jobId);
      await this.failQuietly(job.jobId, ['accepted'], 'Job could not be queued');
      throw err;
    }

    logger.info('Job accepted', { jobId: job.jobId, processId });
    this.emit(job);
    return job;
  }

  /**
   * Stops the job if it is still pending or running, then removes the record.
   * Dismissing a finished job only removes it.
   */
  async dismiss(jobId: string): Promise<Job> {
    const job = await this.store.get(jobId);
    this.inFlight.get(jobId)?.abort();

    let final = job;
    if (!isTerminal(job.status)) {
      try {
        final = await this.store.transition(jobId, ['accepted', 'running'], 'dismissed', {
          message: 'Dismissed by request',
        });
        this.emit(final);
      } catch (err) {
        if (!isLostRace(err)) throw err;
        logger.debug('Job finished before dismissal', { jobId });
      }
    }

    try {
      await this.store.delete(jobId);
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
    }
    logger.info('Job dismissed', { jobId, status: final.status });
    return final;
  }

  /**
   * Polls until the job reaches a terminal status or the timeout elapses.
   * Returns the last record seen.
   */
  async awaitTerminal(jobId: string, timeoutMs: number, pollMs = 25): Promise<Job> {
    const deadline = Date.now() + timeoutMs;
    let job = await this.store.get(jobId);
    while (!isTerminal(job.status) && Date.now() < deadline) {
      await sleep(Math.min(pollMs, Math.max(1, deadline - Date.now())));
      job = await this.store.get(jobId);
    }
    return job;
  }

  /** Aborts running work and waits for the queue to drain. */
  async shutdown(): Promise<void> {
    for (const abort of this.inFlight.values()) abort.abort();
    await this.queue.close();
  }

  private async runTask(task: JobTask): Promise<void> {
    const handler = this.registry.handler(task.processId);
    try {
      await runJobTask(task, handler, this.callbacksFor(task.jobId), {
        heartbeatIntervalMs: this.heartbeatIntervalMs,
      });
    } finally {
      this.inFlight.delete(task.jobId);
    }
  }

  private callbacksFor(jobId: string): TaskCallbacks {
    return {
      onStarted: async () => {
        try {
          const job = await this.store.transition(jobId, ['accepted'], 'running', {
            message: 'Job is running',
            progress: 0,
          });
          this.emit(job);
          return true;
        } catch (err) {
          if (!isLostRace(err)) {
            await this.failQuietly(jobId, ['accepted'], 'Job could not be started');
            throw err;
          }
          logger.info('Job no longer pending; skipping', { jobId });
          return false;
        }
      },
      onHeartbeat: progress => this.store.heartbeat(jobId, progress),
      onSuccess: async (result: JobResult) => {
        await this.complete(jobId, () =>
          this.store.transition(jobId, ['running'], 'successful', {
            message: 'Job completed',
            result,
          })
        );
      },
      onFailure: async (message: string) => {
        await this.complete(jobId, () =>
          this.store.transition(jobId, ['running'], 'failed', { message })
        );
      },
    };
  }

  private async complete(jobId: string, write: () => Promise<Job>) {
    try {
      const job = await write();
      logger.info('Job finished', { jobId, status: job.status });
      this.emit(job);
    } catch (err) {
      if (!isLostRace(err)) throw err;
      logger.info('Discarding late job outcome', { jobId, reason: err instanceof Error ? err.message : String(err) });
    }
  }

  private async failQuietly(jobId: string, from: Job['status'][], message: string) {
    try {
      const job = await this.store.transition(jobId, from, 'failed', { message });
      this.emit(job);
    } catch (err) {
      logger.error('Could not mark job as failed', { jobId, error: err });
    }
  }

  private emit(job: Job) {
    if (!this.onStatusChange) return;
    try {
      this.onStatusChange(job);
    } catch (err) {
      logger.warn('Job status listener failed', { jobId: job.jobId, error: err });
    }
  }
}
