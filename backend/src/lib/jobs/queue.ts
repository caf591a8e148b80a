import { logger } from '../logger/logger.js';
import type { JobInputs } from './model.js';

/** One unit of queued work: everything a worker needs to run a job. */
export interface JobTask {
  jobId: string;
  processId: string;
  inputs: JobInputs;
  signal: AbortSignal;
}

export type TaskRunner = (task: JobTask) => Promise<void>;

/**
 * Hand-off between the execution controller and the workers. The controller
 * enqueues; whoever called `consume` runs the tasks.
 */
export interface TaskQueue {
  enqueue(task: JobTask): void;
  consume(runner: TaskRunner): void;
  /** Resolves once nothing is waiting or running. */
  idle(): Promise<void>;
  /** Stops accepting tasks and drops the ones not started yet. */
  close(): Promise<void>;
}

/**
 * In-process FIFO queue running at most `concurrency` tasks at a time.
 * Tasks are detached from the request that enqueued them.
 */
export class PooledTaskQueue implements TaskQueue {
  private readonly waiting: JobTask[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private runner: TaskRunner | null = null;
  private active = 0;
  private closed = false;

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error('Task queue concurrency must be a positive integer');
    }
  }

  enqueue(task: JobTask): void {
    if (this.closed) {
      throw new Error('Task queue is closed');
    }
    this.waiting.push(task);
    this.pump();
  }

  consume(runner: TaskRunner): void {
    if (this.runner) {
      throw new Error('Task queue already has a consumer');
    }
    this.runner = runner;
    this.pump();
  }

  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    this.closed = true;
    const dropped = this.waiting.splice(0, this.waiting.length);
    if (dropped.length) {
      logger.warn('Task queue closed with queued tasks', { dropped: dropped.map(t => t.jobId) });
    }
    await this.idle();
  }

  private isIdle() {
    return this.active === 0 && this.waiting.length === 0;
  }

  private pump() {
    const runner = this.runner;
    if (!runner) return;

    while (this.active < this.concurrency) {
      const task = this.waiting.shift();
      if (!task) break;
      this.active += 1;
      void runner(task)
        .catch(err => {
          logger.error('Task runner failed', { jobId: task.jobId, processId: task.processId, error: err });
        })
        .finally(() => {
          this.active -= 1;
          this.pump();
          if (this.isIdle()) {
            for (const resolve of this.idleWaiters.splice(0, this.idleWaiters.length)) resolve();
          }
        });
    }
  }
}

/**
 * Queue that only runs tasks when told to. Lets tests decide exactly when a
 * job's work happens.
 */
export class ManualTaskQueue implements TaskQueue {
  readonly pending: JobTask[] = [];
  private runner: TaskRunner | null = null;

  enqueue(task: JobTask): void {
    this.pending.push(task);
  }

  consume(runner: TaskRunner): void {
    this.runner = runner;
  }

  async runNext(): Promise<JobTask | undefined> {
    const task = this.pending.shift();
    if (!task) return undefined;
    if (!this.runner) {
      throw new Error('Task queue has no consumer');
    }
    await this.runner(task);
    return task;
  }

  async runAll(): Promise<number> {
    let count = 0;
    while (await this.runNext()) count += 1;
    return count;
  }

  async idle(): Promise<void> {}

  async close(): Promise<void> {
    this.pending.length = 0;
  }
}
