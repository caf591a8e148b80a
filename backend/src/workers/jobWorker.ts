import type { JobTask } from '../lib/jobs/queue.js';
import type { JobResult } from '../lib/jobs/model.js';
import type { ProcessHandler } from '../lib/processes/types.js';
import { logger } from '../lib/logger/logger.js';

/**
 * What a worker reports back while running a task. The execution controller
 * implements these and owns every status write they cause.
 */
export interface TaskCallbacks {
  /** accepted -> running. False means the job is gone or dismissed: skip it. */
  onStarted(): Promise<boolean>;
  /** Lease refresh. False once the job stopped running. */
  onHeartbeat(progress?: number): Promise<boolean>;
  /** running -> successful */
  onSuccess(result: JobResult): Promise<void>;
  /** running -> failed */
  onFailure(message: string): Promise<void>;
}

export type RunTaskOptions = {
  heartbeatIntervalMs: number;
};

function toErrorMessage(err: unknown) {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : JSON.stringify(err);
}

function isRecord(value: unknown): value is JobResult {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Runs one job task to completion. Handler errors are written back as a
 * failed status; nothing thrown by the handler escapes.
 */
export async function runJobTask(
  task: JobTask,
  handler: ProcessHandler | undefined,
  callbacks: TaskCallbacks,
  options: RunTaskOptions
): Promise<void> {
  if (task.signal.aborted) {
    logger.debug('Skipping dismissed job', { jobId: task.jobId });
    return;
  }

  const started = await callbacks.onStarted();
  if (!started) return;

  let lastProgress: number | undefined;
  const heartbeatTimer = setInterval(() => {
    callbacks.onHeartbeat(lastProgress).catch(err => {
      logger.warn('Job heartbeat failed', { jobId: task.jobId, error: err });
    });
  }, options.heartbeatIntervalMs);
  heartbeatTimer.unref();

  try {
    if (!handler) {
      throw new Error(`No implementation is registered for process "${task.processId}"`);
    }
    const result: unknown = await handler(task.inputs, {
      jobId: task.jobId,
      signal: task.signal,
      reportProgress: async percent => {
        lastProgress = percent;
        await callbacks.onHeartbeat(percent);
      },
    });
    if (task.signal.aborted) {
      logger.info('Discarding result of dismissed job', { jobId: task.jobId });
      return;
    }
    if (!isRecord(result)) {
      throw new Error(`Process "${task.processId}" returned a result that is not a JSON object`);
    }
    await callbacks.onSuccess(result);
  } catch (err) {
    if (task.signal.aborted) {
      logger.info('Job stopped after dismissal', { jobId: task.jobId });
      return;
    }
    logger.warn('Job failed', { jobId: task.jobId, processId: task.processId, error: err });
    await callbacks.onFailure(toErrorMessage(err));
  } finally {
    clearInterval(heartbeatTimer);
  }
}
