import type { Db } from '../db/client.js';
import { runStatement } from '../db/errors.js';
import { parseJsonObject } from '../db/json.js';
import { ConflictError, InvalidTransitionError, NotFoundError } from '../http/errors.js';
import type { Job, JobFilter, JobPage, JobStatus, NewJob, PageRequest, TransitionPatch } from './model.js';
import { canTransition, isJobStatus, isTerminal } from './model.js';

/**
 * Persisted job records. Every status change goes through `transition`, a
 * single conditional write: two callers racing on the same job cannot both
 * succeed.
 */
export interface JobStore {
  /** Inserts the job as `accepted`. ConflictError if the id exists. */
  create(job: NewJob): Promise<Job>;
  get(jobId: string): Promise<Job>;
  /** Ordered by creation time, then id. `total` ignores paging. */
  list(filter: JobFilter, page: PageRequest): Promise<JobPage>;
  /**
   * Moves the job to `to` if its current status is one of `from`.
   * InvalidTransitionError when the current status is not allowed (or the
   * target is unreachable from every listed status), NotFoundError when the
   * record is gone.
   */
  transition(jobId: string, from: readonly JobStatus[], to: JobStatus, patch?: TransitionPatch): Promise<Job>;
  /** Removes the record whatever its status. NotFoundError if absent. */
  delete(jobId: string): Promise<void>;
  /** Refreshes the lease of a running job. False once it stopped running. */
  heartbeat(jobId: string, progress?: number): Promise<boolean>;
  /** Running jobs whose lease is older than `before`. */
  listStalled(before: Date): Promise<Job[]>;
}

type JobRow = {
  job_id: string;
  process_id: string;
  status: string;
  message: string | null;
  progress: number | null;
  inputs: string;
  results: string | null;
  created: string;
  started: string | null;
  finished: string | null;
  updated: string;
  heartbeat_at: string | null;
};

function toJob(row: JobRow): Job {
  if (!isJobStatus(row.status)) {
    throw new Error(`Job ${row.job_id} has unknown status "${row.status}"`);
  }
  return {
    jobId: row.job_id,
    processId: row.process_id,
    status: row.status,
    message: row.message,
    progress: row.progress,
    inputs: parseJsonObject(row.inputs, 'jobs.inputs'),
    result: row.results === null ? null : parseJsonObject(row.results, 'jobs.results'),
    created: row.created,
    started: row.started,
    finished: row.finished,
    updated: row.updated,
    heartbeatAt: row.heartbeat_at,
  };
}

function placeholders(count: number) {
  return new Array(count).fill('?').join(', ');
}

function clampProgress(progress: number | undefined): number | null {
  if (progress === undefined || !Number.isFinite(progress)) return null;
  return Math.min(100, Math.max(0, Math.round(progress)));
}

export type SqliteJobStoreOptions = {
  now?: () => Date;
};

export class SqliteJobStore implements JobStore {
  private readonly now: () => Date;

  constructor(private readonly db: Db, options: SqliteJobStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(job: NewJob): Promise<Job> {
    const row = runStatement('job create', () =>
      this.db
        .prepare<unknown[], JobRow>(
          `INSERT INTO jobs (job_id, process_id, status, inputs, created, updated)
           VALUES (?, ?, 'accepted', ?, ?, ?)
           RETURNING *`
        )
        .get(job.jobId, job.processId, JSON.stringify(job.inputs), job.created, job.created)
    );
    if (!row) {
      throw new ConflictError(`Job "${job.jobId}" could not be created`);
    }
    return toJob(row);
  }

  async get(jobId: string): Promise<Job> {
    const row = runStatement('job read', () =>
      this.db.prepare<unknown[], JobRow>('SELECT * FROM jobs WHERE job_id = ?').get(jobId)
    );
    if (!row) throw new NotFoundError('job', jobId);
    return toJob(row);
  }

  async list(filter: JobFilter, page: PageRequest): Promise<JobPage> {
    const where: string[] = [];
    const params: unknown[] = [];
    if (filter.processId !== undefined) {
      where.push('process_id = ?');
      params.push(filter.processId);
    }
    if (filter.status && filter.status.length > 0) {
      where.push(`status IN (${placeholders(filter.status.length)})`);
      params.push(...filter.status);
    }
    const clause = where.length ? `WHERE ${where.join(' AND ')}` : '';

    // One read transaction so the count and the page see the same snapshot.
    const read = this.db.transaction(() => {
      const counted = this.db
        .prepare<unknown[], { count: number }>(`SELECT COUNT(*) AS count FROM jobs ${clause}`)
        .get(...params);
      const rows = this.db
        .prepare<unknown[], JobRow>(
          `SELECT * FROM jobs ${clause} ORDER BY created ASC, job_id ASC LIMIT ? OFFSET ?`
        )
        .all(...params, page.limit, page.offset);
      return { total: counted?.count ?? 0, rows };
    });

    const { total, rows } = runStatement('job list', () => read());
    return { jobs: rows.map(toJob), total };
  }

  async transition(
    jobId: string,
    from: readonly JobStatus[],
    to: JobStatus,
    patch: TransitionPatch = {}
  ): Promise<Job> {
    const allowed = from.filter(status => canTransition(status, to));
    if (allowed.length === 0) {
      throw new InvalidTransitionError(jobId, from.length === 1 ? from[0] : null, to);
    }
    if (to === 'successful' && patch.result === undefined) {
      throw new Error('A transition to successful must attach a result');
    }
    if (to !== 'successful' && patch.result !== undefined) {
      throw new Error(`A transition to ${to} cannot attach a result`);
    }

    const now = this.now().toISOString();
    const progress = to === 'successful' ? 100 : clampProgress(patch.progress);
    const results = patch.result === undefined ? null : JSON.stringify(patch.result);
    const row = runStatement('job transition', () =>
      this.db
        .prepare<unknown[], JobRow>(
          `UPDATE jobs SET
             status = ?,
             message = COALESCE(?, message),
             progress = COALESCE(?, progress),
             results = ?,
             started = COALESCE(?, started),
             finished = COALESCE(?, finished),
             updated = ?,
             heartbeat_at = ?
           WHERE job_id = ? AND status IN (${placeholders(allowed.length)})
           RETURNING *`
        )
        .get(
          to,
          patch.message ?? null,
          progress,
          results,
          to === 'running' ? now : null,
          isTerminal(to) ? now : null,
          now,
          to === 'running' ? now : null,
          jobId,
          ...allowed
        )
    );
    if (row) return toJob(row);

    const current = runStatement('job read', () =>
      this.db.prepare<unknown[], { status: string }>('SELECT status FROM jobs WHERE job_id = ?').get(jobId)
    );
    if (!current) throw new NotFoundError('job', jobId);
    throw new InvalidTransitionError(jobId, current.status, to);
  }

  async delete(jobId: string): Promise<void> {
    const info = runStatement('job delete', () =>
      this.db.prepare('DELETE FROM jobs WHERE job_id = ?').run(jobId)
    );
    if (info.changes === 0) throw new NotFoundError('job', jobId);
  }

  async heartbeat(jobId: string, progress?: number): Promise<boolean> {
    const now = this.now().toISOString();
    const pct = clampProgress(progress);
    const info = runStatement('job heartbeat', () =>
      this.db
        .prepare(
          `UPDATE jobs SET
             heartbeat_at = ?,
             progress = COALESCE(?, progress),
             updated = CASE WHEN ? IS NULL THEN updated ELSE ? END
           WHERE job_id = ? AND status = 'running'`
        )
        .run(now, pct, pct, now, jobId)
    );
    return info.changes > 0;
  }

  async listStalled(before: Date): Promise<Job[]> {
    const rows = runStatement('stalled job scan', () =>
      this.db
        .prepare<unknown[], JobRow>(
          `SELECT * FROM jobs
           WHERE status = 'running' AND (heartbeat_at IS NULL OR heartbeat_at < ?)
           ORDER BY created ASC, job_id ASC`
        )
        .all(before.toISOString())
    );
    return rows.map(toJob);
  }
}
