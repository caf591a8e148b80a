import type { Exception } from '@geoapi/shared';

const EXCEPTION_BASE = 'http://www.opengis.net/def/exceptions/ogcapi-processes-1/1.0';

export class ApiError extends Error {
  status: number;
  type: string;
  title: string;

  constructor(message: string, status: number, type: string, title: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.type = type;
    this.title = title;
  }

  toException(instance?: string): Exception {
    return {
      type: this.type,
      title: this.title,
      status: this.status,
      detail: this.message,
      ...(instance ? { instance } : {}),
    };
  }
}

export type NotFoundKind = 'process' | 'job' | 'resource';

export class NotFoundError extends ApiError {
  constructor(kind: NotFoundKind, id: string) {
    const type = kind === 'process'
      ? `${EXCEPTION_BASE}/no-such-process`
      : kind === 'job'
        ? `${EXCEPTION_BASE}/no-such-job`
        : `${EXCEPTION_BASE}/not-found`;
    const label = kind === 'resource' ? 'Resource' : kind === 'job' ? 'Job' : 'Process';
    super(`${label} "${id}" not found`, 404, type, `${label} not found`);
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super(message, 409, `${EXCEPTION_BASE}/conflict`, 'Conflict');
  }
}

export class InvalidTransitionError extends ApiError {
  from: string | null;
  to: string;

  constructor(jobId: string, from: string | null, to: string) {
    const detail = from
      ? `Job "${jobId}" cannot move from ${from} to ${to}`
      : `No status can move job "${jobId}" to ${to}`;
    super(detail, 409, `${EXCEPTION_BASE}/invalid-transition`, 'Invalid status transition');
    this.from = from;
    this.to = to;
  }
}

export class ResultsNotReadyError extends ApiError {
  constructor(message: string) {
    super(message, 409, `${EXCEPTION_BASE}/result-not-ready`, 'Results not ready');
  }
}

export class ValidationError extends ApiError {
  constructor(message: string) {
    super(message, 400, `${EXCEPTION_BASE}/invalid-parameter-value`, 'Invalid parameter value');
  }
}

export class JobFailedError extends ApiError {
  constructor(jobId: string, message: string | null) {
    super(
      message ? `Job "${jobId}" failed: ${message}` : `Job "${jobId}" failed`,
      500,
      `${EXCEPTION_BASE}/job-failed`,
      'Job failed'
    );
  }
}

export class StorageUnavailableError extends ApiError {
  retryAfterSeconds: number;

  constructor(operation: string, cause?: unknown) {
    super(
      `Storage unavailable during ${operation}`,
      503,
      `${EXCEPTION_BASE}/storage-unavailable`,
      'Storage unavailable'
    );
    this.retryAfterSeconds = 5;
    if (cause !== undefined) this.cause = cause;
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}
