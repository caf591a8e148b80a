import type { Response } from 'express';
import type { ApiError } from './errors.js';
import { StorageUnavailableError } from './errors.js';

export function json(res: Response, data: unknown, status = 200) {
  res.status(status).type('application/json').send(JSON.stringify(data));
}

export function sendException(res: Response, err: ApiError, instance?: string) {
  if (err instanceof StorageUnavailableError) {
    res.setHeader('Retry-After', String(err.retryAfterSeconds));
  }
  const body = JSON.stringify(err.toException(instance));
  res.status(err.status).type('application/problem+json').send(body);
}
