import express from 'express';
import cors from 'cors';

import { buildApiRouter } from '../registry/buildApiRouter.js';
import { buildRegistry } from '../registry/registry.js';
import { ApiError, NotFoundError, ValidationError, isApiError } from '../lib/http/errors.js';
import { sendException } from '../lib/http/json.js';
import { logger } from '../lib/logger/logger.js';
import type { Services } from './services.js';

// body-parser failures carry the HTTP status they want to answer with.
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createApp(services: Services) {
  const { config } = services;
  const app = express();
  app.disable('x-powered-by');

  app.use(cors({
    origin: config.corsOrigins === '*' ? '*' : config.corsOrigins,
    exposedHeaders: ['Location', 'Preference-Applied', 'Retry-After']
  }));

  app.use(express.json({ limit: '2mb' }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const durationMs = Date.now() - start;
      const level = res.statusCode >= 500 ? 'warn' : 'info';
      logger.log(level, 'request', {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs
      });
    });
    next();
  });

  app.use(config.apiPrefix || '/', buildApiRouter(buildRegistry(services)));

  app.use((req, res) => {
    sendException(res, new NotFoundError('resource', req.path), req.originalUrl);
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (res.headersSent) {
      logger.error('Error after response started', { method: req.method, url: req.originalUrl, error: err });
      res.end();
      return;
    }
    if (isApiError(err)) {
      if (err.status >= 500) {
        logger.warn('Request failed', { method: req.method, url: req.originalUrl, error: err });
      }
      sendException(res, err, req.originalUrl);
      return;
    }
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      const message = err instanceof Error ? err.message : 'Malformed request';
      const error = clientStatus === 400
        ? new ValidationError(message)
        : new ApiError(message, clientStatus, 'about:blank', 'Bad request');
      sendException(res, error, req.originalUrl);
      return;
    }
    logger.error('Unhandled request error', { method: req.method, url: req.originalUrl, error: err });
    sendException(res, new ApiError('Internal server error', 500, 'about:blank', 'Internal server error'), req.originalUrl);
  });

  return app;
}
