import { Router } from 'express';
import type { RequestHandler } from 'express';
import type { Handler } from '../lib/http/types.js';
import type { DomainRegistry, RouteDef } from './types.js';

// Rejected handler promises go to the error middleware.
function wrap(handler: Handler): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res, next))
      .catch(next);
  };
}

function applyRoute(router: Router, r: RouteDef) {
  const handler = wrap(r.handler);
  switch (r.method) {
    case 'GET':
      router.get(r.path, handler);
      break;
    case 'POST':
      router.post(r.path, handler);
      break;
    case 'PUT':
      router.put(r.path, handler);
      break;
    case 'PATCH':
      router.patch(r.path, handler);
      break;
    case 'DELETE':
      router.delete(r.path, handler);
      break;
  }
}

export function buildApiRouter(domains: DomainRegistry[]) {
  const router = Router();
  for (const domain of domains) {
    for (const r of domain.routes) applyRoute(router, r);
  }
  return router;
}
