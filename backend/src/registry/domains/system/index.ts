import type { Link } from '@geoapi/shared';
import type { Services } from '../../../app/services.js';
import { buildApiDocument } from '../../../app/apiDocument.js';
import { pingDatabase } from '../../../lib/db/client.js';
import { json } from '../../../lib/http/json.js';
import { LinkRel, MediaType, resourceUrl } from '../../../lib/http/links.js';
import { logger } from '../../../lib/logger/logger.js';
import type { DomainRegistry } from '../../types.js';

const CONF_BASE = 'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf';

function systemLinks(publicUrl: string): Link[] {
  return [
    { href: `${publicUrl}/`, rel: LinkRel.self, type: MediaType.json, title: 'This document' },
    {
      href: resourceUrl(publicUrl, 'conformance'),
      rel: LinkRel.conformance,
      type: MediaType.json,
      title: 'Conformance classes implemented by this server',
    },
  ];
}

export function systemDomain(services: Services, siblings: readonly DomainRegistry[]): DomainRegistry {
  const own: DomainRegistry = {
    domain: 'system',
    routes: [],
    landingLinks: systemLinks,
    conformance: [`${CONF_BASE}/core`, `${CONF_BASE}/json`],
  };
  const document = buildApiDocument(services.config, [own, ...siblings]);

  return {
    ...own,
    routes: [
      {
        id: 'system.GET./',
        method: 'GET',
        path: '/',
        summary: 'Landing page',
        tags: ['system'],
        handler: (_req, res) => json(res, document.landing)
      },
      {
        id: 'system.GET./conformance',
        method: 'GET',
        path: '/conformance',
        summary: 'Conformance declaration',
        tags: ['system'],
        handler: (_req, res) => json(res, document.conformance)
      },
      {
        id: 'system.GET./health',
        method: 'GET',
        path: '/health',
        summary: 'Liveness',
        tags: ['system'],
        handler: (_req, res) => json(res, { ok: true })
      },
      {
        id: 'system.GET./health/db',
        method: 'GET',
        path: '/health/db',
        summary: 'Database health',
        tags: ['system'],
        handler: (_req, res) => {
          const start = Date.now();
          try {
            if (!pingDatabase(services.db)) throw new Error('Unexpected ping result');
            return json(res, { ok: true, dbLatencyMs: Date.now() - start });
          } catch (err) {
            logger.error('Database check failed', { error: err });
            return json(res, { ok: false, error: err instanceof Error ? err.message : String(err) }, 503);
          }
        }
      }
    ]
  };
}
