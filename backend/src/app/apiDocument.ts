import type { Conformance, LandingPage, Link } from '@geoapi/shared';
import type { ApiConfig } from '../lib/config.js';
import type { DomainRegistry } from '../registry/types.js';

export type ApiDocument = {
  landing: Readonly<LandingPage>;
  conformance: Readonly<Conformance>;
};

/**
 * Landing page and conformance declaration, assembled once from what each
 * domain declares. Both are frozen; handlers serve them as is.
 */
export function buildApiDocument(config: ApiConfig, domains: readonly DomainRegistry[]): ApiDocument {
  const links: Link[] = [];
  const conformsTo: string[] = [];
  for (const domain of domains) {
    links.push(...(domain.landingLinks?.(config.publicUrl) ?? []));
    for (const uri of domain.conformance ?? []) {
      if (!conformsTo.includes(uri)) conformsTo.push(uri);
    }
  }

  const landing: LandingPage = {
    title: config.title,
    description: config.description,
    links: links.map(link => Object.freeze({ ...link })),
  };
  Object.freeze(landing.links);
  const conformance: Conformance = { conformsTo };
  Object.freeze(conformsTo);

  return Object.freeze({
    landing: Object.freeze(landing),
    conformance: Object.freeze(conformance),
  });
}
