import type { Link } from '@geoapi/shared';

export const MediaType = {
  json: 'application/json',
} as const;

export const LinkRel = {
  self: 'self',
  prev: 'prev',
  next: 'next',
  up: 'up',
  conformance: 'http://www.opengis.net/def/rel/ogc/1.0/conformance',
  processes: 'http://www.opengis.net/def/rel/ogc/1.0/processes',
  jobList: 'http://www.opengis.net/def/rel/ogc/1.0/job-list',
  execute: 'http://www.opengis.net/def/rel/ogc/1.0/execute',
  results: 'http://www.opengis.net/def/rel/ogc/1.0/results',
} as const;

export type QueryValue = string | number | boolean | readonly string[];
export type StructuredQuery = Record<string, QueryValue | undefined>;

export type PageLinkInput = {
  /** Absolute URL of the listed resource, without a query string. */
  baseUrl: string;
  /** Every query parameter except limit and offset. */
  query: StructuredQuery;
  total: number;
  limit: number;
  offset: number;
};

export type PageLinks = {
  self: Link;
  prev?: Link;
  next?: Link;
};

/**
 * Joins path segments onto an absolute base URL, escaping each segment.
 */
export function resourceUrl(base: string, ...segments: string[]): string {
  const trimmed = base.replace(/\/+$/, '');
  if (!segments.length) return trimmed;
  return `${trimmed}/${segments.map(encodeURIComponent).join('/')}`;
}

/**
 * Serializes a structured query in key insertion order. Arrays repeat the key,
 * undefined values are left out.
 */
export function buildQueryString(query: StructuredQuery): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      params.append(key, String(value));
      continue;
    }
    for (const item of value) params.append(key, item);
  }
  return params.toString();
}

export function withQuery(baseUrl: string, query: StructuredQuery): string {
  const qs = buildQueryString(query);
  return qs ? `${baseUrl}?${qs}` : baseUrl;
}

function pageLink(input: PageLinkInput, rel: string, offset: number): Link {
  const { limit: _limit, offset: _offset, ...rest } = input.query;
  return {
    href: withQuery(input.baseUrl, { ...rest, limit: input.limit, offset }),
    rel,
    type: MediaType.json,
  };
}

export function buildPageLinks(input: PageLinkInput): PageLinks {
  const { total, limit, offset } = input;
  const links: PageLinks = { self: pageLink(input, LinkRel.self, offset) };
  if (offset > 0) {
    links.prev = pageLink(input, LinkRel.prev, Math.max(0, offset - limit));
  }
  if (offset + limit < total) {
    links.next = pageLink(input, LinkRel.next, offset + limit);
  }
  return links;
}

export function pageLinkList(links: PageLinks): Link[] {
  const out = [links.self];
  if (links.prev) out.push(links.prev);
  if (links.next) out.push(links.next);
  return out;
}
