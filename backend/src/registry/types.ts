import type { Link } from '@geoapi/shared';
import type { HttpMethod, Handler } from '../lib/http/types.js';

export type RouteSpec = {
  id: string;
  method: HttpMethod;
  path: string;
  summary?: string;
  tags?: string[];
};

export type RouteDef = RouteSpec & { handler: Handler };

export type DomainRegistry = {
  domain: string;
  routes: RouteDef[];
  /** Links this domain adds to the landing page. */
  landingLinks?: (publicUrl: string) => Link[];
  /** Conformance classes this domain implements. */
  conformance?: string[];
};
