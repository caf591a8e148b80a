import type { Services } from '../app/services.js';
import type { DomainRegistry } from './types.js';

import { systemDomain } from './domains/system/index.js';
import { processesDomain } from './domains/processes/index.js';
import { jobsDomain } from './domains/jobs/index.js';

export function buildRegistry(services: Services): DomainRegistry[] {
  const domains = [
    processesDomain(services),
    jobsDomain(services)
  ];
  return [systemDomain(services, domains), ...domains];
}
