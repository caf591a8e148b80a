import path from 'node:path';

export type ApiConfig = {
  port: number;
  /** Public origin used when building absolute links. */
  baseUrl: string;
  /** Path prefix every route is mounted under ('' for the root). */
  apiPrefix: string;
  /** baseUrl + apiPrefix */
  publicUrl: string;
  corsOrigins: string[] | '*';
  databasePath: string;
  title: string;
  description: string;
  paging: {
    defaultLimit: number;
    maxLimit: number;
  };
  jobs: {
    concurrency: number;
    heartbeatIntervalMs: number;
    stalledThresholdMs: number;
    stalledSweepMs: number;
    syncTimeoutMs: number;
  };
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid environment configuration: ${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function normalizePrefix(raw: string | undefined): string {
  const trimmed = (raw ?? '').trim().replace(/\/+$/, '');
  if (!trimmed) return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function loadConfig(env: Env = process.env): ApiConfig {
  const port = readInt(env, 'PORT', 4000, 0);
  const baseUrl = (env.API_BASE_URL ?? `http://localhost:${port}`).replace(/\/+$/, '');
  const apiPrefix = normalizePrefix(env.API_PREFIX);

  const corsOriginEnv = env.CORS_ORIGIN?.trim();
  const corsOrigins = !corsOriginEnv || corsOriginEnv === '*'
    ? '*'
    : corsOriginEnv.split(',').map(origin => origin.trim()).filter(Boolean);

  const defaultLimit = readInt(env, 'PAGE_LIMIT_DEFAULT', 10, 1);
  const maxLimit = readInt(env, 'PAGE_LIMIT_MAX', 1000, 1);
  if (defaultLimit > maxLimit) {
    throw new Error('Invalid environment configuration: PAGE_LIMIT_DEFAULT cannot exceed PAGE_LIMIT_MAX');
  }

  const databasePath = env.DATABASE_PATH === ':memory:'
    ? ':memory:'
    : path.resolve(env.DATABASE_PATH ?? path.join(process.cwd(), 'data', 'geoapi.db'));

  return {
    port,
    baseUrl,
    apiPrefix,
    publicUrl: `${baseUrl}${apiPrefix}`,
    corsOrigins,
    databasePath,
    title: env.API_TITLE ?? 'OGC API - Processes',
    description: env.API_DESCRIPTION ?? 'Asynchronous process execution and job monitoring',
    paging: {
      defaultLimit,
      maxLimit,
    },
    jobs: {
      concurrency: readInt(env, 'JOB_CONCURRENCY', 4, 1),
      heartbeatIntervalMs: readInt(env, 'JOB_HEARTBEAT_INTERVAL_MS', 5000, 10),
      stalledThresholdMs: readInt(env, 'JOB_STALLED_THRESHOLD_MS', 60000, 100),
      stalledSweepMs: readInt(env, 'JOB_STALLED_SWEEP_MS', 30000, 100),
      syncTimeoutMs: readInt(env, 'SYNC_EXECUTION_TIMEOUT_MS', 30000, 0),
    },
  };
}
