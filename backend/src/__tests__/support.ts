import assert from 'node:assert';
import type { Server } from 'node:http';
import { createApp } from '../app/createApp.js';
import { createServices } from '../app/services.js';
import type { ServiceOverrides, Services } from '../app/services.js';
import { loadConfig } from '../lib/config.js';
import type { ApiConfig } from '../lib/config.js';
import { isRecord } from '../lib/db/json.js';

process.env.LOG_LEVEL ??= 'silent';

export const TEST_BASE_URL = 'http://api.test';

export function testConfig(env: Record<string, string> = {}): ApiConfig {
  return loadConfig({ DATABASE_PATH: ':memory:', API_BASE_URL: TEST_BASE_URL, ...env });
}

export function testServices(overrides: ServiceOverrides = {}, env: Record<string, string> = {}): Services {
  return createServices(testConfig(env), { onStatusChange: () => {}, ...overrides });
}

export type RunningApp = {
  server: Server;
  url: string;
  close(): Promise<void>;
};

export async function startApp(services: Services): Promise<RunningApp> {
  const app = createApp(services);
  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const addr = server.address();
  const port = typeof addr === 'string' || addr === null ? 80 : addr.port;
  return {
    server,
    url: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      }),
  };
}

export function fixedClock(start = '2026-01-01T00:00:00.000Z') {
  let current = new Date(start);
  return {
    now: () => current,
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
  };
}

export type RequestOptions = {
  method?: string;
  body?: unknown;
  rawBody?: string;
  headers?: Record<string, string>;
};

export type TestResponse = {
  status: number;
  headers: Headers;
  body: unknown;
};

export async function request(baseUrl: string, path: string, options: RequestOptions = {}): Promise<TestResponse> {
  const headers: Record<string, string> = { Accept: 'application/json', ...options.headers };
  let body: string | undefined;
  if (options.rawBody !== undefined) {
    body = options.rawBody;
  } else if (options.body !== undefined) {
    body = JSON.stringify(options.body);
  }
  if (body !== undefined) headers['Content-Type'] = 'application/json';

  const res = await fetch(`${baseUrl}${path}`, {
    method: options.method ?? (body !== undefined ? 'POST' : 'GET'),
    headers,
    body,
  });
  const contentType = res.headers.get('content-type') ?? '';
  const text = await res.text();
  const parsed: unknown = contentType.includes('json') && text ? JSON.parse(text) : text;
  return { status: res.status, headers: res.headers, body: parsed };
}

export function asObject(value: unknown): Record<string, unknown> {
  assert.ok(isRecord(value), `expected a JSON object, got ${JSON.stringify(value)}`);
  return value;
}

export function asList(value: unknown): unknown[] {
  assert.ok(Array.isArray(value), `expected a JSON array, got ${JSON.stringify(value)}`);
  return value;
}

export function linkHref(links: unknown, rel: string): string | undefined {
  const match = asList(links).map(asObject).find(link => link.rel === rel);
  return typeof match?.href === 'string' ? match.href : undefined;
}
