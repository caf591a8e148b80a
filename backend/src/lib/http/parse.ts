import type { StructuredQuery } from './links.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

function normalizeScalar(value: unknown): string | null {
  if (Array.isArray(value)) {
    return normalizeScalar(value[0]);
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length ? trimmed : null;
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) return null;
    return String(value);
  }
  return null;
}

export function parseLimit(value: unknown, fallback: number, max: number, label = 'limit'): ParseResult<number> {
  if (value === undefined || value === null || value === '') {
    return { ok: true, value: fallback };
  }
  const raw = normalizeScalar(value);
  if (!raw) return { ok: false, error: `${label} must be a positive integer` };
  const num = Number(raw);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    return { ok: false, error: `${label} must be a positive integer` };
  }
  return { ok: true, value: Math.min(num, max) };
}

export function parseOffset(value: unknown, label = 'offset'): ParseResult<number> {
  if (value === undefined || value === null || value === '') {
    return { ok: true, value: 0 };
  }
  const raw = normalizeScalar(value);
  if (!raw || !/^\d+$/.test(raw)) {
    return { ok: false, error: `${label} must be zero or a positive integer` };
  }
  const num = Number(raw);
  if (!Number.isSafeInteger(num)) {
    return { ok: false, error: `${label} must be zero or a positive integer` };
  }
  return { ok: true, value: num };
}

export function parseOptionalString(value: unknown, label: string): ParseResult<string | undefined> {
  if (value === undefined || value === null || value === '') {
    return { ok: true, value: undefined };
  }
  if (Array.isArray(value) && value.length > 1) {
    return { ok: false, error: `${label} must be given once` };
  }
  const raw = normalizeScalar(value);
  if (raw === null) return { ok: false, error: `${label} must be a string` };
  return { ok: true, value: raw };
}

/**
 * Accepts `a,b` as well as repeated parameters (`x=a&x=b`).
 */
export function parseOptionalEnumList<T extends string>(
  value: unknown,
  allowed: readonly T[],
  label: string
): ParseResult<T[] | undefined> {
  if (value === undefined || value === null || value === '') {
    return { ok: true, value: undefined };
  }
  const entries = Array.isArray(value) ? value : [value];
  const items: T[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'string') {
      return { ok: false, error: `${label} must be a comma separated list` };
    }
    for (const part of entry.split(',')) {
      const trimmed = part.trim();
      if (!trimmed) continue;
      const match = allowed.find(candidate => candidate === trimmed);
      if (!match) {
        return { ok: false, error: `${label} must be one of: ${allowed.join(', ')}` };
      }
      if (!items.includes(match)) items.push(match);
    }
  }
  return { ok: true, value: items.length ? items : undefined };
}

/**
 * Copies the string-valued query parameters not listed in `exclude`, keeping
 * their order, so page links can carry them along unchanged.
 */
export function collectQuery(query: Record<string, unknown>, exclude: readonly string[]): StructuredQuery {
  const out: StructuredQuery = {};
  for (const [key, value] of Object.entries(query)) {
    if (exclude.includes(key)) continue;
    if (typeof value === 'string') {
      out[key] = value;
    } else if (Array.isArray(value)) {
      const strings = value.filter((item): item is string => typeof item === 'string');
      if (strings.length) out[key] = strings;
    }
  }
  return out;
}
