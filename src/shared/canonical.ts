import { createHash } from 'node:crypto';
import { ValidationError } from './errors.js';

export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

function compareKeys(a: string, b: string): number {
  // Code-unit order, independent of locale.
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Normalize a value into its canonical form: object keys sorted recursively,
 * undefined object members dropped, dates as ISO-8601 strings, -0 as 0.
 * Anything without a stable JSON form is rejected.
 */
export function canonicalize(value: unknown, path = '$'): CanonicalValue {
  if (value === null) return null;
  if (typeof value === 'boolean' || typeof value === 'string') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Non-finite number at ${path}`, [path]);
    }
    return Object.is(value, -0) ? 0 : value;
  }
  if (typeof value !== 'object') {
    throw new ValidationError(`Unsupported ${typeof value} at ${path}`, [path]);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ValidationError(`Invalid date at ${path}`, [path]);
    }
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => canonicalize(item, `${path}[${i}]`));
  }

  if (!isPlainObject(value)) {
    throw new ValidationError(`Unsupported object at ${path}`, [path]);
  }

  const out: { [key: string]: CanonicalValue } = {};
  for (const key of Object.keys(value).sort(compareKeys)) {
    const member = value[key];
    if (member === undefined) continue;
    out[key] = canonicalize(member, `${path}.${key}`);
  }
  return out;
}

/** Deterministic JSON text for a value. Equal inputs give byte-identical output. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/** SHA-256 over the canonical encoding. The one hash used for every idempotency key. */
export function canonicalHash(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}

/** Drop null and undefined members of a filter map. */
export function compactFilters(
  filters: Record<string, unknown> | null | undefined,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (!filters) return out;
  for (const [key, value] of Object.entries(filters)) {
    if (value === null || value === undefined) continue;
    out[key] = value;
  }
  return out;
}

/** Compacted, key-sorted, canonical form of a filter map. */
export function canonicalFilters(
  filters: Record<string, unknown> | null | undefined,
): { [key: string]: CanonicalValue } {
  const out: { [key: string]: CanonicalValue } = {};
  const compacted = compactFilters(filters);
  for (const key of Object.keys(compacted).sort(compareKeys)) {
    out[key] = canonicalize(compacted[key], `$.${key}`);
  }
  return out;
}
