import { randomBytes, randomUUID } from 'node:crypto';

/**
 * Generate a URL-safe random ID of the given byte length (default 16 bytes -> 22 chars base64url).
 */
export function generateId(bytes = 16): string {
  return randomBytes(bytes).toString('base64url');
}

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_RE.test(value);
}

export function newUuid(): string {
  return randomUUID();
}
