import type Database from 'better-sqlite3';

export interface EnsureResult<T> {
  entity: T;
  created: boolean;
}

export interface EnsureOps<T> {
  find: () => T | undefined;
  insert: () => void;
}

const UNIQUE_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

export function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    UNIQUE_CODES.has(err.code)
  );
}

/**
 * Ensure-or-fetch: return the existing row, or insert one and return it.
 *
 * The insert runs in its own transaction scope, which better-sqlite3 turns
 * into a SAVEPOINT when an outer transaction is open. A unique violation rolls
 * back only that scope; the row that won the race is read back and returned
 * with `created: false`. Callers never see the race.
 */
export function ensureOrFetch<T>(db: Database.Database, ops: EnsureOps<T>): EnsureResult<T> {
  const existing = ops.find();
  if (existing !== undefined) return { entity: existing, created: false };

  const insert = db.transaction(() => ops.insert());
  try {
    insert();
  } catch (err) {
    if (!isUniqueViolation(err)) throw err;
    const winner = ops.find();
    if (winner === undefined) throw err;
    return { entity: winner, created: false };
  }

  const created = ops.find();
  if (created === undefined) {
    throw new Error('Inserted row could not be read back');
  }
  return { entity: created, created: true };
}
