import type Database from 'better-sqlite3';
import { ConflictError } from '../shared/errors.js';

export type SqlValue = string | number | bigint | null;

export interface TransitionSpec<S extends string> {
  table: string;
  id: string;
  to: S;
  allowedFrom: readonly S[];
  /** Columns overwritten on success. */
  set?: Record<string, SqlValue>;
  /** Columns written only when still NULL, e.g. `started_at`. */
  setOnce?: Record<string, SqlValue>;
  idColumn?: string;
}

const IDENTIFIER_RE = /^[a-z_][a-z0-9_]*$/;

function ident(name: string): string {
  if (!IDENTIFIER_RE.test(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`);
  }
  return name;
}

/**
 * One conditional UPDATE: `... SET status = ? WHERE id = ? AND status IN (...)`.
 * Returns the number of rows changed; 0 means the row was not in an allowed
 * state (or does not exist). Nothing is retried.
 */
export function conditionalTransition<S extends string>(
  db: Database.Database,
  spec: TransitionSpec<S>,
): number {
  if (spec.allowedFrom.length === 0) return 0;

  const assignments = ['status = ?', 'updated_at = ?'];
  const params: SqlValue[] = [spec.to, new Date().toISOString()];

  for (const [column, value] of Object.entries(spec.set ?? {})) {
    assignments.push(`${ident(column)} = ?`);
    params.push(value);
  }
  for (const [column, value] of Object.entries(spec.setOnce ?? {})) {
    const col = ident(column);
    assignments.push(`${col} = COALESCE(${col}, ?)`);
    params.push(value);
  }

  const placeholders = spec.allowedFrom.map(() => '?').join(', ');
  const sql =
    `UPDATE ${ident(spec.table)} SET ${assignments.join(', ')} ` +
    `WHERE ${ident(spec.idColumn ?? 'id')} = ? AND status IN (${placeholders})`;

  const info = db.prepare(sql).run(...params, spec.id, ...spec.allowedFrom);
  return info.changes;
}

export function readStatus(
  db: Database.Database,
  table: string,
  id: string,
  idColumn = 'id',
): string | null {
  const row = db
    .prepare(`SELECT status FROM ${ident(table)} WHERE ${ident(idColumn)} = ?`)
    .get(id) as { status: string } | undefined;
  return row?.status ?? null;
}

/** Like conditionalTransition, but a zero rowcount raises ConflictError. */
export function requireTransition<S extends string>(
  db: Database.Database,
  spec: TransitionSpec<S>,
): void {
  if (conditionalTransition(db, spec) > 0) return;
  const current = readStatus(db, spec.table, spec.id, spec.idColumn);
  throw new ConflictError(
    current === null
      ? `${spec.table} ${spec.id} not found`
      : `${spec.table} ${spec.id} is ${current}; expected one of ${spec.allowedFrom.join(', ')} to move to ${spec.to}`,
    current,
  );
}
