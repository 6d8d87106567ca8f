import type Database from 'better-sqlite3';
import { generateId } from '../shared/ids.js';
import { canonicalHash } from '../shared/canonical.js';

export interface AuditEntry {
  id: string;
  timestamp: string;
  action: string;
  actor: string;
  subject_type: string;
  subject_id: string;
  request_id: string | null;
  payload_hash: string;
  chain_prev_hash: string | null;
  chain_this_hash: string;
}

export interface AuditEntryInput {
  action: string;
  actor?: string | null;
  subject_type: string;
  subject_id: string;
  request_id?: string | null;
  payload: unknown;            // will be hashed, not stored raw
}

function getLastAuditHash(db: Database.Database): string | null {
  const row = db
    .prepare(`SELECT chain_this_hash FROM audit_log ORDER BY rowid DESC LIMIT 1`)
    .get() as { chain_this_hash: string } | undefined;
  return row?.chain_this_hash ?? null;
}

function computeEntryHash(prev: string | null, entry: Omit<AuditEntry, 'chain_this_hash'>): string {
  return canonicalHash({
    id: entry.id,
    timestamp: entry.timestamp,
    action: entry.action,
    actor: entry.actor,
    subject_type: entry.subject_type,
    subject_id: entry.subject_id,
    request_id: entry.request_id,
    payload_hash: entry.payload_hash,
    chain_prev_hash: prev,
  });
}

/**
 * Append a hash-chained audit record. Only the payload hash is stored.
 * Call inside the caller's transaction to keep the entry atomic with the
 * change it describes.
 */
export function appendAuditEntry(db: Database.Database, input: AuditEntryInput): AuditEntry {
  const chain_prev_hash = getLastAuditHash(db);

  const partial: Omit<AuditEntry, 'chain_this_hash'> = {
    id: generateId(),
    timestamp: new Date().toISOString(),
    action: input.action,
    actor: input.actor ?? 'system',
    subject_type: input.subject_type,
    subject_id: input.subject_id,
    request_id: input.request_id ?? null,
    payload_hash: canonicalHash(input.payload),
    chain_prev_hash,
  };

  const entry: AuditEntry = { ...partial, chain_this_hash: computeEntryHash(chain_prev_hash, partial) };

  db.prepare(`
    INSERT INTO audit_log
      (id, timestamp, action, actor, subject_type, subject_id, request_id,
       payload_hash, chain_prev_hash, chain_this_hash)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    entry.id,
    entry.timestamp,
    entry.action,
    entry.actor,
    entry.subject_type,
    entry.subject_id,
    entry.request_id,
    entry.payload_hash,
    entry.chain_prev_hash,
    entry.chain_this_hash,
  );

  return entry;
}

export function listAuditLog(
  db: Database.Database,
  opts: { subject_type?: string; subject_id?: string; limit?: number; offset?: number } = {},
): AuditEntry[] {
  const limit = opts.limit ?? 100;
  const offset = opts.offset ?? 0;
  if (opts.subject_type && opts.subject_id) {
    return db
      .prepare(
        `SELECT * FROM audit_log WHERE subject_type = ? AND subject_id = ?
         ORDER BY rowid DESC LIMIT ? OFFSET ?`,
      )
      .all(opts.subject_type, opts.subject_id, limit, offset) as AuditEntry[];
  }
  return db
    .prepare(`SELECT * FROM audit_log ORDER BY rowid DESC LIMIT ? OFFSET ?`)
    .all(limit, offset) as AuditEntry[];
}

/** Walk the chain oldest-first; returns the id of the first entry that does not verify. */
export function verifyAuditChain(db: Database.Database): { ok: boolean; broken_at: string | null } {
  const entries = db.prepare(`SELECT * FROM audit_log ORDER BY rowid ASC`).all() as AuditEntry[];
  let prev: string | null = null;
  for (const entry of entries) {
    const { chain_this_hash, ...rest } = entry;
    if (entry.chain_prev_hash !== prev || computeEntryHash(prev, rest) !== chain_this_hash) {
      return { ok: false, broken_at: entry.id };
    }
    prev = chain_this_hash;
  }
  return { ok: true, broken_at: null };
}
