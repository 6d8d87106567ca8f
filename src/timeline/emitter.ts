import type Database from 'better-sqlite3';
import { z } from 'zod';
import { canonicalJson } from '../shared/canonical.js';
import { generateId, isUuid, newUuid } from '../shared/ids.js';
import { parseOrThrow } from '../shared/schemas.js';
import { appendAuditEntry, type AuditEntryInput } from '../audit/audit.js';
import { ensureOrFetch } from '../store/ensure.js';

export type TimelineVisibility = 'all' | 'finance';

export interface TimelineEvent {
  id: string;
  event_type: string;
  subject_type: string;
  subject_id: string;
  correlation_id: string;
  idempotency_key: string;
  visibility: TimelineVisibility;
  payload: Record<string, unknown>;
  actor: string | null;
  audit_id: string | null;
  occurred_at: string;
}

interface TimelineEventRow extends Omit<TimelineEvent, 'payload'> {
  payload_json: string;
}

export interface EmitResult {
  event: TimelineEvent;
  created: boolean;
}

export const TimelineEventInputSchema = z.object({
  event_type: z.string().min(1).max(128),
  subject_type: z.string().min(1).max(64),
  subject_id: z.string().min(1).max(128),
  idempotency_key: z.string().min(1).max(256),
  payload: z.record(z.unknown()).default({}),
  visibility: z.enum(['all', 'finance']).default('all'),
  correlation_id: z.string().nullable().optional(),
  actor: z.string().nullable().optional(),
  occurred_at: z.string().datetime().optional(),
});

export type TimelineEventInput = z.input<typeof TimelineEventInputSchema>;

const HEX32_RE = /^[0-9a-f]{32}$/i;

/**
 * Correlation id for an emission: a UUID-shaped request token is reused in
 * canonical lower-case form; anything else gets a fresh UUID4.
 */
export function correlationIdFromRequestId(token: string | null | undefined): string {
  const trimmed = token?.trim() ?? '';
  if (isUuid(trimmed)) return trimmed.toLowerCase();
  if (HEX32_RE.test(trimmed)) {
    const h = trimmed.toLowerCase();
    return `${h.slice(0, 8)}-${h.slice(8, 12)}-${h.slice(12, 16)}-${h.slice(16, 20)}-${h.slice(20)}`;
  }
  return newUuid();
}

function toEvent(row: TimelineEventRow): TimelineEvent {
  const { payload_json, ...rest } = row;
  return { ...rest, payload: JSON.parse(payload_json) as Record<string, unknown> };
}

export function getTimelineEvent(
  db: Database.Database,
  eventType: string,
  idempotencyKey: string,
): TimelineEvent | null {
  const row = db
    .prepare(`SELECT * FROM timeline_events WHERE event_type = ? AND idempotency_key = ?`)
    .get(eventType, idempotencyKey) as TimelineEventRow | undefined;
  return row ? toEvent(row) : null;
}

/**
 * Append an event unless `(event_type, idempotency_key)` already exists, in
 * which case the original row comes back with `created: false` and the new
 * payload is discarded. An `audit` entry, when given, is written in the same
 * scope as the insert and only for the emission that creates the row.
 */
export function emitTimelineEvent(
  db: Database.Database,
  input: TimelineEventInput,
  audit?: AuditEntryInput,
): EmitResult {
  const ev = parseOrThrow(TimelineEventInputSchema, input, 'timeline event');
  const payloadJson = canonicalJson(ev.payload);

  const { entity, created } = ensureOrFetch(db, {
    find: () => getTimelineEvent(db, ev.event_type, ev.idempotency_key) ?? undefined,
    insert: () => {
      const auditId = audit ? appendAuditEntry(db, audit).id : null;
      db.prepare(`
        INSERT INTO timeline_events
          (id, event_type, subject_type, subject_id, correlation_id, idempotency_key,
           visibility, payload_json, actor, audit_id, occurred_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        generateId(),
        ev.event_type,
        ev.subject_type,
        ev.subject_id,
        correlationIdFromRequestId(ev.correlation_id),
        ev.idempotency_key,
        ev.visibility,
        payloadJson,
        ev.actor ?? null,
        auditId,
        ev.occurred_at ?? new Date().toISOString(),
      );
    },
  });
  return { event: entity, created };
}

export interface TimelineQuery {
  subject_type: string;
  subject_id: string;
  /** `finance` sees every event; `all` sees only events marked for everyone. */
  audience?: TimelineVisibility;
  limit?: number;
}

/** Events for one subject, newest first. */
export function listTimelineEvents(db: Database.Database, query: TimelineQuery): TimelineEvent[] {
  const limit = query.limit ?? 100;
  const visibilities: TimelineVisibility[] =
    query.audience === 'all' ? ['all'] : ['all', 'finance'];
  const rows = db
    .prepare(
      `SELECT * FROM timeline_events
       WHERE subject_type = ? AND subject_id = ? AND visibility IN (${visibilities.map(() => '?').join(', ')})
       ORDER BY occurred_at DESC, rowid DESC LIMIT ?`,
    )
    .all(query.subject_type, query.subject_id, ...visibilities, limit) as TimelineEventRow[];
  return rows.map(toEvent);
}
