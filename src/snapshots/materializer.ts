import type Database from 'better-sqlite3';
import { canonicalFilters, canonicalHash } from '../shared/canonical.js';
import { errorCode, storedErrorMessage } from '../shared/errors.js';
import { StateMachine } from '../shared/fsm.js';
import { generateId } from '../shared/ids.js';
import { logger } from '../shared/logger.js';
import type { ScopeFilters } from '../pipeline/types.js';
import { ensureOrFetch, type EnsureResult } from '../store/ensure.js';
import { snapshotItemsTable, snapshotRunsTable } from '../store/schema.js';
import { conditionalTransition, requireTransition } from '../store/transition.js';
import { emitTimelineEvent } from '../timeline/emitter.js';
import type {
  MaterializeRequest,
  MaterializeResult,
  SnapshotDryRunResult,
  SnapshotFamily,
  SnapshotItem,
  SnapshotRun,
  SnapshotRunStatus,
  SnapshotSource,
  SnapshotSubject,
} from './types.js';

export const SNAPSHOT_RUN_MACHINE = new StateMachine<SnapshotRunStatus>(
  'snapshot_run',
  ['queued', 'running', 'done', 'failed'],
  [
    { from: ['queued'], to: 'running' },
    { from: ['failed'], to: 'running', resume: true },
    { from: ['running'], to: 'done' },
    { from: ['running'], to: 'failed' },
  ],
  ['done'],
);

interface SnapshotRunRow extends Omit<SnapshotRun, 'scope_filters'> {
  scope_filters_json: string;
}

interface SnapshotItemRow extends Omit<SnapshotItem, 'payload'> {
  payload_json: string;
}

function toRun(row: SnapshotRunRow): SnapshotRun {
  const { scope_filters_json, ...rest } = row;
  return { ...rest, scope_filters: JSON.parse(scope_filters_json) as ScopeFilters };
}

function toItem(row: SnapshotItemRow): SnapshotItem {
  const { payload_json, ...rest } = row;
  return { ...rest, payload: JSON.parse(payload_json) as Record<string, unknown> };
}

export function snapshotInputsHash(
  family: SnapshotFamily,
  asOfDate: string,
  filters: ScopeFilters,
): string {
  return canonicalHash({
    version: family.methodologyVersion,
    as_of_date: asOfDate,
    filters,
  });
}

export function getSnapshotRunByHash(
  db: Database.Database,
  family: SnapshotFamily,
  inputsHash: string,
): SnapshotRun | null {
  const row = db
    .prepare(`SELECT * FROM ${snapshotRunsTable(family.name)} WHERE inputs_hash = ?`)
    .get(inputsHash) as SnapshotRunRow | undefined;
  return row ? toRun(row) : null;
}

export function getSnapshotItem(
  db: Database.Database,
  family: SnapshotFamily,
  subjectId: string,
  asOfDate: string,
  currency: string,
): SnapshotItem | null {
  const row = db
    .prepare(
      `SELECT * FROM ${snapshotItemsTable(family.name)}
       WHERE subject_id = ? AND as_of_date = ? AND currency = ?`,
    )
    .get(subjectId, asOfDate, currency) as SnapshotItemRow | undefined;
  return row ? toItem(row) : null;
}

export function listSnapshotItems(
  db: Database.Database,
  family: SnapshotFamily,
  runId: string,
): SnapshotItem[] {
  const rows = db
    .prepare(
      `SELECT * FROM ${snapshotItemsTable(family.name)} WHERE run_id = ?
       ORDER BY subject_id ASC, id ASC`,
    )
    .all(runId) as SnapshotItemRow[];
  return rows.map(toItem);
}

export function ensureSnapshotRun(
  db: Database.Database,
  family: SnapshotFamily,
  asOfDate: string,
  filters: ScopeFilters,
  requestedBy: string | null,
): EnsureResult<SnapshotRun> {
  const inputsHash = snapshotInputsHash(family, asOfDate, filters);
  return ensureOrFetch(db, {
    find: () => getSnapshotRunByHash(db, family, inputsHash) ?? undefined,
    insert: () => {
      const now = new Date().toISOString();
      db.prepare(`
        INSERT INTO ${snapshotRunsTable(family.name)}
          (id, as_of_date, methodology_version, scope_filters_json, inputs_hash, status,
           requested_by, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, 'queued', ?, ?, ?)
      `).run(
        generateId(),
        asOfDate,
        family.methodologyVersion,
        JSON.stringify(filters),
        inputsHash,
        requestedBy,
        now,
        now,
      );
    },
  });
}

/** Hash and subject count for a family, without writing anything. */
export function dryRunSnapshot<S extends SnapshotSubject>(
  family: SnapshotFamily,
  source: SnapshotSource<S>,
  req: MaterializeRequest,
): SnapshotDryRunResult {
  const filters = canonicalFilters(req.filters);
  return {
    family: family.name,
    inputs_hash: snapshotInputsHash(family, req.as_of_date, filters),
    as_of_date: req.as_of_date,
    filters,
    subjects: source.listSubjects({ as_of_date: req.as_of_date, filters }).length,
  };
}

/**
 * Materialize one snapshot family for a date. Subjects that already have an
 * item at `(subject, as_of_date, currency)` are left untouched, so a rerun
 * after a crash only fills the gaps. A `done` run stays `done`.
 */
export function materializeSnapshot<S extends SnapshotSubject>(
  db: Database.Database,
  family: SnapshotFamily,
  source: SnapshotSource<S>,
  req: MaterializeRequest & { correlation_id?: string | null },
): MaterializeResult {
  const filters = canonicalFilters(req.filters);
  const query = { as_of_date: req.as_of_date, filters };
  const { entity: run } = ensureSnapshotRun(db, family, req.as_of_date, filters, req.requested_by ?? null);
  const runsTable = snapshotRunsTable(family.name);
  const itemsTable = snapshotItemsTable(family.name);

  if (run.status !== 'done') {
    requireTransition(db, {
      table: runsTable,
      id: run.id,
      to: 'running',
      allowedFrom: SNAPSHOT_RUN_MACHINE.allowedFrom('running', { resume: true }),
      set: { error_code: null, error_message: null },
      setOnce: { started_at: new Date().toISOString() },
    });
  }

  let written = 0;
  let skippedExisting = 0;
  let skippedNotComputable = 0;

  try {
    for (const subject of source.listSubjects(query)) {
      if (getSnapshotItem(db, family, subject.subject_id, req.as_of_date, subject.currency)) {
        skippedExisting += 1;
        continue;
      }
      const computed = source.computeValue(subject, query);
      if (computed === null) {
        skippedNotComputable += 1;
        continue;
      }
      const { created } = ensureOrFetch(db, {
        find: () =>
          getSnapshotItem(db, family, subject.subject_id, req.as_of_date, subject.currency) ??
          undefined,
        insert: () => {
          db.prepare(`
            INSERT INTO ${itemsTable}
              (id, run_id, subject_id, deal_id, as_of_date, currency, value, payload_json,
               inputs_hash, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          `).run(
            generateId(),
            run.id,
            subject.subject_id,
            subject.deal_id,
            req.as_of_date,
            subject.currency,
            computed.value,
            JSON.stringify(computed.payload),
            run.inputs_hash,
            new Date().toISOString(),
          );
        },
      });
      if (created) written += 1;
      else skippedExisting += 1;
    }
  } catch (err) {
    conditionalTransition(db, {
      table: runsTable,
      id: run.id,
      to: 'failed',
      allowedFrom: SNAPSHOT_RUN_MACHINE.allowedFrom('failed', { idempotent: false }),
      set: { error_code: errorCode(err), error_message: storedErrorMessage(err) },
    });
    logger.error('Snapshot materialization failed', {
      family: family.name,
      run_id: run.id,
      error: storedErrorMessage(err),
    });
    throw err;
  }

  if (run.status !== 'done') {
    requireTransition(db, {
      table: runsTable,
      id: run.id,
      to: 'done',
      allowedFrom: SNAPSHOT_RUN_MACHINE.allowedFrom('done'),
      setOnce: { completed_at: new Date().toISOString() },
    });
  }

  const itemIds = listSnapshotItems(db, family, run.id).map((item) => item.id);

  emitTimelineEvent(db, {
    event_type: family.eventType,
    subject_type: `${family.name}_snapshot_run`,
    subject_id: run.id,
    idempotency_key: `${family.name}:${run.inputs_hash}`,
    visibility: 'finance',
    correlation_id: req.correlation_id ?? null,
    actor: req.requested_by ?? null,
    payload: {
      run_id: run.id,
      inputs_hash: run.inputs_hash,
      as_of_date: req.as_of_date,
      methodology_version: family.methodologyVersion,
      items: itemIds.length,
    },
  });

  logger.info('Snapshot materialized', {
    family: family.name,
    run_id: run.id,
    written,
    skipped_existing: skippedExisting,
    skipped_not_computable: skippedNotComputable,
  });

  return {
    family: family.name,
    run_id: run.id,
    inputs_hash: run.inputs_hash,
    written,
    skipped_existing: skippedExisting,
    skipped_not_computable: skippedNotComputable,
    item_ids: itemIds,
  };
}
