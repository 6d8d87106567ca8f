import type Database from 'better-sqlite3';
import { canonicalJson, sha256Hex, type CanonicalValue } from '../shared/canonical.js';
import { errorCode, storedErrorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { SNAPSHOT_FAMILIES, snapshotItemsTable } from '../store/schema.js';
import { conditionalTransition, requireTransition } from '../store/transition.js';
import { appendAuditEntry } from '../audit/audit.js';
import {
  EXPORT_JOB_MACHINE,
  EXPORT_SCHEMA_VERSION,
  getExportJob,
  type ExportArtifact,
  type ExportJob,
} from './jobs.js';

export type ArtifactGenerator = (
  db: Database.Database,
  job: ExportJob,
) => ExportArtifact[] | Promise<ExportArtifact[]>;

export interface WorkerResult {
  export_id: string;
  status: 'done' | 'failed';
}

const ITEM_FILTER_COLUMNS = ['subject_id', 'deal_id', 'currency'] as const;

function isItemColumn(key: string): key is (typeof ITEM_FILTER_COLUMNS)[number] {
  return (ITEM_FILTER_COLUMNS as readonly string[]).includes(key);
}

/**
 * WHERE fragment for the filter keys snapshot items carry as columns. A list
 * value matches any of its scalars. Other keys are returned as `unapplied`.
 */
export function itemFilterClause(filters: Record<string, CanonicalValue>): {
  sql: string;
  params: Array<string | number>;
  unapplied: string[];
} {
  const clauses: string[] = [];
  const params: Array<string | number> = [];
  const unapplied: string[] = [];
  for (const key of Object.keys(filters).sort()) {
    const expected = filters[key];
    if (expected === undefined) continue;
    if (!isItemColumn(key)) {
      unapplied.push(key);
      continue;
    }
    const values = Array.isArray(expected) ? expected : [expected];
    const parts: string[] = [];
    const bound = values.filter((v): v is string | number => typeof v === 'string' || typeof v === 'number');
    if (bound.length > 0) {
      parts.push(`${key} IN (${bound.map(() => '?').join(', ')})`);
      params.push(...bound);
    }
    if (values.includes(null)) parts.push(`${key} IS NULL`);
    clauses.push(parts.length > 0 ? `(${parts.join(' OR ')})` : '0');
  }
  return { sql: clauses.map((c) => ` AND ${c}`).join(''), params, unapplied };
}

/**
 * Manifest descriptor for a job: item counts per snapshot family on the
 * cutoff date, narrowed by the job's filters. No wall-clock values, so the
 * checksum is reproducible.
 */
export function buildManifestArtifact(db: Database.Database, job: ExportJob): ExportArtifact {
  const asOfDate = job.as_of.slice(0, 10);
  const filter = itemFilterClause(job.filters);
  const counts: Record<string, number> = {};
  for (const family of SNAPSHOT_FAMILIES) {
    const row = db
      .prepare(`SELECT COUNT(*) AS n FROM ${snapshotItemsTable(family)} WHERE as_of_date = ?${filter.sql}`)
      .get(asOfDate, ...filter.params) as { n: number };
    counts[family] = row.n;
  }
  const manifest = {
    schema_version: EXPORT_SCHEMA_VERSION,
    export_id: job.export_id,
    inputs_hash: job.inputs_hash,
    export_type: job.export_type,
    as_of: job.as_of,
    generated_at: job.as_of,
    filters: job.filters,
    unapplied_filters: filter.unapplied,
    counts,
  };
  return {
    kind: `${job.export_type}_manifest`,
    format: 'json',
    filename: 'manifest.json',
    inputs_hash: job.inputs_hash,
    checksum_sha256: sha256Hex(canonicalJson(manifest)),
    manifest,
  };
}

const defaultGenerator: ArtifactGenerator = (db, job) => [buildManifestArtifact(db, job)];

function claimOldestQueued(db: Database.Database): ExportJob | null {
  const row = db
    .prepare(
      `SELECT export_id FROM export_jobs WHERE status = 'queued'
       ORDER BY created_at ASC, rowid ASC LIMIT 1`,
    )
    .get() as { export_id: string } | undefined;
  if (!row) return null;

  const claimed = conditionalTransition(db, {
    table: 'export_jobs',
    idColumn: 'export_id',
    id: row.export_id,
    to: 'running',
    allowedFrom: EXPORT_JOB_MACHINE.allowedFrom('running', { idempotent: false }),
    set: { artifacts_json: null },
    setOnce: { started_at: new Date().toISOString() },
  });
  if (claimed !== 1) return null;
  return getExportJob(db, row.export_id);
}

/**
 * Process at most one queued export job: `queued -> running -> done|failed`.
 * Returns null when nothing was claimed (empty queue or a lost claim).
 */
export async function runExportWorkerOnce(
  db: Database.Database,
  opts: { generate?: ArtifactGenerator; actor?: string } = {},
): Promise<WorkerResult | null> {
  const job = claimOldestQueued(db);
  if (!job) return null;

  const actor = opts.actor ?? 'export-worker';
  appendAuditEntry(db, {
    action: 'exports.job.started',
    actor,
    subject_type: 'export_job',
    subject_id: job.export_id,
    payload: { export_id: job.export_id, inputs_hash: job.inputs_hash },
  });

  let artifacts: ExportArtifact[];
  let artifactsJson: string;
  try {
    artifacts = await (opts.generate ?? defaultGenerator)(db, job);
    artifactsJson = JSON.stringify(artifacts);
  } catch (err) {
    requireTransition(db, {
      table: 'export_jobs',
      idColumn: 'export_id',
      id: job.export_id,
      to: 'failed',
      allowedFrom: EXPORT_JOB_MACHINE.allowedFrom('failed', { idempotent: false }),
      set: { error_code: errorCode(err), error_message: storedErrorMessage(err) },
      setOnce: { completed_at: new Date().toISOString() },
    });
    logger.error('Export job failed', { export_id: job.export_id, error: storedErrorMessage(err) });
    return { export_id: job.export_id, status: 'failed' };
  }

  // Zero rows here means another worker or an operator moved the job.
  requireTransition(db, {
    table: 'export_jobs',
    idColumn: 'export_id',
    id: job.export_id,
    to: 'done',
    allowedFrom: EXPORT_JOB_MACHINE.allowedFrom('done', { idempotent: false }),
    set: { artifacts_json: artifactsJson },
    setOnce: { completed_at: new Date().toISOString() },
  });
  logger.info('Export job completed', { export_id: job.export_id, artifacts: artifacts.length });
  return { export_id: job.export_id, status: 'done' };
}
