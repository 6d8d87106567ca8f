import type Database from 'better-sqlite3';
import { canonicalFilters, canonicalHash } from '../shared/canonical.js';
import { StateMachine } from '../shared/fsm.js';
import { generateId } from '../shared/ids.js';
import { NotFoundError } from '../shared/errors.js';
import type { ScopeFilters } from '../pipeline/types.js';
import { ensureOrFetch } from '../store/ensure.js';

export type ExportJobStatus = 'queued' | 'running' | 'done' | 'failed';

export const EXPORT_SCHEMA_VERSION = 1;
export const STATE_AT_TIME_EXPORT = 'state_at_time';

export const EXPORT_JOB_MACHINE = new StateMachine<ExportJobStatus>(
  'export_job',
  ['queued', 'running', 'done', 'failed'],
  [
    { from: ['queued'], to: 'running' },
    { from: ['running'], to: 'done' },
    { from: ['running'], to: 'failed' },
  ],
  ['done', 'failed'],
);

export interface ExportArtifact {
  kind: string;
  format: string;
  filename: string;
  inputs_hash: string;
  checksum_sha256: string;
  [key: string]: unknown;
}

export interface ExportJob {
  id: string;
  export_id: string;
  inputs_hash: string;
  export_type: string;
  as_of: string;
  filters: ScopeFilters;
  status: ExportJobStatus;
  artifacts: ExportArtifact[] | null;
  requested_by: string | null;
  error_code: string | null;
  error_message: string | null;
  started_at: string | null;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ExportJobRow extends Omit<ExportJob, 'filters' | 'artifacts'> {
  filters_json: string;
  artifacts_json: string | null;
}

export interface ExportRequest {
  export_type: string;
  as_of: string;
  filters?: Record<string, unknown> | null;
  requested_by?: string | null;
}

function toJob(row: ExportJobRow): ExportJob {
  const { filters_json, artifacts_json, ...rest } = row;
  return {
    ...rest,
    filters: JSON.parse(filters_json) as ScopeFilters,
    artifacts: artifacts_json === null ? null : (JSON.parse(artifacts_json) as ExportArtifact[]),
  };
}

/** Cutoff of a daily export: midnight UTC of the business date. */
export function exportCutoff(asOfDate: string): string {
  return new Date(`${asOfDate}T00:00:00.000Z`).toISOString();
}

export function computeExportIdentity(
  exportType: string,
  asOf: string,
  filters: ScopeFilters,
): { export_id: string; inputs_hash: string } {
  const inputsHash = canonicalHash({
    schema_version: EXPORT_SCHEMA_VERSION,
    export_type: exportType,
    as_of: asOf,
    filters,
  });
  return { export_id: `exp_${inputsHash.slice(0, 32)}`, inputs_hash: inputsHash };
}

export function getExportJob(db: Database.Database, exportId: string): ExportJob | null {
  const row = db.prepare(`SELECT * FROM export_jobs WHERE export_id = ?`).get(exportId) as
    | ExportJobRow
    | undefined;
  return row ? toJob(row) : null;
}

export function requireExportJob(db: Database.Database, exportId: string): ExportJob {
  const job = getExportJob(db, exportId);
  if (!job) throw new NotFoundError(`Export job not found: ${exportId}`);
  return job;
}

export function listExportJobs(
  db: Database.Database,
  opts: { status?: ExportJobStatus; limit?: number } = {},
): ExportJob[] {
  const limit = opts.limit ?? 50;
  const rows = opts.status
    ? db
        .prepare(`SELECT * FROM export_jobs WHERE status = ? ORDER BY created_at DESC, rowid DESC LIMIT ?`)
        .all(opts.status, limit)
    : db.prepare(`SELECT * FROM export_jobs ORDER BY created_at DESC, rowid DESC LIMIT ?`).all(limit);
  return (rows as ExportJobRow[]).map(toJob);
}

/**
 * Ensure-or-fetch the export job for `(export_type, as_of, filters)`.
 * `idempotent` is true when an existing job was reused.
 */
export function ensureExportJob(
  db: Database.Database,
  req: ExportRequest,
): { job: ExportJob; idempotent: boolean } {
  const filters = canonicalFilters(req.filters);
  const { export_id, inputs_hash } = computeExportIdentity(req.export_type, req.as_of, filters);
  const { entity, created } = ensureOrFetch(db, {
    find: () => getExportJob(db, export_id) ?? undefined,
    insert: () => {
      const now = new Date().toISOString();
      db.prepare(`
        INSERT INTO export_jobs
          (id, export_id, inputs_hash, export_type, as_of, filters_json, status,
           requested_by, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, 'queued', ?, ?, ?)
      `).run(
        generateId(),
        export_id,
        inputs_hash,
        req.export_type,
        req.as_of,
        JSON.stringify(filters),
        req.requested_by ?? null,
        now,
        now,
      );
    },
  });
  return { job: entity, idempotent: !created };
}
