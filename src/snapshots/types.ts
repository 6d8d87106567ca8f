import type { SnapshotFamilyName } from '../store/schema.js';
import type { ScopeFilters } from '../pipeline/types.js';

export type SnapshotRunStatus = 'queued' | 'running' | 'done' | 'failed';

export interface SnapshotFamily {
  name: SnapshotFamilyName;
  methodologyVersion: string;
  /** Timeline event emitted when a materialization completes. */
  eventType: string;
}

export interface SnapshotSubject {
  subject_id: string;
  deal_id: number | null;
  currency: string;
}

export interface ComputedValue {
  value: number | null;
  payload: Record<string, unknown>;
}

export interface SnapshotQuery {
  as_of_date: string;
  filters: ScopeFilters;
}

/** Supplies subjects and values for one snapshot family. */
export interface SnapshotSource<S extends SnapshotSubject = SnapshotSubject> {
  listSubjects(query: SnapshotQuery): S[];
  /** `null` when the value cannot be computed for this date. */
  computeValue(subject: S, query: SnapshotQuery): ComputedValue | null;
}

export interface SnapshotRun {
  id: string;
  as_of_date: string;
  methodology_version: string;
  scope_filters: ScopeFilters;
  inputs_hash: string;
  status: SnapshotRunStatus;
  requested_by: string | null;
  started_at: string | null;
  completed_at: string | null;
  error_code: string | null;
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

export interface SnapshotItem {
  id: string;
  run_id: string;
  subject_id: string;
  deal_id: number | null;
  as_of_date: string;
  currency: string;
  value: number | null;
  payload: Record<string, unknown>;
  inputs_hash: string;
  created_at: string;
}

export interface MaterializeRequest {
  as_of_date: string;
  filters?: Record<string, unknown> | null;
  requested_by?: string | null;
}

export interface MaterializeResult {
  family: SnapshotFamilyName;
  run_id: string;
  inputs_hash: string;
  written: number;
  skipped_existing: number;
  skipped_not_computable: number;
  item_ids: string[];
}

export interface SnapshotDryRunResult {
  family: SnapshotFamilyName;
  inputs_hash: string;
  as_of_date: string;
  filters: ScopeFilters;
  subjects: number;
}
