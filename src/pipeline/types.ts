import type Database from 'better-sqlite3';
import type { CanonicalValue } from '../shared/canonical.js';

export const DAILY_PIPELINE_STEPS = [
  'market_snapshot_resolve',
  'mtm_snapshot',
  'pnl_snapshot',
  'cashflow_baseline',
  'risk_flags',
  'exports',
] as const;

export type DailyStepName = (typeof DAILY_PIPELINE_STEPS)[number];

export type PipelineMode = 'materialize' | 'dry_run';
export type RunStatus = 'queued' | 'running' | 'done' | 'failed';
export type StepStatus = 'pending' | 'running' | 'done' | 'failed' | 'skipped';

export type ScopeFilters = { [key: string]: CanonicalValue };
export type StepArtifacts = Record<string, unknown>;

export interface Plan {
  as_of_date: string;
  pipeline_version: string;
  scope_filters: ScopeFilters;
  mode: PipelineMode;
  emit_exports: boolean;
  inputs_hash: string;
}

export interface PipelineRun {
  id: string;
  as_of_date: string;
  pipeline_version: string;
  scope_filters: ScopeFilters;
  mode: PipelineMode;
  emit_exports: boolean;
  inputs_hash: string;
  status: RunStatus;
  requested_by: string | null;
  started_at: string | null;
  completed_at: string | null;
  error_code: string | null;
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

export interface PipelineStep {
  id: string;
  run_id: string;
  step_name: DailyStepName;
  status: StepStatus;
  started_at: string | null;
  completed_at: string | null;
  error_code: string | null;
  error_message: string | null;
  artifacts: StepArtifacts | null;
  created_at: string;
  updated_at: string;
}

export interface StepContext {
  db: Database.Database;
  plan: Plan;
  run: PipelineRun;
  stepName: DailyStepName;
  correlationId: string;
  requestedBy: string;
}

/** A step implementation. Must be idempotent; may return artifacts to store on the step. */
export type StepImpl = (ctx: StepContext) => StepArtifacts | void | Promise<StepArtifacts | void>;

export type StepImpls = Partial<Record<DailyStepName, StepImpl>>;

export interface StepSummary {
  step_name: DailyStepName;
  status: StepStatus;
}

export interface RunResult {
  mode: 'materialize';
  run_id: string;
  inputs_hash: string;
  status: RunStatus;
  error_code: string | null;
  error_message: string | null;
  steps: StepSummary[];
}

export interface DryRunResult {
  mode: 'dry_run';
  inputs_hash: string;
  as_of_date: string;
  pipeline_version: string;
  scope_filters: ScopeFilters;
  emit_exports: boolean;
  ordered_steps: DailyStepName[];
}

export interface RunStatusView {
  run: PipelineRun;
  steps: Array<Omit<PipelineStep, 'id' | 'run_id' | 'created_at' | 'updated_at'> & { id: string | null }>;
}
