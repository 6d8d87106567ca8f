import type Database from 'better-sqlite3';
import { generateId } from '../shared/ids.js';
import { NotFoundError, ValidationError } from '../shared/errors.js';
import type { TransitionOptions } from '../shared/fsm.js';
import { ensureOrFetch, type EnsureResult } from '../store/ensure.js';
import { conditionalTransition, requireTransition, type SqlValue } from '../store/transition.js';
import { RUN_MACHINE, STEP_MACHINE } from './status.js';
import {
  DAILY_PIPELINE_STEPS,
  type DailyStepName,
  type PipelineMode,
  type PipelineRun,
  type PipelineStep,
  type Plan,
  type RunStatus,
  type RunStatusView,
  type ScopeFilters,
  type StepArtifacts,
  type StepStatus,
} from './types.js';

interface PipelineRunRow {
  id: string;
  as_of_date: string;
  pipeline_version: string;
  scope_filters_json: string;
  mode: PipelineMode;
  emit_exports: number;
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

interface PipelineStepRow {
  id: string;
  run_id: string;
  step_name: DailyStepName;
  status: StepStatus;
  started_at: string | null;
  completed_at: string | null;
  error_code: string | null;
  error_message: string | null;
  artifacts_json: string | null;
  created_at: string;
  updated_at: string;
}

const HASH_RE = /^[0-9a-f]{64}$/;
const ID_RE = /^[A-Za-z0-9_-]{1,64}$/;

function toRun(row: PipelineRunRow): PipelineRun {
  const { scope_filters_json, emit_exports, ...rest } = row;
  return {
    ...rest,
    scope_filters: JSON.parse(scope_filters_json) as ScopeFilters,
    emit_exports: emit_exports === 1,
  };
}

function toStep(row: PipelineStepRow): PipelineStep {
  const { artifacts_json, ...rest } = row;
  return {
    ...rest,
    artifacts: artifacts_json === null ? null : (JSON.parse(artifacts_json) as StepArtifacts),
  };
}

export function getRunById(db: Database.Database, id: string): PipelineRun | null {
  const row = db.prepare(`SELECT * FROM pipeline_runs WHERE id = ?`).get(id) as
    | PipelineRunRow
    | undefined;
  return row ? toRun(row) : null;
}

export function getRunByHash(db: Database.Database, inputsHash: string): PipelineRun | null {
  const row = db.prepare(`SELECT * FROM pipeline_runs WHERE inputs_hash = ?`).get(inputsHash) as
    | PipelineRunRow
    | undefined;
  return row ? toRun(row) : null;
}

/** Look a run up by its id or by its 64-hex `inputs_hash`. */
export function getRun(db: Database.Database, ref: string): PipelineRun | null {
  if (HASH_RE.test(ref)) return getRunByHash(db, ref);
  if (ID_RE.test(ref)) return getRunById(db, ref);
  throw new ValidationError(`Invalid run reference: ${ref}`);
}

export function requireRun(db: Database.Database, ref: string): PipelineRun {
  const run = getRun(db, ref);
  if (!run) throw new NotFoundError(`Pipeline run not found: ${ref}`);
  return run;
}

export function listRuns(
  db: Database.Database,
  opts: { limit?: number; offset?: number; status?: RunStatus } = {},
): PipelineRun[] {
  const limit = opts.limit ?? 50;
  const offset = opts.offset ?? 0;
  const rows = opts.status
    ? db
        .prepare(
          `SELECT * FROM pipeline_runs WHERE status = ?
           ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`,
        )
        .all(opts.status, limit, offset)
    : db
        .prepare(`SELECT * FROM pipeline_runs ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`)
        .all(limit, offset);
  return (rows as PipelineRunRow[]).map(toRun);
}

/** Ensure-or-fetch the one run for `plan.inputs_hash`. A new run starts `queued`. */
export function ensureRun(
  db: Database.Database,
  plan: Plan,
  requestedBy?: string,
): EnsureResult<PipelineRun> {
  return ensureOrFetch(db, {
    find: () => getRunByHash(db, plan.inputs_hash) ?? undefined,
    insert: () => {
      const now = new Date().toISOString();
      db.prepare(`
        INSERT INTO pipeline_runs
          (id, as_of_date, pipeline_version, scope_filters_json, mode, emit_exports,
           inputs_hash, status, requested_by, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, 'queued', ?, ?, ?)
      `).run(
        generateId(),
        plan.as_of_date,
        plan.pipeline_version,
        JSON.stringify(plan.scope_filters),
        plan.mode,
        plan.emit_exports ? 1 : 0,
        plan.inputs_hash,
        requestedBy ?? null,
        now,
        now,
      );
    },
  });
}

export function getStep(
  db: Database.Database,
  runId: string,
  stepName: DailyStepName,
): PipelineStep | null {
  const row = db
    .prepare(`SELECT * FROM pipeline_steps WHERE run_id = ? AND step_name = ?`)
    .get(runId, stepName) as PipelineStepRow | undefined;
  return row ? toStep(row) : null;
}

/** Ensure-or-fetch the step row for `(runId, stepName)`. A new step starts `pending`. */
export function ensureStep(
  db: Database.Database,
  runId: string,
  stepName: DailyStepName,
): EnsureResult<PipelineStep> {
  return ensureOrFetch(db, {
    find: () => getStep(db, runId, stepName) ?? undefined,
    insert: () => {
      const now = new Date().toISOString();
      db.prepare(`
        INSERT INTO pipeline_steps (id, run_id, step_name, status, created_at, updated_at)
        VALUES (?, ?, ?, 'pending', ?, ?)
      `).run(generateId(), runId, stepName, now, now);
    },
  });
}

export function listSteps(db: Database.Database, runId: string): PipelineStep[] {
  const rows = db
    .prepare(`SELECT * FROM pipeline_steps WHERE run_id = ?`)
    .all(runId) as PipelineStepRow[];
  const order = (name: DailyStepName) => DAILY_PIPELINE_STEPS.indexOf(name);
  return rows.map(toStep).sort((a, b) => order(a.step_name) - order(b.step_name));
}

export interface StatusUpdate extends TransitionOptions {
  set?: Record<string, SqlValue>;
  setOnce?: Record<string, SqlValue>;
}

/** Conditional run transition. Returns the rowcount; 0 means someone else moved it first. */
export function transitionRun(
  db: Database.Database,
  runId: string,
  to: RunStatus,
  update: StatusUpdate = {},
): number {
  return conditionalTransition(db, {
    table: 'pipeline_runs',
    id: runId,
    to,
    allowedFrom: RUN_MACHINE.allowedFrom(to, update),
    set: update.set,
    setOnce: update.setOnce,
  });
}

export function requireRunTransition(
  db: Database.Database,
  runId: string,
  to: RunStatus,
  update: StatusUpdate = {},
): void {
  requireTransition(db, {
    table: 'pipeline_runs',
    id: runId,
    to,
    allowedFrom: RUN_MACHINE.allowedFrom(to, update),
    set: update.set,
    setOnce: update.setOnce,
  });
}

export function requireStepTransition(
  db: Database.Database,
  stepId: string,
  to: StepStatus,
  update: StatusUpdate = {},
): void {
  requireTransition(db, {
    table: 'pipeline_steps',
    id: stepId,
    to,
    allowedFrom: STEP_MACHINE.allowedFrom(to, update),
    set: update.set,
    setOnce: update.setOnce,
  });
}

/** The run plus one entry per ordered step; steps not reached yet report `pending`. */
export function getRunStatus(db: Database.Database, ref: string): RunStatusView {
  const run = requireRun(db, ref);
  const existing = new Map(listSteps(db, run.id).map((step) => [step.step_name, step]));
  return {
    run,
    steps: DAILY_PIPELINE_STEPS.map((stepName) => {
      const step = existing.get(stepName);
      return {
        id: step?.id ?? null,
        step_name: stepName,
        status: step?.status ?? 'pending',
        started_at: step?.started_at ?? null,
        completed_at: step?.completed_at ?? null,
        error_code: step?.error_code ?? null,
        error_message: step?.error_message ?? null,
        artifacts: step?.artifacts ?? null,
      };
    }),
  };
}
