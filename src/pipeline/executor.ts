import type Database from 'better-sqlite3';
import {
  ConflictError,
  StepExecutionError,
  errorCode,
  storedErrorMessage,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { correlationIdFromRequestId } from '../timeline/emitter.js';
import { emitPipelineEvent } from '../timeline/pipeline-events.js';
import { buildPlan } from './plan.js';
import {
  ensureRun,
  ensureStep,
  getRunById,
  getRunStatus,
  listSteps,
  requireRunTransition,
  requireStepTransition,
} from './registry.js';
import { STEP_MACHINE } from './status.js';
import {
  DAILY_PIPELINE_STEPS,
  type DryRunResult,
  type PipelineRun,
  type Plan,
  type RunResult,
  type StepImpls,
} from './types.js';

export interface ExecuteOptions {
  steps: StepImpls;
  requestedBy?: string;
  /** Caller's request token (X-Request-ID); reused as correlation id when it is a UUID. */
  requestId?: string | null;
  /** Allow `failed -> running`. Without it a failed run is a conflict. */
  resume?: boolean;
}

export function dryRunProjection(plan: Plan): DryRunResult {
  return {
    mode: 'dry_run',
    inputs_hash: plan.inputs_hash,
    as_of_date: plan.as_of_date,
    pipeline_version: plan.pipeline_version,
    scope_filters: plan.scope_filters,
    emit_exports: plan.emit_exports,
    ordered_steps: [...DAILY_PIPELINE_STEPS],
  };
}

function summarize(db: Database.Database, run: PipelineRun): RunResult {
  const view = getRunStatus(db, run.id);
  return {
    mode: 'materialize',
    run_id: view.run.id,
    inputs_hash: view.run.inputs_hash,
    status: view.run.status,
    error_code: view.run.error_code,
    error_message: view.run.error_message,
    steps: view.steps.map((step) => ({ step_name: step.step_name, status: step.status })),
  };
}

function reload(db: Database.Database, runId: string): PipelineRun {
  const run = getRunById(db, runId);
  if (!run) throw new Error(`Pipeline run ${runId} disappeared`);
  return run;
}

/**
 * Validate the request and run the daily pipeline. `dry_run` requests return
 * the projection without touching the store.
 */
export async function runDailyPipeline(
  db: Database.Database,
  input: unknown,
  opts: ExecuteOptions,
): Promise<RunResult | DryRunResult> {
  const plan = buildPlan(input);
  if (plan.mode === 'dry_run') return dryRunProjection(plan);
  return executePlan(db, plan, opts);
}

/**
 * Ensure the run for `plan`, then walk the ordered steps. Steps already
 * `done` or `skipped` are never invoked again, so calling this after a
 * failure resumes at the failed step. The first failing step stops the run.
 */
export async function executePlan(
  db: Database.Database,
  plan: Plan,
  opts: ExecuteOptions,
): Promise<RunResult> {
  const actor = opts.requestedBy ?? 'system';
  const correlationId = correlationIdFromRequestId(opts.requestId);
  const eventCtx = { correlationId, actor };

  const { entity: ensured, created } = ensureRun(db, plan, actor);
  if (ensured.status === 'done') {
    logger.info('Run already done', { run_id: ensured.id, inputs_hash: ensured.inputs_hash });
    return summarize(db, ensured);
  }
  if (ensured.status === 'failed' && opts.resume !== true) {
    throw new ConflictError(
      `Pipeline run ${ensured.id} failed at an earlier attempt; send the same request with resume: true to continue it`,
      ensured.status,
    );
  }

  emitPipelineEvent(db, 'requested', ensured, eventCtx);
  const resuming = ensured.status === 'failed';
  const now = new Date().toISOString();
  requireRunTransition(db, ensured.id, 'running', {
    resume: resuming,
    idempotent: false,
    set: { error_code: null, error_message: null, completed_at: null },
    setOnce: { started_at: now },
  });
  let run = reload(db, ensured.id);
  emitPipelineEvent(db, 'started', run, eventCtx);
  logger.info('Run started', {
    run_id: run.id,
    inputs_hash: run.inputs_hash,
    as_of_date: run.as_of_date,
    created,
    resumed: resuming,
  });

  let failed = false;

  for (const stepName of DAILY_PIPELINE_STEPS) {
    const { entity: step } = ensureStep(db, run.id, stepName);
    if (STEP_MACHINE.isTerminal(step.status)) continue;

    if (stepName === 'exports' && !plan.emit_exports) {
      requireStepTransition(db, step.id, 'skipped', {
        set: { completed_at: new Date().toISOString() },
      });
      continue;
    }

    requireStepTransition(db, step.id, 'running', {
      resume: step.status === 'failed',
      idempotent: false,
      set: { error_code: null, error_message: null, completed_at: null },
      setOnce: { started_at: new Date().toISOString() },
    });

    let artifactsJson: string | null = null;
    let failure: { code: string; message: string } | null = null;
    try {
      const impl = opts.steps[stepName];
      if (!impl) {
        throw new StepExecutionError(
          stepName,
          'step_not_implemented',
          `No implementation registered for step '${stepName}'`,
        );
      }
      const artifacts = await impl({ db, plan, run, stepName, correlationId, requestedBy: actor });
      artifactsJson = artifacts === undefined ? null : JSON.stringify(artifacts);
    } catch (err) {
      failure = { code: errorCode(err), message: storedErrorMessage(err) };
    }

    if (failure) {
      const completedAt = new Date().toISOString();
      const recorded = failure;
      db.transaction(() => {
        requireStepTransition(db, step.id, 'failed', {
          set: { error_code: recorded.code, error_message: recorded.message, completed_at: completedAt },
        });
        requireRunTransition(db, run.id, 'failed', {
          set: { error_code: recorded.code, error_message: recorded.message, completed_at: completedAt },
        });
      })();
      run = reload(db, run.id);
      emitPipelineEvent(db, 'failed', run, {
        ...eventCtx,
        extra: { step_name: stepName, error_code: recorded.code, error_message: recorded.message },
      });
      logger.warn('Step failed', {
        run_id: run.id,
        step: stepName,
        error_code: recorded.code,
        error: recorded.message,
      });
      failed = true;
      break;
    }

    requireStepTransition(db, step.id, 'done', {
      set: {
        artifacts_json: artifactsJson,
        completed_at: new Date().toISOString(),
      },
    });
    logger.debug('Step done', { run_id: run.id, step: stepName });
  }

  if (!failed) {
    requireRunTransition(db, run.id, 'done', {
      set: { completed_at: new Date().toISOString() },
    });
    run = reload(db, run.id);
    emitPipelineEvent(db, 'completed', run, eventCtx);
  }

  logger.info('Run completed', { run_id: run.id, status: run.status });
  return summarize(db, run);
}

/**
 * Operator transition for a run left `running` by a crashed process:
 * the run and any `running` step move to `failed`, after which the run can
 * be resumed. Conflicts if the run is not `running`.
 */
export function forceFailRun(
  db: Database.Database,
  runId: string,
  opts: { actor?: string; reason?: string; requestId?: string | null } = {},
): PipelineRun {
  const actor = opts.actor ?? 'operator';
  const message = (opts.reason ?? 'Marked failed by operator').slice(0, 2000);
  const completedAt = new Date().toISOString();

  db.transaction(() => {
    requireRunTransition(db, runId, 'failed', {
      idempotent: false,
      set: { error_code: 'operator_force_failed', error_message: message, completed_at: completedAt },
    });
    for (const step of listSteps(db, runId)) {
      if (step.status !== 'running') continue;
      requireStepTransition(db, step.id, 'failed', {
        set: { error_code: 'operator_force_failed', error_message: message, completed_at: completedAt },
      });
    }
  })();

  const run = reload(db, runId);
  emitPipelineEvent(db, 'failed', run, {
    correlationId: correlationIdFromRequestId(opts.requestId),
    actor,
    extra: { error_code: 'operator_force_failed', error_message: message },
  });
  logger.warn('Run force-failed', { run_id: run.id, actor });
  return run;
}
