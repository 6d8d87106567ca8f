export { buildPlan, computeInputsHash, PLAN_SCHEMA_VERSION } from './pipeline/plan.js';
export { runDailyPipeline, executePlan, dryRunProjection, forceFailRun } from './pipeline/executor.js';
export type { ExecuteOptions } from './pipeline/executor.js';
export { getRun, getRunStatus, listRuns, listSteps } from './pipeline/registry.js';
export { createDailySteps } from './pipeline/steps.js';
export { DAILY_PIPELINE_STEPS } from './pipeline/types.js';
export type {
  DailyStepName,
  DryRunResult,
  Plan,
  PipelineRun,
  PipelineStep,
  RunResult,
  RunStatus,
  RunStatusView,
  StepContext,
  StepImpl,
  StepImpls,
  StepStatus,
} from './pipeline/types.js';

export { materializeSnapshot, dryRunSnapshot, listSnapshotItems } from './snapshots/materializer.js';
export { emitTimelineEvent, listTimelineEvents, correlationIdFromRequestId } from './timeline/emitter.js';
export type { TimelineEvent, TimelineEventInput, TimelineVisibility } from './timeline/emitter.js';
export { ensureExportJob, getExportJob, listExportJobs, exportCutoff } from './exports/jobs.js';
export { runExportWorkerOnce } from './exports/worker.js';
export { getOrCreateWorkflowRequest, decideWorkflowRequest, listWorkflowRequests } from './workflows/approvals.js';
export { SqliteLeaseStore, NoopLeaseStore } from './scheduler/lease.js';
export type { LeaseStore } from './scheduler/lease.js';
export { DailyJobRunner } from './scheduler/daily-runner.js';

export { openProject } from './config/context.js';
export type { ProjectContext } from './config/context.js';
export { openDb, closeDb } from './store/db.js';
export { createServer, startServer } from './api/server.js';
export {
  FinpipeError,
  ValidationError,
  NotFoundError,
  ForbiddenError,
  ConflictError,
  StepExecutionError,
} from './shared/errors.js';
