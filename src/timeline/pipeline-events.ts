import type Database from 'better-sqlite3';
import type { PipelineRun } from '../pipeline/types.js';
import { emitTimelineEvent, type EmitResult } from './emitter.js';

export type PipelineEventName = 'requested' | 'started' | 'completed' | 'failed';

const PIPELINE_EVENT_TYPES: Record<PipelineEventName, string> = {
  requested: 'FINANCE_PIPELINE_REQUESTED',
  started: 'FINANCE_PIPELINE_STARTED',
  completed: 'FINANCE_PIPELINE_COMPLETED',
  failed: 'FINANCE_PIPELINE_FAILED',
};

export const PIPELINE_SUBJECT_TYPE = 'finance_pipeline_run';

export function pipelineIdempotencyKey(event: PipelineEventName, inputsHash: string): string {
  return `finance_pipeline:${event}:${inputsHash}`;
}

export interface PipelineEventContext {
  correlationId: string;
  actor: string;
  extra?: Record<string, unknown>;
}

/** One FINANCE_PIPELINE_* event per (event, run), plus its audit record. */
export function emitPipelineEvent(
  db: Database.Database,
  event: PipelineEventName,
  run: PipelineRun,
  ctx: PipelineEventContext,
): EmitResult {
  const eventType = PIPELINE_EVENT_TYPES[event];
  return emitTimelineEvent(
    db,
    {
      event_type: eventType,
      subject_type: PIPELINE_SUBJECT_TYPE,
      subject_id: run.id,
      correlation_id: ctx.correlationId,
      idempotency_key: pipelineIdempotencyKey(event, run.inputs_hash),
      visibility: 'finance',
      actor: ctx.actor,
      payload: {
        run_id: run.id,
        inputs_hash: run.inputs_hash,
        status: run.status,
        as_of_date: run.as_of_date,
        pipeline_version: run.pipeline_version,
        ...ctx.extra,
      },
    },
    {
      action: `finance.pipeline.daily.${event}`,
      actor: ctx.actor,
      subject_type: PIPELINE_SUBJECT_TYPE,
      subject_id: run.id,
      request_id: ctx.correlationId,
      payload: {
        event_type: eventType,
        run_id: run.id,
        inputs_hash: run.inputs_hash,
        correlation_id: ctx.correlationId,
      },
    },
  );
}
