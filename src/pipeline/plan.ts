import { canonicalFilters, canonicalHash } from '../shared/canonical.js';
import { PipelineRunRequestSchema, parseOrThrow } from '../shared/schemas.js';
import type { Plan } from './types.js';

export const PLAN_SCHEMA_VERSION = 'finance.pipeline.daily.run.v1';

export function computeInputsHash(plan: Omit<Plan, 'inputs_hash'>): string {
  return canonicalHash({
    schema_version: PLAN_SCHEMA_VERSION,
    pipeline_version: plan.pipeline_version,
    as_of_date: plan.as_of_date,
    scope_filters: plan.scope_filters,
    mode: plan.mode,
    emit_exports: plan.emit_exports,
  });
}

/**
 * Validate raw run parameters and derive the content address of the run.
 * Pure: nothing is read from or written to the store.
 */
export function buildPlan(raw: unknown): Plan {
  const request = parseOrThrow(PipelineRunRequestSchema, raw, 'pipeline request');
  const base: Omit<Plan, 'inputs_hash'> = {
    as_of_date: request.as_of_date,
    pipeline_version: request.pipeline_version,
    scope_filters: canonicalFilters(request.scope_filters),
    mode: request.mode,
    emit_exports: request.emit_exports,
  };
  return { ...base, inputs_hash: computeInputsHash(base) };
}
