import { describe, it, expect } from '@jest/globals';
import { buildPlan, computeInputsHash, PLAN_SCHEMA_VERSION } from '../pipeline/plan.js';
import { canonicalHash } from '../shared/canonical.js';
import { ValidationError } from '../shared/errors.js';

describe('buildPlan', () => {
  it('defaults mode and emit_exports', () => {
    const plan = buildPlan({ as_of_date: '2024-03-01', pipeline_version: 'daily.v1' });
    expect(plan.mode).toBe('materialize');
    expect(plan.emit_exports).toBe(true);
    expect(plan.scope_filters).toEqual({});
  });

  it('hashes the canonical plan body', () => {
    const plan = buildPlan({
      as_of_date: '2024-03-01',
      pipeline_version: 'daily.v1',
      scope_filters: { deal_id: 10 },
      emit_exports: false,
    });
    expect(plan.inputs_hash).toBe(
      canonicalHash({
        schema_version: PLAN_SCHEMA_VERSION,
        pipeline_version: 'daily.v1',
        as_of_date: '2024-03-01',
        scope_filters: { deal_id: 10 },
        mode: 'materialize',
        emit_exports: false,
      }),
    );
    expect(computeInputsHash(plan)).toBe(plan.inputs_hash);
  });

  it('is independent of filter key order and ignores null filters', () => {
    const a = buildPlan({
      as_of_date: '2024-03-01',
      pipeline_version: 'daily.v1',
      scope_filters: { symbol: 'BRENT', deal_id: 10 },
    });
    const b = buildPlan({
      as_of_date: '2024-03-01',
      pipeline_version: 'daily.v1',
      scope_filters: { deal_id: 10, desk: null, symbol: 'BRENT' },
    });
    expect(a.inputs_hash).toBe(b.inputs_hash);
    expect(Object.keys(b.scope_filters)).toEqual(['deal_id', 'symbol']);
  });

  it('changes the hash when any input changes', () => {
    const base = { as_of_date: '2024-03-01', pipeline_version: 'daily.v1' };
    const hashes = new Set([
      buildPlan(base).inputs_hash,
      buildPlan({ ...base, as_of_date: '2024-03-02' }).inputs_hash,
      buildPlan({ ...base, pipeline_version: 'daily.v2' }).inputs_hash,
      buildPlan({ ...base, emit_exports: false }).inputs_hash,
      buildPlan({ ...base, mode: 'dry_run' }).inputs_hash,
    ]);
    expect(hashes.size).toBe(5);
  });

  it('rejects malformed input', () => {
    expect(() => buildPlan({ as_of_date: '2024-02-30', pipeline_version: 'daily.v1' })).toThrow(
      ValidationError,
    );
    expect(() => buildPlan({ as_of_date: '2024-03-01', pipeline_version: '' })).toThrow(ValidationError);
    expect(() =>
      buildPlan({ as_of_date: '2024-03-01', pipeline_version: 'v1', mode: 'replay' }),
    ).toThrow(ValidationError);
  });
});
