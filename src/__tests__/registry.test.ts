import { describe, it, expect, beforeEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import { createTestDb } from './test-helpers.js';
import { buildPlan } from '../pipeline/plan.js';
import {
  ensureRun,
  ensureStep,
  getRun,
  getRunStatus,
  listRuns,
  listSteps,
  requireRun,
  transitionRun,
} from '../pipeline/registry.js';
import { NotFoundError, ValidationError } from '../shared/errors.js';

describe('run registry', () => {
  let db: Database.Database;
  const plan = buildPlan({ as_of_date: '2024-03-01', pipeline_version: 'daily.v1', scope_filters: { deal_id: 10 } });

  beforeEach(() => {
    db = createTestDb();
  });

  it('creates one queued run per inputs hash', () => {
    const results = Array.from({ length: 5 }, () => ensureRun(db, plan, 'cli'));
    expect(results.filter((r) => r.created)).toHaveLength(1);
    expect(new Set(results.map((r) => r.entity.id)).size).toBe(1);
    expect(results[0]?.entity).toMatchObject({
      status: 'queued',
      as_of_date: '2024-03-01',
      scope_filters: { deal_id: 10 },
      emit_exports: true,
      mode: 'materialize',
      started_at: null,
    });
  });

  it('resolves a run by id or by hash and rejects malformed refs', () => {
    const run = ensureRun(db, plan).entity;
    expect(getRun(db, run.id)?.id).toBe(run.id);
    expect(getRun(db, plan.inputs_hash)?.id).toBe(run.id);
    expect(getRun(db, 'f'.repeat(64))).toBeNull();
    expect(() => getRun(db, 'bad ref!')).toThrow(ValidationError);
    expect(() => requireRun(db, 'unknown')).toThrow(NotFoundError);
  });

  it('creates one step row per name and lists them in pipeline order', () => {
    const run = ensureRun(db, plan).entity;
    ensureStep(db, run.id, 'risk_flags');
    ensureStep(db, run.id, 'market_snapshot_resolve');
    expect(ensureStep(db, run.id, 'risk_flags').created).toBe(false);
    expect(listSteps(db, run.id).map((s) => s.step_name)).toEqual(['market_snapshot_resolve', 'risk_flags']);
  });

  it('reports every ordered step, pending until reached', () => {
    const run = ensureRun(db, plan).entity;
    ensureStep(db, run.id, 'market_snapshot_resolve');
    const view = getRunStatus(db, run.id);
    expect(view.steps.map((s) => [s.step_name, s.status, s.id === null])).toEqual([
      ['market_snapshot_resolve', 'pending', false],
      ['mtm_snapshot', 'pending', true],
      ['pnl_snapshot', 'pending', true],
      ['cashflow_baseline', 'pending', true],
      ['risk_flags', 'pending', true],
      ['exports', 'pending', true],
    ]);
  });

  it('filters and pages the run list', () => {
    const a = ensureRun(db, plan).entity;
    ensureRun(db, buildPlan({ as_of_date: '2024-03-02', pipeline_version: 'daily.v1' }));
    transitionRun(db, a.id, 'running', { idempotent: false });

    expect(listRuns(db)).toHaveLength(2);
    expect(listRuns(db, { status: 'running' }).map((r) => r.id)).toEqual([a.id]);
    expect(listRuns(db, { limit: 1, offset: 1 })).toHaveLength(1);
  });
});
