import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import type { FastifyInstance } from 'fastify';
import { createTestDb } from './test-helpers.js';
import { createServer } from '../index.js';
import { parseConfig } from '../config/config.js';
import { buildPlan } from '../pipeline/plan.js';
import type { StepImpls } from '../pipeline/types.js';
import { DAILY_PIPELINE_STEPS } from '../pipeline/types.js';

const RUN_BODY = { as_of_date: '2024-03-01', pipeline_version: 'daily.v1', scope_filters: { deal_id: 10 }, emit_exports: false };

describe('HTTP API', () => {
  let db: Database.Database;
  let app: FastifyInstance;
  let failPnl: boolean;

  beforeEach(async () => {
    db = createTestDb();
    failPnl = false;
    const steps: StepImpls = {};
    for (const name of DAILY_PIPELINE_STEPS) {
      steps[name] = () => {
        if (name === 'pnl_snapshot' && failPnl) throw new Error('pnl source down');
        return { step: name };
      };
    }
    app = await createServer({
      db,
      steps,
      config: parseConfig({ instance_id: 'test-instance', created_at: 'now', version: '0.1.0' }),
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/v1/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'ok',
      instance_id: 'test-instance',
      version: '0.1.0',
      audit_chain: { ok: true, broken_at: null },
    });
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });

  it('runs the pipeline and serves its status by id and by hash', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/pipelines/daily/run', payload: RUN_BODY });
    expect(res.statusCode).toBe(200);
    const body = res.json() as { run_id: string; status: string; inputs_hash: string };
    expect(body.status).toBe('done');
    expect(body.inputs_hash).toBe(buildPlan(RUN_BODY).inputs_hash);

    const byId = await app.inject({ method: 'GET', url: `/v1/pipelines/daily/runs/${body.run_id}` });
    const byHash = await app.inject({ method: 'GET', url: `/v1/pipelines/daily/runs/${body.inputs_hash}` });
    expect(byId.statusCode).toBe(200);
    expect(byHash.json()).toEqual(byId.json());

    const list = await app.inject({ method: 'GET', url: '/v1/pipelines/daily/runs?status=done' });
    expect((list.json() as { runs: unknown[] }).runs).toHaveLength(1);

    const events = await app.inject({ method: 'GET', url: `/v1/pipelines/daily/runs/${body.run_id}/events` });
    expect((events.json() as { events: unknown[] }).events).toHaveLength(3);
  });

  it('returns a dry-run projection', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/pipelines/daily/run',
      payload: { ...RUN_BODY, mode: 'dry_run' },
    });
    expect(res.json()).toMatchObject({ mode: 'dry_run', ordered_steps: [...DAILY_PIPELINE_STEPS] });
  });

  it('maps validation, not-found and conflict errors', async () => {
    const invalid = await app.inject({
      method: 'POST',
      url: '/v1/pipelines/daily/run',
      payload: { as_of_date: '03/01/2024', pipeline_version: 'daily.v1' },
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toMatchObject({ code: 'validation_error' });

    const missing = await app.inject({ method: 'GET', url: '/v1/pipelines/daily/runs/no-such-run' });
    expect(missing.statusCode).toBe(404);

    const badRef = await app.inject({ method: 'GET', url: '/v1/pipelines/daily/runs/not%20a%20ref' });
    expect(badRef.statusCode).toBe(400);

    failPnl = true;
    const failed = await app.inject({ method: 'POST', url: '/v1/pipelines/daily/run', payload: RUN_BODY });
    expect(failed.json()).toMatchObject({ status: 'failed', error_message: 'pnl source down' });
    const again = await app.inject({ method: 'POST', url: '/v1/pipelines/daily/run', payload: RUN_BODY });
    expect(again.statusCode).toBe(409);
    const runId = (failed.json() as { run_id: string }).run_id;
    expect(again.json()).toEqual({
      error: `Pipeline run ${runId} failed at an earlier attempt; send the same request with resume: true to continue it`,
      code: 'conflict',
    });

    failPnl = false;
    const resumed = await app.inject({
      method: 'POST',
      url: '/v1/pipelines/daily/run',
      payload: { ...RUN_BODY, resume: true },
    });
    expect(resumed.json()).toMatchObject({ status: 'done' });
  });

  it('queues exports idempotently', async () => {
    const payload = { as_of_date: '2024-03-01', filters: { deal_id: 10 } };
    const first = await app.inject({ method: 'POST', url: '/v1/exports', payload });
    const second = await app.inject({ method: 'POST', url: '/v1/exports', payload });
    expect(first.statusCode).toBe(202);
    expect(second.statusCode).toBe(200);
    const exportId = (first.json() as { job: { export_id: string } }).job.export_id;

    const worked = await app.inject({ method: 'POST', url: '/v1/exports/worker/run-once' });
    expect(worked.json()).toEqual({ processed: { export_id: exportId, status: 'done' } });
    const job = await app.inject({ method: 'GET', url: `/v1/exports/${exportId}` });
    expect(job.json()).toMatchObject({ status: 'done', as_of: '2024-03-01T00:00:00.000Z' });
  });

  it('opens and decides workflow requests', async () => {
    const created = await app.inject({
      method: 'POST',
      url: '/v1/workflows',
      headers: { 'x-actor': 'trader-1' },
      payload: { action: 'hedge.manual.create', subject_type: 'hedge', subject_id: 'H-1', notional_usd: 300000 },
    });
    expect(created.statusCode).toBe(201);
    const request = (created.json() as { request: { id: string; required_role: string; requested_by: string } }).request;
    expect(request.required_role).toBe('admin');
    expect(request.requested_by).toBe('trader-1');

    const forbidden = await app.inject({
      method: 'POST',
      url: `/v1/workflows/${request.id}/decide`,
      headers: { 'x-actor': 'analyst-1', 'x-role': 'finance' },
      payload: { decision: 'approved' },
    });
    expect(forbidden.statusCode).toBe(403);
    expect(forbidden.json()).toMatchObject({ code: 'forbidden' });

    const badRole = await app.inject({
      method: 'POST',
      url: `/v1/workflows/${request.id}/decide`,
      headers: { 'x-role': 'superuser' },
      payload: { decision: 'approved' },
    });
    expect(badRole.statusCode).toBe(400);

    const decided = await app.inject({
      method: 'POST',
      url: `/v1/workflows/${request.id}/decide`,
      headers: { 'x-actor': 'admin-1', 'x-role': 'admin' },
      payload: { decision: 'rejected', reason: 'over limit' },
    });
    expect(decided.json()).toMatchObject({ status: 'rejected', decided_by: 'admin-1' });

    const conflict = await app.inject({
      method: 'POST',
      url: `/v1/workflows/${request.id}/decide`,
      headers: { 'x-role': 'admin' },
      payload: { decision: 'approved' },
    });
    expect(conflict.statusCode).toBe(409);
  });

  it('records and lists timeline events with audience filtering', async () => {
    const payload = {
      event_type: 'NOTE_ADDED',
      subject_type: 'deal',
      subject_id: '10',
      idempotency_key: 'note:10:1',
      visibility: 'finance',
      payload: { text: 'margin call expected' },
    };
    const first = await app.inject({ method: 'POST', url: '/v1/timeline/events', payload });
    const second = await app.inject({ method: 'POST', url: '/v1/timeline/events', payload });
    expect(first.statusCode).toBe(201);
    expect(second.statusCode).toBe(200);

    const general = await app.inject({ method: 'GET', url: '/v1/timeline?subject_type=deal&subject_id=10' });
    expect((general.json() as { events: unknown[] }).events).toHaveLength(0);
    const finance = await app.inject({
      method: 'GET',
      url: '/v1/timeline?subject_type=deal&subject_id=10&audience=finance',
    });
    expect((finance.json() as { events: unknown[] }).events).toHaveLength(1);
  });

  it('refuses to force-fail a finished run', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/pipelines/daily/run', payload: RUN_BODY });
    const runId = (res.json() as { run_id: string }).run_id;
    const conflict = await app.inject({
      method: 'POST',
      url: `/v1/pipelines/daily/runs/${runId}/force-fail`,
      payload: { reason: 'stuck' },
    });
    expect(conflict.statusCode).toBe(409);
  });

  it('lists audit entries for a subject', async () => {
    const created = await app.inject({
      method: 'POST',
      url: '/v1/workflows',
      headers: { 'x-actor': 'trader-2' },
      payload: { action: 'rfq.award', subject_type: 'rfq', subject_id: 'RFQ-9', notional_usd: 1000 },
    });
    const id = (created.json() as { request: { id: string } }).request.id;

    const res = await app.inject({ method: 'GET', url: `/v1/audit?subject_type=workflow&subject_id=${id}` });
    expect(res.statusCode).toBe(200);
    const body = res.json() as { entries: Array<{ action: string; actor: string }>; limit: number };
    expect(body.entries.map((e) => [e.action, e.actor])).toEqual([['workflow.requested', 'trader-2']]);
    expect(body.limit).toBe(100);

    const halfSubject = await app.inject({ method: 'GET', url: '/v1/audit?subject_type=workflow' });
    expect(halfSubject.statusCode).toBe(400);
  });
});
