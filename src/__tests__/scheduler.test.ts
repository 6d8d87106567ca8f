import { describe, it, expect, beforeEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import { createTestDb } from './test-helpers.js';
import { NoopLeaseStore, SqliteLeaseStore, tryAcquireLease, type LeaseStore } from '../scheduler/lease.js';
import { ingestMarketPrices, YamlMarketFeed } from '../scheduler/market-ingest.js';
import { DailyJobRunner, PIPELINE_LEASE_KEY } from '../scheduler/daily-runner.js';
import { SchedulerConfigSchema } from '../shared/schemas.js';
import { latestPrice } from '../market/prices.js';
import type { StepImpls } from '../pipeline/types.js';
import { DAILY_PIPELINE_STEPS } from '../pipeline/types.js';

const FEED_FILE = {
  source: 'exchange',
  prices: [
    { symbol: 'BRENT', as_of_date: '2024-03-01', price: 82 },
    { symbol: 'WTI', as_of_date: '2024-03-01', price: 78.25 },
    { symbol: 'BRENT', as_of_date: '2024-03-04', price: 83 },
  ],
};

function okSteps(): StepImpls {
  const steps: StepImpls = {};
  for (const name of DAILY_PIPELINE_STEPS) steps[name] = () => ({ ok: true });
  return steps;
}

describe('SqliteLeaseStore', () => {
  it('grants a free key, blocks others until expiry and lets the holder extend', () => {
    const db = createTestDb();
    let now = 1000;
    const store = new SqliteLeaseStore(db, () => now);

    expect(store.tryAcquire('job', 500, 'a')).toBe(true);
    now = 1200;
    expect(store.tryAcquire('job', 500, 'b')).toBe(false);
    expect(store.tryAcquire('job', 500, 'a')).toBe(true);
    now = 1600;
    expect(store.tryAcquire('job', 500, 'b')).toBe(false);
    now = 1700;
    expect(store.tryAcquire('job', 500, 'b')).toBe(true);

    store.release('job', 'a');
    expect(store.tryAcquire('job', 500, 'c')).toBe(false);
    store.release('job', 'b');
    expect(store.tryAcquire('job', 500, 'c')).toBe(true);
  });

  it('grants every holder when leasing is off', () => {
    const store = new NoopLeaseStore();
    expect(store.tryAcquire()).toBe(true);
    expect(tryAcquireLease(store, 'job', 1000, 'b')).toBe(true);
  });

  it('treats a failing lease backend as granted', () => {
    const broken: LeaseStore = {
      tryAcquire: () => {
        throw new Error('database is locked');
      },
      release: () => undefined,
    };
    expect(tryAcquireLease(broken, 'job', 1000, 'a')).toBe(true);
  });
});

describe('ingestMarketPrices', () => {
  it('stores the quotes for a day once', async () => {
    const db = createTestDb();
    const feed = new YamlMarketFeed(FEED_FILE);

    const first = await ingestMarketPrices(db, feed, '2024-03-01');
    expect(first).toEqual({ source: 'exchange', as_of_date: '2024-03-01', fetched: 2, inserted: 2, skipped_existing: 0 });
    const again = await ingestMarketPrices(db, feed, '2024-03-01');
    expect(again).toMatchObject({ inserted: 0, skipped_existing: 2 });
    expect(latestPrice(db, 'WTI', '2024-03-01')).toMatchObject({ price: 78.25, currency: 'USD', source: 'exchange' });
  });

  it('reads a missing feed file as empty', async () => {
    const feed = YamlMarketFeed.fromFile('/nonexistent/market-prices.yaml');
    expect(feed.source).toBe('file');
    expect(await feed.fetchQuotes('2024-03-01')).toEqual([]);
  });
});

describe('DailyJobRunner', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  function runner(overrides: Record<string, unknown> = {}, leases: LeaseStore = new SqliteLeaseStore(db)) {
    return new DailyJobRunner({
      db,
      feed: new YamlMarketFeed(FEED_FILE),
      leases,
      steps: okSteps(),
      config: SchedulerConfigSchema.parse({ daily_enabled: true, ...overrides }),
      holder: 'scheduler-test',
    });
  }

  it('runs each job once per day after its hour', async () => {
    const jobs = runner();

    const early = await jobs.tick(new Date('2024-03-01T08:00:00Z'));
    expect(early.ingest).toEqual({ status: 'skipped', reason: 'not_due' });
    expect(early.pipeline).toEqual({ status: 'skipped', reason: 'not_due' });

    const ingestOnly = await jobs.tick(new Date('2024-03-01T09:30:00Z'));
    expect(ingestOnly.ingest).toMatchObject({ status: 'ran', result: { inserted: 2 } });
    expect(ingestOnly.pipeline).toEqual({ status: 'skipped', reason: 'not_due' });

    const both = await jobs.tick(new Date('2024-03-01T10:15:00Z'));
    expect(both.ingest).toEqual({ status: 'skipped', reason: 'already_ran' });
    expect(both.pipeline.status).toBe('ran');
    if (both.pipeline.status === 'ran') {
      expect(both.pipeline.result.status).toBe('done');
      expect(both.pipeline.result.steps[5]).toEqual({ step_name: 'exports', status: 'skipped' });
    }

    const later = await jobs.tick(new Date('2024-03-01T23:00:00Z'));
    expect(later.pipeline).toEqual({ status: 'skipped', reason: 'already_ran' });

    const nextDay = await jobs.tick(new Date('2024-03-04T12:00:00Z'));
    expect(nextDay.as_of_date).toBe('2024-03-04');
    expect(nextDay.ingest).toMatchObject({ status: 'ran', result: { inserted: 1 } });
    expect(nextDay.pipeline.status).toBe('ran');
  });

  it('does not run the pipeline when disabled', async () => {
    const result = await runner({ daily_enabled: false }, new NoopLeaseStore()).tick(new Date('2024-03-01T12:00:00Z'));
    expect(result.pipeline).toEqual({ status: 'skipped', reason: 'disabled' });
    expect(result.ingest.status).toBe('ran');
  });

  it('skips a job whose lease another scheduler holds', async () => {
    expect(new SqliteLeaseStore(db).tryAcquire(PIPELINE_LEASE_KEY, 60_000, 'other-node')).toBe(true);
    const result = await runner().tick(new Date('2024-03-01T12:00:00Z'));
    expect(result.pipeline).toEqual({ status: 'skipped', reason: 'locked' });
    const count = db.prepare(`SELECT COUNT(*) AS n FROM pipeline_runs`).get() as { n: number };
    expect(count.n).toBe(0);
  });
});
