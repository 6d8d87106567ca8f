import { describe, it, expect, beforeEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import { createTestDb, position } from './test-helpers.js';
import { recordMarketPrice, latestPrice, symbolsPricedOn } from '../market/prices.js';
import { SNAPSHOT_FAMILY_DEFS } from '../snapshots/families.js';
import {
  dryRunSnapshot,
  getSnapshotItem,
  getSnapshotRunByHash,
  listSnapshotItems,
  materializeSnapshot,
  snapshotInputsHash,
} from '../snapshots/materializer.js';
import {
  createPositionBookSources,
  filterPositions,
  parsePositionBook,
  type PositionBookSources,
} from '../snapshots/position-book.js';
import type { SnapshotSource } from '../snapshots/types.js';
import { ValidationError } from '../shared/errors.js';
import { listTimelineEvents } from '../timeline/emitter.js';

const AS_OF = '2024-03-01';

const POSITIONS = [
  position({ subject_id: 'P-002', deal_id: 11, symbol: 'WTI', quantity: -50, contract_price: 75, settlement_date: null }),
  position({ subject_id: 'P-001', deal_id: 10, counterparty: 'Acme Energy', realized_pnl: 50 }),
];

function materializeAll(db: Database.Database, sources: PositionBookSources, filters = {}) {
  const req = { as_of_date: AS_OF, filters };
  return {
    mtm: materializeSnapshot(db, SNAPSHOT_FAMILY_DEFS.mtm, sources.mtm, req),
    pnl: materializeSnapshot(db, SNAPSHOT_FAMILY_DEFS.pnl, sources.pnl, req),
    cashflow: materializeSnapshot(db, SNAPSHOT_FAMILY_DEFS.cashflow_baseline, sources.cashflow_baseline, req),
    risk: materializeSnapshot(db, SNAPSHOT_FAMILY_DEFS.risk_flags, sources.risk_flags, req),
  };
}

describe('position book', () => {
  it('parses defaults and rejects duplicate subjects', () => {
    const [p] = parsePositionBook({
      positions: [{ subject_id: 'A', symbol: 'BRENT', currency: 'USD', quantity: 1, contract_price: 2 }],
    });
    expect(p).toEqual({
      subject_id: 'A',
      deal_id: null,
      counterparty: null,
      symbol: 'BRENT',
      currency: 'USD',
      quantity: 1,
      contract_price: 2,
      realized_pnl: 0,
      settlement_date: null,
    });
    const dup = { subject_id: 'A', symbol: 'BRENT', currency: 'USD', quantity: 1, contract_price: 2 };
    expect(() => parsePositionBook({ positions: [dup, dup] })).toThrow(ValidationError);
    expect(parsePositionBook(null)).toEqual([]);
  });

  it('filters by scalar, list and ignores unknown keys', () => {
    expect(filterPositions(POSITIONS, {}).map((p) => p.subject_id)).toEqual(['P-001', 'P-002']);
    expect(filterPositions(POSITIONS, { deal_id: 10 }).map((p) => p.subject_id)).toEqual(['P-001']);
    expect(filterPositions(POSITIONS, { symbol: ['WTI', 'HH'] }).map((p) => p.subject_id)).toEqual(['P-002']);
    expect(filterPositions(POSITIONS, { desk: 'london' })).toHaveLength(2);
  });
});

describe('market prices', () => {
  it('keeps the first publication and resolves the latest price on or before a date', () => {
    const db = createTestDb();
    const input = { source: 'file', symbol: 'BRENT', as_of_date: '2024-02-28', price: 81, currency: 'USD' };
    expect(recordMarketPrice(db, input).created).toBe(true);
    expect(recordMarketPrice(db, { ...input, price: 99 }).price.price).toBe(81);
    recordMarketPrice(db, { ...input, as_of_date: '2024-03-02', price: 85 });

    expect(latestPrice(db, 'BRENT', AS_OF)?.price).toBe(81);
    expect(latestPrice(db, 'BRENT', '2024-03-02')?.price).toBe(85);
    expect(latestPrice(db, 'BRENT', '2024-01-01')).toBeNull();
    expect(symbolsPricedOn(db, '2024-02-28')).toEqual(['BRENT']);
  });
});

describe('materializeSnapshot', () => {
  let db: Database.Database;
  let sources: PositionBookSources;

  beforeEach(() => {
    db = createTestDb();
    recordMarketPrice(db, { source: 'file', symbol: 'BRENT', as_of_date: '2024-02-29', price: 82.5, currency: 'USD' });
    sources = createPositionBookSources(db, POSITIONS);
  });

  it('computes each family from the ones before it', () => {
    const result = materializeAll(db, sources);

    expect(result.mtm).toMatchObject({ written: 1, skipped_existing: 0, skipped_not_computable: 1 });
    expect(result.pnl).toMatchObject({ written: 1, skipped_not_computable: 1 });
    expect(result.cashflow).toMatchObject({ written: 2, skipped_not_computable: 0 });
    expect(result.risk).toMatchObject({ written: 2, skipped_not_computable: 0 });

    expect(getSnapshotItem(db, SNAPSHOT_FAMILY_DEFS.mtm, 'P-001', AS_OF, 'USD')?.value).toBe(250);
    expect(getSnapshotItem(db, SNAPSHOT_FAMILY_DEFS.pnl, 'P-001', AS_OF, 'USD')?.value).toBe(300);
    expect(getSnapshotItem(db, SNAPSHOT_FAMILY_DEFS.cashflow_baseline, 'P-002', AS_OF, 'USD')).toMatchObject({
      value: -3750,
      payload: {
        settlement_date: null,
        data_quality_flags: ['mtm_not_available', 'pnl_not_available', 'missing_settlement_date'],
      },
    });
    const risk = getSnapshotItem(db, SNAPSHOT_FAMILY_DEFS.risk_flags, 'P-002', AS_OF, 'USD');
    expect(risk?.value).toBe(3);
    expect(risk?.payload).toEqual({
      flags: [
        { code: 'mtm_not_available', severity: 'high' },
        { code: 'pnl_not_available', severity: 'medium' },
        { code: 'missing_settlement_date', severity: 'medium' },
      ],
    });
    expect(getSnapshotItem(db, SNAPSHOT_FAMILY_DEFS.risk_flags, 'P-001', AS_OF, 'USD')?.value).toBe(0);
  });

  it('is idempotent across reruns', () => {
    const first = materializeAll(db, sources);
    const second = materializeAll(db, sources);

    expect(second.mtm.run_id).toBe(first.mtm.run_id);
    expect(second.mtm).toMatchObject({ written: 0, skipped_existing: 1, skipped_not_computable: 1 });
    expect(second.cashflow).toMatchObject({ written: 0, skipped_existing: 2 });
    expect(second.cashflow.item_ids).toEqual(first.cashflow.item_ids);
    expect(listSnapshotItems(db, SNAPSHOT_FAMILY_DEFS.cashflow_baseline, first.cashflow.run_id).map((i) => i.subject_id)).toEqual([
      'P-001',
      'P-002',
    ]);
    const events = listTimelineEvents(db, {
      subject_type: 'mtm_snapshot_run',
      subject_id: first.mtm.run_id,
      audience: 'finance',
    });
    expect(events.map((ev) => ev.event_type)).toEqual(['MTM_SNAPSHOT_CREATED']);
  });

  it('marks the snapshot run failed when the source throws and resumes it later', () => {
    let broken = true;
    const flaky: SnapshotSource = {
      listSubjects: () => [{ subject_id: 'S-1', deal_id: null, currency: 'USD' }],
      computeValue: () => {
        if (broken) throw new Error('feed offline');
        return { value: 1, payload: {} };
      },
    };
    const req = { as_of_date: AS_OF, filters: {} };
    expect(() => materializeSnapshot(db, SNAPSHOT_FAMILY_DEFS.mtm, flaky, req)).toThrow('feed offline');

    const hash = snapshotInputsHash(SNAPSHOT_FAMILY_DEFS.mtm, AS_OF, {});
    expect(getSnapshotRunByHash(db, SNAPSHOT_FAMILY_DEFS.mtm, hash)).toMatchObject({
      status: 'failed',
      error_code: 'Error',
      error_message: 'feed offline',
    });

    broken = false;
    const result = materializeSnapshot(db, SNAPSHOT_FAMILY_DEFS.mtm, flaky, req);
    expect(result.written).toBe(1);
    expect(getSnapshotRunByHash(db, SNAPSHOT_FAMILY_DEFS.mtm, hash)?.status).toBe('done');
  });

  it('dry run reports the hash and subject count without writing', () => {
    const dry = dryRunSnapshot(SNAPSHOT_FAMILY_DEFS.mtm, sources.mtm, {
      as_of_date: AS_OF,
      filters: { deal_id: 10, desk: null },
    });
    expect(dry).toEqual({
      family: 'mtm',
      inputs_hash: snapshotInputsHash(SNAPSHOT_FAMILY_DEFS.mtm, AS_OF, { deal_id: 10 }),
      as_of_date: AS_OF,
      filters: { deal_id: 10 },
      subjects: 1,
    });
    expect(getSnapshotRunByHash(db, SNAPSHOT_FAMILY_DEFS.mtm, dry.inputs_hash)).toBeNull();
  });
});
