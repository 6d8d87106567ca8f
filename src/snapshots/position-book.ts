import { readFileSync, existsSync } from 'node:fs';
import type Database from 'better-sqlite3';
import { load } from 'js-yaml';
import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';
import { IsoDateSchema, parseOrThrow } from '../shared/schemas.js';
import { latestPrice } from '../market/prices.js';
import type { ScopeFilters } from '../pipeline/types.js';
import { SNAPSHOT_FAMILY_DEFS } from './families.js';
import { getSnapshotItem } from './materializer.js';
import type { ComputedValue, SnapshotQuery, SnapshotSource, SnapshotSubject } from './types.js';

export const PositionSchema = z.object({
  subject_id: z.string().min(1),
  deal_id: z.number().int().nullable().default(null),
  counterparty: z.string().nullable().default(null),
  symbol: z.string().min(1),
  currency: z.string().length(3),
  quantity: z.number(),
  contract_price: z.number(),
  realized_pnl: z.number().default(0),
  settlement_date: IsoDateSchema.nullable().default(null),
});

export const PositionBookSchema = z.object({
  positions: z.array(PositionSchema).default([]),
});

export type Position = z.infer<typeof PositionSchema>;
export type PositionSubject = SnapshotSubject & { position: Position };

const FILTERABLE_FIELDS = ['subject_id', 'deal_id', 'counterparty', 'symbol', 'currency'] as const;
type FilterableField = (typeof FILTERABLE_FIELDS)[number];

function isFilterable(key: string): key is FilterableField {
  return (FILTERABLE_FIELDS as readonly string[]).includes(key);
}

export function parsePositionBook(raw: unknown): Position[] {
  const book = parseOrThrow(PositionBookSchema, raw ?? {}, 'position book');
  const seen = new Set<string>();
  for (const position of book.positions) {
    const key = `${position.subject_id}|${position.currency}`;
    if (seen.has(key)) {
      throw new ValidationError(`Duplicate position ${position.subject_id} in ${position.currency}`);
    }
    seen.add(key);
  }
  return book.positions;
}

/** Read a YAML position book; a missing file is an empty book. */
export function loadPositionBook(path: string): Position[] {
  if (!existsSync(path)) return [];
  return parsePositionBook(load(readFileSync(path, 'utf8')));
}

/**
 * Positions matching every known filter key. A filter value may be a scalar
 * or a list of accepted scalars; keys the book does not carry are ignored.
 */
export function filterPositions(positions: Position[], filters: ScopeFilters): Position[] {
  const active = Object.entries(filters).filter(([key]) => isFilterable(key));
  return positions
    .filter((position) =>
      active.every(([key, expected]) => {
        if (!isFilterable(key)) return true;
        const actual = position[key];
        return Array.isArray(expected) ? expected.includes(actual) : expected === actual;
      }),
    )
    .sort((a, b) => (a.subject_id < b.subject_id ? -1 : a.subject_id > b.subject_id ? 1 : 0));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function toSubject(position: Position): PositionSubject {
  return {
    subject_id: position.subject_id,
    deal_id: position.deal_id,
    currency: position.currency,
    position,
  };
}

abstract class PositionBookSource implements SnapshotSource<PositionSubject> {
  protected readonly db: Database.Database;
  protected readonly positions: Position[];

  constructor(db: Database.Database, positions: Position[]) {
    this.db = db;
    this.positions = positions;
  }

  listSubjects(query: SnapshotQuery): PositionSubject[] {
    return filterPositions(this.positions, query.filters).map(toSubject);
  }

  abstract computeValue(subject: PositionSubject, query: SnapshotQuery): ComputedValue | null;
}

/** Mark-to-market: quantity x (latest market price - contract price). */
export class MtmSource extends PositionBookSource {
  computeValue(subject: PositionSubject, query: SnapshotQuery): ComputedValue | null {
    const { position } = subject;
    const market = latestPrice(this.db, position.symbol, query.as_of_date);
    if (!market) return null;
    return {
      value: round2(position.quantity * (market.price - position.contract_price)),
      payload: {
        symbol: position.symbol,
        quantity: position.quantity,
        contract_price: position.contract_price,
        market_price: market.price,
        price_date: market.as_of_date,
        price_source: market.source,
      },
    };
  }
}

/** P&L: unrealized (the MTM item) plus realized. Not computable without MTM. */
export class PnlSource extends PositionBookSource {
  computeValue(subject: PositionSubject, query: SnapshotQuery): ComputedValue | null {
    const mtm = getSnapshotItem(
      this.db,
      SNAPSHOT_FAMILY_DEFS.mtm,
      subject.subject_id,
      query.as_of_date,
      subject.currency,
    );
    if (!mtm || mtm.value === null) return null;
    const realized = subject.position.realized_pnl;
    return {
      value: round2(mtm.value + realized),
      payload: { unrealized: mtm.value, realized, mtm_item_id: mtm.id },
    };
  }
}

/** Settlement baseline with the data-quality gaps that later feed risk flags. */
export class CashflowBaselineSource extends PositionBookSource {
  computeValue(subject: PositionSubject, query: SnapshotQuery): ComputedValue {
    const { position } = subject;
    const flags: string[] = [];
    const itemAt = (family: 'mtm' | 'pnl') =>
      getSnapshotItem(
        this.db,
        SNAPSHOT_FAMILY_DEFS[family],
        subject.subject_id,
        query.as_of_date,
        subject.currency,
      );
    if (!itemAt('mtm')) flags.push('mtm_not_available');
    if (!itemAt('pnl')) flags.push('pnl_not_available');
    if (position.settlement_date === null) flags.push('missing_settlement_date');
    return {
      value: round2(position.quantity * position.contract_price),
      payload: { settlement_date: position.settlement_date, data_quality_flags: flags },
    };
  }
}

export type RiskSeverity = 'low' | 'medium' | 'high';

const FLAG_SEVERITY: Record<string, RiskSeverity> = {
  mtm_not_available: 'high',
  pnl_not_available: 'medium',
  missing_settlement_date: 'medium',
};

function dataQualityFlags(payload: Record<string, unknown>): string[] {
  const flags = payload['data_quality_flags'];
  if (!Array.isArray(flags)) return [];
  return flags.filter((flag): flag is string => typeof flag === 'string');
}

/** Risk flags derived from the cashflow baseline. Not computable without a baseline. */
export class RiskFlagsSource extends PositionBookSource {
  computeValue(subject: PositionSubject, query: SnapshotQuery): ComputedValue | null {
    const baseline = getSnapshotItem(
      this.db,
      SNAPSHOT_FAMILY_DEFS.cashflow_baseline,
      subject.subject_id,
      query.as_of_date,
      subject.currency,
    );
    if (!baseline) return null;
    const flags = dataQualityFlags(baseline.payload).map((code) => ({
      code,
      severity: FLAG_SEVERITY[code] ?? 'low',
    }));
    return { value: flags.length, payload: { flags } };
  }
}

export interface PositionBookSources {
  mtm: MtmSource;
  pnl: PnlSource;
  cashflow_baseline: CashflowBaselineSource;
  risk_flags: RiskFlagsSource;
}

export function createPositionBookSources(
  db: Database.Database,
  positions: Position[],
): PositionBookSources {
  return {
    mtm: new MtmSource(db, positions),
    pnl: new PnlSource(db, positions),
    cashflow_baseline: new CashflowBaselineSource(db, positions),
    risk_flags: new RiskFlagsSource(db, positions),
  };
}
