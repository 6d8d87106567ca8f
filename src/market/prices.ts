import type Database from 'better-sqlite3';
import { generateId } from '../shared/ids.js';
import { ensureOrFetch } from '../store/ensure.js';

export interface MarketPrice {
  id: string;
  source: string;
  symbol: string;
  as_of_date: string;
  price: number;
  currency: string;
  ingested_at: string;
}

export interface MarketPriceInput {
  source: string;
  symbol: string;
  as_of_date: string;
  price: number;
  currency: string;
}

export function getMarketPrice(
  db: Database.Database,
  source: string,
  symbol: string,
  asOfDate: string,
): MarketPrice | null {
  const row = db
    .prepare(`SELECT * FROM market_prices WHERE source = ? AND symbol = ? AND as_of_date = ?`)
    .get(source, symbol, asOfDate) as MarketPrice | undefined;
  return row ?? null;
}

/** Insert a published price once; a second publication for the same key is ignored. */
export function recordMarketPrice(
  db: Database.Database,
  input: MarketPriceInput,
): { price: MarketPrice; created: boolean } {
  const { entity, created } = ensureOrFetch(db, {
    find: () => getMarketPrice(db, input.source, input.symbol, input.as_of_date) ?? undefined,
    insert: () => {
      db.prepare(`
        INSERT INTO market_prices (id, source, symbol, as_of_date, price, currency, ingested_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        generateId(),
        input.source,
        input.symbol,
        input.as_of_date,
        input.price,
        input.currency,
        new Date().toISOString(),
      );
    },
  });
  return { price: entity, created };
}

/** Latest price for a symbol published on or before `asOfDate`, across sources. */
export function latestPrice(
  db: Database.Database,
  symbol: string,
  asOfDate: string,
): MarketPrice | null {
  const row = db
    .prepare(
      `SELECT * FROM market_prices WHERE symbol = ? AND as_of_date <= ?
       ORDER BY as_of_date DESC, source ASC LIMIT 1`,
    )
    .get(symbol, asOfDate) as MarketPrice | undefined;
  return row ?? null;
}

/** Symbols with a price on exactly `asOfDate`. */
export function symbolsPricedOn(db: Database.Database, asOfDate: string): string[] {
  const rows = db
    .prepare(`SELECT DISTINCT symbol FROM market_prices WHERE as_of_date = ? ORDER BY symbol ASC`)
    .all(asOfDate) as Array<{ symbol: string }>;
  return rows.map((row) => row.symbol);
}
