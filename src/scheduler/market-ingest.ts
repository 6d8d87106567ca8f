import { existsSync, readFileSync } from 'node:fs';
import type Database from 'better-sqlite3';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { IsoDateSchema, parseOrThrow } from '../shared/schemas.js';
import { recordMarketPrice } from '../market/prices.js';

export interface MarketQuote {
  symbol: string;
  as_of_date: string;
  price: number;
  currency: string;
}

/** A source of published settlement prices. */
export interface MarketFeed {
  readonly source: string;
  fetchQuotes(asOfDate: string): Promise<MarketQuote[]>;
}

const MarketFileSchema = z.object({
  source: z.string().min(1).default('file'),
  prices: z
    .array(
      z.object({
        symbol: z.string().min(1),
        as_of_date: IsoDateSchema,
        price: z.number().finite(),
        currency: z.string().length(3).default('USD'),
      }),
    )
    .default([]),
});

/** Prices from a YAML file; only rows dated `asOfDate` are returned. */
export class YamlMarketFeed implements MarketFeed {
  readonly source: string;
  private readonly quotes: MarketQuote[];

  constructor(raw: unknown) {
    const file = parseOrThrow(MarketFileSchema, raw ?? {}, 'market price file');
    this.source = file.source;
    this.quotes = file.prices;
  }

  static fromFile(path: string): YamlMarketFeed {
    if (!existsSync(path)) return new YamlMarketFeed({});
    return new YamlMarketFeed(load(readFileSync(path, 'utf8')));
  }

  async fetchQuotes(asOfDate: string): Promise<MarketQuote[]> {
    return this.quotes.filter((quote) => quote.as_of_date === asOfDate);
  }
}

export interface IngestResult {
  source: string;
  as_of_date: string;
  fetched: number;
  inserted: number;
  skipped_existing: number;
}

/** Store the feed's quotes for a date. Already stored prices are left as they are. */
export async function ingestMarketPrices(
  db: Database.Database,
  feed: MarketFeed,
  asOfDate: string,
): Promise<IngestResult> {
  const quotes = await feed.fetchQuotes(asOfDate);
  let inserted = 0;
  let skipped = 0;
  db.transaction(() => {
    for (const quote of quotes) {
      const { created } = recordMarketPrice(db, { ...quote, source: feed.source });
      if (created) inserted += 1;
      else skipped += 1;
    }
  })();
  logger.info('Market prices ingested', {
    source: feed.source,
    as_of_date: asOfDate,
    inserted,
    skipped_existing: skipped,
  });
  return {
    source: feed.source,
    as_of_date: asOfDate,
    fetched: quotes.length,
    inserted,
    skipped_existing: skipped,
  };
}
