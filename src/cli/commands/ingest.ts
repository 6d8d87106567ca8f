import type { Command } from 'commander';
import { requireProject } from '../cli-shared.js';
import { symbolsPricedOn } from '../../market/prices.js';
import { ingestMarketPrices } from '../../scheduler/market-ingest.js';

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Load market prices for a business date from the configured feed')
    .requiredOption('--as-of <date>', 'Business date (YYYY-MM-DD)')
    .action(async (opts) => {
      const { db, feed } = requireProject();
      const result = await ingestMarketPrices(db, feed, opts.asOf as string);
      console.log(
        `Ingested ${result.source} prices for ${result.as_of_date}: ` +
          `${result.fetched} fetched, ${result.inserted} new, ${result.skipped_existing} already stored`,
      );
      const symbols = symbolsPricedOn(db, result.as_of_date);
      console.log(`Priced on ${result.as_of_date}: ${symbols.length > 0 ? symbols.join(', ') : '(none)'}`);
    });
}
