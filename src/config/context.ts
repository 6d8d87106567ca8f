import type Database from 'better-sqlite3';
import { openDb } from '../store/db.js';
import type { FinpipeConfig } from '../shared/schemas.js';
import { createDailySteps } from '../pipeline/steps.js';
import type { StepImpls } from '../pipeline/types.js';
import { createPositionBookSources, loadPositionBook } from '../snapshots/position-book.js';
import { YamlMarketFeed } from '../scheduler/market-ingest.js';
import type { MarketFeed } from '../scheduler/market-ingest.js';
import { loadConfig, resolveSourcePath } from './config.js';
import type { FinpipePaths } from './paths.js';

export interface ProjectContext {
  paths: FinpipePaths;
  config: FinpipeConfig;
  db: Database.Database;
  steps: StepImpls;
  feed: MarketFeed;
}

/**
 * Load config, open the state database and wire the daily steps to the
 * configured position book. The book is read once, here.
 */
export function openProject(cwd: string = process.cwd()): ProjectContext {
  const { paths, config } = loadConfig(cwd);
  const db = openDb(paths.stateDb);
  const positions = loadPositionBook(resolveSourcePath(paths, config.sources.position_book));
  const steps = createDailySteps(createPositionBookSources(db, positions));
  const feed = YamlMarketFeed.fromFile(resolveSourcePath(paths, config.sources.market_feed));
  return { paths, config, db, steps, feed };
}
