import { mkdtempSync, rmSync, mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { dump } from 'js-yaml';
import { applySchema } from '../store/schema.js';
import type { FinpipeConfigInput } from '../shared/schemas.js';
import type { Position } from '../snapshots/position-book.js';

/** Fresh in-memory SQLite database with the full schema. */
export function createTestDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  applySchema(db);
  return db;
}

export interface TempProject {
  projectDir: string;
  finpipeDir: string;
  cleanup: () => void;
}

export function createTempProject(
  overrides: Partial<FinpipeConfigInput> = {},
  files: Record<string, unknown> = {},
): TempProject {
  const root = mkdtempSync(join(tmpdir(), 'finpipe-test-'));
  const finpipeDir = join(root, '.finpipe');
  mkdirSync(finpipeDir, { recursive: true });

  const config: FinpipeConfigInput = {
    instance_id: 'test-instance',
    created_at: '2024-01-01T00:00:00.000Z',
    version: '0.1.0',
    ...overrides,
  };
  writeFileSync(join(finpipeDir, 'config.yaml'), dump(config), 'utf8');
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(root, name), dump(content), 'utf8');
  }

  return {
    projectDir: root,
    finpipeDir,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export function position(overrides: Partial<Position> & Pick<Position, 'subject_id'>): Position {
  return {
    deal_id: null,
    counterparty: null,
    symbol: 'BRENT',
    currency: 'USD',
    quantity: 100,
    contract_price: 80,
    realized_pnl: 0,
    settlement_date: '2024-04-30',
    ...overrides,
  };
}
