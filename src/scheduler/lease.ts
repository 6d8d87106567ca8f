import type Database from 'better-sqlite3';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/** Best-effort mutual exclusion for scheduled jobs across processes. */
export interface LeaseStore {
  tryAcquire(key: string, ttlMs: number, holder: string): boolean;
  release(key: string, holder: string): void;
}

/**
 * Leases in the `leases` table. A key is granted when it is free, expired,
 * or already held by the same holder (which extends it).
 */
export class SqliteLeaseStore implements LeaseStore {
  private readonly db: Database.Database;
  private readonly now: () => number;

  constructor(db: Database.Database, now: () => number = Date.now) {
    this.db = db;
    this.now = now;
  }

  tryAcquire(key: string, ttlMs: number, holder: string): boolean {
    const now = this.now();
    const info = this.db
      .prepare(`
        INSERT INTO leases (lease_key, holder, expires_at, acquired_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(lease_key) DO UPDATE SET
          holder = excluded.holder,
          expires_at = excluded.expires_at,
          acquired_at = excluded.acquired_at
        WHERE leases.expires_at <= ? OR leases.holder = excluded.holder
      `)
      .run(key, holder, now + ttlMs, new Date(now).toISOString(), now);
    return info.changes === 1;
  }

  release(key: string, holder: string): void {
    this.db.prepare(`DELETE FROM leases WHERE lease_key = ? AND holder = ?`).run(key, holder);
  }
}

/** Grants every request. For single-process deployments. */
export class NoopLeaseStore implements LeaseStore {
  tryAcquire(): boolean {
    return true;
  }

  release(): void {}
}

/**
 * Acquire a lease, treating a failing lease backend as granted: a scheduled
 * job should still run when only the lock is unavailable.
 */
export function tryAcquireLease(store: LeaseStore, key: string, ttlMs: number, holder: string): boolean {
  try {
    return store.tryAcquire(key, ttlMs, holder);
  } catch (err) {
    logger.warn('Lease store unavailable, proceeding without lease', {
      lease_key: key,
      error: errorMessage(err),
    });
    return true;
  }
}

export function releaseLease(store: LeaseStore, key: string, holder: string): void {
  try {
    store.release(key, holder);
  } catch (err) {
    logger.warn('Lease release failed', { lease_key: key, error: errorMessage(err) });
  }
}
