import type Database from 'better-sqlite3';
import { errorMessage } from '../shared/errors.js';
import { generateId } from '../shared/ids.js';
import { logger } from '../shared/logger.js';
import type { SchedulerConfig } from '../shared/schemas.js';
import { executePlan } from '../pipeline/executor.js';
import { buildPlan } from '../pipeline/plan.js';
import type { RunResult, StepImpls } from '../pipeline/types.js';
import { releaseLease, tryAcquireLease, type LeaseStore } from './lease.js';
import { ingestMarketPrices, type IngestResult, type MarketFeed } from './market-ingest.js';

export const INGEST_LEASE_KEY = 'scheduler:market_ingest';
export const PIPELINE_LEASE_KEY = 'scheduler:pipeline_daily';

export interface DailyJobDeps {
  db: Database.Database;
  feed: MarketFeed;
  leases: LeaseStore;
  steps: StepImpls;
  config: SchedulerConfig;
  holder?: string;
}

export type JobOutcome<T> =
  | { status: 'ran'; result: T }
  | { status: 'skipped'; reason: 'not_due' | 'already_ran' | 'disabled' | 'locked' }
  | { status: 'failed'; error: string };

export interface TickResult {
  as_of_date: string;
  ingest: JobOutcome<IngestResult>;
  pipeline: JobOutcome<RunResult>;
}

function utcDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Once per UTC day: ingest market prices after `ingest_utc_hour`, then, when
 * enabled, run the daily pipeline after `pipeline_utc_hour`. Each job runs
 * under its own lease. The pipeline never resumes a failed run on its own.
 */
export class DailyJobRunner {
  private readonly deps: DailyJobDeps;
  private readonly holder: string;
  private lastIngestDate: string | null = null;
  private lastPipelineDate: string | null = null;
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(deps: DailyJobDeps) {
    this.deps = deps;
    this.holder = deps.holder ?? `scheduler-${generateId(6)}`;
  }

  async tick(now: Date = new Date()): Promise<TickResult> {
    const asOfDate = utcDate(now);
    const hour = now.getUTCHours();
    const { config } = this.deps;

    let ingest: JobOutcome<IngestResult>;
    if (hour < config.ingest_utc_hour) {
      ingest = { status: 'skipped', reason: 'not_due' };
    } else if (this.lastIngestDate === asOfDate) {
      ingest = { status: 'skipped', reason: 'already_ran' };
    } else {
      ingest = await this.withLease(INGEST_LEASE_KEY, () =>
        ingestMarketPrices(this.deps.db, this.deps.feed, asOfDate),
      );
      if (ingest.status !== 'skipped') this.lastIngestDate = asOfDate;
    }

    let pipeline: JobOutcome<RunResult>;
    if (!config.daily_enabled) {
      pipeline = { status: 'skipped', reason: 'disabled' };
    } else if (hour < config.pipeline_utc_hour) {
      pipeline = { status: 'skipped', reason: 'not_due' };
    } else if (this.lastPipelineDate === asOfDate) {
      pipeline = { status: 'skipped', reason: 'already_ran' };
    } else {
      pipeline = await this.withLease(PIPELINE_LEASE_KEY, () => this.runPipeline(asOfDate));
      if (pipeline.status !== 'skipped') this.lastPipelineDate = asOfDate;
    }

    return { as_of_date: asOfDate, ingest, pipeline };
  }

  runPipeline(asOfDate: string): Promise<RunResult> {
    const plan = buildPlan({
      as_of_date: asOfDate,
      pipeline_version: this.deps.config.pipeline_version,
      scope_filters: null,
      mode: 'materialize',
      emit_exports: this.deps.config.emit_exports,
    });
    return executePlan(this.deps.db, plan, { steps: this.deps.steps, requestedBy: this.holder });
  }

  private async withLease<T>(key: string, job: () => Promise<T>): Promise<JobOutcome<T>> {
    const ttlMs = this.deps.config.lease_ttl_seconds * 1000;
    if (!tryAcquireLease(this.deps.leases, key, ttlMs, this.holder)) {
      logger.info('Scheduled job skipped, lease held elsewhere', { lease_key: key });
      return { status: 'skipped', reason: 'locked' };
    }
    try {
      return { status: 'ran', result: await job() };
    } catch (err) {
      logger.error('Scheduled job failed', { lease_key: key, error: errorMessage(err) });
      return { status: 'failed', error: errorMessage(err) };
    } finally {
      releaseLease(this.deps.leases, key, this.holder);
    }
  }

  start(): void {
    if (this.timer) return;
    const intervalMs = this.deps.config.poll_interval_seconds * 1000;
    const poll = () => {
      if (this.ticking) return;
      this.ticking = true;
      void this.tick()
        .then((result) => logger.debug('Scheduler tick', { ...result }))
        .catch((err: unknown) => logger.error('Scheduler tick failed', { error: errorMessage(err) }))
        .finally(() => {
          this.ticking = false;
        });
    };
    this.timer = setInterval(poll, intervalMs);
    poll();
    logger.info('Scheduler started', { holder: this.holder, poll_interval_ms: intervalMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info('Scheduler stopped', { holder: this.holder });
  }
}
