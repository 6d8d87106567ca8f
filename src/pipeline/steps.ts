import { latestPrice } from '../market/prices.js';
import { exportCutoff, ensureExportJob, STATE_AT_TIME_EXPORT } from '../exports/jobs.js';
import { SNAPSHOT_FAMILY_DEFS } from '../snapshots/families.js';
import { materializeSnapshot } from '../snapshots/materializer.js';
import type { PositionBookSources } from '../snapshots/position-book.js';
import type { SnapshotFamilyName } from '../store/schema.js';
import type { DailyStepName, StepArtifacts, StepContext, StepImpl } from './types.js';

/** Creates the `state_at_time` export job for the run's date and filters. */
export const exportsStep: StepImpl = (ctx) => {
  const { job, idempotent } = ensureExportJob(ctx.db, {
    export_type: STATE_AT_TIME_EXPORT,
    as_of: exportCutoff(ctx.plan.as_of_date),
    filters: ctx.plan.scope_filters,
    requested_by: ctx.requestedBy,
  });
  return {
    export_jobs: [
      {
        export_id: job.export_id,
        inputs_hash: job.inputs_hash,
        export_type: job.export_type,
        status: job.status,
        idempotent,
      },
    ],
    export_ids: [job.export_id],
    export_job_count: 1,
  };
};

function snapshotStep(family: SnapshotFamilyName, sources: PositionBookSources): StepImpl {
  return (ctx: StepContext): StepArtifacts => {
    const result = materializeSnapshot(ctx.db, SNAPSHOT_FAMILY_DEFS[family], sources[family], {
      as_of_date: ctx.plan.as_of_date,
      filters: ctx.plan.scope_filters,
      requested_by: ctx.requestedBy,
      correlation_id: ctx.correlationId,
    });
    return {
      snapshot_run_id: result.run_id,
      inputs_hash: result.inputs_hash,
      item_ids: result.item_ids,
      written: result.written,
      skipped_existing: result.skipped_existing,
      skipped_not_computable: result.skipped_not_computable,
    };
  };
}

/** The production step set, backed by a position book and the stored market prices. */
export function createDailySteps(sources: PositionBookSources): Record<DailyStepName, StepImpl> {
  return {
    market_snapshot_resolve: (ctx) => {
      const positions = sources.mtm.listSubjects({
        as_of_date: ctx.plan.as_of_date,
        filters: ctx.plan.scope_filters,
      });
      const symbols = [...new Set(positions.map((subject) => subject.position.symbol))].sort();
      const priced: Array<{ symbol: string; price: number; price_date: string; source: string }> = [];
      const missing: string[] = [];
      for (const symbol of symbols) {
        const price = latestPrice(ctx.db, symbol, ctx.plan.as_of_date);
        if (price) {
          priced.push({ symbol, price: price.price, price_date: price.as_of_date, source: price.source });
        } else {
          missing.push(symbol);
        }
      }
      return { as_of_date: ctx.plan.as_of_date, positions: positions.length, priced, missing };
    },
    mtm_snapshot: snapshotStep('mtm', sources),
    pnl_snapshot: snapshotStep('pnl', sources),
    cashflow_baseline: snapshotStep('cashflow_baseline', sources),
    risk_flags: snapshotStep('risk_flags', sources),
    exports: exportsStep,
  };
}
