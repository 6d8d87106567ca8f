import type { SnapshotFamilyName } from '../store/schema.js';
import type { SnapshotFamily } from './types.js';

export const SNAPSHOT_FAMILY_DEFS: Record<SnapshotFamilyName, SnapshotFamily> = {
  mtm: {
    name: 'mtm',
    methodologyVersion: 'mtm.snapshot.v1',
    eventType: 'MTM_SNAPSHOT_CREATED',
  },
  pnl: {
    name: 'pnl',
    methodologyVersion: 'pnl.snapshot.v1',
    eventType: 'PNL_SNAPSHOT_CREATED',
  },
  cashflow_baseline: {
    name: 'cashflow_baseline',
    methodologyVersion: 'cashflow.baseline.v1',
    eventType: 'CASHFLOW_BASELINE_CREATED',
  },
  risk_flags: {
    name: 'risk_flags',
    methodologyVersion: 'risk.flags.v1',
    eventType: 'RISK_FLAGS_CREATED',
  },
};
