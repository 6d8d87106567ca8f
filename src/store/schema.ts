import type Database from 'better-sqlite3';

export const SNAPSHOT_FAMILIES = ['mtm', 'pnl', 'cashflow_baseline', 'risk_flags'] as const;
export type SnapshotFamilyName = (typeof SNAPSHOT_FAMILIES)[number];

export function snapshotRunsTable(family: SnapshotFamilyName): string {
  return `${family}_snapshot_runs`;
}

export function snapshotItemsTable(family: SnapshotFamilyName): string {
  return `${family}_snapshot_items`;
}

function snapshotTablesSql(family: SnapshotFamilyName): string {
  const runs = snapshotRunsTable(family);
  const items = snapshotItemsTable(family);
  return `
    CREATE TABLE IF NOT EXISTS ${runs} (
      id TEXT PRIMARY KEY,
      as_of_date TEXT NOT NULL,
      methodology_version TEXT NOT NULL,
      scope_filters_json TEXT NOT NULL,
      inputs_hash TEXT NOT NULL UNIQUE,
      status TEXT NOT NULL CHECK (status IN ('queued','running','done','failed')),
      requested_by TEXT,
      started_at TEXT,
      completed_at TEXT,
      error_code TEXT,
      error_message TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_${runs}_as_of ON ${runs}(as_of_date);

    CREATE TABLE IF NOT EXISTS ${items} (
      id TEXT PRIMARY KEY,
      run_id TEXT NOT NULL REFERENCES ${runs}(id),
      subject_id TEXT NOT NULL,
      deal_id INTEGER,
      as_of_date TEXT NOT NULL,
      currency TEXT NOT NULL,
      value REAL,
      payload_json TEXT NOT NULL DEFAULT '{}',
      inputs_hash TEXT NOT NULL,
      created_at TEXT NOT NULL,
      UNIQUE (subject_id, as_of_date, currency)
    );
    CREATE INDEX IF NOT EXISTS idx_${items}_run ON ${items}(run_id);
  `;
}

/** Create every table the orchestrator uses. Safe to call on an existing database. */
export function applySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS pipeline_runs (
      id TEXT PRIMARY KEY,
      as_of_date TEXT NOT NULL,
      pipeline_version TEXT NOT NULL,
      scope_filters_json TEXT NOT NULL,
      mode TEXT NOT NULL CHECK (mode IN ('materialize','dry_run')),
      emit_exports INTEGER NOT NULL CHECK (emit_exports IN (0,1)),
      inputs_hash TEXT NOT NULL UNIQUE,
      status TEXT NOT NULL CHECK (status IN ('queued','running','done','failed')),
      requested_by TEXT,
      started_at TEXT,
      completed_at TEXT,
      error_code TEXT,
      error_message TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_pipeline_runs_as_of ON pipeline_runs(as_of_date);
    CREATE INDEX IF NOT EXISTS idx_pipeline_runs_status ON pipeline_runs(status);

    CREATE TABLE IF NOT EXISTS pipeline_steps (
      id TEXT PRIMARY KEY,
      run_id TEXT NOT NULL REFERENCES pipeline_runs(id),
      step_name TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('pending','running','done','failed','skipped')),
      started_at TEXT,
      completed_at TEXT,
      error_code TEXT,
      error_message TEXT,
      artifacts_json TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      UNIQUE (run_id, step_name)
    );

    CREATE TABLE IF NOT EXISTS timeline_events (
      id TEXT PRIMARY KEY,
      event_type TEXT NOT NULL,
      subject_type TEXT NOT NULL,
      subject_id TEXT NOT NULL,
      correlation_id TEXT NOT NULL,
      idempotency_key TEXT NOT NULL,
      visibility TEXT NOT NULL CHECK (visibility IN ('all','finance')),
      payload_json TEXT NOT NULL,
      actor TEXT,
      audit_id TEXT,
      occurred_at TEXT NOT NULL,
      UNIQUE (event_type, idempotency_key)
    );
    CREATE INDEX IF NOT EXISTS idx_timeline_subject
      ON timeline_events(subject_type, subject_id, occurred_at);

    CREATE TABLE IF NOT EXISTS export_jobs (
      id TEXT PRIMARY KEY,
      export_id TEXT NOT NULL UNIQUE,
      inputs_hash TEXT NOT NULL UNIQUE,
      export_type TEXT NOT NULL,
      as_of TEXT NOT NULL,
      filters_json TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('queued','running','done','failed')),
      artifacts_json TEXT,
      requested_by TEXT,
      error_code TEXT,
      error_message TEXT,
      started_at TEXT,
      completed_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_export_jobs_status ON export_jobs(status, created_at);

    CREATE TABLE IF NOT EXISTS workflow_requests (
      id TEXT PRIMARY KEY,
      request_key TEXT NOT NULL UNIQUE,
      inputs_hash TEXT NOT NULL,
      action TEXT NOT NULL,
      subject_type TEXT NOT NULL,
      subject_id TEXT NOT NULL,
      required_role TEXT NOT NULL,
      notional_usd REAL,
      threshold_usd REAL,
      context_json TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('pending','approved','rejected')),
      requested_by TEXT,
      decided_by TEXT,
      decided_at TEXT,
      decision_reason TEXT,
      correlation_id TEXT,
      sla_due_at TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_workflow_requests_status ON workflow_requests(status);

    CREATE TABLE IF NOT EXISTS market_prices (
      id TEXT PRIMARY KEY,
      source TEXT NOT NULL,
      symbol TEXT NOT NULL,
      as_of_date TEXT NOT NULL,
      price REAL NOT NULL,
      currency TEXT NOT NULL,
      ingested_at TEXT NOT NULL,
      UNIQUE (source, symbol, as_of_date)
    );

    CREATE TABLE IF NOT EXISTS leases (
      lease_key TEXT PRIMARY KEY,
      holder TEXT NOT NULL,
      expires_at INTEGER NOT NULL,
      acquired_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS audit_log (
      id TEXT PRIMARY KEY,
      timestamp TEXT NOT NULL,
      action TEXT NOT NULL,
      actor TEXT NOT NULL,
      subject_type TEXT NOT NULL,
      subject_id TEXT NOT NULL,
      request_id TEXT,
      payload_hash TEXT NOT NULL,
      chain_prev_hash TEXT,
      chain_this_hash TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_audit_subject ON audit_log(subject_type, subject_id);
  `);

  for (const family of SNAPSHOT_FAMILIES) {
    db.exec(snapshotTablesSql(family));
  }
}
