/**
 * SQLite schema for the history store.
 *
 * Unmeasured metrics are SQL NULL. Alerts carry denormalized values and no
 * foreign keys so they outlive pruned runs.
 *
 * @module history/schema
 */

import { METRIC_NAMES } from '../types/benchmark'

const metricColumns = METRIC_NAMES.map(name => `  ${name} REAL`).join(',\n')

export const SCHEMA = `
CREATE TABLE IF NOT EXISTS benchmark_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  run_type TEXT NOT NULL,
  total_frameworks INTEGER NOT NULL DEFAULT 0,
  successful_frameworks INTEGER NOT NULL DEFAULT 0,
  duration_seconds REAL,
  notes TEXT,
  recorded_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS framework_results (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id INTEGER NOT NULL REFERENCES benchmark_runs(id),
  framework TEXT NOT NULL,
  result_type TEXT NOT NULL,
${metricColumns},
  UNIQUE (run_id, framework, result_type)
);

CREATE TABLE IF NOT EXISTS performance_alerts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  run_id INTEGER NOT NULL,
  baseline_run_id INTEGER NOT NULL,
  framework TEXT NOT NULL,
  result_type TEXT NOT NULL,
  metric TEXT NOT NULL,
  alert_type TEXT NOT NULL,
  severity TEXT NOT NULL,
  old_value REAL NOT NULL,
  new_value REAL NOT NULL,
  change_percent REAL NOT NULL,
  message TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_runs_type ON benchmark_runs(run_type, id);
CREATE INDEX IF NOT EXISTS idx_runs_timestamp ON benchmark_runs(timestamp);
CREATE INDEX IF NOT EXISTS idx_results_framework ON framework_results(framework, run_id);
CREATE INDEX IF NOT EXISTS idx_alerts_timestamp ON performance_alerts(timestamp);
CREATE INDEX IF NOT EXISTS idx_alerts_severity ON performance_alerts(severity, timestamp);
`
