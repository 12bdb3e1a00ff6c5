export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS artifacts (
  handle TEXT PRIMARY KEY,
  run_id TEXT NOT NULL,
  pipeline TEXT NOT NULL,
  name TEXT NOT NULL,
  content TEXT NOT NULL,
  content_hash TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_artifacts_run ON artifacts(run_id, pipeline);
CREATE INDEX IF NOT EXISTS idx_artifacts_hash ON artifacts(content_hash);

CREATE TABLE IF NOT EXISTS runs (
  id TEXT PRIMARY KEY,
  started_at TEXT NOT NULL,
  pipeline_a TEXT NOT NULL,
  pipeline_b TEXT NOT NULL,
  passes_a INTEGER NOT NULL,
  passes_b INTEGER NOT NULL,
  matched INTEGER NOT NULL,
  unmatched INTEGER NOT NULL,
  divergence_found INTEGER NOT NULL,
  divergence_index INTEGER,
  divergent_a TEXT,
  divergent_b TEXT
);

CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
`;
