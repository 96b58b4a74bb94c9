/**
 * Staging store schema.
 *
 * Applied on every open; statements are idempotent.
 */

export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_info (
  version INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS migration_runs (
  id            TEXT PRIMARY KEY,
  project_key   TEXT NOT NULL,
  status        TEXT NOT NULL,
  phase         TEXT NOT NULL,
  started_at    TEXT NOT NULL,
  updated_at    TEXT NOT NULL,
  completed_at  TEXT,
  error         TEXT
);

CREATE TABLE IF NOT EXISTS source_entities (
  seq             INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id          TEXT NOT NULL REFERENCES migration_runs(id) ON DELETE CASCADE,
  entity_type     TEXT NOT NULL,
  source_id       TEXT NOT NULL,
  payload         TEXT NOT NULL,
  refs            TEXT NOT NULL,
  extracted_at    TEXT NOT NULL,
  status          TEXT NOT NULL,
  transformed     TEXT,
  failure_reason  TEXT,
  failure_code    TEXT,
  attempts        INTEGER NOT NULL DEFAULT 0,
  updated_at      TEXT NOT NULL,
  UNIQUE (run_id, entity_type, source_id)
);

CREATE INDEX IF NOT EXISTS idx_source_entities_status
  ON source_entities (run_id, entity_type, status, seq);

CREATE TABLE IF NOT EXISTS correlation_entries (
  seq             INTEGER PRIMARY KEY AUTOINCREMENT,
  entity_type     TEXT NOT NULL,
  source_id       TEXT NOT NULL,
  destination_id  TEXT NOT NULL,
  run_id          TEXT NOT NULL,
  created_at      TEXT NOT NULL,
  UNIQUE (entity_type, source_id)
);

CREATE TABLE IF NOT EXISTS checkpoints (
  run_id                      TEXT NOT NULL REFERENCES migration_runs(id) ON DELETE CASCADE,
  entity_type                 TEXT NOT NULL,
  extract_cursor              TEXT,
  extract_done                INTEGER NOT NULL DEFAULT 0,
  pages_fetched               INTEGER NOT NULL DEFAULT 0,
  items_staged                INTEGER NOT NULL DEFAULT 0,
  last_transformed_source_id  TEXT,
  last_loaded_source_id       TEXT,
  status                      TEXT NOT NULL,
  error                       TEXT,
  updated_at                  TEXT NOT NULL,
  PRIMARY KEY (run_id, entity_type)
);

CREATE TABLE IF NOT EXISTS load_journal (
  run_id          TEXT NOT NULL,
  entity_type     TEXT NOT NULL,
  source_id       TEXT NOT NULL,
  destination_id  TEXT NOT NULL,
  batch_id        TEXT NOT NULL,
  payload         TEXT NOT NULL,
  created_at      TEXT NOT NULL,
  PRIMARY KEY (run_id, entity_type, source_id)
);
`;
