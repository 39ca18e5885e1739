/**
 * Table definitions shared by the SQLite and Postgres backends.
 *
 * Ids are UUID text and timestamps ISO-8601 text so the same statements
 * run unchanged on both engines.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS workflow_events (
  id TEXT PRIMARY KEY,
  event_timestamp TEXT NOT NULL,
  document_type TEXT NOT NULL,
  destination_code TEXT NOT NULL,
  request_id TEXT NOT NULL,
  status TEXT NOT NULL,
  file_name TEXT NOT NULL,
  ingested_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_workflow_events_file_name ON workflow_events (file_name);
CREATE INDEX IF NOT EXISTS idx_workflow_events_request_id ON workflow_events (request_id);
CREATE INDEX IF NOT EXISTS idx_workflow_events_ingested_at ON workflow_events (ingested_at);

CREATE TABLE IF NOT EXISTS error_events (
  id TEXT PRIMARY KEY,
  event_timestamp TEXT NOT NULL,
  document_type TEXT NOT NULL,
  destination_code TEXT NOT NULL,
  request_id TEXT NOT NULL,
  service_name TEXT NOT NULL,
  error_category TEXT NOT NULL,
  comment TEXT,
  file_name TEXT NOT NULL,
  ingested_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_error_events_file_name ON error_events (file_name);
CREATE INDEX IF NOT EXISTS idx_error_events_request_id ON error_events (request_id);
CREATE INDEX IF NOT EXISTS idx_error_events_error_category ON error_events (error_category);

CREATE TABLE IF NOT EXISTS ingestion_audit_log (
  id TEXT PRIMARY KEY,
  file_name TEXT NOT NULL UNIQUE,
  file_type TEXT NOT NULL,
  file_date TEXT NOT NULL,
  records_expected INTEGER NOT NULL DEFAULT 0,
  records_inserted INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL,
  error_message TEXT,
  started_at TEXT NOT NULL,
  ended_at TEXT
);
CREATE INDEX IF NOT EXISTS idx_ingestion_audit_log_status ON ingestion_audit_log (status);
CREATE INDEX IF NOT EXISTS idx_ingestion_audit_log_file_date ON ingestion_audit_log (file_date);
`;
