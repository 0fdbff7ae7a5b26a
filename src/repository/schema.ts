/**
 * Postgres DDL for the tables the production repository reads and writes.
 *
 * Tables the surrounding application owns (providers, collections, files, participants) are declared here as well so
 * a fresh database can run the engine; every statement is idempotent.
 */

export const POSTGRES_HISTORY_DDL = `
CREATE TABLE IF NOT EXISTS pipeline_scoped_history (
  id SERIAL PRIMARY KEY,
  session_id TEXT NOT NULL,
  type TEXT NOT NULL,
  name TEXT NOT NULL,
  UNIQUE (session_id, type, name)
);

CREATE TABLE IF NOT EXISTS pipeline_history_record (
  id SERIAL PRIMARY KEY,
  history_id INTEGER NOT NULL REFERENCES pipeline_scoped_history(id) ON DELETE CASCADE,
  node_id TEXT NOT NULL,
  human_message TEXT NOT NULL,
  ai_message TEXT NOT NULL,
  compression_marker TEXT,
  summary TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_pipeline_history_record_history ON pipeline_history_record (history_id, id);

CREATE TABLE IF NOT EXISTS session_message (
  id SERIAL PRIMARY KEY,
  session_id TEXT NOT NULL,
  role TEXT NOT NULL,
  content TEXT NOT NULL,
  compression_marker TEXT,
  summary TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_session_message_session ON session_message (session_id, id);
`

export const POSTGRES_RESOURCES_DDL = `
CREATE TABLE IF NOT EXISTS llm_provider (
  id SERIAL PRIMARY KEY,
  type TEXT NOT NULL,
  name TEXT NOT NULL,
  config JSONB NOT NULL DEFAULT '{}'::jsonb
);

CREATE TABLE IF NOT EXISTS llm_provider_model (
  id SERIAL PRIMARY KEY,
  type TEXT NOT NULL,
  name TEXT NOT NULL,
  max_token_limit INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS source_material (
  id SERIAL PRIMARY KEY,
  topic TEXT NOT NULL,
  material TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS collection (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL,
  summary TEXT NOT NULL DEFAULT '',
  is_index BOOLEAN NOT NULL DEFAULT FALSE
);

CREATE TABLE IF NOT EXISTS file (
  id SERIAL PRIMARY KEY,
  team_id TEXT NOT NULL,
  name TEXT NOT NULL,
  content_type TEXT NOT NULL,
  purpose TEXT NOT NULL,
  summary TEXT NOT NULL DEFAULT '',
  size INTEGER NOT NULL,
  content BYTEA NOT NULL
);

CREATE TABLE IF NOT EXISTS collection_file (
  collection_id INTEGER NOT NULL REFERENCES collection(id) ON DELETE CASCADE,
  file_id INTEGER NOT NULL REFERENCES file(id) ON DELETE CASCADE,
  PRIMARY KEY (collection_id, file_id)
);

CREATE TABLE IF NOT EXISTS collection_chunk (
  id SERIAL PRIMARY KEY,
  collection_id INTEGER NOT NULL REFERENCES collection(id) ON DELETE CASCADE,
  file_id INTEGER NOT NULL REFERENCES file(id) ON DELETE CASCADE,
  content TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS session_file (
  session_id TEXT NOT NULL,
  file_id INTEGER NOT NULL REFERENCES file(id) ON DELETE CASCADE,
  attachment_type TEXT NOT NULL,
  PRIMARY KEY (session_id, file_id, attachment_type)
);

CREATE TABLE IF NOT EXISTS assistant (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL,
  instructions TEXT NOT NULL,
  llm_provider_id INTEGER NOT NULL REFERENCES llm_provider(id),
  llm_provider_model_id INTEGER NOT NULL REFERENCES llm_provider_model(id),
  temperature REAL NOT NULL DEFAULT 0.7,
  collection_index_ids INTEGER[] NOT NULL DEFAULT '{}',
  citations_enabled BOOLEAN NOT NULL DEFAULT TRUE
);
`

export const POSTGRES_PARTICIPANT_DDL = `
CREATE TABLE IF NOT EXISTS participant_data (
  participant_id TEXT NOT NULL,
  experiment_id TEXT NOT NULL DEFAULT '',
  data JSONB NOT NULL DEFAULT '{}'::jsonb,
  PRIMARY KEY (participant_id, experiment_id)
);

CREATE TABLE IF NOT EXISTS participant_schedule (
  id TEXT PRIMARY KEY,
  participant_id TEXT NOT NULL,
  experiment_id TEXT NOT NULL DEFAULT '',
  name TEXT NOT NULL,
  prompt TEXT NOT NULL,
  next_trigger_date TIMESTAMPTZ,
  is_complete BOOLEAN NOT NULL DEFAULT FALSE
);
`

export const POSTGRES_SCHEMA_DDL = `
${POSTGRES_HISTORY_DDL}
${POSTGRES_RESOURCES_DDL}
${POSTGRES_PARTICIPANT_DDL}
`
