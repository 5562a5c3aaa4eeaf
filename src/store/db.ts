import Database from "better-sqlite3";
import { join } from "node:path";
import { isRow } from "./rows.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS items (
  id              TEXT PRIMARY KEY,
  kind            TEXT NOT NULL CHECK(kind IN ('message','event')),
  conversation_id TEXT,
  sender          TEXT NOT NULL,
  sender_name     TEXT,
  to_recipients   TEXT NOT NULL DEFAULT '[]',
  cc_recipients   TEXT NOT NULL DEFAULT '[]',
  direction       TEXT NOT NULL CHECK(direction IN ('inbound','outbound')),
  is_cc           INTEGER NOT NULL DEFAULT 0,
  subject         TEXT NOT NULL DEFAULT '',
  body_preview    TEXT NOT NULL DEFAULT '',
  body_text       TEXT,
  received_at     INTEGER NOT NULL,
  organizer       TEXT,
  attendees       TEXT NOT NULL DEFAULT '[]',
  location        TEXT,
  start_at        INTEGER,
  end_at          INTEGER,
  categories      TEXT NOT NULL DEFAULT '[]',
  urgency         TEXT CHECK(urgency IN ('immediate','today','this_week','someday')),
  requires_reply  INTEGER NOT NULL DEFAULT 0,
  cleanup_action  TEXT CHECK(cleanup_action IN ('keep','archive','delete')),
  classification_reason TEXT,
  confidence      REAL,
  state           TEXT NOT NULL DEFAULT 'unprocessed'
                  CHECK(state IN ('unprocessed','classifying','actioned','failed','processed')),
  outcome         TEXT CHECK(outcome IN ('actioned','failed')),
  processed_at    INTEGER,
  lease_owner     TEXT,
  lease_expires_at INTEGER,
  claims          INTEGER NOT NULL DEFAULT 0,
  last_error      TEXT,
  extraction_status TEXT NOT NULL DEFAULT 'pending' CHECK(extraction_status IN ('pending','complete')),
  indexed_at      INTEGER,
  deleted_at      INTEGER,
  created_at      INTEGER NOT NULL,
  updated_at      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_items_unprocessed
  ON items(received_at) WHERE processed_at IS NULL;
CREATE INDEX IF NOT EXISTS idx_items_conversation ON items(conversation_id, received_at);
CREATE INDEX IF NOT EXISTS idx_items_unindexed
  ON items(received_at) WHERE indexed_at IS NULL AND extraction_status = 'complete';

CREATE TABLE IF NOT EXISTS attachments (
  id              TEXT PRIMARY KEY,
  item_id         TEXT NOT NULL REFERENCES items(id) ON DELETE CASCADE,
  filename        TEXT NOT NULL,
  content_type    TEXT,
  size            INTEGER NOT NULL DEFAULT 0,
  extracted_text  TEXT,
  extraction_status TEXT NOT NULL DEFAULT 'pending' CHECK(extraction_status IN ('pending','complete'))
);
CREATE INDEX IF NOT EXISTS idx_attachments_item ON attachments(item_id);

CREATE TABLE IF NOT EXISTS chunks (
  id          TEXT PRIMARY KEY,
  item_id     TEXT NOT NULL REFERENCES items(id) ON DELETE CASCADE,
  source_type TEXT NOT NULL CHECK(source_type IN ('item','attachment')),
  source_id   TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  content     TEXT NOT NULL,
  embedding   BLOB,
  created_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_chunks_item ON chunks(item_id);

CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
  content,
  content='chunks',
  content_rowid='rowid',
  tokenize='porter unicode61'
);

CREATE TRIGGER IF NOT EXISTS chunks_ai AFTER INSERT ON chunks BEGIN
  INSERT INTO chunks_fts(rowid, content) VALUES (new.rowid, new.content);
END;

CREATE TRIGGER IF NOT EXISTS chunks_ad AFTER DELETE ON chunks BEGIN
  INSERT INTO chunks_fts(chunks_fts, rowid, content) VALUES('delete', old.rowid, old.content);
END;

CREATE TRIGGER IF NOT EXISTS chunks_au AFTER UPDATE ON chunks BEGIN
  INSERT INTO chunks_fts(chunks_fts, rowid, content) VALUES('delete', old.rowid, old.content);
  INSERT INTO chunks_fts(rowid, content) VALUES (new.rowid, new.content);
END;

CREATE TABLE IF NOT EXISTS labels (
  item_id     TEXT NOT NULL REFERENCES items(id) ON DELETE CASCADE,
  label       TEXT NOT NULL,
  confidence  REAL NOT NULL DEFAULT 0,
  PRIMARY KEY (item_id, label)
);

CREATE TABLE IF NOT EXISTS triage_log (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  item_id     TEXT NOT NULL REFERENCES items(id) ON DELETE CASCADE,
  categories  TEXT NOT NULL DEFAULT '[]',
  urgency     TEXT,
  reason      TEXT,
  outcome     TEXT NOT NULL CHECK(outcome IN ('actioned','failed')),
  error       TEXT,
  created_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_triage_item ON triage_log(item_id);

CREATE TABLE IF NOT EXISTS reply_tracking (
  item_id            TEXT PRIMARY KEY REFERENCES items(id) ON DELETE CASCADE,
  requires_reply     INTEGER NOT NULL DEFAULT 1,
  reason             TEXT,
  last_activity_at   INTEGER NOT NULL,
  nudge_scheduled_at INTEGER
);

CREATE TABLE IF NOT EXISTS threads (
  conversation_id  TEXT PRIMARY KEY,
  subject          TEXT NOT NULL DEFAULT '',
  status           TEXT NOT NULL CHECK(status IN ('active','stale','closed')),
  needs_reply      INTEGER NOT NULL DEFAULT 0,
  urgency          TEXT,
  last_activity_at INTEGER NOT NULL,
  last_sender      TEXT NOT NULL,
  message_count    INTEGER NOT NULL DEFAULT 0,
  participants     TEXT NOT NULL DEFAULT '[]',
  last_nudged_at   INTEGER
);

CREATE TABLE IF NOT EXISTS contacts (
  email            TEXT PRIMARY KEY,
  name             TEXT,
  first_seen       INTEGER NOT NULL,
  last_interaction INTEGER NOT NULL,
  total_messages   INTEGER NOT NULL DEFAULT 0,
  user_initiated   INTEGER NOT NULL DEFAULT 0,
  they_initiated   INTEGER NOT NULL DEFAULT 0,
  cc_count         INTEGER NOT NULL DEFAULT 0,
  is_vip           INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS decisions (
  id              TEXT PRIMARY KEY,
  source_item_id  TEXT NOT NULL REFERENCES items(id) ON DELETE CASCADE,
  conversation_id TEXT,
  question        TEXT NOT NULL,
  context         TEXT,
  requester       TEXT,
  options         TEXT NOT NULL DEFAULT '[]',
  due_by          INTEGER,
  initial_urgency TEXT NOT NULL,
  urgency         TEXT NOT NULL,
  is_resolved     INTEGER NOT NULL DEFAULT 0,
  resolution      TEXT CHECK(resolution IN ('replied','expired')),
  resolved_at     INTEGER,
  created_at      INTEGER NOT NULL,
  last_nudged_at  INTEGER,
  seen            INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_decisions_open ON decisions(created_at) WHERE is_resolved = 0;

CREATE TABLE IF NOT EXISTS commitments (
  id              TEXT PRIMARY KEY,
  source_item_id  TEXT NOT NULL REFERENCES items(id) ON DELETE CASCADE,
  conversation_id TEXT,
  description     TEXT NOT NULL,
  to_whom         TEXT,
  due_by          INTEGER,
  initial_urgency TEXT NOT NULL,
  urgency         TEXT NOT NULL,
  is_completed    INTEGER NOT NULL DEFAULT 0,
  resolution      TEXT CHECK(resolution IN ('replied','expired')),
  completed_at    INTEGER,
  created_at      INTEGER NOT NULL,
  last_nudged_at  INTEGER,
  seen            INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_commitments_open ON commitments(due_by) WHERE is_completed = 0;

CREATE TABLE IF NOT EXISTS observations (
  id              TEXT PRIMARY KEY,
  source_item_id  TEXT REFERENCES items(id) ON DELETE CASCADE,
  conversation_id TEXT,
  type            TEXT NOT NULL CHECK(type IN (
                    'project_mention','decision_made','deadline_mentioned','person_introduced',
                    'status_update','meeting_scheduled','commitment_made','context_learned')),
  content         TEXT NOT NULL,
  importance      REAL NOT NULL DEFAULT 0.5,
  created_at      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_observations_created ON observations(created_at);

CREATE TABLE IF NOT EXISTS alert_rules (
  id                    TEXT PRIMARY KEY,
  natural_language_rule TEXT NOT NULL,
  condition             TEXT NOT NULL,
  enabled               INTEGER NOT NULL DEFAULT 1,
  cooldown_minutes      INTEGER NOT NULL DEFAULT 30,
  channel               TEXT,
  channel_target        TEXT,
  created_at            INTEGER NOT NULL,
  updated_at            INTEGER NOT NULL,
  last_triggered_at     INTEGER
);

CREATE TABLE IF NOT EXISTS alert_history (
  id           TEXT PRIMARY KEY,
  rule_id      TEXT NOT NULL REFERENCES alert_rules(id) ON DELETE CASCADE,
  event_type   TEXT NOT NULL,
  event_id     TEXT NOT NULL,
  match_reason TEXT,
  payload      TEXT,
  triggered_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_alert_history_event
  ON alert_history(rule_id, event_type, event_id, triggered_at);

CREATE TABLE IF NOT EXISTS poll_state (
  name       TEXT PRIMARY KEY,
  value      TEXT,
  version    INTEGER NOT NULL DEFAULT 0,
  updated_at INTEGER NOT NULL
);
`;

export const DB_FILENAME = "steward.db";

/**
 * The event store: one SQLite database in WAL mode holding items, derived
 * working-memory entities, alert rules and history, and poll state.
 */
export class EventStore {
  private db: Database.Database;

  constructor(stateDir: string) {
    this.db = new Database(join(stateDir, DB_FILENAME));
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA_SQL);
    this.migrate();
  }

  /**
   * Forward-only migrations for existing databases.
   * Each migration is idempotent (checks before altering).
   */
  private migrate(): void {
    this.addColumnIfMissing("items", "indexed_at", "INTEGER");
    this.addColumnIfMissing("items", "claims", "INTEGER NOT NULL DEFAULT 0");
    this.addColumnIfMissing("decisions", "seen", "INTEGER NOT NULL DEFAULT 0");
    this.addColumnIfMissing("commitments", "seen", "INTEGER NOT NULL DEFAULT 0");
  }

  private addColumnIfMissing(table: string, column: string, definition: string): void {
    const columns = this.db.prepare(`PRAGMA table_info(${table})`).all().filter(isRow);
    if (columns.length > 0 && !columns.some((c) => c["name"] === column)) {
      this.db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    }
  }

  raw(): Database.Database {
    return this.db;
  }

  /** Runs `fn` inside an IMMEDIATE transaction so concurrent writers serialize at BEGIN. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
