import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export type RelayDatabase = Database.Database;

export const IN_MEMORY_DATABASE = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS outbound_messages (
    id TEXT PRIMARY KEY,
    channel TEXT NOT NULL,
    recipient TEXT NOT NULL,
    subject TEXT,
    template_key TEXT,
    payload TEXT NOT NULL,
    status TEXT NOT NULL,
    idempotency_key TEXT UNIQUE,
    attempts INTEGER NOT NULL DEFAULT 0,
    provider_message_id TEXT,
    error_code TEXT,
    error_message TEXT,
    queued_at TEXT NOT NULL,
    sent_at TEXT,
    delivered_at TEXT,
    failed_at TEXT,
    dead_lettered_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_outbound_messages_status
    ON outbound_messages(status);

  CREATE INDEX IF NOT EXISTS idx_outbound_messages_channel_created
    ON outbound_messages(channel, created_at DESC);

  CREATE TABLE IF NOT EXISTS dead_letters (
    id TEXT PRIMARY KEY,
    message_id TEXT NOT NULL,
    channel TEXT NOT NULL,
    payload TEXT NOT NULL,
    attempts INTEGER NOT NULL,
    error_code TEXT NOT NULL,
    error_message TEXT NOT NULL,
    exception_trace TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_dead_letters_channel_created
    ON dead_letters(channel, created_at DESC);

  CREATE INDEX IF NOT EXISTS idx_dead_letters_message
    ON dead_letters(message_id);

  CREATE TABLE IF NOT EXISTS scheduled_attempts (
    id TEXT PRIMARY KEY,
    message_id TEXT NOT NULL,
    payload TEXT NOT NULL,
    previous_delay_ms INTEGER NOT NULL DEFAULT 0,
    run_at INTEGER NOT NULL,
    state TEXT NOT NULL DEFAULT 'pending',
    claimed_at INTEGER,
    last_error TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_scheduled_attempts_due
    ON scheduled_attempts(state, run_at);
`;

/**
 * Open (creating if needed) the relay's SQLite database and apply the schema.
 * File databases run in WAL mode so the API can read while workers write.
 */
export function openRelayDatabase(filePath: string = IN_MEMORY_DATABASE): RelayDatabase {
  if (filePath !== IN_MEMORY_DATABASE) {
    const dir = path.dirname(path.resolve(filePath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(filePath);
  if (filePath !== IN_MEMORY_DATABASE) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);
  return db;
}

/** True when `err` is SQLite's unique-constraint failure on `table.column`. */
export function isUniqueViolation(err: unknown, table: string, column: string): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    err.code === 'SQLITE_CONSTRAINT_UNIQUE' &&
    err.message.includes(`${table}.${column}`)
  );
}
