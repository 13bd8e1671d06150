/**
 * SQLite database initialization.
 * Opens the database, enables WAL mode, and runs schema migrations.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

const SCHEMA_SQL = `
-- events (IEventStore)
CREATE TABLE IF NOT EXISTS events (
  event_id         TEXT PRIMARY KEY,
  sequence_number  INTEGER NOT NULL UNIQUE,
  block_number     INTEGER NOT NULL,
  timestamp        TEXT NOT NULL,
  event_type       TEXT NOT NULL,
  actor_id         TEXT,
  payload          TEXT NOT NULL,
  prev_event_hash  TEXT NOT NULL,
  event_hash       TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type, block_number);
CREATE INDEX IF NOT EXISTS idx_events_actor ON events(actor_id, block_number);

-- ledger_globals (accumulator, fees, roles, chain head; single row)
CREATE TABLE IF NOT EXISTS ledger_globals (
  id           INTEGER PRIMARY KEY CHECK (id = 1),
  globals_json TEXT NOT NULL,
  updated_at   TEXT NOT NULL
);

-- checkpoints (uint128 values as decimal TEXT)
CREATE TABLE IF NOT EXISTS checkpoints (
  account_id        TEXT PRIMARY KEY,
  accrued_reward    TEXT NOT NULL DEFAULT '0',
  reward_per_token  TEXT NOT NULL DEFAULT '0',
  opted_out         INTEGER NOT NULL DEFAULT 0,
  updated_at        TEXT NOT NULL
);

-- principals (in-process principal book)
CREATE TABLE IF NOT EXISTS principals (
  account_id           TEXT PRIMARY KEY,
  principal            TEXT NOT NULL DEFAULT '0',
  distributor_tracked  INTEGER NOT NULL DEFAULT 0
);
`;

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? path.join(process.cwd(), 'data', 'rewards.db');

  if (resolvedPath !== ':memory:') {
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(resolvedPath);

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(SCHEMA_SQL);

  return db;
}
