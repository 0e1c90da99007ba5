/**
 * SQLite database initialization.
 * Opens the database, enables WAL mode, and runs schema migrations.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

const SCHEMA_SQL = `
-- pool (single row: accumulator and reward period)
CREATE TABLE IF NOT EXISTS pool (
  id                       INTEGER PRIMARY KEY CHECK (id = 1),
  total_staked             TEXT NOT NULL,
  reward_per_token_stored  TEXT NOT NULL,
  last_update_time         INTEGER NOT NULL,
  reward_rate              TEXT NOT NULL,
  period_finish            INTEGER NOT NULL,
  duration                 INTEGER NOT NULL
);

-- authority (single row: owner and reward distribution account)
CREATE TABLE IF NOT EXISTS authority (
  id                   INTEGER PRIMARY KEY CHECK (id = 1),
  owner                TEXT NOT NULL,
  reward_distribution  TEXT NOT NULL
);

-- participants (stake and reward checkpoint per account)
CREATE TABLE IF NOT EXISTS participants (
  account                TEXT PRIMARY KEY,
  staked_amount          TEXT NOT NULL DEFAULT '0',
  reward_per_token_paid  TEXT NOT NULL DEFAULT '0',
  rewards                TEXT NOT NULL DEFAULT '0'
);

-- events (hash-chained distributor event log)
CREATE TABLE IF NOT EXISTS events (
  event_id         TEXT PRIMARY KEY,
  sequence_number  INTEGER NOT NULL UNIQUE,
  timestamp        TEXT NOT NULL,
  block_time       INTEGER NOT NULL,
  event_type       TEXT NOT NULL,
  account          TEXT,
  payload          TEXT NOT NULL,
  prev_event_hash  TEXT NOT NULL,
  event_hash       TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type, sequence_number);
CREATE INDEX IF NOT EXISTS idx_events_account ON events(account, sequence_number);
`;

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? path.join(process.cwd(), 'data', 'distributor.db');

  if (resolvedPath !== ':memory:') {
    // Ensure directory exists
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(resolvedPath);

  // WAL mode for better concurrent read performance
  db.pragma('journal_mode = WAL');

  // Run schema migrations
  db.exec(SCHEMA_SQL);

  return db;
}
