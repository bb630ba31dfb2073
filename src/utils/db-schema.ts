/**
 * SQLite database initialization and schema.
 *
 * Timestamps are stored as INTEGER epoch milliseconds, hashes as BLOB.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { logger } from '../middleware/logger.js';

export type SqliteDatabase = InstanceType<typeof Database>;

export const IN_MEMORY = ':memory:';

export function openSqliteDatabase(path: string): SqliteDatabase {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db: SqliteDatabase = new Database(path, { timeout: 5000 });

  // NOTE: busy_timeout should be set before attempting journal_mode switches.
  db.pragma('busy_timeout = 5000');
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  // Off by default in SQLite; item rows rely on ON DELETE CASCADE.
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS feed_groups (
      urls_hash BLOB PRIMARY KEY,
      last_check INTEGER NOT NULL,
      last_update INTEGER NULL,
      last_seen INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS feed_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      urls_hash BLOB NOT NULL REFERENCES feed_groups (urls_hash) ON DELETE CASCADE,
      update_hash BLOB NOT NULL,
      last_seen INTEGER NOT NULL,
      UNIQUE (urls_hash, update_hash)
    );

    CREATE INDEX IF NOT EXISTS idx_feed_items_group_seen
      ON feed_items (urls_hash, last_seen);

    CREATE TABLE IF NOT EXISTS failures (
      urls_hash BLOB PRIMARY KEY,
      fail_count INTEGER NOT NULL,
      error TEXT NOT NULL
    );
  `);

  logger.info({ path }, 'SQLite database opened');
  return db;
}
