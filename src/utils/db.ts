/**
 * Database entry point: picks the backend for the configured dialect.
 *
 * Callers hold the returned DbBackend; nothing else in the project opens
 * a connection of its own.
 */

import { logger } from '../middleware/logger.js';
import type { DbBackend } from './db-backend.js';
import { createPostgresBackend } from './db-postgres.js';
import { createSqliteBackend } from './db-sqlite.js';

export type { DbBackend } from './db-backend.js';
export type { CommitResult, FailureRow, FeedGroupRow, MaintenanceStats, PollCommit } from './db-types.js';

export type DbDialect = 'sqlite' | 'postgres';

export interface DbOptions {
  dialect: DbDialect;
  sqlitePath: string;
  databaseUrl?: string;
  postgresSsl?: boolean;
}

export async function openDb(options: DbOptions): Promise<DbBackend> {
  if (options.dialect === 'postgres') {
    if (!options.databaseUrl) {
      throw new Error('DB_DIALECT=postgres requires DATABASE_URL');
    }
    logger.info({ dialect: 'postgres' }, 'Opening database');
    return createPostgresBackend({ connectionString: options.databaseUrl, ssl: options.postgresSsl });
  }

  logger.info({ dialect: 'sqlite', path: options.sqlitePath }, 'Opening database');
  return createSqliteBackend(options.sqlitePath);
}
