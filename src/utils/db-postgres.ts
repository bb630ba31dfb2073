import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Pool, type PoolClient, type PoolConfig, type QueryResultRow } from 'pg';

import { PersistenceError } from '../core/errors.js';
import { logger } from '../middleware/logger.js';
import type { DbBackend } from './db-backend.js';
import type { CommitResult, FailureRow, FeedGroupRow, PollCommit } from './db-types.js';

const REQUIRED_TABLES = ['feed_groups', 'feed_items', 'failures'] as const;

type BigintLike = string | number;

interface FeedGroupDbRow {
  urls_hash: Buffer;
  last_check: Date;
  last_update: Date | null;
  last_seen: Date;
}

interface FailureDbRow {
  urls_hash: Buffer;
  fail_count: number;
  error: string;
}

interface DbCountRow {
  count: BigintLike;
}

function toNumber(value: BigintLike | null | undefined): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') return value;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function mapFeedGroup(row: FeedGroupDbRow): FeedGroupRow {
  return {
    urlsHash: row.urls_hash,
    lastCheck: row.last_check,
    lastUpdate: row.last_update,
    lastSeen: row.last_seen,
  };
}

function mapFailure(row: FailureDbRow): FailureRow {
  return {
    urlsHash: row.urls_hash,
    failCount: row.fail_count,
    error: row.error,
  };
}

/** Distinct hashes, in first-seen order. A bulk upsert may not touch the same row twice. */
function distinctHashes(hashes: readonly Buffer[]): Buffer[] {
  const seen = new Set<string>();
  return hashes.filter((hash) => {
    const key = hash.toString('hex');
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function resolveSchemaPath(): string | undefined {
  // src/utils at dev time, dist/src/utils once built.
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    resolve(here, 'postgres-schema.sql'),
    resolve(here, '..', '..', '..', 'src', 'utils', 'postgres-schema.sql'),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }

  return undefined;
}

async function validateTables(pool: Pool): Promise<void> {
  const res = await pool.query<{ table_name: string }>(
    `SELECT table_name
     FROM information_schema.tables
     WHERE table_schema = current_schema() AND table_name = ANY($1::text[])`,
    [Array.from(REQUIRED_TABLES)],
  );

  const available = new Set(res.rows.map((row) => row.table_name));
  const missing = REQUIRED_TABLES.filter((table) => !available.has(table));
  if (missing.length > 0) {
    throw new Error(
      `Postgres schema is incomplete; missing tables: ${missing.join(', ')}. `
      + 'Ensure postgres-schema.sql ships next to the runtime build.',
    );
  }
}

export interface PostgresBackendOptions {
  connectionString: string;
  ssl?: boolean;
  maxConnections?: number;
}

export async function createPostgresBackend(options: PostgresBackendOptions): Promise<DbBackend> {
  const poolConfig: PoolConfig = {
    connectionString: options.connectionString,
    max: options.maxConnections ?? 10,
  };
  if (options.ssl) {
    poolConfig.ssl = { rejectUnauthorized: true };
  }

  const pool = new Pool(poolConfig);
  pool.on('error', (err) => {
    logger.error({ err }, 'Idle postgres client error');
  });

  try {
    const schemaPath = resolveSchemaPath();
    if (schemaPath) {
      await pool.query(readFileSync(schemaPath, 'utf-8'));
    } else {
      logger.warn('postgres-schema.sql not found in runtime filesystem; relying on existing DB tables');
    }
    await validateTables(pool);
  } catch (err) {
    await pool.end();
    throw new PersistenceError('Postgres backend initialization failed', { cause: err });
  }

  logger.info({ postgresSsl: Boolean(options.ssl) }, 'Postgres backend initialized');

  const query = async <R extends QueryResultRow>(action: string, text: string, values: unknown[]): Promise<R[]> => {
    try {
      const res = await pool.query<R>(text, values);
      return res.rows;
    } catch (err) {
      throw new PersistenceError(`Postgres ${action} failed`, { cause: err });
    }
  };

  const withTransaction = async <T>(action: string, fn: (client: PoolClient) => Promise<T>): Promise<T> => {
    let client: PoolClient;
    try {
      client = await pool.connect();
    } catch (err) {
      throw new PersistenceError(`Postgres ${action} failed to acquire a connection`, { cause: err });
    }

    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        logger.warn({ err: rollbackErr, action }, 'Postgres rollback failed');
      });
      throw new PersistenceError(`Postgres ${action} failed`, { cause: err });
    } finally {
      client.release();
    }
  };

  const upsertGroup = async (client: PoolClient, urlsHash: Buffer, now: Date, lastUpdate: Date | null): Promise<void> => {
    await client.query(
      `INSERT INTO feed_groups (urls_hash, last_check, last_update, last_seen)
       VALUES ($1, $2, $3, $2)
       ON CONFLICT (urls_hash) DO UPDATE SET
         last_check = EXCLUDED.last_check,
         last_update = COALESCE(EXCLUDED.last_update, feed_groups.last_update),
         last_seen = EXCLUDED.last_seen`,
      [urlsHash, now, lastUpdate],
    );
  };

  return {
    dialect: 'postgres',

    async findKnownFingerprints(urlsHash, fingerprints) {
      if (fingerprints.length === 0) return new Set<string>();
      const rows = await query<{ update_hash: Buffer }>(
        'fingerprint lookup',
        `SELECT update_hash FROM feed_items WHERE urls_hash = $1 AND update_hash = ANY($2::bytea[])`,
        [urlsHash, distinctHashes(fingerprints)],
      );
      return new Set(rows.map((row) => row.update_hash.toString('hex')));
    },

    async countItems(urlsHash) {
      const rows = await query<DbCountRow>(
        'item count',
        `SELECT COUNT(*) AS count FROM feed_items WHERE urls_hash = $1`,
        [urlsHash],
      );
      return toNumber(rows[0]?.count);
    },

    async getFeedGroup(urlsHash) {
      const rows = await query<FeedGroupDbRow>(
        'group lookup',
        `SELECT urls_hash, last_check, last_update, last_seen FROM feed_groups WHERE urls_hash = $1`,
        [urlsHash],
      );
      return rows[0] ? mapFeedGroup(rows[0]) : undefined;
    },

    async commitPoll(commit: PollCommit): Promise<CommitResult> {
      return withTransaction('poll commit', async (client) => {
        await upsertGroup(client, commit.urlsHash, commit.now, commit.notified ? commit.now : null);

        if (commit.fingerprints.length > 0) {
          await client.query(
            `INSERT INTO feed_items (urls_hash, update_hash, last_seen)
             SELECT $1::bytea, hash, $3::timestamptz FROM unnest($2::bytea[]) AS hash
             ON CONFLICT (urls_hash, update_hash) DO UPDATE SET last_seen = EXCLUDED.last_seen`,
            [commit.urlsHash, distinctHashes(commit.fingerprints), commit.now],
          );
        }

        await client.query(`DELETE FROM failures WHERE urls_hash = $1`, [commit.urlsHash]);

        const pruned = await client.query(
          `DELETE FROM feed_items WHERE urls_hash = $1 AND last_seen < $2`,
          [commit.urlsHash, new Date(commit.now.getTime() - commit.keepOldMs)],
        );
        return { itemsPruned: pruned.rowCount ?? 0 };
      });
    },

    async touchFeedGroups(urlsHashes, now) {
      if (urlsHashes.length === 0) return 0;
      return withTransaction('group touch', async (client) => {
        const res = await client.query(
          `UPDATE feed_groups SET last_seen = $1 WHERE urls_hash = ANY($2::bytea[])`,
          [now, distinctHashes(urlsHashes)],
        );
        return res.rowCount ?? 0;
      });
    },

    async pruneGroups(cutoff, keep) {
      return withTransaction('group prune', async (client) => {
        const res = await client.query(
          `DELETE FROM feed_groups WHERE last_seen < $1 AND urls_hash <> ALL($2::bytea[])`,
          [cutoff, distinctHashes(keep)],
        );
        return res.rowCount ?? 0;
      });
    },

    async getFailure(urlsHash) {
      const rows = await query<FailureDbRow>(
        'failure lookup',
        `SELECT urls_hash, fail_count, error FROM failures WHERE urls_hash = $1`,
        [urlsHash],
      );
      return rows[0] ? mapFailure(rows[0]) : undefined;
    },

    async listFailures(minFailCount = 1) {
      const rows = await query<FailureDbRow>(
        'failure listing',
        `SELECT urls_hash, fail_count, error FROM failures WHERE fail_count >= $1 ORDER BY fail_count DESC, urls_hash`,
        [minFailCount],
      );
      return rows.map(mapFailure);
    },

    async recordFailure(urlsHash, error, now) {
      return withTransaction('failure record', async (client) => {
        await upsertGroup(client, urlsHash, now, null);
        const res = await client.query<FailureDbRow>(
          `INSERT INTO failures (urls_hash, fail_count, error) VALUES ($1, 1, $2)
           ON CONFLICT (urls_hash) DO UPDATE SET fail_count = failures.fail_count + 1, error = EXCLUDED.error
           RETURNING urls_hash, fail_count, error`,
          [urlsHash, error],
        );
        const row = res.rows[0];
        if (!row) throw new Error('Failure upsert returned no row');
        return mapFailure(row);
      });
    },

    async pruneOrphanFailures() {
      return withTransaction('orphan failure prune', async (client) => {
        const res = await client.query(
          `DELETE FROM failures f WHERE NOT EXISTS (SELECT 1 FROM feed_groups g WHERE g.urls_hash = f.urls_hash)`,
        );
        return res.rowCount ?? 0;
      });
    },

    async closeDb() {
      await pool.end();
      logger.info('Postgres pool closed');
    },
  };
}
