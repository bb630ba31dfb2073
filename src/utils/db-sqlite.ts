/**
 * SQLite backend. better-sqlite3 is synchronous, so every method runs its
 * statements inline and wraps the result in a settled promise.
 */

import { PersistenceError } from '../core/errors.js';
import { logger } from '../middleware/logger.js';
import type { DbBackend } from './db-backend.js';
import { openSqliteDatabase } from './db-schema.js';
import type { CommitResult, FailureRow, FeedGroupRow, PollCommit } from './db-types.js';

interface FeedGroupDbRow {
  urls_hash: Buffer;
  last_check: number;
  last_update: number | null;
  last_seen: number;
}

interface FailureDbRow {
  urls_hash: Buffer;
  fail_count: number;
  error: string;
}

function mapFeedGroup(row: FeedGroupDbRow): FeedGroupRow {
  return {
    urlsHash: row.urls_hash,
    lastCheck: new Date(row.last_check),
    lastUpdate: row.last_update === null ? null : new Date(row.last_update),
    lastSeen: new Date(row.last_seen),
  };
}

function mapFailure(row: FailureDbRow): FailureRow {
  return {
    urlsHash: row.urls_hash,
    failCount: row.fail_count,
    error: row.error,
  };
}

function run<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new PersistenceError(`SQLite ${action} failed`, { cause: err });
  }
}

export function createSqliteBackend(path: string): DbBackend {
  const db = openSqliteDatabase(path);

  // ── Prepared statements ───────────────────────────────────────────

  const selectItem = db.prepare<[Buffer, Buffer], { id: number }>(
    `SELECT id FROM feed_items WHERE urls_hash = ? AND update_hash = ?`,
  );
  const countGroupItems = db.prepare<[Buffer], { count: number }>(
    `SELECT COUNT(*) AS count FROM feed_items WHERE urls_hash = ?`,
  );
  const upsertItem = db.prepare<[Buffer, Buffer, number]>(
    `INSERT INTO feed_items (urls_hash, update_hash, last_seen) VALUES (?, ?, ?)
     ON CONFLICT (urls_hash, update_hash) DO UPDATE SET last_seen = excluded.last_seen`,
  );
  const pruneGroupItems = db.prepare<[Buffer, number]>(
    `DELETE FROM feed_items WHERE urls_hash = ? AND last_seen < ?`,
  );

  const selectGroup = db.prepare<[Buffer], FeedGroupDbRow>(
    `SELECT urls_hash, last_check, last_update, last_seen FROM feed_groups WHERE urls_hash = ?`,
  );
  const upsertGroupOnPoll = db.prepare<[Buffer, number, number | null, number]>(
    `INSERT INTO feed_groups (urls_hash, last_check, last_update, last_seen) VALUES (?, ?, ?, ?)
     ON CONFLICT (urls_hash) DO UPDATE SET
       last_check = excluded.last_check,
       last_update = COALESCE(excluded.last_update, feed_groups.last_update),
       last_seen = excluded.last_seen`,
  );
  const touchGroup = db.prepare<[number, Buffer]>(
    `UPDATE feed_groups SET last_seen = ? WHERE urls_hash = ?`,
  );
  const selectStaleGroups = db.prepare<[number], { urls_hash: Buffer }>(
    `SELECT urls_hash FROM feed_groups WHERE last_seen < ?`,
  );
  const deleteGroup = db.prepare<[Buffer]>(
    `DELETE FROM feed_groups WHERE urls_hash = ?`,
  );

  const selectFailure = db.prepare<[Buffer], FailureDbRow>(
    `SELECT urls_hash, fail_count, error FROM failures WHERE urls_hash = ?`,
  );
  const selectFailures = db.prepare<[number], FailureDbRow>(
    `SELECT urls_hash, fail_count, error FROM failures WHERE fail_count >= ? ORDER BY fail_count DESC, urls_hash`,
  );
  const upsertFailure = db.prepare<[Buffer, string], FailureDbRow>(
    `INSERT INTO failures (urls_hash, fail_count, error) VALUES (?, 1, ?)
     ON CONFLICT (urls_hash) DO UPDATE SET fail_count = failures.fail_count + 1, error = excluded.error
     RETURNING urls_hash, fail_count, error`,
  );
  const deleteFailure = db.prepare<[Buffer]>(
    `DELETE FROM failures WHERE urls_hash = ?`,
  );
  const deleteOrphanFailures = db.prepare<[]>(
    `DELETE FROM failures WHERE urls_hash NOT IN (SELECT urls_hash FROM feed_groups)`,
  );

  // ── Transactions ──────────────────────────────────────────────────

  const findKnownTx = db.transaction((urlsHash: Buffer, fingerprints: readonly Buffer[]): Set<string> => {
    const known = new Set<string>();
    for (const fingerprint of fingerprints) {
      if (selectItem.get(urlsHash, fingerprint)) known.add(fingerprint.toString('hex'));
    }
    return known;
  });

  const commitPollTx = db.transaction((commit: PollCommit): CommitResult => {
    const now = commit.now.getTime();
    upsertGroupOnPoll.run(commit.urlsHash, now, commit.notified ? now : null, now);
    for (const fingerprint of commit.fingerprints) {
      upsertItem.run(commit.urlsHash, fingerprint, now);
    }
    deleteFailure.run(commit.urlsHash);
    const pruned = pruneGroupItems.run(commit.urlsHash, now - commit.keepOldMs);
    return { itemsPruned: pruned.changes };
  });

  const recordFailureTx = db.transaction((urlsHash: Buffer, error: string, now: number): FailureRow => {
    upsertGroupOnPoll.run(urlsHash, now, null, now);
    const row = upsertFailure.get(urlsHash, error);
    if (!row) throw new Error('Failure upsert returned no row');
    return mapFailure(row);
  });

  const touchGroupsTx = db.transaction((urlsHashes: readonly Buffer[], now: number): number => {
    let touched = 0;
    for (const urlsHash of urlsHashes) {
      touched += touchGroup.run(now, urlsHash).changes;
    }
    return touched;
  });

  const pruneGroupsTx = db.transaction((cutoff: number, keep: readonly Buffer[]): number => {
    const kept = new Set(keep.map((hash) => hash.toString('hex')));
    let pruned = 0;
    for (const row of selectStaleGroups.all(cutoff)) {
      if (kept.has(row.urls_hash.toString('hex'))) continue;
      pruned += deleteGroup.run(row.urls_hash).changes;
    }
    return pruned;
  });

  return {
    dialect: 'sqlite',

    async findKnownFingerprints(urlsHash, fingerprints) {
      return run('fingerprint lookup', () => findKnownTx(urlsHash, fingerprints));
    },

    async countItems(urlsHash) {
      return run('item count', () => countGroupItems.get(urlsHash)?.count ?? 0);
    },

    async getFeedGroup(urlsHash) {
      return run('group lookup', () => {
        const row = selectGroup.get(urlsHash);
        return row ? mapFeedGroup(row) : undefined;
      });
    },

    async commitPoll(commit) {
      return run('poll commit', () => commitPollTx(commit));
    },

    async touchFeedGroups(urlsHashes, now) {
      return run('group touch', () => touchGroupsTx(urlsHashes, now.getTime()));
    },

    async pruneGroups(cutoff, keep) {
      return run('group prune', () => pruneGroupsTx(cutoff.getTime(), keep));
    },

    async getFailure(urlsHash) {
      return run('failure lookup', () => {
        const row = selectFailure.get(urlsHash);
        return row ? mapFailure(row) : undefined;
      });
    },

    async listFailures(minFailCount = 1) {
      return run('failure listing', () => selectFailures.all(minFailCount).map(mapFailure));
    },

    async recordFailure(urlsHash, error, now) {
      return run('failure record', () => recordFailureTx(urlsHash, error, now.getTime()));
    },

    async pruneOrphanFailures() {
      return run('orphan failure prune', () => deleteOrphanFailures.run().changes);
    },

    async closeDb() {
      db.close();
      logger.info({ path }, 'SQLite database closed');
    },
  };
}
