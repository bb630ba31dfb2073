import type { CommitResult, FailureRow, FeedGroupRow, PollCommit } from './db-types.js';

/**
 * A database backend implements the storage API the poller depends on.
 *
 * Hashes are the raw 32-byte SHA-256 values. Every write method is a single
 * transaction; failures surface as PersistenceError.
 */
export interface DbBackend {
  readonly dialect: 'sqlite' | 'postgres';

  // Feed items
  /** Subset of `fingerprints` already recorded for the group, as hex strings. */
  findKnownFingerprints(urlsHash: Buffer, fingerprints: readonly Buffer[]): Promise<Set<string>>;
  countItems(urlsHash: Buffer): Promise<number>;

  // Feed groups
  getFeedGroup(urlsHash: Buffer): Promise<FeedGroupRow | undefined>;
  /**
   * Upsert the group, record every fingerprint (refreshing `last_seen` of
   * known ones), set `last_update` when notified, clear the failure row and
   * prune the group's expired items.
   */
  commitPoll(commit: PollCommit): Promise<CommitResult>;
  /** Refresh `last_seen` of existing groups. Returns the number of rows touched. */
  touchFeedGroups(urlsHashes: readonly Buffer[], now: Date): Promise<number>;
  /** Delete groups (and, by cascade, their items) unseen since `cutoff`, except `keep`. */
  pruneGroups(cutoff: Date, keep: readonly Buffer[]): Promise<number>;

  // Failures
  getFailure(urlsHash: Buffer): Promise<FailureRow | undefined>;
  listFailures(minFailCount?: number): Promise<FailureRow[]>;
  /** Upsert the group's `last_check` and increment (or start) its failure count. */
  recordFailure(urlsHash: Buffer, error: string, now: Date): Promise<FailureRow>;
  /** Delete failure rows whose group no longer exists. */
  pruneOrphanFailures(): Promise<number>;

  // Lifecycle
  closeDb(): Promise<void>;
}
