/**
 * Shared database domain types used by all backends.
 *
 * Keep this file backend-agnostic so sqlite and postgres implementations
 * can share the exact same API contract.
 */

export interface FeedGroupRow {
  urlsHash: Buffer;
  lastCheck: Date;
  /** Latest poll that produced at least one mail */
  lastUpdate: Date | null;
  /** Latest time the group was present in configuration */
  lastSeen: Date;
}

export interface FailureRow {
  urlsHash: Buffer;
  failCount: number;
  error: string;
}

/** Everything a successful poll writes, applied in one transaction. */
export interface PollCommit {
  urlsHash: Buffer;
  now: Date;
  /** New and already-known fingerprints observed by the poll */
  fingerprints: readonly Buffer[];
  /** Whether the poll produced at least one mail */
  notified: boolean;
  /** Items of the group not seen for this long are pruned */
  keepOldMs: number;
}

export interface CommitResult {
  itemsPruned: number;
}

export interface MaintenanceStats {
  groupsTouched: number;
  groupsPruned: number;
  failuresPruned: number;
}
