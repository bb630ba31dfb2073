/**
 * Database maintenance: periodic sweep over group and failure rows.
 *
 * Each sweep refreshes `last_seen` of every configured group, prunes groups
 * that have been missing from the config for longer than the retention
 * horizon, drops failure rows left behind by pruned groups, and lets the
 * failure reporter look at the current failure set.
 */

import type { ConfigStore } from '../core/config-store.js';
import type { FailureReporter } from '../core/failure-tracker.js';
import type { ConfigSnapshot } from '../core/feeds-config.js';
import { logger } from '../middleware/logger.js';
import type { DbBackend } from './db-backend.js';
import type { MaintenanceStats } from './db-types.js';

export type { MaintenanceStats } from './db-types.js';

export async function runMaintenance(db: DbBackend, snapshot: ConfigSnapshot, now: Date): Promise<MaintenanceStats> {
  const configured = snapshot.groups.map((group) => group.urlsHash);
  const cutoff = new Date(now.getTime() - snapshot.groupRetentionMs);

  const groupsTouched = await db.touchFeedGroups(configured, now);
  const groupsPruned = await db.pruneGroups(cutoff, configured);
  const failuresPruned = await db.pruneOrphanFailures();

  logger.info({
    generation: snapshot.generation,
    groupsTouched,
    groupsPruned,
    failuresPruned,
    retentionHours: +(snapshot.groupRetentionMs / 3_600_000).toFixed(1),
  }, 'Database maintenance complete');

  return { groupsTouched, groupsPruned, failuresPruned };
}

export interface MaintenanceSchedulerOptions {
  db: DbBackend;
  store: ConfigStore;
  intervalMs: number;
  reporter?: FailureReporter;
  now?: () => Date;
}

export interface MaintenanceScheduler {
  /** Run one sweep now. Errors are logged, never thrown. */
  runOnce(): Promise<void>;
  /**
   * Refresh `last_seen` of the configured groups without a full sweep. Used on
   * config swaps, which must not count as failure report sweeps.
   */
  touchConfigured(): Promise<void>;
  scheduleMaintenance(): void;
  stopMaintenance(): void;
}

export function createMaintenanceScheduler(options: MaintenanceSchedulerOptions): MaintenanceScheduler {
  const now = options.now ?? (() => new Date());
  let maintenanceTimer: ReturnType<typeof setTimeout> | null = null;
  let running: Promise<void> | null = null;

  const sweep = async (): Promise<void> => {
    const snapshot = options.store.current();

    try {
      await runMaintenance(options.db, snapshot, now());
    } catch (err) {
      logger.error({ err }, 'Database maintenance failed');
    }

    if (options.reporter) {
      try {
        await options.reporter.sweep(snapshot);
      } catch (err) {
        logger.error({ err }, 'Failure report failed');
      }
    }
  };

  const runOnce = (): Promise<void> => {
    if (running) return running;
    running = sweep().finally(() => {
      running = null;
    });
    return running;
  };

  const touchConfigured = async (): Promise<void> => {
    const snapshot = options.store.current();
    try {
      const touched = await options.db.touchFeedGroups(snapshot.groups.map((group) => group.urlsHash), now());
      logger.debug({ generation: snapshot.generation, touched }, 'Configured feed groups touched');
    } catch (err) {
      logger.error({ err }, 'Failed to touch configured feed groups');
    }
  };

  const scheduleMaintenance = (): void => {
    maintenanceTimer = setTimeout(() => {
      void (async () => {
        await runOnce();
        if (maintenanceTimer) scheduleMaintenance();
      })();
    }, options.intervalMs);

    logger.debug({
      nextRun: new Date(Date.now() + options.intervalMs).toISOString(),
      inMinutes: +(options.intervalMs / 60_000).toFixed(1),
    }, 'Database maintenance scheduled');
  };

  const stopMaintenance = (): void => {
    if (maintenanceTimer) {
      clearTimeout(maintenanceTimer);
      maintenanceTimer = null;
    }
  };

  return { runOnce, touchConfigured, scheduleMaintenance, stopMaintenance };
}
