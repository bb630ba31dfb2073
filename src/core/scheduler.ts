import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';

import { logger } from '../middleware/logger.js';
import type { ConfigStore } from './config-store.js';
import type { ConfigSnapshot } from './feeds-config.js';
import type { PollFeedGroup, PollOutcome } from './poll-feed-group.js';

/**
 * Feed group scheduler: one independent timer per group key.
 *
 * Timers are reconciled against every new config snapshot. A poll reads the
 * newest snapshot when it leaves the concurrency queue and keeps that group
 * config until it finishes. A group never overlaps itself; other groups are unaffected by a
 * slow one apart from sharing the concurrency limit.
 */

export interface SchedulerOptions {
  poll: PollFeedGroup;
  /** Upper bound on polls running at once across all groups */
  maxConcurrent: number;
  /** First tick of a new group fires after a random delay in [0, jitterMs) */
  jitterMs: number;
  random?: () => number;
}

export interface ReconcileResult {
  added: string[];
  restarted: string[];
  removed: string[];
}

interface GroupTimer {
  intervalMs: number;
  handle: ReturnType<typeof setTimeout>;
}

export class FeedGroupScheduler {
  private readonly timers = new Map<string, GroupTimer>();
  private readonly running = new Map<string, Promise<PollOutcome | null>>();
  private readonly limit: LimitFunction;
  private readonly abort = new AbortController();
  private readonly random: () => number;
  private unsubscribe: (() => void) | null = null;
  private stopped = false;

  constructor(
    private readonly store: ConfigStore,
    private readonly options: SchedulerOptions,
  ) {
    this.limit = pLimit(Math.max(1, options.maxConcurrent));
    this.random = options.random ?? Math.random;
  }

  start(): void {
    this.reconcile(this.store.current());
    this.unsubscribe = this.store.subscribe((next) => {
      this.reconcile(next);
    });
  }

  /** Bring the timer set in line with a snapshot. Never touches stored state. */
  reconcile(snapshot: ConfigSnapshot): ReconcileResult {
    const result: ReconcileResult = { added: [], restarted: [], removed: [] };
    if (this.stopped) return result;

    for (const [key, timer] of this.timers) {
      if (snapshot.groupsByKey.has(key)) continue;
      clearTimeout(timer.handle);
      this.timers.delete(key);
      result.removed.push(key);
    }

    for (const group of snapshot.groups) {
      const { intervalMs } = group.settings;
      const timer = this.timers.get(group.key);

      if (!timer) {
        this.arm(group.key, intervalMs, Math.floor(this.random() * this.options.jitterMs));
        result.added.push(group.key);
      } else if (timer.intervalMs !== intervalMs) {
        clearTimeout(timer.handle);
        this.arm(group.key, intervalMs, intervalMs);
        result.restarted.push(group.key);
      }
    }

    if (result.added.length + result.restarted.length + result.removed.length > 0) {
      logger.info({
        generation: snapshot.generation,
        added: result.added.length,
        restarted: result.restarted.length,
        removed: result.removed.length,
        scheduled: this.timers.size,
      }, 'Feed group schedules reconciled');
    }
    return result;
  }

  /** Keys with a live timer. */
  scheduledKeys(): string[] {
    return Array.from(this.timers.keys());
  }

  isRunning(key: string): boolean {
    return this.running.has(key);
  }

  /**
   * Start a poll of `key` against the newest snapshot, unless one is already
   * running. Resolves with the outcome, or null when skipped or when the group
   * left the config while the poll was queued.
   */
  trigger(key: string): Promise<PollOutcome | null> {
    if (this.stopped) return Promise.resolve(null);

    const inFlight = this.running.get(key);
    if (inFlight) {
      logger.warn({ group: key.slice(0, 12) }, 'Previous poll still running; skipping tick');
      return Promise.resolve(null);
    }

    if (!this.store.current().groupsByKey.has(key)) return Promise.resolve(null);

    const { signal } = this.abort;
    const run = this.limit(async (): Promise<PollOutcome | null> => {
      if (signal.aborted) return null;
      // Queued polls pick up whatever config is newest when a slot frees up.
      const group = this.store.current().groupsByKey.get(key);
      if (!group) return null;
      return this.options.poll(group, signal);
    })
      .catch((err: unknown) => {
        logger.error({ err, group: key.slice(0, 12) }, 'Feed group poll crashed');
        return null;
      })
      .finally(() => {
        this.running.delete(key);
      });

    this.running.set(key, run);
    return run;
  }

  /** Cancel timers, abort queued and running polls, and wait for them to return. */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const timer of this.timers.values()) clearTimeout(timer.handle);
    this.timers.clear();

    this.abort.abort();
    const pending = Array.from(this.running.values());
    logger.info({ pending: pending.length }, 'Scheduler stopping');
    await Promise.allSettled(pending);
  }

  private arm(key: string, intervalMs: number, delayMs: number): void {
    const handle = setTimeout(() => {
      if (this.timers.get(key)?.handle !== handle) return;
      this.arm(key, intervalMs, intervalMs);
      void this.trigger(key);
    }, delayMs);
    this.timers.set(key, { intervalMs, handle });
  }
}
