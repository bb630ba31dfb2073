import { logger } from '../middleware/logger.js';
import type { ConfigSnapshot } from './feeds-config.js';

export type SnapshotListener = (next: ConfigSnapshot, previous: ConfigSnapshot) => void;

/**
 * Holder of the current configuration snapshot.
 *
 * Snapshots are frozen and replaced whole, so a reader that grabbed one via
 * `current()` keeps a consistent view for as long as it holds the reference.
 */
export class ConfigStore {
  private snapshot: ConfigSnapshot;
  private readonly listeners = new Set<SnapshotListener>();

  constructor(initial: ConfigSnapshot) {
    this.snapshot = initial;
  }

  current(): ConfigSnapshot {
    return this.snapshot;
  }

  /** Generation number the next loaded snapshot should carry. */
  nextGeneration(): number {
    return this.snapshot.generation + 1;
  }

  swap(next: ConfigSnapshot): void {
    const previous = this.snapshot;
    if (next.generation <= previous.generation) {
      throw new Error(`Stale config generation ${next.generation} (current ${previous.generation})`);
    }

    this.snapshot = next;
    logger.info({
      generation: next.generation,
      previousGeneration: previous.generation,
      groups: next.groups.length,
    }, 'Config snapshot swapped');

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err) {
        logger.error({ err, generation: next.generation }, 'Config listener failed');
      }
    }
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
