import { stat } from 'node:fs/promises';

import { logger } from '../middleware/logger.js';
import type { ConfigStore } from './config-store.js';
import { ConfigError } from './errors.js';
import { loadFeedsConfig } from './feeds-config.js';
import type { ConfigSnapshot } from './feeds-config.js';

export type ReloadReason = 'mtime' | 'signal' | 'manual';

export type ConfigLoader = (path: string, generation: number) => Promise<ConfigSnapshot>;

export interface ConfigWatcherOptions {
  path: string;
  store: ConfigStore;
  /** How often the file's mtime is checked */
  intervalMs: number;
  load?: ConfigLoader;
}

/**
 * Reloads the feeds config when the file changes (mtime polling) or on
 * demand (SIGHUP). A config that fails to load is logged and dropped; the
 * store keeps serving the previous snapshot.
 */
export class ConfigWatcher {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private lastMtimeMs: number | null = null;
  private pending: Promise<boolean> | null = null;
  private readonly load: ConfigLoader;

  constructor(private readonly options: ConfigWatcherOptions) {
    this.load = options.load ?? loadFeedsConfig;
  }

  async start(): Promise<void> {
    this.lastMtimeMs = await this.readMtime();
    this.scheduleCheck();
    logger.info({ path: this.options.path, intervalMs: this.options.intervalMs }, 'Config watcher started');
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Load the file and swap it in. Concurrent calls share one load.
   * Resolves true when a new snapshot was installed.
   */
  reload(reason: ReloadReason): Promise<boolean> {
    if (this.pending) return this.pending;

    this.pending = this.doReload(reason).finally(() => {
      this.pending = null;
    });
    return this.pending;
  }

  /** Reload if the file's mtime moved since the last successful check. */
  async checkForChanges(): Promise<boolean> {
    const mtimeMs = await this.readMtime();
    if (mtimeMs === null || mtimeMs === this.lastMtimeMs) return false;

    this.lastMtimeMs = mtimeMs;
    return this.reload('mtime');
  }

  private async doReload(reason: ReloadReason): Promise<boolean> {
    const { path, store } = this.options;
    const generation = store.nextGeneration();

    let next: ConfigSnapshot;
    try {
      next = await this.load(path, generation);
    } catch (err) {
      if (err instanceof ConfigError) {
        logger.error({
          err,
          path,
          reason,
          issues: err.issues,
          keptGeneration: store.current().generation,
        }, 'Config reload rejected; keeping previous configuration');
        return false;
      }
      throw err;
    }

    store.swap(next);
    logger.info({ path, reason, generation, groups: next.groups.length }, 'Config reloaded');
    return true;
  }

  private async readMtime(): Promise<number | null> {
    try {
      return (await stat(this.options.path)).mtimeMs;
    } catch (err) {
      logger.warn({ err, path: this.options.path }, 'Cannot stat feeds config');
      return null;
    }
  }

  private scheduleCheck(): void {
    this.timer = setTimeout(() => {
      void (async () => {
        try {
          await this.checkForChanges();
        } catch (err) {
          logger.error({ err, path: this.options.path }, 'Config change check failed');
        }
        if (this.timer) this.scheduleCheck();
      })();
    }, this.options.intervalMs);
  }
}
