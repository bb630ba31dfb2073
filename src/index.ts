import { openDb } from './utils/db.js';
import type { DbBackend } from './utils/db.js';
import { createMaintenanceScheduler } from './utils/db-maintenance.js';
import type { MaintenanceScheduler } from './utils/db-maintenance.js';
import { logger } from './middleware/logger.js';
import { config } from './utils/config.js';
import { ConfigStore } from './core/config-store.js';
import { ConfigWatcher } from './core/config-watcher.js';
import { FailureReporter } from './core/failure-tracker.js';
import { loadFeedsConfig } from './core/feeds-config.js';
import { createFeedGroupPoller } from './core/poll-feed-group.js';
import { FeedGroupScheduler } from './core/scheduler.js';
import { HttpFeedFetcher } from './platforms/feed-fetcher.js';
import { createSmtpMailSender } from './platforms/mailer.js';
import type { SmtpMailSender } from './platforms/mailer.js';

interface Runtime {
  db: DbBackend;
  sender: SmtpMailSender;
  watcher: ConfigWatcher;
  scheduler: FeedGroupScheduler;
  maintenance: MaintenanceScheduler;
}

let runtime: Runtime | null = null;

async function main(): Promise<void> {
  logger.info('rss-courier starting...');

  logger.info({
    feedsConfig: config.FEEDS_CONFIG_PATH,
    dialect: config.DB_DIALECT,
    maxConcurrentPolls: config.MAX_CONCURRENT_POLLS,
    pollJitterMs: config.POLL_JITTER,
    reloadIntervalMs: config.CONFIG_RELOAD_INTERVAL,
    maintenanceIntervalMs: config.MAINTENANCE_INTERVAL,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  const initial = await loadFeedsConfig(config.FEEDS_CONFIG_PATH, 1);
  logger.info({ groups: initial.groups.length, generation: initial.generation }, 'Feeds config loaded');

  const db = await openDb({
    dialect: config.DB_DIALECT,
    sqlitePath: config.SQLITE_PATH,
    databaseUrl: config.DATABASE_URL,
    postgresSsl: config.POSTGRES_SSL,
  });

  const store = new ConfigStore(initial);
  const sender = createSmtpMailSender(config.SMTP_URL, config.SMTP_FROM);

  const scheduler = new FeedGroupScheduler(store, {
    poll: createFeedGroupPoller({ db, fetcher: new HttpFeedFetcher(), sender }),
    maxConcurrent: config.MAX_CONCURRENT_POLLS,
    jitterMs: config.POLL_JITTER,
  });

  const maintenance = createMaintenanceScheduler({
    db,
    store,
    intervalMs: config.MAINTENANCE_INTERVAL,
    reporter: new FailureReporter(db, sender),
  });

  const watcher = new ConfigWatcher({
    path: config.FEEDS_CONFIG_PATH,
    store,
    intervalMs: config.CONFIG_RELOAD_INTERVAL,
  });

  runtime = { db, sender, watcher, scheduler, maintenance };

  // Configured groups get their last_seen refreshed as soon as they appear.
  store.subscribe(() => {
    void maintenance.touchConfigured();
  });

  await maintenance.runOnce();
  maintenance.scheduleMaintenance();
  scheduler.start();
  await watcher.start();

  logger.info({ groups: initial.groups.length }, 'rss-courier is polling');
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error, shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection, shutting down');
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception, shutting down');
  process.exit(1);
});

process.on('SIGHUP', () => {
  if (!runtime) return;
  logger.info('Received SIGHUP, reloading feeds config');
  runtime.watcher.reload('signal').catch((err: unknown) => {
    logger.error({ err }, 'Config reload failed');
  });
});

// Graceful shutdown
async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal, shutting down');

  if (runtime) {
    runtime.watcher.stop();
    runtime.maintenance.stopMaintenance();
    await runtime.scheduler.stop();
    runtime.sender.close();

    try {
      await runtime.db.closeDb();
    } catch (err) {
      logger.error({ err, signal }, 'Failed to close database cleanly during shutdown');
    }
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
