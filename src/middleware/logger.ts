import { pino } from 'pino';

/**
 * Shared structured logger.
 *
 * Reads LOG_LEVEL straight from the environment so modules that only need
 * logging do not pull in (and validate) the full runtime config.
 */
export const logger = pino({
  name: 'rss-courier',
  level: process.env.LOG_LEVEL ?? 'info',
  base: { pid: process.pid },
});

export type Logger = typeof logger;
