import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import ms from 'ms';
import { resolve, dirname } from 'path';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
// src/utils at dev time, dist/src/utils once built.
const PROJECT_ROOT = [resolve(__dirname, '../..'), resolve(__dirname, '../../..')]
  .find((candidate) => existsSync(resolve(candidate, 'package.json'))) ?? resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const duration = (fallback: string) => z
  .string()
  .default(fallback)
  .transform((value, ctx) => {
    const parsed = ms(value);
    if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed <= 0) {
      ctx.addIssue({ code: 'custom', message: `Invalid duration "${value}" (expected e.g. "30s", "5m", "1h")` });
      return z.NEVER;
    }
    return parsed;
  });

const envSchema = z.object({
  // Feeds
  FEEDS_CONFIG_PATH: z.string().default('config/feeds.json'),
  CONFIG_RELOAD_INTERVAL: duration('30s'),

  // Storage
  DB_DIALECT: z.enum(['sqlite', 'postgres']).default('sqlite'),
  SQLITE_PATH: z.string().default('data/rss-courier.db'),
  DATABASE_URL: z.string().optional(),
  POSTGRES_SSL: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  MAINTENANCE_INTERVAL: duration('1h'),

  // Mail
  SMTP_URL: z.string().min(1, 'SMTP_URL is required (set it in .env)'),
  SMTP_FROM: z.string().min(1, 'SMTP_FROM is required (set it in .env)'),

  // Polling
  MAX_CONCURRENT_POLLS: z.coerce.number().int().positive().default(4),
  POLL_JITTER: duration('1m'),

  // Infrastructure
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`   ${issue.path.map(String).join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

if (parsed.data.DB_DIALECT === 'postgres' && !parsed.data.DATABASE_URL) {
  console.error('❌ DB_DIALECT=postgres requires DATABASE_URL');
  process.exit(1);
}

export const config = {
  ...parsed.data,
  FEEDS_CONFIG_PATH: resolve(PROJECT_ROOT, parsed.data.FEEDS_CONFIG_PATH),
  SQLITE_PATH: parsed.data.SQLITE_PATH === ':memory:'
    ? parsed.data.SQLITE_PATH
    : resolve(PROJECT_ROOT, parsed.data.SQLITE_PATH),
};
export { PROJECT_ROOT };
