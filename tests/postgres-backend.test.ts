import { createHash } from 'node:crypto';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import type { DbBackend } from '../src/utils/db-backend.js';

const databaseUrl = process.env.DATABASE_URL;
const describePostgres = databaseUrl ? describe : describe.skip;

type PgClient = {
  query: (text: string, values?: readonly unknown[]) => Promise<{ rows: Array<Record<string, unknown>> }>;
  end: () => Promise<void>;
};

function hash(text: string): Buffer {
  return createHash('sha256').update(text).digest();
}

const GROUP = hash('pg-group-a');
const OTHER = hash('pg-group-b');
const DAY = 86_400_000;
const T0 = new Date('2026-03-01T12:00:00.000Z');

function at(offsetMs: number): Date {
  return new Date(T0.getTime() + offsetMs);
}

describePostgres('Postgres backend parity', () => {
  let db: DbBackend;
  let client: PgClient;

  beforeAll(async () => {
    const { Client } = await import('pg');
    const pg = new Client({ connectionString: databaseUrl });
    await pg.connect();
    client = pg;

    const { createPostgresBackend } = await import('../src/utils/db-postgres.js');
    db = await createPostgresBackend({ connectionString: databaseUrl ?? '' });
  });

  beforeEach(async () => {
    await client.query('TRUNCATE TABLE feed_items, failures, feed_groups RESTART IDENTITY CASCADE');
  });

  afterAll(async () => {
    await db.closeDb();
    await client.end();
  });

  it('records fingerprints and finds them again', async () => {
    await db.commitPoll({ urlsHash: GROUP, now: T0, fingerprints: [hash('1'), hash('1'), hash('2')], notified: true, keepOldMs: DAY });

    expect(await db.findKnownFingerprints(GROUP, [hash('1'), hash('3')])).toEqual(new Set([hash('1').toString('hex')]));
    expect(await db.countItems(GROUP)).toBe(2);
    expect(await db.getFeedGroup(GROUP)).toEqual({ urlsHash: GROUP, lastCheck: T0, lastUpdate: T0, lastSeen: T0 });
  });

  it('prunes expired items at the keepOld boundary', async () => {
    await db.commitPoll({ urlsHash: GROUP, now: T0, fingerprints: [hash('old')], notified: false, keepOldMs: DAY });
    await db.commitPoll({ urlsHash: GROUP, now: at(1000), fingerprints: [hash('edge')], notified: false, keepOldMs: DAY });

    const result = await db.commitPoll({ urlsHash: GROUP, now: at(DAY + 1000), fingerprints: [], notified: false, keepOldMs: DAY });

    expect(result).toEqual({ itemsPruned: 1 });
    expect(await db.countItems(GROUP)).toBe(1);
  });

  it('counts failures and clears them on the next commit', async () => {
    await db.recordFailure(GROUP, 'first', T0);
    const second = await db.recordFailure(GROUP, 'second', at(1000));

    expect(second).toEqual({ urlsHash: GROUP, failCount: 2, error: 'second' });
    expect(await db.listFailures(2)).toEqual([second]);

    await db.commitPoll({ urlsHash: GROUP, now: at(2000), fingerprints: [], notified: false, keepOldMs: DAY });
    expect(await db.getFailure(GROUP)).toBeUndefined();
  });

  it('touches, prunes and cleans up orphaned failures', async () => {
    await db.commitPoll({ urlsHash: GROUP, now: T0, fingerprints: [hash('1')], notified: false, keepOldMs: DAY });
    await db.recordFailure(OTHER, 'boom', T0);

    expect(await db.touchFeedGroups([GROUP], at(DAY))).toBe(1);
    expect(await db.pruneGroups(at(1), [])).toBe(1);
    expect(await db.getFeedGroup(OTHER)).toBeUndefined();
    expect(await db.pruneOrphanFailures()).toBe(1);
    expect(await db.countItems(GROUP)).toBe(1);
  });
});
