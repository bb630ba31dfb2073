import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FetchError, RenderError, SendError } from '../src/core/errors.js';
import type { FeedGroupConfig } from '../src/core/feeds-config.js';
import { NEW_FEED_SUBJECT_PREFIX, createFeedGroupPoller } from '../src/core/poll-feed-group.js';
import type { PollFeedGroup, PollOutcome, PollStats } from '../src/core/poll-feed-group.js';
import type { DbBackend } from '../src/utils/db-backend.js';
import { IN_MEMORY } from '../src/utils/db-schema.js';
import { createSqliteBackend } from '../src/utils/db-sqlite.js';
import { parseFeed } from '../src/platforms/feed-fetcher.js';
import { FakeFetcher, RecordingSender, makeEntry, makeFeed, snapshotFrom } from './fakes.js';

const FEED = 'https://example.com/feed.xml';
const MIRROR = 'https://mirror.example.com/feed.xml';
const T0 = new Date('2026-03-01T12:00:00.000Z');

const RSS_WITHOUT_UPDATED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Plain RSS</title>
    <item>
      <title>Only published</title>
      <guid>post-1</guid>
      <pubDate>Sun, 01 Mar 2026 10:00:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;

function groupFrom(feed: Record<string, unknown>): FeedGroupConfig {
  const group = snapshotFrom({ feeds: [feed] }).groups[0];
  if (!group) throw new Error('config produced no group');
  return group;
}

function statsOf(outcome: PollOutcome): PollStats {
  if (outcome.status !== 'ok') throw new Error(`expected ok, got ${outcome.status}`);
  return outcome.stats;
}

describe('pollFeedGroup', () => {
  let db: DbBackend;
  let fetcher: FakeFetcher;
  let sender: RecordingSender;
  let poll: PollFeedGroup;

  beforeEach(() => {
    db = createSqliteBackend(IN_MEMORY);
    fetcher = new FakeFetcher();
    sender = new RecordingSender();
    poll = createFeedGroupPoller({ db, fetcher, sender, now: () => T0 });
  });

  afterEach(async () => {
    await db.closeDb();
  });

  /** A group that has been polled before, so new entries are mailed one by one. */
  async function existingGroup(feed: Record<string, unknown>): Promise<FeedGroupConfig> {
    const group = groupFrom(feed);
    await db.commitPoll({ urlsHash: group.urlsHash, now: T0, fingerprints: [], notified: false, keepOldMs: group.settings.keepOldMs });
    return group;
  }

  it('mails entries that pass the filter once, and only once', async () => {
    const group = await existingGroup({ url: FEED, to: 'reader@example.com', filter: { titleRegex: '^Announcing' } });
    fetcher.set(FEED, makeFeed(FEED, [
      makeEntry({ id: 'a', title: 'Announcing X', link: 'https://example.com/x' }),
      makeEntry({ id: 'b', title: 'Random' }),
    ]));

    const first = statsOf(await poll(group));

    expect(first).toEqual({
      fetched: 2,
      duplicates: 0,
      known: 0,
      fresh: 2,
      filteredOut: 1,
      problems: 0,
      mails: 1,
      itemsPruned: 0,
    });
    expect(sender.sent).toHaveLength(1);
    expect(sender.sent[0]).toMatchObject({ to: ['reader@example.com'], cc: [], bcc: [], subject: 'Announcing X' });
    expect(sender.sent[0]?.html).toContain('<a href="https://example.com/x">Announcing X</a>');

    const second = statsOf(await poll(group));

    expect(second).toMatchObject({ known: 2, fresh: 0, filteredOut: 0, mails: 0 });
    expect(sender.sent).toHaveLength(1);
    expect((await db.getFeedGroup(group.urlsHash))?.lastUpdate).toEqual(T0);
  });

  it('passes the group fetch settings to the fetcher', async () => {
    const group = groupFrom({ url: FEED, timeout: '5s', sanitize: false, httpHeaders: { Authorization: 'Bearer test-secret' } });
    fetcher.set(FEED, makeFeed(FEED, []));

    await poll(group);

    expect(fetcher.calls).toEqual([{
      urls: [FEED],
      options: { timeoutMs: 5000, headers: { Authorization: 'Bearer test-secret' }, sanitize: false, signal: undefined },
    }]);
  });

  it('collapses the same entry served by several URLs of a group', async () => {
    const group = await existingGroup({ urls: [FEED, MIRROR], to: 'reader@example.com' });
    fetcher
      .set(FEED, makeFeed(FEED, [makeEntry({ id: 'same', title: 'Shared' })]))
      .set(MIRROR, makeFeed(MIRROR, [makeEntry({ id: 'same', title: 'Shared' }), makeEntry({ id: 'own', title: 'Own' })]));

    const stats = statsOf(await poll(group));

    expect(stats).toMatchObject({ fetched: 3, duplicates: 1, fresh: 2, mails: 2 });
    expect(sender.sent.map((mail) => mail.subject)).toEqual(['Shared', 'Own']);
  });

  it('switches to a digest when a poll finds more entries than the cap', async () => {
    const group = await existingGroup({ url: FEED, to: 'reader@example.com' });
    fetcher.set(FEED, makeFeed(FEED, Array.from({ length: 6 }, (_, index) => makeEntry({ id: `e${index}`, title: `Entry ${index}` }))));

    const stats = statsOf(await poll(group));

    expect(stats.mails).toBe(1);
    expect(sender.sent.map((mail) => mail.subject)).toEqual(['6 new items from Example Feed']);
    expect(await db.countItems(group.urlsHash)).toBe(6);
  });

  it('counts consecutive fetch failures and resets on success', async () => {
    const group = groupFrom({ url: FEED, to: 'reader@example.com' });
    fetcher.set(FEED, new FetchError('HTTP 500 Internal Server Error', FEED, { transient: true }));

    const first = await poll(group);
    const second = await poll(group);

    expect(first).toMatchObject({ status: 'failed', failCount: 1 });
    expect(second).toMatchObject({ status: 'failed', failCount: 2 });
    expect(await db.getFailure(group.urlsHash)).toEqual({
      urlsHash: group.urlsHash,
      failCount: 2,
      error: '2026-03-01T12:00:00.000Z\nHTTP 500 Internal Server Error',
    });

    fetcher.set(FEED, makeFeed(FEED, []));
    expect((await poll(group)).status).toBe('ok');
    expect(await db.getFailure(group.urlsHash)).toBeUndefined();
  });

  it('skips entries whose update key fails without failing the poll', async () => {
    const group = await existingGroup({ url: FEED, to: 'reader@example.com', updateKeys: ['item.id', 'item.title.toUpperCase()'] });
    fetcher.set(FEED, makeFeed(FEED, [
      makeEntry({ id: 'titled', title: 'Titled' }),
      makeEntry({ id: 'untitled' }),
    ]));

    const stats = statsOf(await poll(group));

    expect(stats).toMatchObject({ fetched: 2, fresh: 1, problems: 1, mails: 1 });
    expect(sender.sent.map((mail) => mail.subject)).toEqual(['Titled']);
    expect(await db.countItems(group.urlsHash)).toBe(1);
  });

  it('fingerprints RSS items that carry no updated date', async () => {
    const group = await existingGroup({ url: FEED, to: 'reader@example.com', updateKeys: ['item.id', 'item.updated'] });
    const feed = parseFeed(RSS_WITHOUT_UPDATED, FEED, 'application/rss+xml');
    expect(feed.entries[0]?.updated).toBeNull();
    fetcher.set(FEED, feed);

    const first = statsOf(await poll(group));
    const second = statsOf(await poll(group));

    expect(first).toMatchObject({ fresh: 1, problems: 0, mails: 1 });
    expect(second).toMatchObject({ known: 1, fresh: 0, problems: 0, mails: 0 });
    expect(sender.sent.map((mail) => mail.subject)).toEqual(['Only published']);
  });

  it('renders empty feed fields as blank text instead of failing the group', async () => {
    const group = await existingGroup({ url: FEED, to: 'reader@example.com', itemSubject: '[status] {{ item.title }}' });
    fetcher.set(FEED, makeFeed(FEED, [
      makeEntry({ id: 'a', title: 'Degraded' }),
      makeEntry({ id: 'b' }),
    ]));

    const stats = statsOf(await poll(group));

    expect(stats.mails).toBe(2);
    expect(sender.sent.map((mail) => mail.subject)).toEqual(['[status] Degraded', '[status]']);
    expect(await db.getFailure(group.urlsHash)).toBeUndefined();
  });

  it('sends the first poll of a new group as one marked digest', async () => {
    const group = groupFrom({ url: FEED, to: 'reader@example.com' });
    fetcher.set(FEED, makeFeed(FEED, [
      makeEntry({ id: 'a', title: 'Alpha' }),
      makeEntry({ id: 'b', title: 'Beta' }),
    ]));

    expect(statsOf(await poll(group)).mails).toBe(1);
    expect(sender.sent.map((mail) => mail.subject)).toEqual([`${NEW_FEED_SUBJECT_PREFIX}2 new items from Example Feed`]);

    fetcher.set(FEED, makeFeed(FEED, [
      makeEntry({ id: 'a', title: 'Alpha' }),
      makeEntry({ id: 'b', title: 'Beta' }),
      makeEntry({ id: 'c', title: 'Gamma' }),
    ]));

    expect(statsOf(await poll(group)).mails).toBe(1);
    expect(sender.sent.map((mail) => mail.subject)).toEqual(['[New Feed] 2 new items from Example Feed', 'Gamma']);
  });

  it('treats a failed first attempt as the first poll of the group', async () => {
    const group = groupFrom({ url: FEED, to: 'reader@example.com', digest: true });
    fetcher.set(FEED, new FetchError('HTTP 502 Bad Gateway', FEED, { transient: true }));
    expect(await poll(group)).toMatchObject({ status: 'failed', failCount: 1 });

    fetcher.set(FEED, makeFeed(FEED, [makeEntry({ id: 'a', title: 'Alpha' })]));
    await poll(group);

    expect(sender.sent.map((mail) => mail.subject)).toEqual(['1 new item from Example Feed']);
  });

  it('leaves entries whose filter fails unrecorded so they are judged again', async () => {
    const group = groupFrom({ url: FEED, to: 'reader@example.com', filter: { expr: 'item.title.startsWith("A")' } });
    fetcher.set(FEED, makeFeed(FEED, [
      makeEntry({ id: 'a', title: 'Alpha' }),
      makeEntry({ id: 'b', title: 'Beta' }),
      makeEntry({ id: 'c' }),
    ]));

    const first = statsOf(await poll(group));
    const second = statsOf(await poll(group));

    expect(first).toMatchObject({ fresh: 3, filteredOut: 1, problems: 1, mails: 1 });
    expect(second).toMatchObject({ known: 2, fresh: 1, problems: 1, mails: 0 });
    expect(await db.countItems(group.urlsHash)).toBe(2);
  });

  it('commits nothing when sending fails, so the next poll sends again', async () => {
    const group = await existingGroup({ url: FEED, to: 'reader@example.com' });
    fetcher.set(FEED, makeFeed(FEED, [makeEntry({ id: 'a', title: 'Alpha' })]));
    sender.failWith = new SendError('Failed to send mail "Alpha" after all retries');

    const failed = await poll(group);

    expect(failed).toMatchObject({ status: 'failed', failCount: 1 });
    expect(failed.status === 'failed' ? failed.error : null).toBeInstanceOf(SendError);
    expect(await db.countItems(group.urlsHash)).toBe(0);

    sender.failWith = null;
    expect(statsOf(await poll(group)).mails).toBe(1);
    expect(sender.sent.map((mail) => mail.subject)).toEqual(['Alpha']);
  });

  it('fails the poll when a template cannot be rendered', async () => {
    const group = await existingGroup({ url: FEED, to: 'reader@example.com', itemBody: '{{ item.missing }}' });
    fetcher.set(FEED, makeFeed(FEED, [makeEntry({ id: 'a', title: 'Alpha' })]));

    const outcome = await poll(group);

    expect(outcome).toMatchObject({ status: 'failed', failCount: 1 });
    expect(outcome.status === 'failed' ? outcome.error : null).toBeInstanceOf(RenderError);
    expect(sender.sent).toEqual([]);
  });

  it('records entries of a group without recipients as notified', async () => {
    const group = groupFrom({ url: FEED });
    fetcher.set(FEED, makeFeed(FEED, [makeEntry({ id: 'a', title: 'Alpha' })]));

    expect(statsOf(await poll(group)).mails).toBe(1);
    expect(sender.sent).toEqual([]);
    expect(statsOf(await poll(group)).mails).toBe(0);
    expect((await db.getFeedGroup(group.urlsHash))?.lastUpdate).toEqual(T0);
  });

  it('sorts entries newest first when asked to', async () => {
    const group = await existingGroup({ url: FEED, to: 'reader@example.com', sortByLastModified: true });
    fetcher.set(FEED, makeFeed(FEED, [
      makeEntry({ id: 'old', title: 'Old', published: '2026-01-01T00:00:00.000Z' }),
      makeEntry({ id: 'new', title: 'New', published: '2026-02-01T00:00:00.000Z' }),
    ]));

    await poll(group);

    expect(sender.sent.map((mail) => mail.subject)).toEqual(['New', 'Old']);
  });

  it('commits nothing when cancelled', async () => {
    const group = groupFrom({ url: FEED, to: 'reader@example.com' });
    fetcher.set(FEED, makeFeed(FEED, [makeEntry({ id: 'a', title: 'Alpha' })]));
    const controller = new AbortController();
    controller.abort();

    expect(await poll(group, controller.signal)).toEqual({ status: 'cancelled' });
    expect(sender.sent).toEqual([]);
    expect(await db.getFeedGroup(group.urlsHash)).toBeUndefined();
  });

  it('does not count a failure caused by cancellation', async () => {
    const group = groupFrom({ url: FEED, to: 'reader@example.com' });
    fetcher.set(FEED, new FetchError('Fetch cancelled', FEED));
    const controller = new AbortController();
    controller.abort();

    expect(await poll(group, controller.signal)).toEqual({ status: 'cancelled' });
    expect(await db.getFailure(group.urlsHash)).toBeUndefined();
  });
});
