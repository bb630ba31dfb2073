import type { DbBackend } from '../utils/db.js';
import { logger } from '../middleware/logger.js';
import type { FeedFetcher, MailSender } from './adapters.js';
import { planNotifications, renderNotifications, sortByLastModified } from './digest.js';
import { EvaluationError } from './errors.js';
import { recordPollFailure } from './failure-tracker.js';
import type { FeedGroupConfig } from './feeds-config.js';
import { evaluateFilter } from './filter.js';
import { dedupeEntries, entryContexts, partitionByKnown } from './update-key.js';
import type { FingerprintedEntry } from './update-key.js';

/** Subject prefix of the digest sent by the first poll of a group. */
export const NEW_FEED_SUBJECT_PREFIX = '[New Feed] ';

/**
 * One poll of one feed group:
 * fetch → fingerprint/dedup → known lookup → filter → batch → render → send → commit.
 *
 * Everything up to the commit is side-effect free apart from sending, so a
 * failure anywhere leaves the stored state untouched except for the failure
 * row. A crash between send and commit re-sends on the next poll.
 *
 * The first poll of a group (no stored row yet) always sends a single digest
 * marked `[New Feed]`, whatever the group's digest setting, so subscribing to
 * a feed mails its backlog once instead of item by item.
 */

export interface PollStats {
  fetched: number;
  duplicates: number;
  known: number;
  fresh: number;
  filteredOut: number;
  problems: number;
  mails: number;
  itemsPruned: number;
}

export type PollOutcome =
  | { status: 'ok'; stats: PollStats }
  | { status: 'failed'; error: unknown; failCount: number | null }
  | { status: 'cancelled' };

export interface PollDeps {
  db: DbBackend;
  fetcher: FeedFetcher;
  sender: MailSender;
  now?: () => Date;
}

export type PollFeedGroup = (group: FeedGroupConfig, signal?: AbortSignal) => Promise<PollOutcome>;

export function createFeedGroupPoller(deps: PollDeps): PollFeedGroup {
  const now = deps.now ?? (() => new Date());

  return async function pollFeedGroup(group, signal) {
    const startedAt = now();
    const { settings } = group;
    const log = logger.child({ group: group.key.slice(0, 12) });

    try {
      const newGroup = (await deps.db.getFeedGroup(group.urlsHash)) === undefined;

      const feeds = await deps.fetcher.fetch(group.urls, {
        timeoutMs: settings.timeoutMs,
        headers: settings.httpHeaders,
        sanitize: settings.sanitize,
        signal,
      });

      const dedup = dedupeEntries(entryContexts(feeds), settings.updateKeys, settings.templateArgs);
      for (const problem of dedup.problems) {
        log.warn({ err: problem.error, entry: problem.context.item.id, feed: problem.context.feed.url }, 'Skipping entry: update key failed');
      }

      const known = await deps.db.findKnownFingerprints(
        group.urlsHash,
        dedup.entries.map((entry) => entry.fingerprint),
      );
      const partition = partitionByKnown(dedup.entries, known);

      // Every fresh entry that got a verdict is recorded, pass or not.
      const judged: FingerprintedEntry[] = [];
      const passed: FingerprintedEntry[] = [];
      let filterProblems = 0;
      for (const entry of partition.fresh) {
        let keep: boolean;
        try {
          keep = evaluateFilter(group.filter, entry.context, settings.templateArgs);
        } catch (err) {
          if (!(err instanceof EvaluationError)) throw err;
          filterProblems += 1;
          log.warn({ err, entry: entry.context.item.id, feed: entry.context.feed.url }, 'Skipping entry: filter failed');
          continue;
        }
        judged.push(entry);
        if (keep) passed.push(entry);
      }

      const selected = settings.sortByLastModified
        ? sortByLastModified(passed.map((entry) => entry.context))
        : passed.map((entry) => entry.context);

      const plan = planNotifications(selected, newGroup ? { ...settings, digest: true } : settings);
      const mails = renderNotifications(plan, settings.templates, feeds, settings.templateArgs)
        .map((mail) => (newGroup ? { ...mail, subject: `${NEW_FEED_SUBJECT_PREFIX}${mail.subject}` } : mail));

      if (signal?.aborted) return { status: 'cancelled' };

      const recipients = settings.to.length + settings.cc.length + settings.bcc.length;
      if (mails.length > 0 && recipients === 0) {
        log.warn({ mails: mails.length, urls: group.urls }, 'No recipients configured; notifications not sent');
      } else {
        for (const mail of mails) {
          await deps.sender.send({ to: settings.to, cc: settings.cc, bcc: settings.bcc, ...mail });
        }
      }

      const commit = await deps.db.commitPoll({
        urlsHash: group.urlsHash,
        now: startedAt,
        fingerprints: [...partition.known, ...judged].map((entry) => entry.fingerprint),
        notified: mails.length > 0,
        keepOldMs: settings.keepOldMs,
      });

      const stats: PollStats = {
        fetched: dedup.entries.length + dedup.duplicates + dedup.problems.length,
        duplicates: dedup.duplicates,
        known: partition.known.length,
        fresh: partition.fresh.length,
        filteredOut: judged.length - passed.length,
        problems: dedup.problems.length + filterProblems,
        mails: mails.length,
        itemsPruned: commit.itemsPruned,
      };
      log.info({ ...stats, plan: plan.kind, newGroup }, 'Feed group polled');
      return { status: 'ok', stats };
    } catch (err) {
      if (signal?.aborted) {
        log.info('Poll cancelled');
        return { status: 'cancelled' };
      }

      try {
        const failure = await recordPollFailure(deps.db, group, err, startedAt);
        return { status: 'failed', error: err, failCount: failure.failCount };
      } catch (recordErr) {
        log.error({ err: recordErr, pollError: err }, 'Failed to record poll failure');
        return { status: 'failed', error: err, failCount: null };
      }
    }
  };
}
