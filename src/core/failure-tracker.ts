import type { DbBackend, FailureRow } from '../utils/db.js';
import { logger } from '../middleware/logger.js';
import { createTemplateEngine } from '../platforms/template-engine.js';
import type { CompiledTemplate, MailSender } from './adapters.js';
import { describeError } from './errors.js';
import { readBuiltinTemplate } from './feeds-config.js';
import type { ConfigSnapshot, FeedGroupConfig } from './feeds-config.js';
import { RegexCache } from './regex-cache.js';

/**
 * Failure bookkeeping. Each unhealthy group has one row, removed on its next
 * successful poll. The periodic failure report is mailed to
 * `errorReportTo`.
 */

/** Groups with at least this many consecutive failures show up in reports. */
export const REPORT_FAIL_THRESHOLD = 2;
/** Sweeps the failing set must stay unchanged before a report goes out. */
export const REPORT_STABLE_SWEEPS = 5;

/** Persisted failure text: timestamp line, then the error and its causes. */
export function formatFailure(err: unknown, now: Date): string {
  return `${now.toISOString()}\n${describeError(err)}`;
}

export async function recordPollFailure(
  db: DbBackend,
  group: FeedGroupConfig,
  err: unknown,
  now: Date,
): Promise<FailureRow> {
  const row = await db.recordFailure(group.urlsHash, formatFailure(err, now), now);
  logger.warn({
    err,
    group: group.key,
    urls: group.urls,
    failCount: row.failCount,
  }, 'Feed group poll failed');
  return row;
}

// ── Failure report ──────────────────────────────────────────────────

export interface ReportedFailure {
  key: string;
  urls: readonly string[];
  failCount: number;
  error: string;
}

export type ReportResult =
  | { sent: false; reason: 'settling' | 'unchanged' | 'no-recipients' }
  | { sent: true; kind: 'failing' | 'recovered'; failures: ReportedFailure[] };

export interface FailureReporterOptions {
  threshold?: number;
  stableSweeps?: number;
}

export class FailureReporter {
  private readonly threshold: number;
  private readonly stableSweeps: number;
  private readonly subject: CompiledTemplate;
  private readonly body: CompiledTemplate;

  private observed: string | null = null;
  private unchangedSweeps = 0;
  /** Healthy is the state recipients are assumed to know about at startup. */
  private reported = '';

  constructor(
    private readonly db: DbBackend,
    private readonly sender: MailSender,
    options: FailureReporterOptions = {},
  ) {
    this.threshold = options.threshold ?? REPORT_FAIL_THRESHOLD;
    this.stableSweeps = options.stableSweeps ?? REPORT_STABLE_SWEEPS;

    const engine = createTemplateEngine(new RegexCache(0), { autoescape: true });
    this.subject = engine.compileTemplate('failure-report-subject', readBuiltinTemplate('failure-report-subject.njk'));
    this.body = engine.compileTemplate('failure-report', readBuiltinTemplate('failure-report.njk'));
  }

  /**
   * Called once per maintenance sweep. Only failures of groups configured in
   * `snapshot` count; a report is sent once the failing set has stayed the
   * same for `stableSweeps` sweeps and differs from the last one reported.
   */
  async sweep(snapshot: ConfigSnapshot): Promise<ReportResult> {
    const rows = await this.db.listFailures(this.threshold);
    const failures: ReportedFailure[] = [];
    for (const row of rows) {
      const key = row.urlsHash.toString('hex');
      const group = snapshot.groupsByKey.get(key);
      if (!group) continue;
      failures.push({ key, urls: group.urls, failCount: row.failCount, error: row.error });
    }

    const signature = failures.map((failure) => failure.key).sort().join(',');
    if (signature !== this.observed) {
      this.observed = signature;
      this.unchangedSweeps = 1;
    } else {
      this.unchangedSweeps += 1;
    }

    if (this.unchangedSweeps < this.stableSweeps) return { sent: false, reason: 'settling' };
    if (signature === this.reported) return { sent: false, reason: 'unchanged' };

    const kind = failures.length > 0 ? 'failing' : 'recovered';

    if (snapshot.errorReportTo.length === 0) {
      logger.warn({ failing: failures.length }, 'Failure report due but errorReportTo is empty');
      this.reported = signature;
      return { sent: false, reason: 'no-recipients' };
    }

    const context = { failures, threshold: this.threshold };
    await this.sender.send({
      to: snapshot.errorReportTo,
      cc: [],
      bcc: [],
      subject: this.subject.render(context).replace(/\s+/g, ' ').trim(),
      html: this.body.render(context),
    });

    this.reported = signature;
    logger.info({ kind, failing: failures.length, to: snapshot.errorReportTo.length }, 'Failure report sent');
    return { sent: true, kind, failures };
  }
}
