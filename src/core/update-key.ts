import { createHash } from 'node:crypto';

import type { CompiledExpression } from './adapters.js';
import { EvaluationError } from './errors.js';
import type { EntryContext, Feed } from './feed-types.js';

/**
 * Update-key engine: turns each entry into a fixed-size content fingerprint
 * and collapses entries that share one.
 *
 * The fingerprint is SHA-256 over the concatenated update-key values in
 * declared order. Which fields go in decides what counts as "changed": the
 * default `item.id` only notices new items, `item.id` + `item.updated`
 * notices edits as well.
 */

export const FINGERPRINT_BYTES = 32;

/** Entry that produced a fingerprint and takes part in this poll. */
export interface FingerprintedEntry {
  context: EntryContext;
  fingerprint: Buffer;
  /** Hex form of the fingerprint, used as a map key */
  key: string;
}

/** Entry excluded from this poll because an update key failed for it. */
export interface EntryProblem {
  context: EntryContext;
  error: EvaluationError;
}

export interface DedupResult {
  entries: FingerprintedEntry[];
  problems: EntryProblem[];
  /** Number of entries that collapsed into an earlier entry of the same poll */
  duplicates: number;
}

/** Hashed in place of a `null` value, so absent feed fields still fingerprint. */
export const NULL_MARKER = 'null';

function valueBytes(value: unknown, source: string): Buffer {
  if (value === undefined) {
    throw new EvaluationError(`Update key "${source}" evaluated to undefined`);
  }
  if (value === null) return Buffer.from(NULL_MARKER, 'utf8');
  if (typeof value === 'string') return Buffer.from(value, 'utf8');
  if (value instanceof Uint8Array) return Buffer.from(value);
  if (typeof value === 'object') return Buffer.from(JSON.stringify(value), 'utf8');
  return Buffer.from(String(value), 'utf8');
}

/**
 * Fingerprint of one entry. Throws EvaluationError when any update key fails
 * or names a field the entry does not have. Fields the feed left empty are
 * `null` and hash as `"null"`.
 */
export function computeFingerprint(
  updateKeys: readonly CompiledExpression[],
  context: EntryContext,
  templateArgs: Readonly<Record<string, unknown>> = {},
): Buffer {
  const hash = createHash('sha256');
  const scope = { ...context, template_args: templateArgs };

  for (const key of updateKeys) {
    hash.update(valueBytes(key.evaluate(scope), key.source));
  }

  return hash.digest();
}

/** Flatten a group's fetched feeds into entry contexts, in configured URL order. */
export function entryContexts(feeds: readonly Feed[]): EntryContext[] {
  return feeds.flatMap((feed) => feed.entries.map((item) => ({ feed, item })));
}

/**
 * Fingerprint every entry of a poll and drop in-poll duplicates (the first
 * occurrence wins, so earlier URLs of a group take precedence).
 */
export function dedupeEntries(
  contexts: readonly EntryContext[],
  updateKeys: readonly CompiledExpression[],
  templateArgs: Readonly<Record<string, unknown>> = {},
): DedupResult {
  const seen = new Set<string>();
  const entries: FingerprintedEntry[] = [];
  const problems: EntryProblem[] = [];
  let duplicates = 0;

  for (const context of contexts) {
    let fingerprint: Buffer;
    try {
      fingerprint = computeFingerprint(updateKeys, context, templateArgs);
    } catch (err) {
      const error = err instanceof EvaluationError
        ? err
        : new EvaluationError('Update key evaluation failed', { cause: err });
      problems.push({ context, error });
      continue;
    }

    const key = fingerprint.toString('hex');
    if (seen.has(key)) {
      duplicates += 1;
      continue;
    }
    seen.add(key);
    entries.push({ context, fingerprint, key });
  }

  return { entries, problems, duplicates };
}

/** Split fingerprinted entries into new and already-known ones. */
export function partitionByKnown(
  entries: readonly FingerprintedEntry[],
  known: ReadonlySet<string>,
): { fresh: FingerprintedEntry[]; known: FingerprintedEntry[] } {
  const fresh: FingerprintedEntry[] = [];
  const seen: FingerprintedEntry[] = [];
  for (const entry of entries) {
    (known.has(entry.key) ? seen : fresh).push(entry);
  }
  return { fresh, known: seen };
}
