import { describe, expect, it } from 'vitest';

import { ConfigError, EvaluationError } from '../src/core/errors.js';
import type { EntryContext, FeedEntry } from '../src/core/feed-types.js';
import { compileFilter, evaluateFilter } from '../src/core/filter.js';
import type { RawFilter } from '../src/core/filter.js';
import { RegexCache } from '../src/core/regex-cache.js';
import { createTemplateEngine } from '../src/platforms/template-engine.js';
import { makeEntry, makeFeed } from './fakes.js';

const regexCache = new RegexCache(1);
const engine = createTemplateEngine(regexCache);

function compile(raw: RawFilter) {
  return compileFilter(raw, { regexCache, engine });
}

function entry(fields: Partial<FeedEntry> = {}): EntryContext {
  const item = makeEntry({ id: 'entry-1', ...fields });
  return { feed: makeFeed('https://example.com/feed.xml', [item]), item };
}

const announcing = entry({ title: 'Announcing X' });
const random = entry({ title: 'Random' });
const throwing: RawFilter = { expr: 'undefinedFunction()' };

describe('filter algebra', () => {
  it('passes everything without a filter', () => {
    expect(evaluateFilter(null, random)).toBe(true);
  });

  it('treats an empty and as true and an empty or as false', () => {
    expect(evaluateFilter(compile({ and: [] }), random)).toBe(true);
    expect(evaluateFilter(compile({ or: [] }), random)).toBe(false);
    expect(evaluateFilter(compile({ all: [] }), random)).toBe(true);
    expect(evaluateFilter(compile({ any: [] }), random)).toBe(false);
  });

  it('negates exactly one child', () => {
    const leaf = compile({ titleRegex: '^Announcing' });
    const negated = compile({ not: { titleRegex: '^Announcing' } });
    for (const ctx of [announcing, random]) {
      expect(evaluateFilter(negated, ctx)).toBe(!evaluateFilter(leaf, ctx));
    }
  });

  it('is repeatable for a fixed tree and context', () => {
    const filter = compile({ or: [{ titleRegex: 'X$' }, { expr: 'item.title == "Random"' }] });
    const first = evaluateFilter(filter, random);
    expect(evaluateFilter(filter, random)).toBe(first);
    expect(first).toBe(true);
  });

  it('short-circuits left to right', () => {
    expect(evaluateFilter(compile({ and: [{ titleRegex: '^Nope' }, throwing] }), random)).toBe(false);
    expect(evaluateFilter(compile({ or: [{ titleRegex: '^Random' }, throwing] }), random)).toBe(true);
  });
});

describe('regex leaves', () => {
  it('matches the title', () => {
    const filter = compile({ titleRegex: '^Announcing' });
    expect(evaluateFilter(filter, announcing)).toBe(true);
    expect(evaluateFilter(filter, random)).toBe(false);
  });

  it('matches against plain text, not markup', () => {
    const filter = compile({ titleRegex: '^Announcing X$' });
    expect(evaluateFilter(filter, entry({ title: '<b>Announcing</b> X' }))).toBe(true);
  });

  it('matches the body against summary or content', () => {
    const filter = compile({ bodyRegex: 'needle' });
    expect(evaluateFilter(filter, entry({ summary: 'nothing here', content: '<p>a needle</p>' }))).toBe(true);
    expect(evaluateFilter(filter, entry({ summary: 'a needle' }))).toBe(true);
    expect(evaluateFilter(filter, entry({ title: 'needle' }))).toBe(false);
  });

  it('matches title or body with a plain regex leaf', () => {
    const filter = compile({ regex: 'needle' });
    expect(evaluateFilter(filter, entry({ title: 'needle' }))).toBe(true);
    expect(evaluateFilter(filter, entry({ content: 'needle' }))).toBe(true);
    expect(evaluateFilter(filter, entry({ title: 'hay' }))).toBe(false);
  });

  it('honors regex flags', () => {
    const filter = compile({ titleRegex: { pattern: 'announcing', flags: 'i' } });
    expect(evaluateFilter(filter, announcing)).toBe(true);
  });

  it('compiles each pattern once per generation', () => {
    const cache = new RegexCache(7);
    const local = createTemplateEngine(cache);
    compileFilter({ and: [{ titleRegex: 'shared' }, { bodyRegex: 'shared' }] }, { regexCache: cache, engine: local });
    expect(cache.size).toBe(1);
    expect(cache.generation).toBe(7);
  });

  it('rejects an invalid pattern at compile time', () => {
    expect(() => compile({ titleRegex: '(' })).toThrow(ConfigError);
  });
});

describe('expression leaves', () => {
  it('coerces the result by truthiness', () => {
    expect(evaluateFilter(compile({ expr: 'item.title' }), random)).toBe(true);
    expect(evaluateFilter(compile({ expr: 'item.summary' }), random)).toBe(false);
    expect(evaluateFilter(compile({ expr: 'item.categories | length' }), entry({ categories: ['a'] }))).toBe(true);
  });

  it('sees feed, item and template args', () => {
    const filter = compile({ expr: 'feed.title == "Example Feed" and item.title == template_args.wanted' });
    expect(evaluateFilter(filter, random, { wanted: 'Random' })).toBe(true);
    expect(evaluateFilter(filter, random, { wanted: 'Other' })).toBe(false);
  });

  it('can use the regex filter', () => {
    const filter = compile({ expr: 'item.title | matches("^rand", "i")' });
    expect(evaluateFilter(filter, random)).toBe(true);
  });

  it('raises EvaluationError when the expression fails for an entry', () => {
    expect(() => evaluateFilter(compile(throwing), random)).toThrow(EvaluationError);
  });

  it('rejects a syntax error at compile time', () => {
    expect(() => compile({ expr: 'item.title ==' })).toThrow(ConfigError);
  });
});
