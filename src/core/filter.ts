import type { CompiledExpression, TemplateEngine } from './adapters.js';
import type { EntryContext, FeedEntry } from './feed-types.js';
import type { RegexCache } from './regex-cache.js';
import { htmlToText } from '../middleware/sanitize.js';

/**
 * Filter DSL: a finite boolean tree over regex and expression leaves,
 * rebuilt from every config load and evaluated by recursive descent.
 */

// ── Config shape (as written in feeds.json) ─────────────────────────

export type RegexSpec = string | { pattern: string; flags?: string };

export type RawFilter =
  | { and: RawFilter[] }
  | { all: RawFilter[] }
  | { or: RawFilter[] }
  | { any: RawFilter[] }
  | { not: RawFilter }
  | { titleRegex: RegexSpec }
  | { bodyRegex: RegexSpec }
  | { regex: RegexSpec }
  | { expr: string };

// ── Compiled tree ───────────────────────────────────────────────────

export type FilterNode =
  | { kind: 'and'; children: readonly FilterNode[] }
  | { kind: 'or'; children: readonly FilterNode[] }
  | { kind: 'not'; child: FilterNode }
  | { kind: 'titleRegex'; pattern: RegExp }
  | { kind: 'bodyRegex'; pattern: RegExp }
  | { kind: 'regex'; pattern: RegExp }
  | { kind: 'expr'; expression: CompiledExpression };

export interface FilterCompileContext {
  regexCache: RegexCache;
  engine: TemplateEngine;
}

function compileRegex(spec: RegexSpec, regexCache: RegexCache): RegExp {
  return typeof spec === 'string'
    ? regexCache.get(spec)
    : regexCache.get(spec.pattern, spec.flags ?? '');
}

/** Compile a raw filter. Bad patterns and expressions throw ConfigError. */
export function compileFilter(raw: RawFilter, ctx: FilterCompileContext): FilterNode {
  if ('and' in raw) return { kind: 'and', children: raw.and.map((child) => compileFilter(child, ctx)) };
  if ('all' in raw) return { kind: 'and', children: raw.all.map((child) => compileFilter(child, ctx)) };
  if ('or' in raw) return { kind: 'or', children: raw.or.map((child) => compileFilter(child, ctx)) };
  if ('any' in raw) return { kind: 'or', children: raw.any.map((child) => compileFilter(child, ctx)) };
  if ('not' in raw) return { kind: 'not', child: compileFilter(raw.not, ctx) };
  if ('titleRegex' in raw) return { kind: 'titleRegex', pattern: compileRegex(raw.titleRegex, ctx.regexCache) };
  if ('bodyRegex' in raw) return { kind: 'bodyRegex', pattern: compileRegex(raw.bodyRegex, ctx.regexCache) };
  if ('regex' in raw) return { kind: 'regex', pattern: compileRegex(raw.regex, ctx.regexCache) };
  return { kind: 'expr', expression: ctx.engine.compileExpression(raw.expr) };
}

// ── Text extraction ─────────────────────────────────────────────────

interface EntryText {
  title: string;
  bodies: string[];
}

const textCache = new WeakMap<FeedEntry, EntryText>();

function entryText(item: FeedEntry): EntryText {
  const cached = textCache.get(item);
  if (cached) return cached;

  const text: EntryText = {
    title: item.title ? htmlToText(item.title) : '',
    bodies: [item.summary, item.content]
      .filter((value): value is string => value !== null)
      .map(htmlToText),
  };
  textCache.set(item, text);
  return text;
}

// ── Evaluation ──────────────────────────────────────────────────────

/**
 * Evaluate a filter for one entry. A missing filter passes everything.
 * Expression leaves may throw EvaluationError; the caller excludes that
 * entry from the poll.
 */
export function evaluateFilter(
  node: FilterNode | null,
  context: EntryContext,
  templateArgs: Readonly<Record<string, unknown>> = {},
): boolean {
  if (!node) return true;

  switch (node.kind) {
    case 'and':
      return node.children.every((child) => evaluateFilter(child, context, templateArgs));
    case 'or':
      return node.children.some((child) => evaluateFilter(child, context, templateArgs));
    case 'not':
      return !evaluateFilter(node.child, context, templateArgs);
    case 'titleRegex':
      return node.pattern.test(entryText(context.item).title);
    case 'bodyRegex':
      return entryText(context.item).bodies.some((body) => node.pattern.test(body));
    case 'regex': {
      const text = entryText(context.item);
      return node.pattern.test(text.title) || text.bodies.some((body) => node.pattern.test(body));
    }
    case 'expr':
      return Boolean(node.expression.evaluate({ ...context, template_args: templateArgs }));
  }
}
