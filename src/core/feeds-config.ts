import { createHash } from 'node:crypto';
import { existsSync, readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import ms from 'ms';
import { z } from 'zod';

import type { CompiledExpression, CompiledTemplate, TemplateEngine } from './adapters.js';
import type { MailTemplates } from './digest.js';
import { ConfigError } from './errors.js';
import { compileFilter } from './filter.js';
import type { FilterNode, RawFilter } from './filter.js';
import { RegexCache } from './regex-cache.js';
import { createTemplateEngine } from '../platforms/template-engine.js';

// ── Built-in defaults ───────────────────────────────────────────────

const DEFAULT_UPDATE_KEYS = ['item.id'];
const DEFAULT_INTERVAL_MS = ms('1h');
const DEFAULT_KEEP_OLD_MS = ms('7d');
const DEFAULT_TIMEOUT_MS = ms('30s');
const DEFAULT_MAX_MAILS_PER_CHECK = 5;

const TEMPLATE_FILES: Record<keyof MailTemplates, string> = {
  itemSubject: 'item-subject.njk',
  itemBody: 'item-body.njk',
  digestSubject: 'digest-subject.njk',
  digestBody: 'digest-body.njk',
};

// src/core at dev time, dist/src/core once built; templates ship in src/.
const HERE = dirname(fileURLToPath(import.meta.url));
const TEMPLATE_DIR_CANDIDATES = [
  resolve(HERE, '../templates'),
  resolve(HERE, '../../../src/templates'),
];

/** Read one of the templates that ship in src/templates. */
export function readBuiltinTemplate(file: string): string {
  const dir = TEMPLATE_DIR_CANDIDATES.find((candidate) => existsSync(resolve(candidate, file)));
  if (!dir) {
    throw new ConfigError(`Built-in template ${file} not found`, TEMPLATE_DIR_CANDIDATES);
  }
  return readFileSync(resolve(dir, file), 'utf-8');
}

let defaultTemplateSources: Record<keyof MailTemplates, string> | null = null;

function loadDefaultTemplateSources(): Record<keyof MailTemplates, string> {
  if (defaultTemplateSources) return defaultTemplateSources;

  defaultTemplateSources = {
    itemSubject: readBuiltinTemplate(TEMPLATE_FILES.itemSubject),
    itemBody: readBuiltinTemplate(TEMPLATE_FILES.itemBody),
    digestSubject: readBuiltinTemplate(TEMPLATE_FILES.digestSubject),
    digestBody: readBuiltinTemplate(TEMPLATE_FILES.digestBody),
  };
  return defaultTemplateSources;
}

// ── Zod schema for the feeds config file ────────────────────────────

/** Durations are `ms` strings ("30s", "2h", "7d") or plain seconds. */
const DurationSchema = z.union([z.number().positive(), z.string().min(1)]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value * 1000 : ms(value);
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed <= 0) {
    ctx.addIssue({ code: 'custom', message: `Invalid duration "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

const StringListSchema = z
  .union([z.string().min(1), z.array(z.string().min(1))])
  .transform((value) => (typeof value === 'string' ? [value] : value));

const UrlListSchema = z
  .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
  .transform((value) => (typeof value === 'string' ? [value] : value));

const TemplateSourceSchema = z.union([
  z.string(),
  z.strictObject({ file: z.string().min(1) }),
]);

const RegexSpecSchema = z.union([
  z.string(),
  z.strictObject({
    pattern: z.string(),
    flags: z.string().regex(/^[dgimsuvy]*$/, 'Unknown regex flag').optional(),
  }),
]);

const RawFilterSchema: z.ZodType<RawFilter> = z.lazy(() =>
  z.union([
    z.strictObject({ and: z.array(RawFilterSchema) }),
    z.strictObject({ all: z.array(RawFilterSchema) }),
    z.strictObject({ or: z.array(RawFilterSchema) }),
    z.strictObject({ any: z.array(RawFilterSchema) }),
    z.strictObject({ not: RawFilterSchema }),
    z.strictObject({ titleRegex: RegexSpecSchema }),
    z.strictObject({ bodyRegex: RegexSpecSchema }),
    z.strictObject({ regex: RegexSpecSchema }),
    z.strictObject({ expr: z.string().min(1) }),
  ]),
);

const SettingsSchema = z.strictObject({
  to: StringListSchema.optional(),
  cc: StringListSchema.optional(),
  bcc: StringListSchema.optional(),
  digest: z.boolean().optional(),
  itemSubject: TemplateSourceSchema.optional(),
  itemBody: TemplateSourceSchema.optional(),
  digestSubject: TemplateSourceSchema.optional(),
  digestBody: TemplateSourceSchema.optional(),
  templateArgs: z.record(z.string(), z.unknown()).optional(),
  updateKeys: StringListSchema.optional(),
  interval: DurationSchema.optional(),
  keepOld: DurationSchema.optional(),
  timeout: DurationSchema.optional(),
  maxMailsPerCheck: z.number().int().nonnegative().optional(),
  sanitize: z.boolean().optional(),
  sortByLastModified: z.boolean().optional(),
  httpHeaders: z.record(z.string(), z.string()).optional(),
});

const FeedGroupSchema = SettingsSchema.extend({
  urls: UrlListSchema.optional(),
  url: z.string().min(1).optional(),
  filter: RawFilterSchema.optional(),
}).refine((group) => (group.urls === undefined) !== (group.url === undefined), {
  message: 'Each feed needs exactly one of "url" or "urls"',
});

const FeedsConfigSchema = z.strictObject({
  $schema: z.string().optional(),
  errorReportTo: StringListSchema.optional(),
  groupRetention: DurationSchema.optional(),
  settings: SettingsSchema.optional(),
  feeds: z.array(FeedGroupSchema).default([]),
});

type RawSettings = z.infer<typeof SettingsSchema>;
type TemplateSource = z.infer<typeof TemplateSourceSchema>;

// ── Resolved snapshot ───────────────────────────────────────────────

export interface GroupSettings {
  to: readonly string[];
  cc: readonly string[];
  bcc: readonly string[];
  digest: boolean;
  templates: MailTemplates;
  templateArgs: Readonly<Record<string, unknown>>;
  updateKeys: readonly CompiledExpression[];
  intervalMs: number;
  keepOldMs: number;
  timeoutMs: number;
  maxMailsPerCheck: number;
  sanitize: boolean;
  sortByLastModified: boolean;
  httpHeaders: Readonly<Record<string, string>>;
}

export interface FeedGroupConfig {
  /** Hex form of `urlsHash`, the group's identity */
  key: string;
  urlsHash: Buffer;
  /** Normalized, sorted, de-duplicated */
  urls: readonly string[];
  filter: FilterNode | null;
  settings: GroupSettings;
}

/** One immutable configuration generation. */
export interface ConfigSnapshot {
  generation: number;
  loadedAt: Date;
  /** File the snapshot was read from, if any */
  source: string | null;
  errorReportTo: readonly string[];
  groupRetentionMs: number;
  groups: readonly FeedGroupConfig[];
  groupsByKey: ReadonlyMap<string, FeedGroupConfig>;
  regexCache: RegexCache;
  engine: TemplateEngine;
}

export interface ParseOptions {
  generation: number;
  /** Directory that `{ "file": ... }` template paths are relative to */
  baseDir: string;
  source?: string | null;
}

// ── URL-set identity ────────────────────────────────────────────────

export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch (err) {
    throw new ConfigError(`Invalid feed URL "${url}"`, [], { cause: err });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`Unsupported feed URL scheme "${parsed.protocol}" in "${url}"`);
  }
  parsed.hash = '';
  return parsed.href;
}

/** SHA-256 over the normalized, sorted, de-duplicated URL set. */
export function hashUrlSet(urls: readonly string[]): { urls: string[]; hash: Buffer } {
  const normalized = Array.from(new Set(urls.map(normalizeUrl))).sort();
  const hash = createHash('sha256');
  for (const url of normalized) {
    // Length prefix keeps ["ab", "c"] and ["a", "bc"] apart.
    hash.update(`${Buffer.byteLength(url)}:${url}\n`);
  }
  return { urls: normalized, hash: hash.digest() };
}

// ── Resolution ──────────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

class Compiler {
  private readonly templates = new Map<string, CompiledTemplate>();
  private readonly expressions = new Map<string, CompiledExpression>();

  constructor(
    readonly engine: TemplateEngine,
    private readonly baseDir: string,
  ) {}

  template(name: keyof MailTemplates, source: TemplateSource | undefined): CompiledTemplate {
    const text = source === undefined
      ? loadDefaultTemplateSources()[name]
      : typeof source === 'string'
        ? source
        : this.readTemplateFile(source.file);

    const cacheKey = `${name}\u0000${text}`;
    const cached = this.templates.get(cacheKey);
    if (cached) return cached;

    const compiled = this.engine.compileTemplate(name, text);
    this.templates.set(cacheKey, compiled);
    return compiled;
  }

  expression(source: string): CompiledExpression {
    const cached = this.expressions.get(source);
    if (cached) return cached;

    const compiled = this.engine.compileExpression(source);
    this.expressions.set(source, compiled);
    return compiled;
  }

  private readTemplateFile(file: string): string {
    const path = resolve(this.baseDir, file);
    try {
      return readFileSync(path, 'utf-8');
    } catch (err) {
      throw new ConfigError(`Cannot read template file ${path}`, [], { cause: err });
    }
  }
}

function resolveSettings(group: RawSettings, global: RawSettings, compiler: Compiler): GroupSettings {
  const pick = <K extends keyof RawSettings>(key: K): RawSettings[K] => group[key] ?? global[key];

  return Object.freeze({
    to: Object.freeze([...(pick('to') ?? [])]),
    cc: Object.freeze([...(pick('cc') ?? [])]),
    bcc: Object.freeze([...(pick('bcc') ?? [])]),
    digest: pick('digest') ?? false,
    templates: Object.freeze({
      itemSubject: compiler.template('itemSubject', pick('itemSubject')),
      itemBody: compiler.template('itemBody', pick('itemBody')),
      digestSubject: compiler.template('digestSubject', pick('digestSubject')),
      digestBody: compiler.template('digestBody', pick('digestBody')),
    }),
    templateArgs: Object.freeze({ ...(global.templateArgs ?? {}), ...(group.templateArgs ?? {}) }),
    updateKeys: Object.freeze((pick('updateKeys') ?? DEFAULT_UPDATE_KEYS).map((source) => compiler.expression(source))),
    intervalMs: pick('interval') ?? DEFAULT_INTERVAL_MS,
    keepOldMs: pick('keepOld') ?? DEFAULT_KEEP_OLD_MS,
    timeoutMs: pick('timeout') ?? DEFAULT_TIMEOUT_MS,
    maxMailsPerCheck: pick('maxMailsPerCheck') ?? DEFAULT_MAX_MAILS_PER_CHECK,
    sanitize: pick('sanitize') ?? true,
    sortByLastModified: pick('sortByLastModified') ?? false,
    httpHeaders: Object.freeze({ ...(pick('httpHeaders') ?? {}) }),
  });
}

/**
 * Validate and resolve a parsed feeds config into a frozen snapshot.
 * Every template, update key, regex and filter expression is compiled here,
 * so any mistake surfaces as a ConfigError before the snapshot is used.
 */
export function parseFeedsConfig(raw: unknown, options: ParseOptions): ConfigSnapshot {
  const parsed = FeedsConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid feeds config', formatIssues(parsed.error));
  }

  const file = parsed.data;
  const global = file.settings ?? {};
  const regexCache = new RegexCache(options.generation);
  const engine = createTemplateEngine(regexCache);
  const compiler = new Compiler(engine, options.baseDir);

  const groups: FeedGroupConfig[] = [];
  const groupsByKey = new Map<string, FeedGroupConfig>();

  file.feeds.forEach((feed, index) => {
    const { urls, hash } = hashUrlSet(feed.urls ?? (feed.url ? [feed.url] : []));
    const key = hash.toString('hex');

    const existing = groupsByKey.get(key);
    if (existing) {
      throw new ConfigError('Duplicate feed group', [
        `feeds.${index}: same URL set as an earlier group (${existing.urls.join(', ')})`,
      ]);
    }

    const group: FeedGroupConfig = Object.freeze({
      key,
      urlsHash: hash,
      urls: Object.freeze(urls),
      filter: feed.filter ? compileFilter(feed.filter, { regexCache, engine }) : null,
      settings: resolveSettings(feed, global, compiler),
    });
    groups.push(group);
    groupsByKey.set(key, group);
  });

  return Object.freeze({
    generation: options.generation,
    loadedAt: new Date(),
    source: options.source ?? null,
    errorReportTo: Object.freeze([...(file.errorReportTo ?? [])]),
    groupRetentionMs: file.groupRetention ?? global.keepOld ?? DEFAULT_KEEP_OLD_MS,
    groups: Object.freeze(groups),
    groupsByKey,
    regexCache,
    engine,
  });
}

/** Read, parse and resolve the feeds config file. Throws ConfigError. */
export async function loadFeedsConfig(path: string, generation: number): Promise<ConfigSnapshot> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read feeds config ${path}`, [], { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Feeds config ${path} is not valid JSON`, [detail], { cause: err });
  }

  return parseFeedsConfig(raw, { generation, baseDir: dirname(path), source: path });
}
