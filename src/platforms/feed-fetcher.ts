import { createHash } from 'node:crypto';
import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { z } from 'zod';

import type { FeedFetcher, FetchOptions } from '../core/adapters.js';
import { FetchError } from '../core/errors.js';
import type { Feed, FeedEntry } from '../core/feed-types.js';
import { looksLikeHtml, sanitizeHtml, stripControlChars } from '../middleware/sanitize.js';
import { withRetry } from '../middleware/retry.js';

/**
 * HTTP feed fetcher: RSS 2.0, RSS 1.0 (RDF), Atom and JSON Feed.
 *
 * Transient failures (connection errors, 5xx, 429) are retried with
 * exponential backoff until the group timeout, which covers all attempts of
 * one URL together. Parse errors fail immediately.
 */

const USER_AGENT = 'rss-courier/0.1 (+https://www.npmjs.com/package/rss-courier)';
const ACCEPT = 'application/rss+xml, application/atom+xml, application/feed+json, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8';
const FETCH_ATTEMPTS = 4;
const FETCH_BASE_DELAY_MS = 500;

const ARRAY_TAGS = new Set(['item', 'entry', 'link', 'category', 'author', 'dc:creator', 'dc:subject']);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  processEntities: true,
  htmlEntities: true,
  isArray: (name: string) => ARRAY_TAGS.has(name),
});

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
});

// ── XML helpers ─────────────────────────────────────────────────────

type XmlNode = Record<string, unknown>;

function asNode(value: unknown): XmlNode | null {
  if (Array.isArray(value)) return asNode(value[0]);
  if (typeof value === 'object' && value !== null) return Object.fromEntries(Object.entries(value));
  return null;
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function hasChildElements(node: XmlNode): boolean {
  return Object.keys(node).some((key) => !key.startsWith('@_') && key !== '#text');
}

/** Text content of a node: plain value, `#text`, or re-serialized XHTML children. */
function textOf(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (Array.isArray(value)) return textOf(value[0]);
  if (typeof value === 'string') return value.trim() === '' ? null : value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  const node = asNode(value);
  if (!node) return null;
  if (node['#text'] !== undefined) return textOf(node['#text']);
  if (hasChildElements(node)) {
    const children = Object.fromEntries(Object.entries(node).filter(([key]) => !key.startsWith('@_')));
    const built: unknown = xmlBuilder.build(children);
    return typeof built === 'string' && built.trim() !== '' ? built.trim() : null;
  }
  return null;
}

function attrOf(value: unknown, name: string): string | null {
  const node = asNode(value);
  return node ? textOf(node[`@_${name}`]) : null;
}

function toIsoDate(value: string | null): string | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function uniqueStrings(values: Array<string | null>): string[] {
  return Array.from(new Set(values.filter((value): value is string => value !== null)));
}

function syntheticId(link: string | null, title: string | null, summary: string | null): string {
  return createHash('sha256')
    .update(`${link ?? ''}\n${title ?? ''}\n${summary ?? ''}`)
    .digest('hex');
}

// ── RSS ─────────────────────────────────────────────────────────────

function parseRssItem(raw: unknown): FeedEntry {
  const item = asNode(raw) ?? {};
  const title = textOf(item.title);
  const link = textOf(item.link);
  const summary = textOf(item.description);
  const guid = textOf(item.guid);

  return {
    id: guid ?? link ?? syntheticId(link, title, summary),
    title,
    link,
    summary,
    content: textOf(item['content:encoded']),
    authors: uniqueStrings([...asList(item.author), ...asList(item['dc:creator'])].map(textOf)),
    categories: uniqueStrings([...asList(item.category), ...asList(item['dc:subject'])].map(textOf)),
    published: toIsoDate(textOf(item.pubDate) ?? textOf(item['dc:date'])),
    updated: toIsoDate(textOf(item['atom:updated'])),
  };
}

function parseRss(channel: XmlNode, items: unknown[], url: string): Feed {
  const link = asList(channel.link).map(textOf).find((value) => value !== null) ?? null;
  return {
    url,
    id: link ?? url,
    title: textOf(channel.title),
    description: textOf(channel.description),
    link,
    updated: toIsoDate(textOf(channel.lastBuildDate) ?? textOf(channel.pubDate) ?? textOf(channel['dc:date'])),
    entries: items.map(parseRssItem),
  };
}

// ── Atom ────────────────────────────────────────────────────────────

function atomLink(links: unknown): string | null {
  const list = asList(links);
  const alternate = list.find((link) => {
    const rel = attrOf(link, 'rel');
    return rel === null || rel === 'alternate';
  });
  return attrOf(alternate ?? list[0], 'href');
}

function parseAtomEntry(raw: unknown): FeedEntry {
  const entry = asNode(raw) ?? {};
  const title = textOf(entry.title);
  const link = atomLink(entry.link);
  const summary = textOf(entry.summary);

  return {
    id: textOf(entry.id) ?? link ?? syntheticId(link, title, summary),
    title,
    link,
    summary,
    content: textOf(entry.content),
    authors: uniqueStrings(asList(entry.author).map((author) => textOf(asNode(author)?.name))),
    categories: uniqueStrings(asList(entry.category).map((category) => attrOf(category, 'term') ?? textOf(category))),
    published: toIsoDate(textOf(entry.published) ?? textOf(entry.issued)),
    updated: toIsoDate(textOf(entry.updated) ?? textOf(entry.modified)),
  };
}

function parseAtom(feed: XmlNode, url: string): Feed {
  const link = atomLink(feed.link);
  return {
    url,
    id: textOf(feed.id) ?? link ?? url,
    title: textOf(feed.title),
    description: textOf(feed.subtitle),
    link,
    updated: toIsoDate(textOf(feed.updated)),
    entries: asList(feed.entry).map(parseAtomEntry),
  };
}

// ── JSON Feed ───────────────────────────────────────────────────────

const JsonFeedAuthorSchema = z.object({ name: z.string().optional() });

const JsonFeedItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  url: z.string().optional(),
  title: z.string().optional(),
  content_html: z.string().optional(),
  content_text: z.string().optional(),
  summary: z.string().optional(),
  date_published: z.string().optional(),
  date_modified: z.string().optional(),
  author: JsonFeedAuthorSchema.optional(),
  authors: z.array(JsonFeedAuthorSchema).optional(),
  tags: z.array(z.string()).optional(),
});

const JsonFeedSchema = z.object({
  version: z.string().startsWith('https://jsonfeed.org/version/'),
  title: z.string().optional(),
  home_page_url: z.string().optional(),
  feed_url: z.string().optional(),
  description: z.string().optional(),
  items: z.array(JsonFeedItemSchema),
});

function parseJsonFeed(body: string, url: string): Feed {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new FetchError('Failed to parse JSON feed', url, { cause: err });
  }

  const parsed = JsonFeedSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`);
    throw new FetchError(`Invalid JSON feed (${issues.join('; ')})`, url);
  }

  const feed = parsed.data;
  return {
    url,
    id: feed.feed_url ?? feed.home_page_url ?? url,
    title: feed.title ?? null,
    description: feed.description ?? null,
    link: feed.home_page_url ?? null,
    updated: null,
    entries: feed.items.map((item) => ({
      id: item.id,
      title: item.title ?? null,
      link: item.url ?? null,
      summary: item.summary ?? null,
      content: item.content_html ?? item.content_text ?? null,
      authors: uniqueStrings([item.author?.name ?? null, ...(item.authors ?? []).map((author) => author.name ?? null)]),
      categories: item.tags ?? [],
      published: toIsoDate(item.date_published ?? null),
      updated: toIsoDate(item.date_modified ?? null),
    })),
  };
}

// ── Public API ──────────────────────────────────────────────────────

/** Parse a feed document. Throws FetchError for unparseable or unknown formats. */
export function parseFeed(body: string, url: string, contentType?: string | null): Feed {
  const trimmed = body.trimStart();
  if (contentType?.includes('json') || trimmed.startsWith('{')) {
    return parseJsonFeed(trimmed, url);
  }

  let doc: XmlNode | null;
  try {
    doc = asNode(xmlParser.parse(trimmed, true));
  } catch (err) {
    throw new FetchError('Failed to parse feed XML', url, { cause: err });
  }

  const rss = asNode(doc?.rss);
  const rssChannel = asNode(rss?.channel);
  if (rssChannel) return parseRss(rssChannel, asList(rssChannel.item), url);

  const rdf = asNode(doc?.['rdf:RDF']);
  const rdfChannel = asNode(rdf?.channel);
  if (rdf && rdfChannel) return parseRss(rdfChannel, asList(rdf.item), url);

  const atom = asNode(doc?.feed);
  if (atom) return parseAtom(atom, url);

  throw new FetchError('Unrecognized feed format (expected RSS, Atom or JSON Feed)', url);
}

function sanitizeText(value: string | null): string | null {
  if (value === null) return null;
  return looksLikeHtml(value) ? sanitizeHtml(value) : stripControlChars(value);
}

/** Clean every HTML-bearing field of a feed; relative URLs resolve against the entry link. */
export function sanitizeFeed(feed: Feed): Feed {
  const feedBase = feed.link ?? feed.url;
  return {
    ...feed,
    title: sanitizeText(feed.title),
    description: feed.description === null ? null : sanitizeHtml(feed.description, feedBase),
    entries: feed.entries.map((entry) => {
      const base = entry.link ?? feedBase;
      return {
        ...entry,
        title: sanitizeText(entry.title),
        summary: entry.summary === null ? null : sanitizeHtml(entry.summary, base),
        content: entry.content === null ? null : sanitizeHtml(entry.content, base),
      };
    }),
  };
}

export interface HttpFeedFetcherOptions {
  attempts?: number;
  baseDelayMs?: number;
}

export class HttpFeedFetcher implements FeedFetcher {
  constructor(private readonly options: HttpFeedFetcherOptions = {}) {}

  async fetch(urls: readonly string[], options: FetchOptions): Promise<Feed[]> {
    return Promise.all(urls.map((url) => this.fetchOne(url, options)));
  }

  private async fetchOne(url: string, options: FetchOptions): Promise<Feed> {
    // The group timeout bounds the whole fetch: every attempt and the backoff between them.
    const deadline = new AbortController();
    const stop: { reason: string | null } = { reason: null };
    const abort = (reason: string): void => {
      if (stop.reason !== null) return;
      stop.reason = reason;
      deadline.abort();
    };
    const timer = setTimeout(() => abort(`Timed out after ${options.timeoutMs}ms`), options.timeoutMs);
    const onCancel = (): void => abort('Fetch cancelled');
    if (options.signal?.aborted) onCancel();
    options.signal?.addEventListener('abort', onCancel, { once: true });

    try {
      const feed = await withRetry(() => this.request(url, options.headers, deadline.signal), {
        attempts: this.options.attempts ?? FETCH_ATTEMPTS,
        baseDelayMs: this.options.baseDelayMs ?? FETCH_BASE_DELAY_MS,
        shouldRetry: (err) => err instanceof FetchError && err.transient,
        signal: deadline.signal,
        label: url,
      });
      return options.sanitize ? sanitizeFeed(feed) : feed;
    } catch (err) {
      if (stop.reason !== null) throw new FetchError(stop.reason, url, { cause: err });
      throw err;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCancel);
    }
  }

  private async request(url: string, headers: Readonly<Record<string, string>>, signal: AbortSignal): Promise<Feed> {
    if (signal.aborted) throw new FetchError('Fetch aborted', url);

    let res: Response;
    try {
      res = await fetch(url, {
        signal,
        redirect: 'follow',
        headers: { 'User-Agent': USER_AGENT, Accept: ACCEPT, ...headers },
      });
    } catch (err) {
      throw new FetchError('Failed to fetch feed', url, { cause: err, transient: true });
    }

    if (!res.ok) {
      const transient = res.status >= 500 || res.status === 429;
      throw new FetchError(`HTTP ${res.status} ${res.statusText}`.trim(), url, { transient });
    }

    let body: string;
    try {
      body = await res.text();
    } catch (err) {
      throw new FetchError('Failed to read response body', url, { cause: err, transient: true });
    }

    return parseFeed(body, url, res.headers.get('content-type'));
  }
}
