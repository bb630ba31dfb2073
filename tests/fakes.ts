import { tmpdir } from 'node:os';

import type { FeedFetcher, FetchOptions, MailSender, OutgoingMail } from '../src/core/adapters.js';
import type { Feed, FeedEntry } from '../src/core/feed-types.js';
import { parseFeedsConfig } from '../src/core/feeds-config.js';
import type { ConfigSnapshot } from '../src/core/feeds-config.js';

export function makeEntry(fields: Partial<FeedEntry> & { id: string }): FeedEntry {
  return {
    title: null,
    link: null,
    summary: null,
    content: null,
    authors: [],
    categories: [],
    published: null,
    updated: null,
    ...fields,
  };
}

export function makeFeed(url: string, entries: FeedEntry[], fields: Partial<Feed> = {}): Feed {
  return {
    url,
    id: url,
    title: 'Example Feed',
    description: null,
    link: null,
    updated: null,
    entries,
    ...fields,
  };
}

/** Serves canned feeds (or errors) per URL and records every call. */
export class FakeFetcher implements FeedFetcher {
  readonly responses = new Map<string, Feed | Error>();
  readonly calls: Array<{ urls: readonly string[]; options: FetchOptions }> = [];
  /** When set, fetch waits for this before answering */
  gate: Promise<void> | null = null;

  set(url: string, response: Feed | Error): this {
    this.responses.set(url, response);
    return this;
  }

  async fetch(urls: readonly string[], options: FetchOptions): Promise<Feed[]> {
    this.calls.push({ urls, options });
    if (this.gate) await this.gate;

    return urls.map((url) => {
      const response = this.responses.get(url);
      if (!response) throw new Error(`No canned response for ${url}`);
      if (response instanceof Error) throw response;
      return response;
    });
  }
}

export class RecordingSender implements MailSender {
  readonly sent: OutgoingMail[] = [];
  failWith: Error | null = null;

  async send(mail: OutgoingMail): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(mail);
  }
}

export function snapshotFrom(raw: unknown, generation = 1): ConfigSnapshot {
  return parseFeedsConfig(raw, { generation, baseDir: tmpdir() });
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
