/**
 * Parsed feed model shared by the fetch adapter, the templates and the
 * filter/update-key engines. Dates are ISO-8601 strings so templates and
 * expressions can use them without conversion.
 */

export interface FeedEntry {
  id: string;
  title: string | null;
  link: string | null;
  summary: string | null;
  content: string | null;
  authors: string[];
  categories: string[];
  published: string | null;
  updated: string | null;
}

export interface Feed {
  /** URL the feed was fetched from */
  url: string;
  id: string;
  title: string | null;
  description: string | null;
  link: string | null;
  updated: string | null;
  entries: FeedEntry[];
}

/** The `{ feed, item }` pair every expression and item template sees. */
export interface EntryContext {
  feed: Feed;
  item: FeedEntry;
}
