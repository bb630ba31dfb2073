import type { Feed } from './feed-types.js';

/**
 * Capability interfaces for the external collaborators of the polling
 * engine. Concrete implementations live in `src/platforms/`; tests swap in
 * in-process fakes.
 */

export interface FetchOptions {
  timeoutMs: number;
  headers: Readonly<Record<string, string>>;
  sanitize: boolean;
  signal?: AbortSignal;
}

export interface FeedFetcher {
  /**
   * Fetch and parse every URL of a group. Resolves with one feed per URL in
   * the given order, or rejects with a FetchError for the first URL that
   * failed.
   */
  fetch(urls: readonly string[], options: FetchOptions): Promise<Feed[]>;
}

export interface CompiledExpression {
  readonly source: string;
  /** Throws EvaluationError when evaluation fails. */
  evaluate(context: object): unknown;
}

export interface CompiledTemplate {
  /** Throws RenderError when rendering fails. */
  render(context: object): string;
}

export interface TemplateEngine {
  /** Throws ConfigError on a syntax error. */
  compileExpression(source: string): CompiledExpression;
  /** Throws ConfigError on a syntax error. */
  compileTemplate(name: string, source: string): CompiledTemplate;
}

export interface OutgoingMail {
  to: readonly string[];
  cc: readonly string[];
  bcc: readonly string[];
  subject: string;
  html: string;
}

export interface MailSender {
  /** Throws SendError once retries are exhausted. */
  send(mail: OutgoingMail): Promise<void>;
}
