/**
 * Error taxonomy for the polling engine.
 *
 * Group-level errors (fetch, render, send, persistence) end a poll and are
 * recorded as a failure. Evaluation errors are per-entry. Config errors
 * reject a whole configuration load.
 */

export type CourierErrorKind = 'fetch' | 'evaluation' | 'render' | 'send' | 'persistence' | 'config';

export abstract class CourierError extends Error {
  abstract readonly kind: CourierErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, non-2xx status or unparseable feed body. */
export class FetchError extends CourierError {
  readonly kind = 'fetch';
  /** Worth retrying: connection failures, 5xx and 429 responses. */
  readonly transient: boolean;

  constructor(
    message: string,
    readonly url: string,
    options?: ErrorOptions & { transient?: boolean },
  ) {
    super(message, options);
    this.transient = options?.transient ?? false;
  }
}

/** An update-key or filter expression failed for one entry. */
export class EvaluationError extends CourierError {
  readonly kind = 'evaluation';
}

export class RenderError extends CourierError {
  readonly kind = 'render';
}

export class SendError extends CourierError {
  readonly kind = 'send';
}

export class PersistenceError extends CourierError {
  readonly kind = 'persistence';
}

export class ConfigError extends CourierError {
  readonly kind = 'config';

  constructor(message: string, readonly issues: string[] = [], options?: ErrorOptions) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
  }
}

/**
 * Flatten an error and its cause chain into one line per level.
 * Used for the persisted failure text.
 */
export function describeError(err: unknown): string {
  const lines: string[] = [];
  let current: unknown = err;
  let depth = 0;

  while (current !== undefined && current !== null && depth < 8) {
    if (current instanceof Error) {
      lines.push(depth === 0 ? current.message : `caused by: ${current.message}`);
      current = current.cause;
    } else {
      lines.push(depth === 0 ? String(current) : `caused by: ${String(current)}`);
      current = undefined;
    }
    depth += 1;
  }

  return lines.join('\n');
}
