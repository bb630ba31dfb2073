import { ConfigError } from './errors.js';

/**
 * Compiled-regex cache scoped to one configuration generation.
 *
 * Every config load creates a fresh cache, so patterns are compiled once per
 * generation and the whole cache is dropped together with the snapshot that
 * owns it.
 */
export class RegexCache {
  private readonly compiled = new Map<string, RegExp>();

  constructor(readonly generation: number) {}

  /** Compile (or reuse) a pattern. Invalid patterns raise ConfigError. */
  get(pattern: string, flags = ''): RegExp {
    const key = `${flags}/${pattern}`;
    const cached = this.compiled.get(key);
    if (cached) return cached;

    let re: RegExp;
    try {
      // Global and sticky flags carry lastIndex state between calls.
      re = new RegExp(pattern, flags.replace(/[gy]/g, ''));
    } catch (err) {
      throw new ConfigError(`Invalid regular expression /${pattern}/${flags}`, [], { cause: err });
    }

    this.compiled.set(key, re);
    return re;
  }

  get size(): number {
    return this.compiled.size;
  }
}
