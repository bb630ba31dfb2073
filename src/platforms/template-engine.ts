import nunjucks from 'nunjucks';
import type { Environment, Template } from 'nunjucks';

import type { CompiledExpression, CompiledTemplate, TemplateEngine } from '../core/adapters.js';
import { ConfigError, EvaluationError, RenderError } from '../core/errors.js';
import type { RegexCache } from '../core/regex-cache.js';

/**
 * Nunjucks-backed template and expression engine.
 *
 * Expressions are compiled as a one-tag template that hands the evaluated
 * value to a capture function, so update keys and filter expressions share
 * the exact syntax and filters of the mail templates.
 */

const CAPTURE = '__capture';

const DATE_FORMAT = new Intl.DateTimeFormat('en-US', {
  dateStyle: 'medium',
  timeStyle: 'short',
  timeZone: 'UTC',
});

export interface TemplateEngineOptions {
  autoescape?: boolean;
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Feeds report absent fields as null. Templates print those as empty text,
// while a name that does not exist at all still fails the render.
function blankNulls(value: unknown): unknown {
  if (value === null) return '';
  if (Array.isArray(value)) return value.map(blankNulls);
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, blankNulls(inner)]));
  }
  return value;
}

function renderContext(context: object): object {
  const blanked = blankNulls(context);
  return isPlainObject(blanked) ? blanked : context;
}

export class NunjucksTemplateEngine implements TemplateEngine {
  private readonly env: Environment;

  constructor(private readonly regexCache: RegexCache, options: TemplateEngineOptions = {}) {
    this.env = new nunjucks.Environment(null, {
      autoescape: options.autoescape ?? false,
      throwOnUndefined: true,
    });

    this.env.addFilter('matches', (value: unknown, pattern: string, flags?: string): boolean => {
      if (value === null || value === undefined) return false;
      return this.regexCache.get(pattern, flags ?? '').test(String(value));
    });

    this.env.addFilter('datetimeformat', (value: unknown, format?: string): string => {
      const date = toDate(value);
      if (!date) return String(value ?? '');
      return format === 'iso' ? date.toISOString() : DATE_FORMAT.format(date);
    });

    this.env.addFilter('pluralize', (value: unknown, singular = '', plural = 's'): string => {
      const count = Array.isArray(value) ? value.length : Number(value);
      return count === 1 ? singular : plural;
    });

    this.env.addGlobal('now', () => new Date().toISOString());
  }

  compileExpression(source: string): CompiledExpression {
    const template = this.compile(`{{ ${CAPTURE}((${source})) }}`, `expression "${source}"`);

    return {
      source,
      evaluate(context: object): unknown {
        let captured: unknown;
        const capture = (value: unknown): string => {
          captured = value;
          return '';
        };

        try {
          template.render({ ...context, [CAPTURE]: capture });
        } catch (err) {
          throw new EvaluationError(`Failed to evaluate expression "${source}"`, { cause: err });
        }
        return captured;
      },
    };
  }

  compileTemplate(name: string, source: string): CompiledTemplate {
    const template = this.compile(source, `template "${name}"`);

    return {
      render(context: object): string {
        try {
          return template.render(renderContext(context));
        } catch (err) {
          throw new RenderError(`Failed to render template "${name}"`, { cause: err });
        }
      },
    };
  }

  private compile(source: string, label: string): Template {
    try {
      return new nunjucks.Template(source, this.env, label, true);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Failed to compile ${label}`, [detail], { cause: err });
    }
  }
}

export function createTemplateEngine(regexCache: RegexCache, options?: TemplateEngineOptions): TemplateEngine {
  return new NunjucksTemplateEngine(regexCache, options);
}
