import { describe, expect, it } from 'vitest';

import { ConfigError, EvaluationError, RenderError } from '../src/core/errors.js';
import { RegexCache } from '../src/core/regex-cache.js';
import { createTemplateEngine } from '../src/platforms/template-engine.js';

describe('template engine', () => {
  const cache = new RegexCache(1);
  const engine = createTemplateEngine(cache);

  describe('expressions', () => {
    it('returns the evaluated value with its type', () => {
      expect(engine.compileExpression('item.count + 1').evaluate({ item: { count: 1 } })).toBe(2);
      expect(engine.compileExpression('item.tags').evaluate({ item: { tags: ['a'] } })).toEqual(['a']);
      expect(engine.compileExpression('item.title == "x"').evaluate({ item: { title: 'x' } })).toBe(true);
    });

    it('keeps its source', () => {
      expect(engine.compileExpression('item.id').source).toBe('item.id');
    });

    it('reports a missing value as undefined rather than failing', () => {
      expect(engine.compileExpression('item.nothing').evaluate({ item: {} })).toBeUndefined();
    });

    it('wraps runtime failures in EvaluationError', () => {
      const expression = engine.compileExpression('nope()');
      expect(() => expression.evaluate({})).toThrow(new EvaluationError('Failed to evaluate expression "nope()"'));
    });

    it('rejects syntax errors with ConfigError', () => {
      expect(() => engine.compileExpression('item.')).toThrow(ConfigError);
    });
  });

  describe('templates', () => {
    it('renders with autoescape off by default', () => {
      expect(engine.compileTemplate('t', '{{ html }}').render({ html: '<b>x</b>' })).toBe('<b>x</b>');
    });

    it('escapes output when autoescape is on', () => {
      const escaping = createTemplateEngine(cache, { autoescape: true });
      expect(escaping.compileTemplate('t', '{{ html }}').render({ html: '<b>x</b>' })).toBe('&lt;b&gt;x&lt;/b&gt;');
    });

    it('fails on undefined output', () => {
      const template = engine.compileTemplate('body', 'Hello {{ missing }}');
      expect(() => template.render({})).toThrow(new RenderError('Failed to render template "body"'));
    });

    it('prints null fields as empty text', () => {
      const template = engine.compileTemplate('itemSubject', '[status] {{ item.title }}{{ item.tags | join(",") }}');
      expect(template.render({ item: { title: null, tags: ['a', null] } })).toBe('[status] a,');
    });

    it('rejects syntax errors with ConfigError naming the template', () => {
      expect(() => engine.compileTemplate('digestBody', '{% for %}')).toThrow(/^Failed to compile template "digestBody": /);
    });
  });

  describe('filters', () => {
    it('matches regexes through the generation cache', () => {
      const local = new RegexCache(2);
      const withCache = createTemplateEngine(local);
      const expression = withCache.compileExpression('item.title | matches("^hello", "i")');

      expect(expression.evaluate({ item: { title: 'Hello there' } })).toBe(true);
      expect(expression.evaluate({ item: { title: 'Bye' } })).toBe(false);
      expect(expression.evaluate({ item: { title: null } })).toBe(false);
      expect(local.size).toBe(1);
    });

    it('formats dates as ISO on request and passes through unparseable values', () => {
      const template = engine.compileTemplate('t', '{{ a | datetimeformat("iso") }}|{{ b | datetimeformat }}');
      expect(template.render({ a: '2026-03-01T10:00:00Z', b: 'someday' })).toBe('2026-03-01T10:00:00.000Z|someday');
    });

    it('pluralizes counts and lists', () => {
      const template = engine.compileTemplate('t', 'entr{{ n | pluralize("y", "ies") }} item{{ list | pluralize }}');
      expect(template.render({ n: 1, list: [1, 2] })).toBe('entry items');
      expect(template.render({ n: 0, list: [1] })).toBe('entries item');
    });
  });
});
