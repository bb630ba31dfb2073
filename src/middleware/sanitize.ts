/**
 * Feed content sanitization: feed HTML is untrusted input that ends up in
 * outgoing mail.
 *
 * 1. HTML fields are cleaned with DOMPurify (scripts, handlers, frames gone)
 * 2. Relative href/src attributes are resolved against the entry's base URL
 * 3. Plain-text fields get control characters stripped
 * 4. Filters match against text extracted from HTML, never raw markup
 */

import createDOMPurify from 'dompurify';
import { JSDOM } from 'jsdom';

const { window } = new JSDOM('');
const purify = createDOMPurify(window);

const URL_ATTRIBUTES = ['href', 'src'] as const;

// DOMPurify hooks are global; sanitizeHtml sets the base right before each
// synchronous sanitize call.
let currentBase: string | null = null;

function resolveUrl(value: string, base: string): string | null {
  try {
    return new URL(value, base).href;
  } catch {
    return null;
  }
}

purify.addHook('afterSanitizeAttributes', (node) => {
  if (!currentBase) return;
  for (const attr of URL_ATTRIBUTES) {
    const value = node.getAttribute(attr);
    if (!value) continue;
    const resolved = resolveUrl(value, currentBase);
    if (resolved) node.setAttribute(attr, resolved);
  }
});

/** Strip null bytes, zero-width characters and directional overrides. */
export function stripControlChars(text: string): string {
  return text
    .replace(/\0/g, '')
    .replace(/[\u200B-\u200F\uFEFF]/g, '')
    .replace(/[\u202A-\u202E\u2066-\u2069]/g, '')
    .replace(/[\u2028\u2029]/g, '\n');
}

function isAbsoluteUrl(value: string): boolean {
  return URL.canParse(value);
}

/**
 * Sanitize an HTML fragment. `baseUrl` (usually the entry or feed link) is
 * used to absolutize relative links and images; it is ignored when it is not
 * itself an absolute URL.
 */
export function sanitizeHtml(html: string, baseUrl?: string | null): string {
  currentBase = baseUrl && isAbsoluteUrl(baseUrl) ? baseUrl : null;
  try {
    return purify.sanitize(stripControlChars(html));
  } finally {
    currentBase = null;
  }
}

/** Plain text of an HTML fragment with whitespace collapsed. */
export function htmlToText(html: string): string {
  if (!/[<&]/.test(html)) return html.replace(/\s+/g, ' ').trim();
  const text = JSDOM.fragment(html).textContent ?? '';
  return text.replace(/\s+/g, ' ').trim();
}

/** Heuristic used for fields whose content type the feed does not declare. */
export function looksLikeHtml(text: string): boolean {
  return /<\/?[a-z][\s\S]*>/i.test(text) || /&(?:[a-z]+|#\d+|#x[0-9a-f]+);/i.test(text);
}
