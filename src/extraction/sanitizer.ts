/**
 * Strips null code points from raw response text before JSON decoding.
 *
 * Some upstream sources emit U+0000 inside otherwise valid JSON, either as
 * the escape text `\u0000` or as a raw NUL character. `JSON.parse` rejects
 * the raw character in strings and downstream writers reject the escaped
 * one, so both go before decoding. Nothing else is touched.
 */

const ESCAPED_NULL = '\\u0000';
const LITERAL_NULL = '\u0000';

export interface SanitizeResult {
  text: string;
  /** Number of escaped and literal null instances removed */
  removed: number;
}

function removeAll(text: string, needle: string): { text: string; count: number } {
  const parts = text.split(needle);
  return { text: parts.join(''), count: parts.length - 1 };
}

/**
 * Remove every null instance and report how many were removed.
 *
 * A removal can splice a new instance together (`\u\u00000000` becomes
 * `\u0000`), so passes repeat until the text is a fixed point.
 */
export function sanitizeWithReport(raw: string): SanitizeResult {
  let text = raw;
  let removed = 0;

  while (text.includes(ESCAPED_NULL) || text.includes(LITERAL_NULL)) {
    const escaped = removeAll(text, ESCAPED_NULL);
    const literal = removeAll(escaped.text, LITERAL_NULL);
    text = literal.text;
    removed += escaped.count + literal.count;
  }

  return { text, removed };
}

export function sanitize(raw: string): string {
  return sanitizeWithReport(raw).text;
}
