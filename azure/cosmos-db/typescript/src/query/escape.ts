/**
 * JSON string escaping for query text embedded in a request body.
 */

const ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

/**
 * Escape text for embedding between the quotes of a JSON string. Control
 * characters without a short escape become `\u00XX`.
 */
export function escapeTextForJson(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/[\\"\u0000-\u001f]/g, (c) => {
    return ESCAPES[c] ?? `\\u${c.charCodeAt(0).toString(16).padStart(4, "0")}`;
  });
}

/**
 * Request body of a query: `{"query":"<escaped text>"}`.
 */
export function buildQueryBody(queryText: string): string {
  return `{"query":"${escapeTextForJson(queryText)}"}`;
}
