/**
 * Escape a string to be safely inserted into HTML text or attribute contexts.
 *
 * Implementation detail: encodes `&`, `<`, `>`, `"` and `'` to ensure consistent,
 * attribute-safe output.
 *
 * @param str The string to escape.
 * @returns The escaped string.
 *
 * @example
 * ```ts
 * const unsafeString = '<script>alert("XSS")</script>';
 * const safeString = escapeHtml(unsafeString);
 * // safeString will be '&lt;script&gt;alert(&quot;XSS&quot;)&lt;/script&gt;'
 * ```
 */
export function escapeHtml (str: string): string {
  const map: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
  };
  return str.replace(/[&<>"']/g, (ch) => map[ch]);
}

/**
 * Strict escaper: every ASCII character that is not a letter or a digit becomes
 * a decimal numeric character reference. Non-ASCII characters pass through.
 *
 * @param str The string to escape.
 * @returns The escaped string.
 *
 * @example
 * ```ts
 * escapeHtmlNumeric('User 0'); // 'User&#32;0'
 * ```
 */
export function escapeHtmlNumeric (str: string): string {
  return str.replace(/[\x00-\x2f\x3a-\x40\x5b-\x60\x7b-\x7f]/g, (ch) => `&#${ch.charCodeAt(0)};`);
}
