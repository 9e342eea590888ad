/**
 * Text Escaper
 *
 * Rewrites the entity tokens that markup-based print templates use for
 * control and reserved characters.
 *
 * @module printer/services/escpos/TextEscaper
 */

/**
 * Entity replacements, applied in order. `&amp;` must stay last so that
 * `&amp;lt;` decodes to `&lt;` and not to `<`.
 */
export const TEXT_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  // horizontal tab
  ['&#9;', '\t'],
  ['&#x9;', '\t'],
  // linefeed
  ['&#10;', '\n'],
  ['&#xA;', '\n'],
  // markup
  ['&apos;', "'"],
  ['&quot;', '"'],
  ['&gt;', '>'],
  ['&lt;', '<'],
  ['&amp;', '&'],
];

/**
 * Replace every known entity token in `text`
 */
export function escapeText(text: string): string {
  let result = text;
  for (const [token, replacement] of TEXT_REPLACEMENTS) {
    result = result.split(token).join(replacement);
  }
  return result;
}
