/**
 * Property-Based Tests for Text Escaping
 */

import * as fc from 'fast-check';
import './propertyTestConfig';
import { TEXT_REPLACEMENTS, escapeText } from '../printer/services/escpos/TextEscaper';

describe('Text Escaper Property Tests', () => {
  it('replaces every entity token', () => {
    expect(escapeText('&#9;|&#x9;|&#10;|&#xA;')).toBe('\t|\t|\n|\n');
    expect(escapeText('&quot;hi&apos; &gt; &lt;')).toBe('"hi\' > <');
    expect(escapeText('a &amp; b')).toBe('a & b');
  });

  it('replaces &amp; last, so an escaped entity survives as text', () => {
    expect(escapeText('&amp;lt;')).toBe('&lt;');
    expect(escapeText('&amp;amp;')).toBe('&amp;');
  });

  it('leaves unknown entities untouched', () => {
    expect(escapeText('&nbsp; &#13; &copy;')).toBe('&nbsp; &#13; &copy;');
  });

  it('passes text without ampersands through unchanged', () => {
    fc.assert(
      fc.property(
        fc.string({ maxLength: 100 }).filter((s) => !s.includes('&')),
        (text) => {
          expect(escapeText(text)).toBe(text);
        }
      )
    );
  });

  it('replaces each token wherever it appears between plain text', () => {
    const plainArb = fc.string({ maxLength: 20 }).filter((s) => !s.includes('&'));
    fc.assert(
      fc.property(
        fc.array(fc.tuple(plainArb, fc.constantFrom(...TEXT_REPLACEMENTS)), { maxLength: 8 }),
        plainArb,
        (parts, tail) => {
          const input = parts.map(([plain, [token]]) => plain + token).join('') + tail;
          const expected = parts.map(([plain, [, replacement]]) => plain + replacement).join('') + tail;
          expect(escapeText(input)).toBe(expected);
        }
      )
    );
  });
});
