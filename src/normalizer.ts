/**
 * Text Normalizer
 *
 * Undoes the common obfuscation tricks before matching:
 * - Zero-width and other invisible separators (f<ZWSP>uck)
 * - Compatibility forms (ｆｕｃｋ, superscripts) via NFKC
 * - Cyrillic/Greek lookalikes (Cyrillic а → Latin a)
 * - Stretched letters (fuuuuck)
 * - Spacing tricks (f u c k)
 * - Punctuation padding (f.u.c.k, sh!t)
 */

import { getDefaultTables } from './substitutions';
import type { NormalizationChange, SubstitutionTables } from './types';

// =============================================================================
// ZERO-WIDTH AND INVISIBLE CHARACTERS
// =============================================================================

export const HIDDEN_SEPARATORS = [
  '\u200B', // Zero-width space
  '\u200C', // Zero-width non-joiner
  '\u200D', // Zero-width joiner
  '\u200E', // Left-to-right mark
  '\u200F', // Right-to-left mark
  '\u2060', // Word joiner
  '\u2061', // Function application
  '\u2062', // Invisible times
  '\u2063', // Invisible separator
  '\u2064', // Invisible plus
  '\uFEFF', // BOM / Zero-width no-break space
  '\u00AD', // Soft hyphen
  '\u034F', // Combining grapheme joiner
  '\u061C', // Arabic letter mark
  '\u115F', // Hangul choseong filler
  '\u1160', // Hangul jungseong filler
  '\u17B4', // Khmer vowel inherent aq
  '\u17B5', // Khmer vowel inherent aa
  '\u180E', // Mongolian vowel separator
  '\u2028', // Line separator
  '\u2029', // Paragraph separator
  '\u3164', // Hangul filler
  '\uFFA0', // Halfwidth hangul filler
];

const HIDDEN_CLASS = HIDDEN_SEPARATORS
  .map((char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`)
  .join('');

const HIDDEN_SEPARATOR_REGEX = new RegExp(`[${HIDDEN_CLASS}]`, 'g');
const HAS_HIDDEN_SEPARATOR = new RegExp(`[${HIDDEN_CLASS}]`);

// =============================================================================
// TEXT FOLDING STEPS
// =============================================================================

/** "heeellooo" → "helo". Lossy: legitimate double letters go too. */
export function squashRepeats(text: string): string {
  return text.replace(/(.)\1+/gsu, '$1');
}

/** "f u c k" → "fuck"; needs at least three single letters in a row */
export function collapseSpacedLetters(text: string): string {
  return text.replace(/\b(?:[a-z]\s+){2,}[a-z]\b/gi, (match) => match.replace(/\s+/g, ''));
}

export function stripNonAlphanumeric(text: string): string {
  return text.replace(/[^a-zA-Z0-9\s]/g, '');
}

// =============================================================================
// MAIN NORMALIZER CLASS
// =============================================================================

export class TextNormalizer {
  private readonly tables: SubstitutionTables;
  private readonly multiCharGlyphs: string[];

  constructor(tables: SubstitutionTables = getDefaultTables()) {
    this.tables = tables;
    this.multiCharGlyphs = Array.from(tables.normalizationMap.keys())
      .filter((glyph) => Array.from(glyph).length > 1)
      .sort((a, b) => Array.from(b).length - Array.from(a).length);
  }

  /**
   * Full cleanup pipeline. The steps run in a fixed order and the whole
   * pipeline repeats until the text stops changing: stripping punctuation
   * or lowercasing can line up new repeats ("a!a", "Aa") or new spaced
   * letters, and a second pass must not find more to do.
   */
  preprocess(text: string): string {
    let current = this.preprocessOnce(text);
    for (;;) {
      const next = this.preprocessOnce(current);
      if (next === current) return current;
      current = next;
    }
  }

  private preprocessOnce(text: string): string {
    let result = this.removeHiddenSeparators(text);
    result = result.normalize('NFKC');
    result = this.foldHomoglyphs(result);
    result = squashRepeats(result);
    result = collapseSpacedLetters(result);
    result = stripNonAlphanumeric(result);
    return result.toLowerCase().trim();
  }

  removeHiddenSeparators(text: string): string {
    return text.replace(HIDDEN_SEPARATOR_REGEX, '');
  }

  /**
   * Convert cross-script lookalikes to Latin
   */
  foldHomoglyphs(text: string): string {
    let result = '';
    for (const char of text) {
      result += this.tables.homoglyphs.get(char) ?? char;
    }
    return result;
  }

  /**
   * Replace every registered glyph with its canonical character, multi-char
   * glyphs ("|)", "vv") first. Canonicals that are themselves glyphs are
   * followed: 𝟎 → 0 → o.
   */
  foldToBase(text: string): string {
    let result = text;
    for (const glyph of this.multiCharGlyphs) {
      if (result.includes(glyph)) {
        result = result.split(glyph).join(this.canonicalOf(glyph));
      }
    }

    let folded = '';
    for (const char of result) {
      folded += this.canonicalOf(char);
    }
    return folded;
  }

  private canonicalOf(glyph: string): string {
    const map = this.tables.normalizationMap;
    const seen = new Set<string>([glyph]);
    let current = glyph;
    let next = map.get(current);
    while (next !== undefined && !seen.has(next)) {
      seen.add(next);
      current = next;
      next = map.get(current);
    }
    return current;
  }

  /**
   * Which characters the normalization map would rewrite, by code-point position
   */
  debugNormalization(text: string): NormalizationChange[] {
    const changes: NormalizationChange[] = [];
    Array.from(text).forEach((char, position) => {
      const normalized = this.tables.normalizationMap.get(char);
      if (normalized !== undefined && normalized !== char) {
        changes.push({
          position,
          original: char,
          normalized,
          codePoint: `U+${(char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0')}`,
        });
      }
    });
    return changes;
  }

  /**
   * Check if text contains obfuscation
   */
  hasObfuscation(text: string): boolean {
    if (HAS_HIDDEN_SEPARATOR.test(text)) return true;

    for (const char of text) {
      if (this.tables.homoglyphs.has(char)) return true;
      if (char.charCodeAt(0) > 0x7f && this.tables.normalizationMap.has(char)) return true;
    }

    // Leetspeak inside a word
    if (/[a-z][0-9@$!|+*][a-z]/i.test(text)) return true;

    // Spaced-out words
    if (/\b[a-z]\s+[a-z]\s+[a-z]\b/i.test(text)) return true;

    return false;
  }
}

// Export singleton for convenience
export const normalizer = new TextNormalizer();

export function preprocess(text: string): string {
  return normalizer.preprocess(text);
}
