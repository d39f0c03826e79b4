/**
 * Variant Expander
 *
 * Enumerates every reading of an obfuscated token: each glyph is replaced
 * by each canonical character it may stand for ("$h!t" → "shit", "sh1t",
 * ...). The product grows exponentially with token length, so enumeration
 * is capped and best-effort.
 */

import { compareGlyphs, getDefaultTables } from './substitutions';
import type { SubstitutionTables } from './types';
import { DEFAULT_FILTER_CONFIG } from './types';

export class VariantExpander {
  private readonly tables: SubstitutionTables;
  private readonly optionCache = new Map<string, readonly string[]>();

  constructor(tables: SubstitutionTables = getDefaultTables()) {
    this.tables = tables;
  }

  /**
   * Readings of one code point, shortest then lowest first. A glyph with no
   * table entry only reads as itself.
   */
  options(char: string): readonly string[] {
    let cached = this.optionCache.get(char);
    if (!cached) {
      const bases = this.tables.reverseSubstitutions.get(char);
      cached = bases ? Object.freeze(Array.from(bases).sort(compareGlyphs)) : Object.freeze([char]);
      this.optionCache.set(char, cached);
    }
    return cached;
  }

  /**
   * Lazy cartesian product, rightmost position varying fastest.
   * An empty token has exactly one reading: the empty string.
   */
  *iterate(token: string): Generator<string> {
    const positions = Array.from(token).map((char) => this.options(char));
    const indices = new Array<number>(positions.length).fill(0);

    for (;;) {
      yield positions.map((choices, i) => choices[indices[i]]).join('');

      let cursor = positions.length - 1;
      while (cursor >= 0) {
        indices[cursor]++;
        if (indices[cursor] < positions[cursor].length) break;
        indices[cursor] = 0;
        cursor--;
      }
      if (cursor < 0) return;
    }
  }

  expand(token: string, limit: number = DEFAULT_FILTER_CONFIG.maxVariants): Set<string> {
    const variants = new Set<string>();
    if (limit <= 0) return variants;

    for (const variant of this.iterate(token)) {
      variants.add(variant);
      if (variants.size >= limit) break;
    }
    return variants;
  }

  /**
   * Same answer as `expand(token, limit).has(target)` without building the
   * set: the target's position in the enumeration order is computed directly
   * and compared with the limit.
   */
  includes(token: string, target: string, limit: number = DEFAULT_FILTER_CONFIG.maxVariants): boolean {
    const chars = Array.from(token);
    const wanted = Array.from(target);
    if (chars.length !== wanted.length || limit <= 0) return false;

    let rank = 0;
    let weight = 1;
    for (let i = chars.length - 1; i >= 0; i--) {
      const choices = this.options(chars[i]);
      const index = choices.indexOf(wanted[i]);
      if (index < 0) return false;

      rank += index * weight;
      if (rank >= limit) return false;
      weight = Math.min(weight * choices.length, limit);
    }
    return true;
  }
}

let defaultExpander: VariantExpander | undefined;

function getDefaultExpander(): VariantExpander {
  if (!defaultExpander) {
    defaultExpander = new VariantExpander();
  }
  return defaultExpander;
}

export function expandVariants(token: string, cap: number = DEFAULT_FILTER_CONFIG.maxVariants): Set<string> {
  return getDefaultExpander().expand(token, cap);
}

export function iterateVariants(token: string): Generator<string> {
  return getDefaultExpander().iterate(token);
}
