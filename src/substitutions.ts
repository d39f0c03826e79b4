/**
 * Substitution Tables
 *
 * Glyph data for leetspeak digits and symbols, accented letters, enclosed,
 * fullwidth and mathematical alphanumerics, plus the cross-script homoglyph
 * table. Loaded from data/ once per process and shared read-only.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SubstitutionEntry, SubstitutionTables } from './types';

const DATA_DIR = path.join(__dirname, '..', 'data');

export const SUBSTITUTIONS_PATH = path.join(DATA_DIR, 'substitutions.json');
export const HOMOGLYPHS_PATH = path.join(DATA_DIR, 'homoglyphs.json');

// =============================================================================
// ORDERING
// =============================================================================

/**
 * Shorter glyphs first, then by code point. Lengths count code points so
 * that astral letters (𝐚, 🅰) sort with the other single characters.
 */
export function compareGlyphs(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  if (left.length !== right.length) {
    return left.length - right.length;
  }
  for (let i = 0; i < left.length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSingleCodePoint(value: string): boolean {
  return Array.from(value).length === 1;
}

// =============================================================================
// BUILDERS
// =============================================================================

/**
 * Validate raw table data. Entries with a bad base or no usable variants are
 * skipped with a warning; a repeated base is merged into its first entry.
 */
export function buildSubstitutionTable(raw: unknown): SubstitutionEntry[] {
  if (!Array.isArray(raw)) {
    console.warn('[substitutions] Table data is not an array, using an empty table');
    return [];
  }

  const order: string[] = [];
  const variantsByBase = new Map<string, Set<string>>();

  raw.forEach((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.base !== 'string' || !Array.isArray(entry.variants)) {
      console.warn(`[substitutions] Skipping malformed entry #${index}`);
      return;
    }

    const base = entry.base.toLowerCase();
    if (!isSingleCodePoint(base)) {
      console.warn(`[substitutions] Skipping entry #${index}: base "${entry.base}" is not a single character`);
      return;
    }

    const variants = entry.variants.filter(
      (variant: unknown): variant is string => typeof variant === 'string' && variant.length > 0,
    );
    if (variants.length < entry.variants.length) {
      console.warn(`[substitutions] Dropped ${entry.variants.length - variants.length} invalid variant(s) for "${base}"`);
    }
    if (variants.length === 0) {
      console.warn(`[substitutions] Skipping "${base}": no variants`);
      return;
    }

    let known = variantsByBase.get(base);
    if (!known) {
      known = new Set();
      variantsByBase.set(base, known);
      order.push(base);
    }
    for (const variant of variants) known.add(variant);
  });

  return order.map((base) => ({
    base,
    variants: Object.freeze(Array.from(variantsByBase.get(base) ?? []).sort(compareGlyphs)),
  }));
}

function caseForms(glyph: string): Set<string> {
  return new Set([glyph, glyph.toLowerCase(), glyph.toUpperCase()]);
}

/** glyph → canonical; the first base a glyph is registered under wins */
export function buildNormalizationMap(entries: readonly SubstitutionEntry[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const { base, variants } of entries) {
    for (const variant of variants) {
      for (const form of caseForms(variant)) {
        if (!map.has(form)) map.set(form, base);
      }
    }
  }
  return map;
}

/** glyph → every canonical it may stand for */
export function buildReverseSubstitutions(
  entries: readonly SubstitutionEntry[],
): Map<string, Set<string>> {
  const reverse = new Map<string, Set<string>>();
  for (const { base, variants } of entries) {
    for (const variant of variants) {
      for (const form of caseForms(variant)) {
        let bases = reverse.get(form);
        if (!bases) {
          bases = new Set();
          reverse.set(form, bases);
        }
        bases.add(base);
      }
    }
  }
  return reverse;
}

export function buildHomoglyphMap(raw: unknown): Map<string, string> {
  const map = new Map<string, string>();
  if (!isRecord(raw)) {
    console.warn('[substitutions] Homoglyph data is not an object, using an empty table');
    return map;
  }
  for (const [glyph, latin] of Object.entries(raw)) {
    if (typeof latin !== 'string' || !isSingleCodePoint(glyph) || !/^[a-z]$/i.test(latin)) {
      console.warn(`[substitutions] Skipping homoglyph "${glyph}"`);
      continue;
    }
    map.set(glyph, latin.toLowerCase());
  }
  return map;
}

// =============================================================================
// TABLES
// =============================================================================

export function createSubstitutionTables(
  substitutionData: unknown,
  homoglyphData: unknown,
): SubstitutionTables {
  const substitutions = Object.freeze(buildSubstitutionTable(substitutionData));
  return Object.freeze({
    substitutions,
    normalizationMap: buildNormalizationMap(substitutions),
    reverseSubstitutions: buildReverseSubstitutions(substitutions),
    homoglyphs: buildHomoglyphMap(homoglyphData),
  });
}

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

export function loadSubstitutionTables(
  substitutionsPath: string = SUBSTITUTIONS_PATH,
  homoglyphsPath: string = HOMOGLYPHS_PATH,
): SubstitutionTables {
  return createSubstitutionTables(readJson(substitutionsPath), readJson(homoglyphsPath));
}

let defaultTables: SubstitutionTables | undefined;

/** Process-wide tables, loaded on first use */
export function getDefaultTables(): SubstitutionTables {
  if (!defaultTables) {
    defaultTables = loadSubstitutionTables();
  }
  return defaultTables;
}
