/**
 * Word Lists
 *
 * Parsing of operator-supplied term lists and loading of the safe-word
 * allowlist (built-in place names and anatomy terms, optionally extended
 * from a newline-delimited dictionary file).
 */

import * as fs from 'fs';
import * as path from 'path';

export const SAFE_WORDS_PATH = path.join(__dirname, '..', 'data', 'safe-words.json');

/** Dictionary entries this much longer than a banned prefix are treated as its inflections */
const VARIANT_SLACK = 3;

function readBuiltInSafeWords(): string[] {
  const raw: unknown = JSON.parse(fs.readFileSync(SAFE_WORDS_PATH, 'utf-8'));
  if (!Array.isArray(raw)) {
    console.warn('[words] Built-in safe-word data is not an array, ignoring it');
    return [];
  }
  return raw
    .filter((word: unknown): word is string => typeof word === 'string')
    .map((word) => word.trim().toLowerCase())
    .filter((word) => word.length > 0);
}

export const DEFAULT_SAFE_WORDS: readonly string[] = Object.freeze(readBuiltInSafeWords());

/**
 * "Fuck, SHIT  damn,fuck" → ["fuck", "shit", "damn"]
 *
 * Commas and whitespace both separate; anything other than ASCII letters
 * and digits is dropped; first occurrence wins.
 */
export function splitWords(input: string): string[] {
  const cleaned = input.toLowerCase().replace(/[^a-z0-9,\s]/g, '');
  const words = cleaned.split(/[,\s]+/).filter((word) => word.length > 0);
  return Array.from(new Set(words));
}

function isBannedVariant(word: string, swearWords: ReadonlySet<string>): boolean {
  for (const swear of swearWords) {
    if (word.startsWith(swear) && word.length - swear.length <= VARIANT_SLACK) {
      return true;
    }
  }
  return false;
}

/**
 * Built-in safe words plus a dictionary file, if one is given. Dictionary
 * words that are banned terms, or a banned term with a short ending
 * ("fucks", "shitty"), are left out.
 */
export function loadSafeWords(swearWords: Iterable<string> = [], filePath?: string): Set<string> {
  const safeWords = new Set(DEFAULT_SAFE_WORDS);
  if (filePath === undefined) return safeWords;

  if (!fs.existsSync(filePath)) {
    console.warn(`[words] Safe-word list "${filePath}" not found, using the built-in list only`);
    return safeWords;
  }

  const banned = new Set(Array.from(swearWords, (word) => word.trim().toLowerCase()).filter(Boolean));

  try {
    const lines = fs.readFileSync(filePath, 'latin1').split(/\r?\n/);
    for (const line of lines) {
      const word = line.trim().toLowerCase();
      if (!word || banned.has(word) || isBannedVariant(word, banned)) continue;
      safeWords.add(word);
    }
  } catch (error) {
    console.error(`[words] Failed to read safe-word list "${filePath}":`, error);
  }

  return safeWords;
}
