/**
 * Phonetic Folder
 *
 * Coarse sound-alike key used as the last matching stage. Catches
 * misspellings and transpositions ("fukc", "phuck") at the price of
 * precision, which is why its hits still go through the context whitelist.
 */

import { normalizer, TextNormalizer } from './normalizer';

export const DEFAULT_PHONETIC_KEY_LENGTH = 8;

type Rewrite = [pattern: RegExp, replacement: string];

// Order matters: later rules see the output of earlier ones
const REWRITES: Rewrite[] = [
  [/[^a-z]/g, ''],
  [/([aeiou])h/g, '$1'],          // vowel + h
  [/gh(?=[iey])/g, ''],           // silent gh
  [/ck/g, 'k'],
  [/c(?!e|i|y)/g, 'k'],           // hard c
  [/ph/g, 'f'],
  [/qu/g, 'kw'],
  [/x/g, 'ks'],
  [/(\w)\1+/g, '$1'],
  [/sch/g, 'sk'],
  [/th/g, 't'],
  [/^kn/, 'n'],
  [/^gn/, 'n'],
  [/^pn/, 'n'],
  [/^wr/, 'r'],
  [/mb$/, 'm'],
  [/([^s]|^)c(?=[iey])/g, '$1s'], // soft c, except after s
  [/([^f]|^)gh/g, '$1g'],
  [/([^t]|^)ch/g, '$1k'],
];

/**
 * Phonetic key of `text`. Glyphs are folded to their canonical letters
 * first, so "phvck" and "phuck" share a key. From four letters up the
 * middle is sorted, making the key blind to transposed inner letters.
 */
export function phoneticKey(
  text: string,
  maxLength: number = DEFAULT_PHONETIC_KEY_LENGTH,
  textNormalizer: TextNormalizer = normalizer,
): string {
  if (!text) return '';

  let key = textNormalizer.foldToBase(text.toLowerCase());
  for (const [pattern, replacement] of REWRITES) {
    key = key.replace(pattern, replacement);
  }

  if (key.length >= 4) {
    const middle = key.slice(1, -1).split('').sort().join('');
    key = key[0] + middle + key[key.length - 1];
  }

  return key.slice(0, Math.max(0, maxLength));
}
