/**
 * Environment Configuration
 *
 *   SWEAR_FILTER_CACHE_SIZE       cached verdicts per filter (integer >= 0)
 *   SWEAR_FILTER_MAX_VARIANTS     expansion cap (integer >= 1)
 *   SWEAR_FILTER_SUFFIX_RULES     "true"/"false", enables the suffix-rule stage
 *   SWEAR_FILTER_SAFE_WORDS_PATH  newline-delimited dictionary merged into the safe words
 *
 * Unset variables keep their defaults; unparseable ones warn and keep them too.
 */

import type { SwearFilterConfig } from './types';
import { DEFAULT_FILTER_CONFIG } from './types';
import { loadSafeWords } from './words';

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.warn(`[config] Ignoring ${name}="${raw}": expected an integer >= ${min}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;

  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;

  console.warn(`[config] Ignoring ${name}="${raw}": expected true or false, using ${fallback}`);
  return fallback;
}

/**
 * Filter settings from environment variables. `swearWords` is needed only
 * to keep banned terms and their inflections out of a dictionary file.
 */
export function loadConfigFromEnv(
  env: Env = process.env,
  swearWords: Iterable<string> = [],
): Partial<SwearFilterConfig> {
  const config: Partial<SwearFilterConfig> = {
    cacheMaxSize: readInteger(env, 'SWEAR_FILTER_CACHE_SIZE', DEFAULT_FILTER_CONFIG.cacheMaxSize, 0),
    maxVariants: readInteger(env, 'SWEAR_FILTER_MAX_VARIANTS', DEFAULT_FILTER_CONFIG.maxVariants, 1),
    useSuffixRules: readBoolean(env, 'SWEAR_FILTER_SUFFIX_RULES', DEFAULT_FILTER_CONFIG.useSuffixRules),
  };

  const safeWordsPath = env.SWEAR_FILTER_SAFE_WORDS_PATH?.trim();
  if (safeWordsPath) {
    config.safeWords = loadSafeWords(swearWords, safeWordsPath);
  }

  return config;
}
