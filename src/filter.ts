/**
 * Swear Filter
 *
 * Decides whether a message contains one of a set of banned terms, however
 * it is disguised. Stages run cheapest and most precise first:
 *
 *   raw-variant  each whitespace token read through the glyph tables
 *   safe-word    allowlisted token in the cleaned text clears the message
 *   direct       cleaned token equals a banned term
 *   root-suffix  banned term inside a token with a short ending ("fucker")
 *   suffix-rule  inflection table, opt-in
 *   short-form   one-token abbreviations ("wtf", "fk")
 *   phonetic     sound-alike key contains a term's key
 *
 * Hits from the direct, root-suffix, suffix-rule and phonetic stages are
 * dropped when the context whitelist clears the term for that message.
 */

import { ResultCache } from './cache';
import { ContextWhitelist } from './context';
import { TextNormalizer } from './normalizer';
import { phoneticKey } from './phonetic';
import { compareGlyphs, getDefaultTables } from './substitutions';
import type { FilterStats, FilterVerdict, MatchSpan, SubstitutionTables, SwearFilterConfig } from './types';
import { DEFAULT_FILTER_CONFIG } from './types';
import { VariantExpander } from './variants';
import { DEFAULT_SAFE_WORDS } from './words';

// =============================================================================
// SHORT FORMS
// =============================================================================

export const SHORT_FORMS: ReadonlySet<string> = new Set([
  'fx', 'fk', 'sht', 'wtf', 'ffs', 'ngr', 'bch', 'cnt', 'dck',
  'fck', 'sh1', '5ht', 'vgn', 'prn', 'f4n', 'n1g', 'k3k', 'fku',
  'ass', 'fuk', 'fuc', 'fgs', 'wth', 'dmn', 'prk', 'twt',
]);

const SHORT_FORM_MAX_LENGTH = 3;
const LEETSPEAK_SYMBOLS = /[1378245609@#$+*]/g;

export function isShortForm(token: string): boolean {
  const lower = token.toLowerCase();
  if (lower.length <= SHORT_FORM_MAX_LENGTH && SHORT_FORMS.has(lower)) return true;

  const stripped = lower.replace(LEETSPEAK_SYMBOLS, '');
  return stripped.length <= SHORT_FORM_MAX_LENGTH && SHORT_FORMS.has(stripped);
}

// =============================================================================
// SUFFIX RULES (opt-in)
// =============================================================================

interface SuffixRule {
  suffix: string;
  minLength: number;
  exceptions: ReadonlySet<string>;
}

export const SUFFIX_RULES: readonly SuffixRule[] = [
  { suffix: 'ing', minLength: 4, exceptions: new Set(['ring', 'king', 'sing']) },
  { suffix: 'er', minLength: 3, exceptions: new Set(['her', 'per']) },
  { suffix: 'ed', minLength: 3, exceptions: new Set(['red', 'bed']) },
  { suffix: 'a', minLength: 4, exceptions: new Set(['banana']) },
  { suffix: 's', minLength: 3, exceptions: new Set(['is', 'as', 'us']) },
  { suffix: 'es', minLength: 4, exceptions: new Set(['yes', 'res', 'des']) },
];

export const COMMON_PREFIXES: readonly string[] = ['re', 'un', 'de', 'in', 'pre', 'pro'];

/**
 * Banned root of an inflected word ("fucking" → "fuck", "unfuck" → "fuck"),
 * or undefined when no rule applies.
 */
export function matchesSuffixRule(word: string, swearWords: ReadonlySet<string>): string | undefined {
  for (const { suffix, minLength, exceptions } of SUFFIX_RULES) {
    if (word.length < minLength || !word.endsWith(suffix) || exceptions.has(word)) continue;
    const root = word.slice(0, -suffix.length);
    if (swearWords.has(root)) return root;
  }

  for (const prefix of COMMON_PREFIXES) {
    if (!word.startsWith(prefix)) continue;
    const root = word.slice(prefix.length);
    if (swearWords.has(root)) return root;
  }

  return undefined;
}

// =============================================================================
// TERM PATTERNS
// =============================================================================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function longestFirst(a: string, b: string): number {
  const byLength = Array.from(b).length - Array.from(a).length;
  return byLength !== 0 ? byLength : compareGlyphs(a, b);
}

function alternation(glyphs: Iterable<string>): string {
  return Array.from(glyphs).sort(longestFirst).map(escapeRegExp).join('|');
}

/** Consecutive equal letters of `term` as [letter, count] pairs */
function letterRuns(term: string): Array<[string, number]> {
  const runs: Array<[string, number]> = [];
  for (const char of term) {
    const last = runs[runs.length - 1];
    if (last && last[0] === char) last[1] += 1;
    else runs.push([char, 1]);
  }
  return runs;
}

/**
 * Pattern that finds `term` as written in raw text: each letter may be any
 * of its glyphs, repeated, with punctuation or invisible characters between
 * letters ("F.u.c.k", "fuuuck", "ƒ-ü-c-k").
 *
 * Every letter is an atomic unit, `(?=(...))\N`, so a failed match never
 * backtracks into an earlier letter. A letter only repeats through glyphs
 * the next letter does not share, which leaves `*` in "f**k" for the
 * letters after it.
 */
export function compileTermPattern(term: string, tables: SubstitutionTables): RegExp {
  const glyphsByBase = new Map(tables.substitutions.map((entry) => [entry.base, entry.variants]));
  const glyphsOf = (char: string) => new Set([char, ...(glyphsByBase.get(char) ?? [])]);

  const runs = letterRuns(term);
  const units = runs.map(([char, count], index) => {
    const glyphs = glyphsOf(char);
    const next = runs[index + 1];
    const shared = next ? new Set(Array.from(glyphsOf(next[0]), (glyph) => glyph.toLowerCase())) : new Set<string>();
    const repeats = Array.from(glyphs).filter((glyph) => !shared.has(glyph.toLowerCase()));

    const letter = `(?:${alternation(glyphs)})`;
    let body = letter;
    if (count > 1) body += `(?:[\\W_]*?${letter}){${count - 1}}`;
    if (repeats.length > 0) body += `(?:[\\W_]*?(?:${alternation(repeats)}))*`;
    if (index > 0) body = `[\\W_]*?${body}`;
    return `(?=(${body}))\\${index + 1}`;
  });

  try {
    return new RegExp(`(?<!\\w)${units.join('')}(?!\\w)`, 'iu');
  } catch (error) {
    console.warn(`[filter] Could not compile pattern for "${term}", matching it literally:`, error);
    return new RegExp(escapeRegExp(term), 'i');
  }
}

// =============================================================================
// SWEAR FILTER CLASS
// =============================================================================

type ResolvedConfig = Omit<SwearFilterConfig, 'tables' | 'safeWords' | 'contextRules'>;

export class SwearFilter {
  private readonly config: ResolvedConfig;
  private readonly tables: SubstitutionTables;
  private readonly normalizer: TextNormalizer;
  private readonly expander: VariantExpander;
  private readonly whitelist: ContextWhitelist;
  private readonly cache: ResultCache;

  private readonly swearWords: ReadonlySet<string>;
  private readonly safeWords: ReadonlySet<string>;
  private readonly patterns = new Map<string, RegExp>();
  private readonly phoneticKeys = new Map<string, string>();

  private cacheHits = 0;
  private evaluations = 0;

  constructor(terms: Iterable<string>, config: Partial<SwearFilterConfig> = {}) {
    const { tables, safeWords, contextRules, ...settings } = config;
    this.config = { ...DEFAULT_FILTER_CONFIG, ...settings };

    this.tables = tables ?? getDefaultTables();
    this.normalizer = new TextNormalizer(this.tables);
    this.expander = new VariantExpander(this.tables);
    this.whitelist = new ContextWhitelist(contextRules);
    this.cache = new ResultCache(this.config.cacheMaxSize);

    this.swearWords = new Set(
      Array.from(terms, (term) => term.trim().toLowerCase()).filter((term) => term.length > 0),
    );

    // Stored cleaned so they compare equal to cleaned message tokens
    this.safeWords = new Set(
      Array.from(safeWords ?? DEFAULT_SAFE_WORDS, (word) => this.normalizer.preprocess(word))
        .filter((word) => word.length > 0),
    );

    for (const term of this.swearWords) {
      this.patterns.set(term, compileTermPattern(term, this.tables));
      this.phoneticKeys.set(term, phoneticKey(term, this.config.phoneticKeyLength, this.normalizer));
    }
  }

  get terms(): string[] {
    return Array.from(this.swearWords);
  }

  /**
   * Cached verdict for one message. Never rejects: an internal failure is
   * logged and reported as not blocked, and is not cached.
   */
  async containsBannedTerm(message: string): Promise<boolean> {
    const cached = this.cache.get(message);
    if (cached !== undefined) {
      this.cacheHits++;
      return cached;
    }

    let blocked: boolean;
    try {
      this.evaluations++;
      blocked = this.evaluate(message).blocked;
    } catch (error) {
      console.error('[filter] Evaluation failed, letting message through:', error);
      return false;
    }

    await this.cache.put(message, blocked);
    return blocked;
  }

  /**
   * Run messages one after another. Keys keep input order; a repeated
   * message keeps its first position.
   */
  async testBatch(messages: Iterable<string>): Promise<Map<string, boolean>> {
    const results = new Map<string, boolean>();
    for (const message of messages) {
      results.set(message, await this.containsBannedTerm(message));
    }
    return results;
  }

  /**
   * Uncached verdict with the deciding stage and, for blocked messages,
   * where the term sits in the original text.
   */
  inspect(message: string): FilterVerdict {
    const verdict = this.evaluate(message);
    if (verdict.blocked && verdict.term !== undefined) {
      const span = this.locate(message, verdict.term);
      if (span) return { ...verdict, span };
    }
    return verdict;
  }

  /** First occurrence of `term` in the raw message, glyphs and padding included */
  locate(message: string, term: string): MatchSpan | undefined {
    const key = term.trim().toLowerCase();
    const pattern = this.patterns.get(key) ?? compileTermPattern(key, this.tables);
    const match = pattern.exec(message);
    if (!match) return undefined;
    return { start: match.index, end: match.index + match[0].length, original: match[0] };
  }

  getStats(): FilterStats {
    return {
      cacheHits: this.cacheHits,
      evaluations: this.evaluations,
      cacheSize: this.cache.size,
    };
  }

  // ===========================================================================
  // PIPELINE
  // ===========================================================================

  private evaluate(message: string): FilterVerdict {
    if (!message || this.swearWords.size === 0) {
      return { blocked: false, stage: 'empty' };
    }

    const rawHit = this.findRawVariant(message);
    if (rawHit) return { blocked: true, stage: 'raw-variant', ...rawHit };

    const normalized = this.normalizer.preprocess(message);
    const tokens = normalized.match(/\w+/g) ?? [];

    for (const token of tokens) {
      if (this.safeWords.has(token) && !this.swearWords.has(token)) {
        return { blocked: false, stage: 'safe-word', term: token, token, normalized };
      }
    }

    for (const token of tokens) {
      if (this.swearWords.has(token) && !this.whitelist.isWhitelisted(message, token)) {
        return { blocked: true, stage: 'direct', term: token, token, normalized };
      }
    }

    const rootHit = this.findRootWithSuffix(message, tokens);
    if (rootHit) return { blocked: true, stage: 'root-suffix', ...rootHit, normalized };

    if (this.config.useSuffixRules) {
      for (const token of tokens) {
        const root = matchesSuffixRule(token, this.swearWords);
        if (root !== undefined && !this.whitelist.isWhitelisted(message, root)) {
          return { blocked: true, stage: 'suffix-rule', term: root, token, normalized };
        }
      }
    }

    if (tokens.length === 1 && isShortForm(tokens[0])) {
      return { blocked: true, stage: 'short-form', term: tokens[0], token: tokens[0], normalized };
    }

    const messageKey = phoneticKey(normalized, this.config.phoneticKeyLength, this.normalizer);
    for (const [term, termKey] of this.phoneticKeys) {
      if (termKey && messageKey.includes(termKey) && !this.whitelist.isWhitelisted(message, term)) {
        return { blocked: true, stage: 'phonetic', term, token: messageKey, normalized };
      }
    }

    return { blocked: false, stage: 'none', normalized };
  }

  private findRawVariant(message: string): { term: string; token: string } | undefined {
    const tokens = message.split(/\s+/).filter((token) => token.length > 0);
    for (const token of tokens) {
      for (const term of this.swearWords) {
        if (this.expander.includes(token, term, this.config.maxVariants)) {
          return { term, token };
        }
      }
    }
    return undefined;
  }

  private findRootWithSuffix(message: string, tokens: string[]): { term: string; token: string } | undefined {
    const { minRootLength, maxSuffixLength, maxVariants } = this.config;

    for (const token of tokens) {
      for (const term of this.swearWords) {
        if (term.length < minRootLength) continue;

        for (let start = 0; start + term.length <= token.length; start++) {
          const segment = token.slice(start, start + term.length);
          if (!this.expander.includes(segment, term, maxVariants)) continue;

          const suffixLength = token.length - (start + term.length);
          if (suffixLength <= maxSuffixLength && !this.whitelist.isWhitelisted(message, term)) {
            return { term, token };
          }
        }
      }
    }
    return undefined;
  }
}
