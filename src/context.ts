/**
 * Context Whitelist
 *
 * Some banned terms are also the start or the middle of everyday words
 * ("assignment", "cocktail", "hello", "country"). When a term has a rule
 * set here, a hit on any of its patterns in the original message clears
 * that term for the message.
 */

import type { ContextRule, ContextRules } from './types';

export const DEFAULT_RULE_TIMEOUT_MS = 1000;

// =============================================================================
// DEFAULT RULES
// =============================================================================

export const DEFAULT_CONTEXT_RULES: ContextRules = {
  cunt: {
    patterns: [
      /\bcunt(?:ry|ries|ing|ed|ious|ure|ship)\b/i,
      /\b(?:dis|re)cunt\b/i,
      /\bcount\b/i,
      /\baccount\b/i,
    ],
    timeoutMs: DEFAULT_RULE_TIMEOUT_MS,
  },
  ass: {
    patterns: [
      /\bass\s*(?:ignment|essment|ociation|embly|ets|ist|uming|ert)/i,
      /\b(?:cl|gr|m|p)ass\b/i,
      /\b(?:embr|harr)ass/i,
    ],
    timeoutMs: DEFAULT_RULE_TIMEOUT_MS,
  },
  cock: {
    patterns: [
      /\bcock(?:tail|atoo|pit|roach)/i,
      /\bpea(?:cock)\b/i,
      /\bhancock\b/i,
      /\bshuttle(?:cock)\b/i,
    ],
    timeoutMs: DEFAULT_RULE_TIMEOUT_MS,
  },
  hell: {
    patterns: [
      /\bhell(?:o|icopter|met|ium|enic)/i,
      /\bshell\b/i,
      /\bothello\b/i,
    ],
    timeoutMs: DEFAULT_RULE_TIMEOUT_MS,
  },
};

/** Milliseconds from an arbitrary origin */
export type Clock = () => number;

// =============================================================================
// CONTEXT WHITELIST CLASS
// =============================================================================

export class ContextWhitelist {
  private readonly rules: ReadonlyMap<string, ContextRule>;
  private readonly now: Clock;

  /**
   * @param rules - merged over the defaults; a term listed here replaces the default rule set
   * @param now - time source for the per-term budget
   */
  constructor(rules: ContextRules = {}, now: Clock = () => performance.now()) {
    const merged = { ...DEFAULT_CONTEXT_RULES, ...rules };
    this.rules = new Map(Object.entries(merged).map(([term, rule]) => [term.toLowerCase(), rule]));
    this.now = now;
  }

  has(term: string): boolean {
    return this.rules.has(term.toLowerCase());
  }

  /**
   * True when one of the term's patterns matches the message. Patterns are
   * tried in order; once the term's budget is spent the scan stops with what
   * it has so far.
   */
  isWhitelisted(message: string, term: string): boolean {
    const rule = this.rules.get(term.toLowerCase());
    if (!rule) return false;

    const startedAt = this.now();
    for (const pattern of rule.patterns) {
      // Stateful global/sticky patterns would otherwise resume mid-string
      pattern.lastIndex = 0;
      if (pattern.test(message)) return true;
      if (this.now() - startedAt > rule.timeoutMs) break;
    }
    return false;
  }
}

// Export singleton for convenience
export const contextWhitelist = new ContextWhitelist();

export function isWhitelisted(message: string, term: string): boolean {
  return contextWhitelist.isWhitelisted(message, term);
}
