// =============================================================================
// SUBSTITUTION TABLES
// =============================================================================

/** One canonical character and every glyph that can impersonate it */
export interface SubstitutionEntry {
  base: string;
  /** De-duplicated, sorted by code-point length then code point */
  variants: readonly string[];
}

/**
 * Immutable lookup tables shared by every filter in the process.
 *
 * `substitutions` is iterated in its array order when deriving
 * `normalizationMap`, so a glyph listed under two bases resolves to the
 * base that comes first (`*` → a, `v` → u, `1` → i).
 */
export interface SubstitutionTables {
  readonly substitutions: readonly SubstitutionEntry[];
  readonly normalizationMap: ReadonlyMap<string, string>;
  readonly reverseSubstitutions: ReadonlyMap<string, ReadonlySet<string>>;
  readonly homoglyphs: ReadonlyMap<string, string>;
}

// =============================================================================
// CONTEXT RULES
// =============================================================================

export interface ContextRule {
  /** Tested in order against the original message */
  patterns: RegExp[];
  /** Wall-clock budget for the whole scan of this term */
  timeoutMs: number;
}

export type ContextRules = Record<string, ContextRule>;

// =============================================================================
// VERDICTS
// =============================================================================

export const MATCH_STAGES = [
  'empty',
  'raw-variant',
  'safe-word',
  'direct',
  'root-suffix',
  'suffix-rule',
  'short-form',
  'phonetic',
  'none',
] as const;

export type MatchStage = typeof MATCH_STAGES[number];

export interface MatchSpan {
  start: number;           // Start index in original text
  end: number;             // End index in original text
  original: string;        // Original text as written
}

export interface FilterVerdict {
  blocked: boolean;

  /** Stage that decided; 'none' when every stage passed */
  stage: MatchStage;

  /** Banned term that matched (or the safe word that vetoed) */
  term?: string;

  /** Token the decision was made on */
  token?: string;

  /** Preprocessed message, once the pipeline got that far */
  normalized?: string;

  /** Where the term's pattern sits in the original text, if it can be found */
  span?: MatchSpan;
}

export interface FilterStats {
  cacheHits: number;
  evaluations: number;
  cacheSize: number;
}

export interface NormalizationChange {
  position: number;
  original: string;
  normalized: string;
  codePoint: string;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface SwearFilterConfig {
  /** Maximum cached verdicts per filter instance */
  cacheMaxSize: number;

  /** Cap on strings produced by one variant expansion */
  maxVariants: number;

  /** Banned terms shorter than this skip the root+suffix stage */
  minRootLength: number;

  /** Characters allowed after a banned root inside one token */
  maxSuffixLength: number;

  /** Length phonetic keys are truncated to */
  phoneticKeyLength: number;

  /** Run the suffix/prefix rule table as an extra stage */
  useSuffixRules: boolean;

  /** Allowlist; built-in list when omitted */
  safeWords?: Iterable<string>;

  /** Extra or replacement whitelist rules, merged over the built-in ones */
  contextRules?: ContextRules;

  /** Shared tables; the process-wide defaults when omitted */
  tables?: SubstitutionTables;
}

export const DEFAULT_FILTER_CONFIG: SwearFilterConfig = {
  cacheMaxSize: 1000,
  maxVariants: 50_000,
  minRootLength: 3,
  maxSuffixLength: 3,
  phoneticKeyLength: 8,
  useSuffixRules: false,
};
