export { SwearFilter, SHORT_FORMS, SUFFIX_RULES, COMMON_PREFIXES, isShortForm, matchesSuffixRule, compileTermPattern } from "./filter";
export { FilterRegistry } from "./registry";
export { TextNormalizer, normalizer, preprocess, HIDDEN_SEPARATORS } from "./normalizer";
export { VariantExpander, expandVariants, iterateVariants } from "./variants";
export { ContextWhitelist, contextWhitelist, isWhitelisted, DEFAULT_CONTEXT_RULES } from "./context";
export type { Clock } from "./context";
export { phoneticKey } from "./phonetic";
export { ResultCache, Mutex } from "./cache";
export { splitWords, loadSafeWords, DEFAULT_SAFE_WORDS } from "./words";
export { loadConfigFromEnv } from "./config";
export {
  createSubstitutionTables,
  loadSubstitutionTables,
  getDefaultTables,
} from "./substitutions";

// Types
export type {
  SubstitutionEntry,
  SubstitutionTables,
  ContextRule,
  ContextRules,
  MatchStage,
  MatchSpan,
  FilterVerdict,
  FilterStats,
  NormalizationChange,
  SwearFilterConfig,
} from "./types";

export { MATCH_STAGES, DEFAULT_FILTER_CONFIG } from "./types";
