/**
 * Shared types for the menu-search core library.
 */

// ============================================================================
// Lexicon Models
// ============================================================================

/**
 * Raw lexicon as stored on disk (see data/lexicon.json)
 */
export interface LexiconData {
  diacritics: Record<string, string>;
  typoCorrections: Record<string, string>;
  vocabulary: Record<string, string[]>;
  phonetic: Record<string, string>;
  abbreviations: Record<string, string>;
}

/**
 * A single substring rewrite: every occurrence of `pattern` becomes `replacement`
 */
export interface RewriteRule {
  pattern: string;
  replacement: string;
}

/**
 * Immutable tables consulted by the normalizer and the variation generator
 */
export interface LexicalTables {
  diacritics: ReadonlyMap<string, string>;
  /** Misspelling → canonical, sorted longest pattern first (ties keep table order) */
  typoRules: readonly RewriteRule[];
  /** Orthographic cluster → phonetic surrogate, in table order */
  phoneticRules: readonly RewriteRule[];
  /** Short form → full form */
  abbreviations: ReadonlyMap<string, string>;
  /** Canonical dish name → known spellings */
  vocabulary: ReadonlyMap<string, readonly string[]>;
}

/**
 * A rule whose output re-introduces a key of the tables
 */
export interface CascadingRule {
  table: 'typo' | 'phonetic';
  rule: RewriteRule;
  /** The key found inside the rule's replacement (or inside the phonetic key) */
  conflictsWith: string;
}

// ============================================================================
// Cache Models
// ============================================================================

export interface CacheStats {
  size: number;
  maxEntries: number | null;
  hits: number;
  misses: number;
  evictions: number;
}

export interface MatcherCacheStats {
  normalization: CacheStats;
  variations: CacheStats;
}

// ============================================================================
// Matcher Models
// ============================================================================

export interface MatcherOptions {
  tables?: LexicalTables;
  /** LRU bound applied to each cache; omit for unbounded caches */
  maxCacheEntries?: number;
  debug?: boolean;
  /** Sink for debug lines (defaults to console.debug) */
  log?: (message: string) => void;
}

export interface RankOptions {
  /** Candidates must score strictly above this (default 0.6) */
  threshold?: number;
  limit?: number;
}

export interface RankedMatch {
  candidate: string;
  index: number;
  score: number;
}

// ============================================================================
// Search Models
// ============================================================================

/**
 * How a record was matched, in priority order
 */
export type MatchType = 'variation' | 'all-words' | 'similar';

export interface SearchHit<T> {
  record: T;
  index: number;
  matchType: MatchType;
  matchedField: string;
}

export interface SearchOptions {
  limit?: number;
}
