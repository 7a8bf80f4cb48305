/**
 * @menu-search/core
 *
 * Fuzzy text normalization and matching for food and dish search: diacritic
 * folding, typo and regional-spelling correction, search variations and
 * edit-distance similarity.
 *
 * @packageDocumentation
 */

// ============================================================================
// Type Exports
// ============================================================================

/**
 * Lexicon Models
 *
 * Raw lexicon data and the immutable tables built from it.
 */
export type {
  LexiconData,
  LexicalTables,
  RewriteRule,
  CascadingRule,
} from './types/index.js';

/**
 * Matcher Models
 */
export type {
  MatcherOptions,
  MatcherCacheStats,
  CacheStats,
  RankOptions,
  RankedMatch,
} from './types/index.js';

/**
 * Search Models
 */
export type {
  MatchType,
  SearchHit,
  SearchOptions,
} from './types/index.js';

// ============================================================================
// Lexicon Exports
// ============================================================================

export {
  createLexicalTables,
  defaultLexicalTables,
  findCascadingRules,
} from './lexicon/LexicalTables.js';

// ============================================================================
// Service Exports
// ============================================================================

/**
 * Text Matcher
 *
 * Public entry point: normalize, generateVariations, isSimilar, findBestMatch,
 * rankMatches, clearCache. The free functions share one process-wide matcher.
 */
export {
  TextMatcher,
  defaultTextMatcher,
  normalize,
  generateVariations,
  isSimilar,
  findBestMatch,
  clearCache,
} from './services/TextMatcher.js';

export { TextNormalizer, MAX_REWRITE_PASSES } from './services/TextNormalizer.js';
export { VariationGenerator } from './services/VariationGenerator.js';
export {
  SimilarityEngine,
  SIMILARITY_THRESHOLD,
  BEST_MATCH_THRESHOLD,
} from './services/SimilarityEngine.js';

/**
 * Local Search Service
 *
 * Filters in-memory records (restaurants, menu items) by a free-text query.
 */
export { LocalSearchService } from './services/LocalSearchService.js';

export { MatchCache } from './services/caching/index.js';

// ============================================================================
// Utility Exports
// ============================================================================

export { levenshteinDistance, similarityScore } from './utils/levenshtein.js';
