/**
 * TextMatcher - Typo, diacritic and spelling-variant tolerant text matching
 *
 * Facade over the normalizer, the variation generator and the similarity
 * engine. Owns the two memo caches; nothing here performs I/O or throws.
 */

import { defaultLexicalTables } from '../lexicon/LexicalTables.js';
import type {
  LexicalTables,
  MatcherCacheStats,
  MatcherOptions,
  RankedMatch,
  RankOptions,
} from '../types/index.js';
import { MatchCache } from './caching/MatchCache.js';
import { SimilarityEngine } from './SimilarityEngine.js';
import { TextNormalizer } from './TextNormalizer.js';
import { VariationGenerator } from './VariationGenerator.js';

/**
 * Debug mode logs the first N fresh normalizations since the last clearCache
 */
const DEBUG_LOG_LIMIT = 100;

export class TextMatcher {
  readonly tables: LexicalTables;
  private readonly normalizer: TextNormalizer;
  private readonly variationGenerator: VariationGenerator;
  private readonly similarityEngine: SimilarityEngine;
  private readonly normalizationCache: MatchCache<string>;
  private readonly variationCache: MatchCache<readonly string[]>;
  private readonly debug: boolean;
  private readonly log: (message: string) => void;
  private debugLogCount = 0;

  constructor(options: MatcherOptions = {}) {
    this.tables = options.tables ?? defaultLexicalTables;
    this.debug = options.debug ?? false;
    this.log = options.log ?? ((message) => console.debug(message));

    this.normalizationCache = new MatchCache<string>(options.maxCacheEntries);
    this.variationCache = new MatchCache<readonly string[]>(options.maxCacheEntries);

    const normalize = (text: string): string => this.normalize(text);
    this.normalizer = new TextNormalizer(this.tables);
    this.variationGenerator = new VariationGenerator(this.tables, normalize);
    this.similarityEngine = new SimilarityEngine(normalize);
  }

  /**
   * Canonical comparable form of a string (memoized by raw input)
   */
  normalize(text: string): string {
    if (text.length === 0) {
      return text;
    }

    const cached = this.normalizationCache.get(text);
    if (cached !== undefined) {
      return cached;
    }

    const normalized = this.normalizer.normalize(text);
    this.normalizationCache.set(text, normalized);

    if (this.debug && this.debugLogCount < DEBUG_LOG_LIMIT) {
      this.debugLogCount++;
      this.log(`[TextMatcher] "${text}" -> "${normalized}"`);
    }

    return normalized;
  }

  /**
   * Unique alternate spellings of a query (memoized by raw query).
   * Returns a fresh array on every call.
   */
  generateVariations(query: string): string[] {
    const cached = this.variationCache.get(query);
    if (cached !== undefined) {
      return [...cached];
    }

    const variations = Object.freeze(this.variationGenerator.generate(query));
    this.variationCache.set(query, variations);
    return [...variations];
  }

  isSimilar(text1: string, text2: string): boolean {
    return this.similarityEngine.isSimilar(text1, text2);
  }

  findBestMatch(query: string, candidates: readonly string[]): string | null {
    return this.similarityEngine.findBestMatch(query, candidates);
  }

  rankMatches(query: string, candidates: readonly string[], options?: RankOptions): RankedMatch[] {
    return this.similarityEngine.rankMatches(query, candidates, options);
  }

  /**
   * Empty both caches
   */
  clearCache(): void {
    const dropped = this.normalizationCache.size + this.variationCache.size;
    this.normalizationCache.clear();
    this.variationCache.clear();
    this.debugLogCount = 0;

    if (this.debug) {
      this.log(`[TextMatcher] Cleared ${dropped} cached entries`);
    }
  }

  getCacheStats(): MatcherCacheStats {
    return {
      normalization: this.normalizationCache.getStats(),
      variations: this.variationCache.getStats(),
    };
  }
}

/**
 * Process-wide matcher backing the free functions below
 */
export const defaultTextMatcher = new TextMatcher();

export function normalize(text: string): string {
  return defaultTextMatcher.normalize(text);
}

export function generateVariations(query: string): string[] {
  return defaultTextMatcher.generateVariations(query);
}

export function isSimilar(text1: string, text2: string): boolean {
  return defaultTextMatcher.isSimilar(text1, text2);
}

export function findBestMatch(query: string, candidates: readonly string[]): string | null {
  return defaultTextMatcher.findBestMatch(query, candidates);
}

export function clearCache(): void {
  defaultTextMatcher.clearCache();
}
