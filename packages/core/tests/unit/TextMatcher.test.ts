/**
 * Unit tests for TextMatcher
 *
 * Tests cover:
 * - Memoization of normalize() and generateVariations()
 * - Cache stats, LRU bound and clearCache()
 * - Debug logging through a custom sink
 * - The process-wide free functions
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { createLexicalTables } from '../../src/lexicon/LexicalTables.js';
import {
  TextMatcher,
  clearCache,
  defaultTextMatcher,
  findBestMatch,
  generateVariations,
  isSimilar,
  normalize,
} from '../../src/services/TextMatcher.js';

describe('TextMatcher', () => {
  let matcher: TextMatcher;

  beforeEach(() => {
    matcher = new TextMatcher();
  });

  describe('normalize()', () => {
    it('should memoize by raw input', () => {
      expect(matcher.normalize('pizza')).toBe('pizza');
      expect(matcher.normalize('pizza')).toBe('pizza');

      expect(matcher.getCacheStats().normalization).toEqual({
        size: 1,
        maxEntries: null,
        hits: 1,
        misses: 1,
        evictions: 0,
      });
    });

    it('should not cache empty input', () => {
      expect(matcher.normalize('')).toBe('');
      expect(matcher.getCacheStats().normalization.size).toBe(0);
      expect(matcher.getCacheStats().normalization.misses).toBe(0);
    });

    it('should use custom tables', () => {
      const custom = new TextMatcher({
        tables: createLexicalTables({
          diacritics: {},
          typoCorrections: { tomatoe: 'tomato' },
          vocabulary: {},
          phonetic: {},
          abbreviations: {},
        }),
      });
      expect(custom.normalize('Tomatoe')).toBe('tomato');
      expect(custom.normalize('café')).toBe('café');
    });
  });

  describe('generateVariations()', () => {
    it('should memoize by raw query', () => {
      matcher.generateVariations('pizza');
      matcher.generateVariations('pizza');

      const stats = matcher.getCacheStats();
      expect(stats.variations).toEqual({ size: 1, maxEntries: null, hits: 1, misses: 1, evictions: 0 });
      expect(stats.normalization).toEqual({ size: 1, maxEntries: null, hits: 0, misses: 1, evictions: 0 });
    });

    it('should return a fresh array on every call', () => {
      const first = matcher.generateVariations('pz');
      first.push('mutated');

      expect(matcher.generateVariations('pz')).toEqual(['pz', 'pizza']);
    });
  });

  describe('comparison', () => {
    it('should delegate to the similarity engine', () => {
      expect(matcher.isSimilar('burguer', 'burger')).toBe(true);
      expect(matcher.findBestMatch('pizza', ['PIZZA', 'pizzza', 'burger'])).toBe('PIZZA');
      expect(matcher.rankMatches('pizza', ['pasta', 'piza'])).toEqual([{ candidate: 'piza', index: 1, score: 1 }]);
    });
  });

  describe('caching', () => {
    it('should bound each cache when maxCacheEntries is set', () => {
      const bounded = new TextMatcher({ maxCacheEntries: 2 });
      bounded.normalize('a');
      bounded.normalize('b');
      bounded.normalize('c');

      expect(bounded.getCacheStats().normalization).toEqual({
        size: 2,
        maxEntries: 2,
        hits: 0,
        misses: 3,
        evictions: 1,
      });
      expect(bounded.getCacheStats().variations.maxEntries).toBe(2);
    });

    it('should empty both caches on clearCache', () => {
      matcher.normalize('pizza');
      matcher.generateVariations('burger');
      matcher.clearCache();

      const stats = matcher.getCacheStats();
      expect(stats.normalization.size).toBe(0);
      expect(stats.variations.size).toBe(0);
      expect(matcher.normalize('pizza')).toBe('pizza');
    });

    it('should keep separate caches per instance', () => {
      const other = new TextMatcher();
      matcher.normalize('pizza');

      expect(other.getCacheStats().normalization.size).toBe(0);
    });
  });

  describe('debug logging', () => {
    it('should log fresh normalizations only', () => {
      const log = jest.fn<(message: string) => void>();
      const debugMatcher = new TextMatcher({ debug: true, log });

      debugMatcher.normalize('Café');
      debugMatcher.normalize('Café');

      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith('[TextMatcher] "Café" -> "cafe"');
    });

    it('should stop logging after the first 100 entries', () => {
      const log = jest.fn<(message: string) => void>();
      const debugMatcher = new TextMatcher({ debug: true, log });

      for (let i = 0; i < 150; i++) {
        debugMatcher.normalize(`item ${i}`);
      }

      expect(log).toHaveBeenCalledTimes(100);
      expect(log).toHaveBeenLastCalledWith('[TextMatcher] "item 99" -> "item 99"');
    });

    it('should stop logging after 100 entries when the cache is bounded', () => {
      const log = jest.fn<(message: string) => void>();
      const debugMatcher = new TextMatcher({ debug: true, log, maxCacheEntries: 10 });

      for (let i = 0; i < 150; i++) {
        debugMatcher.normalize(`item ${i}`);
      }

      expect(log).toHaveBeenCalledTimes(100);
      expect(log).toHaveBeenLastCalledWith('[TextMatcher] "item 99" -> "item 99"');
    });

    it('should resume logging after clearCache', () => {
      const log = jest.fn<(message: string) => void>();
      const debugMatcher = new TextMatcher({ debug: true, log, maxCacheEntries: 10 });

      for (let i = 0; i < 100; i++) {
        debugMatcher.normalize(`item ${i}`);
      }
      debugMatcher.clearCache();
      debugMatcher.normalize('Café');

      expect(log).toHaveBeenCalledTimes(102);
      expect(log).toHaveBeenNthCalledWith(101, '[TextMatcher] Cleared 10 cached entries');
      expect(log).toHaveBeenLastCalledWith('[TextMatcher] "Café" -> "cafe"');
    });

    it('should log how many entries clearCache dropped', () => {
      const log = jest.fn<(message: string) => void>();
      const debugMatcher = new TextMatcher({ debug: true, log });

      debugMatcher.normalize('pizza');
      debugMatcher.clearCache();

      expect(log).toHaveBeenLastCalledWith('[TextMatcher] Cleared 1 cached entries');
    });

    it('should stay silent without debug', () => {
      const log = jest.fn<(message: string) => void>();
      const quietMatcher = new TextMatcher({ log });

      quietMatcher.normalize('pizza');
      quietMatcher.clearCache();

      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('free functions', () => {
    beforeEach(() => {
      clearCache();
    });

    it('should share the default matcher', () => {
      expect(normalize('café')).toBe('cafe');
      expect(defaultTextMatcher.getCacheStats().normalization.size).toBe(1);

      clearCache();
      expect(defaultTextMatcher.getCacheStats().normalization.size).toBe(0);
    });

    it('should expose generateVariations, isSimilar and findBestMatch', () => {
      expect(generateVariations('pz')).toEqual(['pz', 'pizza']);
      expect(isSimilar('pizza', 'sushi')).toBe(false);
      expect(findBestMatch('burger', ['burgr', 'burgerz'])).toBe('burgerz');
    });
  });
});
