/**
 * VariationGenerator - Alternate spellings of a query for wider recall
 *
 * Stored item names keep whatever spelling the restaurant typed, so a query is
 * expanded in both directions: towards canonical forms (phonetic surrogates,
 * expanded abbreviations) and back towards the misspellings and regional
 * variants the typo table knows about.
 */

import type { LexicalTables } from '../types/index.js';
import { TextNormalizer } from './TextNormalizer.js';

export class VariationGenerator {
  constructor(
    private readonly tables: LexicalTables,
    private readonly normalize: (text: string) => string
  ) {}

  /**
   * Generate the unique variations of a query, normalized form first.
   * Empty input yields a single empty variation.
   */
  generate(query: string): string[] {
    if (query.length === 0) {
      return [query];
    }

    const normalized = this.normalize(query);
    const variations = new Set<string>();

    variations.add(normalized);
    variations.add(TextNormalizer.cleanText(query.toLowerCase()));

    for (const variation of this.phoneticVariations(normalized)) variations.add(variation);
    for (const variation of this.abbreviationVariations(normalized)) variations.add(variation);
    for (const variation of this.misspellingVariations(normalized)) variations.add(variation);

    return Array.from(variations);
  }

  /**
   * Forward (pattern → surrogate) then reverse (surrogate → pattern)
   */
  private phoneticVariations(text: string): string[] {
    const variations: string[] = [];
    const { phoneticRules } = this.tables;

    for (const { pattern, replacement } of phoneticRules) {
      if (text.includes(pattern)) {
        variations.push(replaceAll(text, pattern, replacement));
      }
    }

    for (const { pattern, replacement } of phoneticRules) {
      if (replacement.length > 0 && text.includes(replacement)) {
        variations.push(replaceAll(text, replacement, pattern));
      }
    }

    return variations;
  }

  /**
   * Expand short forms that stand as whole words: "pz" must not fire inside
   * "pizza". Full forms are never shortened.
   */
  private abbreviationVariations(text: string): string[] {
    const words = text.split(' ');
    const variations: string[] = [];

    for (const [short, full] of this.tables.abbreviations) {
      if (words.includes(short)) {
        variations.push(words.map((word) => (word === short ? full : word)).join(' '));
      }
    }

    return variations;
  }

  /**
   * Put known misspellings back in place of their canonical form
   */
  private misspellingVariations(text: string): string[] {
    const variations: string[] = [];

    for (const { pattern, replacement } of this.tables.typoRules) {
      if (replacement.length > 0 && text.includes(replacement)) {
        variations.push(replaceAll(text, replacement, pattern));
      }
    }

    return variations;
  }
}

function replaceAll(text: string, search: string, replacement: string): string {
  return text.split(search).join(replacement);
}
