/**
 * LocalSearchService - Filter in-memory records (restaurants, menu items)
 * against a free-text query using the text matcher.
 *
 * Each record exposes its searchable text through `getFields`. A record is
 * kept by the first rule that matches, checked in this order:
 * - variation: a query variation occurs in a field or in its normalized form
 * - all-words: every word of a multi-word query occurs in some field
 * - similar: a single-word query is similar to some field
 */

import type { MatchType, SearchHit, SearchOptions } from '../types/index.js';
import type { TextMatcher } from './TextMatcher.js';

const MATCH_PRIORITY: readonly MatchType[] = ['variation', 'all-words', 'similar'];

export class LocalSearchService<T> {
  constructor(
    private readonly matcher: TextMatcher,
    private readonly getFields: (record: T) => readonly string[]
  ) {}

  /**
   * Search records, best match type first, input order within a type
   */
  search(query: string, records: readonly T[], options: SearchOptions = {}): SearchHit<T>[] {
    const queryWords = LocalSearchService.splitWords(query);
    // A query of punctuation alone normalizes to "", which every field contains
    if (queryWords.length === 0 || this.matcher.normalize(query).length === 0) {
      return [];
    }

    const variations = this.matcher
      .generateVariations(query)
      .filter((variation) => variation.length > 0);

    const hits: SearchHit<T>[] = [];
    records.forEach((record, index) => {
      const fields = this.getFields(record)
        .map((field) => field.toLowerCase().trim())
        .filter((field) => field.length > 0);

      const hit = this.matchRecord(query, queryWords, variations, fields);
      if (hit) {
        hits.push({ record, index, ...hit });
      }
    });

    const ordered = MATCH_PRIORITY.flatMap((type) => hits.filter((hit) => hit.matchType === type));
    const { limit } = options;
    return limit !== undefined && limit >= 0 ? ordered.slice(0, limit) : ordered;
  }

  private matchRecord(
    query: string,
    queryWords: string[],
    variations: string[],
    fields: string[]
  ): { matchType: MatchType; matchedField: string } | null {
    for (const field of fields) {
      const normalizedField = this.matcher.normalize(field);
      if (variations.some((variation) => field.includes(variation) || normalizedField.includes(variation))) {
        return { matchType: 'variation', matchedField: field };
      }
    }

    if (queryWords.length > 1) {
      const allWordsFound = queryWords.every((word) => fields.some((field) => field.includes(word)));
      if (allWordsFound) {
        return { matchType: 'all-words', matchedField: fields.find((field) => field.includes(queryWords[0])) ?? '' };
      }
      return null;
    }

    const similarField = fields.find((field) => this.matcher.isSimilar(query, field));
    return similarField !== undefined ? { matchType: 'similar', matchedField: similarField } : null;
  }

  /**
   * Lowercased, whitespace-separated words of a query
   */
  static splitWords(query: string): string[] {
    return query
      .toLowerCase()
      .trim()
      .split(/\s+/)
      .filter((word) => word.length > 0);
  }
}
