/**
 * SimilarityEngine - Edit-distance comparison of normalized strings
 *
 * isSimilar() and findBestMatch() use different thresholds; both compare
 * strictly.
 */

import type { RankedMatch, RankOptions } from '../types/index.js';
import { similarityScore } from '../utils/levenshtein.js';

/**
 * isSimilar() requires a score strictly above this (70%)
 */
export const SIMILARITY_THRESHOLD = 0.7;

/**
 * findBestMatch() and rankMatches() require a score strictly above this (60%)
 */
export const BEST_MATCH_THRESHOLD = 0.6;

export class SimilarityEngine {
  constructor(private readonly normalize: (text: string) => string) {}

  /**
   * Check whether two raw strings refer to the same thing
   *
   * Equal or containing normalized forms are always similar; otherwise the
   * edit-distance score must exceed SIMILARITY_THRESHOLD.
   */
  isSimilar(text1: string, text2: string): boolean {
    if (text1.length === 0 || text2.length === 0) {
      return false;
    }

    const normalized1 = this.normalize(text1);
    const normalized2 = this.normalize(text2);

    if (normalized1 === normalized2) return true;
    if (normalized1.includes(normalized2) || normalized2.includes(normalized1)) return true;

    return similarityScore(normalized1, normalized2) > SIMILARITY_THRESHOLD;
  }

  /**
   * Find the best match for a query among candidates
   *
   * The first candidate with the same normalized form wins immediately.
   * Otherwise the highest score above BEST_MATCH_THRESHOLD wins, and on a tie
   * the earlier candidate is kept.
   *
   * @returns The original candidate string, or null when nothing qualifies
   */
  findBestMatch(query: string, candidates: readonly string[]): string | null {
    if (query.length === 0 || candidates.length === 0) {
      return null;
    }

    const normalizedQuery = this.normalize(query);
    let bestMatch: string | null = null;
    let bestScore = 0;

    for (const candidate of candidates) {
      const normalizedCandidate = this.normalize(candidate);

      if (normalizedCandidate === normalizedQuery) {
        return candidate;
      }

      const score = similarityScore(normalizedQuery, normalizedCandidate);
      if (score > bestScore && score > BEST_MATCH_THRESHOLD) {
        bestScore = score;
        bestMatch = candidate;
      }
    }

    return bestMatch;
  }

  /**
   * Score every candidate and return those above the threshold, best first.
   * Equal scores keep input order; an exact normalized match scores 1.
   */
  rankMatches(query: string, candidates: readonly string[], options: RankOptions = {}): RankedMatch[] {
    const { threshold = BEST_MATCH_THRESHOLD, limit } = options;

    if (query.length === 0 || candidates.length === 0) {
      return [];
    }

    const normalizedQuery = this.normalize(query);
    const ranked: RankedMatch[] = [];

    candidates.forEach((candidate, index) => {
      const score = similarityScore(normalizedQuery, this.normalize(candidate));
      if (score > threshold) {
        ranked.push({ candidate, index, score });
      }
    });

    ranked.sort((a, b) => b.score - a.score || a.index - b.index);

    return limit !== undefined && limit >= 0 ? ranked.slice(0, limit) : ranked;
  }
}
