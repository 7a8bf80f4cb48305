/**
 * TextNormalizer - Canonical form for search queries and stored item names
 *
 * Pipeline (order matters):
 *   1. lowercase + trim
 *   2. diacritic folding
 *   3. typo corrections, longest pattern first
 *   4. phonetic clusters
 *   5. cleanup: drop non letter/digit/space characters, collapse whitespace
 *
 * Steps 3-4 are repeated until a pass changes nothing, and the character
 * strip of step 5 also runs before step 3. Both keep normalize() idempotent.
 */

import type { LexicalTables, RewriteRule } from '../types/index.js';

/**
 * Upper bound on rewrite passes; the shipped tables settle in two or three
 */
export const MAX_REWRITE_PASSES = 16;

const NON_WORD_CHARACTERS = /[^\p{L}\p{N}\s]/gu;
const WHITESPACE_RUNS = /\s+/g;

function applyRules(text: string, rules: readonly RewriteRule[]): string {
  let result = text;
  for (const { pattern, replacement } of rules) {
    if (result.includes(pattern)) {
      result = result.split(pattern).join(replacement);
    }
  }
  return result;
}

export class TextNormalizer {
  constructor(private readonly tables: LexicalTables) {}

  /**
   * Run the full pipeline. Empty input is returned as is.
   */
  normalize(text: string): string {
    if (text.length === 0) {
      return text;
    }

    let normalized = text.toLowerCase().trim();
    normalized = this.foldDiacritics(normalized);
    normalized = TextNormalizer.stripSpecialCharacters(normalized);

    for (let pass = 0; pass < MAX_REWRITE_PASSES; pass++) {
      const before = normalized;
      normalized = this.applyTypoCorrections(normalized);
      normalized = this.applyPhoneticPatterns(normalized);
      if (normalized === before) {
        break;
      }
    }

    return TextNormalizer.cleanText(normalized);
  }

  /**
   * Replace every mapped character; unmapped characters pass through
   */
  foldDiacritics(text: string): string {
    let folded = '';
    for (const char of text) {
      folded += this.tables.diacritics.get(char) ?? char;
    }
    return folded;
  }

  /**
   * One pass over the typo table, longest pattern first
   */
  applyTypoCorrections(text: string): string {
    return applyRules(text, this.tables.typoRules);
  }

  /**
   * One pass over the phonetic table
   */
  applyPhoneticPatterns(text: string): string {
    return applyRules(text, this.tables.phoneticRules);
  }

  /**
   * Step 5 on its own: strip special characters and normalize whitespace.
   * Does not change case.
   */
  static cleanText(text: string): string {
    return TextNormalizer.stripSpecialCharacters(text)
      .replace(WHITESPACE_RUNS, ' ')
      .trim();
  }

  private static stripSpecialCharacters(text: string): string {
    return text.replace(NON_WORD_CHARACTERS, '');
  }
}
