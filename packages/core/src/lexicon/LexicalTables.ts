/**
 * LexicalTables - Builds the immutable lookup tables used by the text matcher
 *
 * The shipped lexicon lives in data/lexicon.json: diacritic folding, general
 * misspellings, phonetic clusters, abbreviations and a dish vocabulary whose
 * regional spellings become typo rules pointing at the canonical name.
 */

import lexicon from '../data/lexicon.json';
import type { CascadingRule, LexicalTables, LexiconData, RewriteRule } from '../types/index.js';

function toRules(entries: Record<string, string>): RewriteRule[] {
  return Object.entries(entries).map(([pattern, replacement]) => ({ pattern, replacement }));
}

function freezeRules(rules: RewriteRule[]): readonly RewriteRule[] {
  return Object.freeze(rules.map((rule) => Object.freeze({ ...rule })));
}

/**
 * Build typo rules from the general list followed by the vocabulary variants.
 * Array.prototype.sort is stable, so equal-length keys keep table order.
 */
function buildTypoRules(data: LexiconData): RewriteRule[] {
  const rules = toRules(data.typoCorrections);

  for (const [canonical, variants] of Object.entries(data.vocabulary)) {
    for (const variant of variants) {
      if (variant && variant !== canonical) {
        rules.push({ pattern: variant, replacement: canonical });
      }
    }
  }

  return rules
    .filter((rule) => rule.pattern.length > 0)
    .sort((a, b) => b.pattern.length - a.pattern.length);
}

/**
 * Create lexical tables from raw lexicon data
 *
 * Empty patterns are dropped (an empty key would match everywhere).
 */
export function createLexicalTables(data: LexiconData): LexicalTables {
  const vocabulary = new Map<string, readonly string[]>();
  for (const [canonical, variants] of Object.entries(data.vocabulary)) {
    vocabulary.set(canonical, Object.freeze([...variants]));
  }

  return Object.freeze({
    diacritics: new Map(Object.entries(data.diacritics)),
    typoRules: freezeRules(buildTypoRules(data)),
    phoneticRules: freezeRules(toRules(data.phonetic).filter((rule) => rule.pattern.length > 0)),
    abbreviations: new Map(Object.entries(data.abbreviations).filter(([short]) => short.length > 0)),
    vocabulary,
  });
}

/**
 * Tables built from the shipped lexicon
 */
export const defaultLexicalTables: LexicalTables = createLexicalTables(lexicon);

/**
 * Report rules that can cascade into other rules.
 *
 * A replacement that contains a key lets one correction feed another; a
 * phonetic key nested inside another makes the phonetic order significant.
 * The shipped tables return an empty list.
 */
export function findCascadingRules(tables: LexicalTables): CascadingRule[] {
  const keys = [
    ...tables.typoRules.map((rule) => rule.pattern),
    ...tables.phoneticRules.map((rule) => rule.pattern),
  ];
  const conflicts: CascadingRule[] = [];

  const check = (table: CascadingRule['table'], rule: RewriteRule): void => {
    for (const key of keys) {
      if (rule.replacement.includes(key)) {
        conflicts.push({ table, rule, conflictsWith: key });
      }
    }
  };

  tables.typoRules.forEach((rule) => check('typo', rule));
  tables.phoneticRules.forEach((rule) => check('phonetic', rule));

  for (const rule of tables.phoneticRules) {
    for (const other of tables.phoneticRules) {
      if (other !== rule && rule.pattern.includes(other.pattern)) {
        conflicts.push({ table: 'phonetic', rule, conflictsWith: other.pattern });
      }
    }
  }

  return conflicts;
}
