/**
 * Tool request handlers for the MCP server.
 * Each handler validates its arguments and delegates to the core matcher.
 */

import type { LocalSearchService, TextMatcher } from '@menu-search/core';
import type { SearchItem } from './types/index.js';
import { safeErrorHandler } from './utils/errors.js';
import {
  collectValidationErrors,
  createValidationErrorResponse,
  isSearchItemArray,
  isStringArray,
  validateLimit,
  validateSearchItems,
  validateString,
  validateStringArray,
  validateThreshold,
} from './utils/validation.js';

export interface Services {
  matcher: TextMatcher;
  searchService: LocalSearchService<SearchItem>;
  /** Limit used when a call does not pass one */
  resultLimit: number;
}

export type ToolArgs = Record<string, unknown>;

type ToolHandler = (args: ToolArgs, services: Services) => Promise<unknown>;

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

/**
 * Tool handler mapping - maps tool names to matcher methods
 */
const toolHandlers: Record<string, ToolHandler> = {
  normalize_text: async ({ text }, s) => {
    if (typeof text !== 'string') {
      return createValidationErrorResponse(collectValidationErrors([() => validateString(text, 'text')]));
    }
    return { text, normalized: s.matcher.normalize(text) };
  },

  generate_search_variations: async ({ query }, s) => {
    if (typeof query !== 'string') {
      return createValidationErrorResponse(collectValidationErrors([() => validateString(query, 'query')]));
    }
    return { query, variations: s.matcher.generateVariations(query) };
  },

  check_similarity: async ({ text_a, text_b }, s) => {
    if (typeof text_a !== 'string' || typeof text_b !== 'string') {
      return createValidationErrorResponse(collectValidationErrors([
        () => validateString(text_a, 'text_a'),
        () => validateString(text_b, 'text_b'),
      ]));
    }
    return { text_a, text_b, similar: s.matcher.isSimilar(text_a, text_b) };
  },

  find_best_match: async ({ query, candidates }, s) => {
    if (typeof query !== 'string' || !isStringArray(candidates)) {
      return createValidationErrorResponse(collectValidationErrors([
        () => validateString(query, 'query'),
        () => validateStringArray(candidates, 'candidates'),
      ]));
    }
    return { query, match: s.matcher.findBestMatch(query, candidates) };
  },

  rank_matches: async ({ query, candidates, threshold, limit }, s) => {
    const errors = collectValidationErrors([
      () => validateString(query, 'query'),
      () => validateStringArray(candidates, 'candidates'),
      () => validateThreshold(threshold),
      () => validateLimit(limit),
    ]);
    if (errors.length > 0 || typeof query !== 'string' || !isStringArray(candidates)) {
      return createValidationErrorResponse(errors);
    }

    const matches = s.matcher.rankMatches(query, candidates, {
      threshold: optionalNumber(threshold),
      limit: optionalNumber(limit) ?? s.resultLimit,
    });
    return { query, matches };
  },

  search_items: async ({ query, items, limit }, s) => {
    const errors = collectValidationErrors([
      () => validateString(query, 'query'),
      () => validateSearchItems(items),
      () => validateLimit(limit),
    ]);
    if (errors.length > 0 || typeof query !== 'string' || !isSearchItemArray(items)) {
      return createValidationErrorResponse(errors);
    }

    const hits = s.searchService.search(query, items, { limit: optionalNumber(limit) ?? s.resultLimit });
    return {
      query,
      results: hits.map((hit) => ({
        id: hit.record.id,
        matchType: hit.matchType,
        matchedField: hit.matchedField,
      })),
    };
  },

  clear_cache: async (_args, s) => {
    const { normalization, variations } = s.matcher.getCacheStats();
    s.matcher.clearCache();
    return { cleared: normalization.size + variations.size };
  },

  get_cache_stats: async (_args, s) => s.matcher.getCacheStats(),
};

/**
 * Handle tool call requests by delegating to the matching handler.
 * Never throws: failures come back as an ErrorResponse.
 */
export async function handleToolCall(
  toolName: string,
  args: ToolArgs | undefined,
  services: Services
): Promise<unknown> {
  try {
    if (!Object.hasOwn(toolHandlers, toolName)) {
      throw new Error(`Unknown tool: ${toolName}`);
    }
    return await toolHandlers[toolName](args ?? {}, services);
  } catch (error) {
    return safeErrorHandler(error, `run ${toolName}`, { toolName });
  }
}
