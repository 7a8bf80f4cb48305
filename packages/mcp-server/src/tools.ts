import type { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Shared schema definitions to reduce duplication
 */
const candidatesSchema = {
  type: 'array',
  items: { type: 'string' },
  description: 'Candidate strings to compare against the query, e.g. dish names from a menu',
};

const limitSchema = {
  type: 'number',
  description: 'Optional: Maximum number of results. Defaults to the server result limit',
  minimum: 0,
};

const searchItemSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', description: 'Caller identifier for the item (restaurant or menu item ID)' },
    fields: { type: 'array', items: { type: 'string' }, description: 'Searchable text: name, description, cuisine, etc.' },
  },
  required: ['id', 'fields'],
};

/**
 * Tool definitions for the MCP server.
 *
 * Each tool defines:
 * - name: Unique tool identifier
 * - description: User-friendly description
 * - inputSchema: JSON Schema for input validation
 */
export const tools: Tool[] = [
  {
    name: 'normalize_text',
    description: 'Normalize text for comparison: lowercase, remove accents, fix known misspellings and regional spellings, simplify phonetic clusters, strip punctuation. Example: "Chakhchoukha maison" becomes "chakchouka maison".',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to normalize' },
      },
      required: ['text'],
    },
  },
  {
    name: 'generate_search_variations',
    description: 'Generate alternate spellings of a search query (phonetic variants, abbreviations, known misspellings). The normalized query comes first. Use this to widen a substring search over stored names.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'The search query' },
      },
      required: ['query'],
    },
  },
  {
    name: 'check_similarity',
    description: 'Check whether two texts refer to the same thing after normalization (identical, one containing the other, or edit-distance similarity above 70%).',
    inputSchema: {
      type: 'object',
      properties: {
        text_a: { type: 'string', description: 'First text' },
        text_b: { type: 'string', description: 'Second text' },
      },
      required: ['text_a', 'text_b'],
    },
  },
  {
    name: 'find_best_match',
    description: 'Return the candidate closest to the query. An exact normalized match wins immediately; otherwise the highest similarity above 60% wins, earliest candidate on ties. Returns null when nothing qualifies.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'The text to match' },
        candidates: candidatesSchema,
      },
      required: ['query', 'candidates'],
    },
  },
  {
    name: 'rank_matches',
    description: 'Score every candidate against the query and return those above the threshold, best first, with their index and similarity score.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'The text to match' },
        candidates: candidatesSchema,
        threshold: {
          type: 'number',
          description: 'Optional: Minimum similarity (0-1), exclusive. Default is 0.6',
          minimum: 0,
          maximum: 1,
        },
        limit: limitSchema,
      },
      required: ['query', 'candidates'],
    },
  },
  {
    name: 'search_items',
    description: 'Filter items (restaurants, menu items) by a free-text query. Items matching a query variation come first, then items containing every query word, then items similar to a single-word query.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'The search query' },
        items: {
          type: 'array',
          items: searchItemSchema,
          description: 'Items to search',
        },
        limit: limitSchema,
      },
      required: ['query', 'items'],
    },
  },
  {
    name: 'clear_cache',
    description: 'Empty the normalization and variation caches. Use this after the server has processed many one-off queries.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'get_cache_stats',
    description: 'Report size, bound, hits, misses and evictions of the normalization and variation caches.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];
