/**
 * Shared types for the menu-search MCP server.
 */

/**
 * Structured error returned to MCP clients instead of throwing
 */
export interface ErrorResponse {
  error: ErrorType;
  message: string;
  context?: Record<string, unknown>;
  suggestions?: string[];
}

export type ErrorType =
  | 'VALIDATION_ERROR'
  | 'PROCESSING_ERROR';

/**
 * A record passed to the search_items tool
 */
export interface SearchItem {
  id: string;
  fields: string[];
}
