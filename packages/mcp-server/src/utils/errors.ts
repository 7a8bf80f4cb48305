/**
 * Error response formatter for MCP tools
 * Every tool failure reaches the client as a JSON ErrorResponse
 */

import type { ErrorResponse, ErrorType } from '../types/index.js';

const ERROR_TYPES: readonly ErrorType[] = ['VALIDATION_ERROR', 'PROCESSING_ERROR'];

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create a processing error response
 */
export function createProcessingError(
  operation: string,
  error: unknown,
  context?: Record<string, unknown>
): ErrorResponse {
  const errorMessage = describeError(error);

  const suggestions: string[] = [];

  // Provide specific suggestions based on operation
  if (operation.includes('Unknown tool') || errorMessage.includes('Unknown tool')) {
    suggestions.push(
      'List the available tools and check the tool name',
      'Tool names use snake_case, e.g. "find_best_match"'
    );
  } else if (operation.includes('search') || operation.includes('rank') || operation.includes('match')) {
    suggestions.push(
      'Check that every candidate or item field is a string',
      'Try a shorter query or fewer candidates',
      'Clear the cache with clear_cache and retry'
    );
  } else {
    suggestions.push(
      'Check the error message for specific details',
      'Try the operation again with different parameters'
    );
  }

  return {
    error: 'PROCESSING_ERROR',
    message: `Failed to ${operation}: ${errorMessage}`,
    context: {
      operation,
      errorDetails: errorMessage,
      ...context,
    },
    suggestions,
  };
}

/**
 * Check if a value is an ErrorResponse
 */
export function isErrorResponse(value: unknown): value is ErrorResponse {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('error' in value) || !('message' in value)) {
    return false;
  }
  return (
    ERROR_TYPES.some((type) => type === value.error) &&
    typeof value.message === 'string'
  );
}

/**
 * Format error response as JSON string
 */
export function formatErrorResponse(error: ErrorResponse): string {
  return JSON.stringify(error, null, 2);
}

/**
 * Safe error handler that never throws
 * Returns ErrorResponse for any error
 */
export function safeErrorHandler(
  error: unknown,
  operation: string,
  context?: Record<string, unknown>
): ErrorResponse {
  try {
    if (isErrorResponse(error)) {
      return error;
    }
    return createProcessingError(operation, error, context);
  } catch (handlerError) {
    // String() itself throws for objects without a prototype
    return {
      error: 'PROCESSING_ERROR',
      message: 'An unexpected error occurred',
      context: {
        operation,
        handlerError: handlerError instanceof Error ? handlerError.message : typeof handlerError,
        ...context,
      },
      suggestions: [
        'Check server logs for more information',
      ],
    };
  }
}
