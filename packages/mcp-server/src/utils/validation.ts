/**
 * Input validation utilities for MCP tool parameters
 * Validates required parameters, types, and ranges
 * Returns structured validation errors
 */

import type { ErrorResponse, SearchItem } from '../types/index.js';

/**
 * Validation error details
 */
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Validate that a required parameter is present.
 * Empty strings are valid input for the matcher.
 */
export function validateRequired(
  value: unknown,
  fieldName: string
): ValidationError | null {
  if (value === undefined || value === null) {
    return {
      field: fieldName,
      message: `${fieldName} is required`,
    };
  }

  return null;
}

/**
 * Validate that a value is a string
 */
export function validateString(
  value: unknown,
  fieldName: string,
  required: boolean = true
): ValidationError | null {
  if (!required && (value === undefined || value === null)) {
    return null;
  }

  if (required) {
    const requiredError = validateRequired(value, fieldName);
    if (requiredError) return requiredError;
  }

  if (typeof value !== 'string') {
    return {
      field: fieldName,
      message: `${fieldName} must be a string`,
      value,
    };
  }

  return null;
}

/**
 * Validate that a value is a number
 */
export function validateNumber(
  value: unknown,
  fieldName: string,
  required: boolean = true
): ValidationError | null {
  if (!required && (value === undefined || value === null)) {
    return null;
  }

  if (required) {
    const requiredError = validateRequired(value, fieldName);
    if (requiredError) return requiredError;
  }

  if (typeof value !== 'number' || isNaN(value)) {
    return {
      field: fieldName,
      message: `${fieldName} must be a number`,
      value,
    };
  }

  return null;
}

/**
 * Validate that a number is within a range
 */
export function validateRange(
  value: number,
  fieldName: string,
  min: number,
  max: number
): ValidationError | null {
  if (value < min || value > max) {
    return {
      field: fieldName,
      message: `${fieldName} must be between ${min} and ${max}`,
      value,
    };
  }

  return null;
}

/**
 * Validate that a value is an array of strings
 */
export function validateStringArray(
  value: unknown,
  fieldName: string
): ValidationError | null {
  const requiredError = validateRequired(value, fieldName);
  if (requiredError) return requiredError;

  if (!Array.isArray(value)) {
    return {
      field: fieldName,
      message: `${fieldName} must be an array`,
      value,
    };
  }

  const index = value.findIndex((entry) => typeof entry !== 'string');
  if (index !== -1) {
    return {
      field: `${fieldName}[${index}]`,
      message: `${fieldName}[${index}] must be a string`,
      value: value[index],
    };
  }

  return null;
}

/**
 * Validate threshold parameter (0-1 range)
 */
export function validateThreshold(
  value: unknown,
  fieldName: string = 'threshold',
  required: boolean = false
): ValidationError | null {
  if (!required && (value === undefined || value === null)) {
    return null;
  }

  const numberError = validateNumber(value, fieldName, required);
  if (numberError) return numberError;

  return typeof value === 'number' ? validateRange(value, fieldName, 0, 1) : null;
}

/**
 * Validate an optional result limit (non-negative integer)
 */
export function validateLimit(
  value: unknown,
  fieldName: string = 'limit'
): ValidationError | null {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    return {
      field: fieldName,
      message: `${fieldName} must be a non-negative integer`,
      value,
    };
  }

  return null;
}

/**
 * Validate the items of a search_items call: [{ id, fields[] }]
 */
export function validateSearchItems(
  value: unknown,
  fieldName: string = 'items'
): ValidationError | null {
  const requiredError = validateRequired(value, fieldName);
  if (requiredError) return requiredError;

  if (!Array.isArray(value)) {
    return {
      field: fieldName,
      message: `${fieldName} must be an array`,
      value,
    };
  }

  for (let i = 0; i < value.length; i++) {
    const item: unknown = value[i];
    const itemField = `${fieldName}[${i}]`;

    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      return {
        field: itemField,
        message: `${itemField} must be an object`,
        value: item,
      };
    }

    const id = 'id' in item ? item.id : undefined;
    if (typeof id !== 'string' || id.trim() === '') {
      return {
        field: `${itemField}.id`,
        message: `${itemField}.id must be a non-empty string`,
        value: id,
      };
    }

    const fieldsError = validateStringArray('fields' in item ? item.fields : undefined, `${itemField}.fields`);
    if (fieldsError) return fieldsError;
  }

  return null;
}

/**
 * Type guards matching the validators above, for narrowing in handlers
 */
export function isStringArray(value: unknown): value is string[] {
  return validateStringArray(value, 'value') === null;
}

export function isSearchItemArray(value: unknown): value is SearchItem[] {
  return validateSearchItems(value) === null;
}

/**
 * Collect all validation errors from multiple validators
 */
export function collectValidationErrors(
  validators: Array<() => ValidationError | null>
): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const validator of validators) {
    const error = validator();
    if (error) {
      errors.push(error);
    }
  }

  return errors;
}

/**
 * Create a validation error response
 */
export function createValidationErrorResponse(
  errors: ValidationError[]
): ErrorResponse {
  const firstError = errors[0];

  return {
    error: 'VALIDATION_ERROR',
    message: errors.length === 1
      ? firstError.message
      : `${errors.length} validation errors found`,
    context: {
      errors: errors.map(e => ({
        field: e.field,
        message: e.message,
        value: e.value,
      })),
    },
    suggestions: [
      'Check the input parameters match the expected types and formats',
      'Refer to the tool input schema for parameter requirements',
    ],
  };
}
