/**
 * Unit tests for input validation utilities
 */

import { describe, it, expect } from '@jest/globals';
import {
  validateRequired,
  validateString,
  validateNumber,
  validateRange,
  validateStringArray,
  validateThreshold,
  validateLimit,
  validateSearchItems,
  isStringArray,
  isSearchItemArray,
  collectValidationErrors,
  createValidationErrorResponse,
} from '../../src/utils/validation.js';

describe('Validation Utilities', () => {
  describe('validateRequired', () => {
    it('should reject undefined and null', () => {
      expect(validateRequired(undefined, 'query')).toEqual({ field: 'query', message: 'query is required' });
      expect(validateRequired(null, 'query')).toEqual({ field: 'query', message: 'query is required' });
    });

    it('should accept an empty string', () => {
      expect(validateRequired('', 'query')).toBeNull();
    });
  });

  describe('validateString', () => {
    it('should accept strings', () => {
      expect(validateString('pizza', 'text')).toBeNull();
    });

    it('should reject other types', () => {
      expect(validateString(42, 'text')).toEqual({ field: 'text', message: 'text must be a string', value: 42 });
    });

    it('should skip a missing optional value', () => {
      expect(validateString(undefined, 'text', false)).toBeNull();
    });
  });

  describe('validateNumber and validateRange', () => {
    it('should reject NaN', () => {
      expect(validateNumber(NaN, 'threshold')?.message).toBe('threshold must be a number');
    });

    it('should check inclusive bounds', () => {
      expect(validateRange(0, 'threshold', 0, 1)).toBeNull();
      expect(validateRange(1, 'threshold', 0, 1)).toBeNull();
      expect(validateRange(1.01, 'threshold', 0, 1)?.message).toBe('threshold must be between 0 and 1');
    });
  });

  describe('validateStringArray', () => {
    it('should accept an empty array', () => {
      expect(validateStringArray([], 'candidates')).toBeNull();
    });

    it('should reject non-arrays', () => {
      expect(validateStringArray('pizza', 'candidates')?.message).toBe('candidates must be an array');
    });

    it('should point at the first non-string entry', () => {
      expect(validateStringArray(['a', 'b', null], 'candidates')).toEqual({
        field: 'candidates[2]',
        message: 'candidates[2] must be a string',
        value: null,
      });
    });
  });

  describe('validateThreshold', () => {
    it('should be optional', () => {
      expect(validateThreshold(undefined)).toBeNull();
    });

    it('should reject strings and out-of-range numbers', () => {
      expect(validateThreshold('0.5')?.message).toBe('threshold must be a number');
      expect(validateThreshold(-0.1)?.message).toBe('threshold must be between 0 and 1');
    });
  });

  describe('validateLimit', () => {
    it('should accept zero and positive integers', () => {
      expect(validateLimit(0)).toBeNull();
      expect(validateLimit(5)).toBeNull();
    });

    it('should reject fractions and negatives', () => {
      expect(validateLimit(2.5)?.message).toBe('limit must be a non-negative integer');
      expect(validateLimit(-1)?.message).toBe('limit must be a non-negative integer');
    });
  });

  describe('validateSearchItems', () => {
    it('should accept well-formed items', () => {
      expect(validateSearchItems([{ id: 'r1', fields: ['Pizza'] }, { id: 'r2', fields: [] }])).toBeNull();
    });

    it('should reject non-object items', () => {
      expect(validateSearchItems(['r1'])?.message).toBe('items[0] must be an object');
    });

    it('should reject a blank id', () => {
      expect(validateSearchItems([{ id: '  ', fields: [] }])?.field).toBe('items[0].id');
    });

    it('should reject missing or mistyped fields', () => {
      expect(validateSearchItems([{ id: 'r1' }])?.message).toBe('items[0].fields is required');
      expect(validateSearchItems([{ id: 'r1', fields: [1] }])?.message).toBe('items[0].fields[0] must be a string');
    });
  });

  describe('type guards', () => {
    it('should agree with the validators', () => {
      expect(isStringArray(['a'])).toBe(true);
      expect(isStringArray(['a', 1])).toBe(false);
      expect(isSearchItemArray([{ id: 'r1', fields: ['x'] }])).toBe(true);
      expect(isSearchItemArray([{ id: 'r1' }])).toBe(false);
    });
  });

  describe('collectValidationErrors and createValidationErrorResponse', () => {
    it('should use the single error message directly', () => {
      const errors = collectValidationErrors([
        () => validateString('pizza', 'query'),
        () => validateLimit(-1),
      ]);
      const response = createValidationErrorResponse(errors);

      expect(response.error).toBe('VALIDATION_ERROR');
      expect(response.message).toBe('limit must be a non-negative integer');
      expect(response.context).toEqual({
        errors: [{ field: 'limit', message: 'limit must be a non-negative integer', value: -1 }],
      });
    });

    it('should count multiple errors', () => {
      const errors = collectValidationErrors([
        () => validateString(undefined, 'query'),
        () => validateStringArray(undefined, 'candidates'),
      ]);
      expect(createValidationErrorResponse(errors).message).toBe('2 validation errors found');
    });
  });
});
