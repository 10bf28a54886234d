import { describe, it, expect } from 'vitest';
import { ValidationUtils } from './validation-utils.js';

describe('ValidationUtils', () => {
  describe('validateUrl', () => {
    it('should accept valid URLs', () => {
      expect(() =>
        ValidationUtils.validateUrl('https://login.example.com'),
      ).not.toThrow();
      expect(() =>
        ValidationUtils.validateUrl('http://localhost:8080/callback'),
      ).not.toThrow();
    });

    it('should throw for invalid URLs', () => {
      expect(() => ValidationUtils.validateUrl('not-a-url')).toThrow(
        'Invalid URL format',
      );
    });

    it('should throw for empty URLs', () => {
      expect(() => ValidationUtils.validateUrl('')).toThrow('URL is required');
    });

    it('should include context in error messages', () => {
      expect(() =>
        ValidationUtils.validateUrl('invalid', 'token endpoint'),
      ).toThrow('token endpoint: Invalid URL format: invalid');
    });
  });

  describe('validateRequired', () => {
    it('should pass when all fields are set', () => {
      expect(() =>
        ValidationUtils.validateRequired(
          { api_key: 'k', bearer_token_prefix: 'Bearer' },
          ['api_key', 'bearer_token_prefix'],
        ),
      ).not.toThrow();
    });

    it('should report the first missing field with context', () => {
      const data: { api_key?: string; bearer_token_prefix?: string } = {
        bearer_token_prefix: 'Bearer',
      };
      expect(() =>
        ValidationUtils.validateRequired(data, ['api_key'], 'credential'),
      ).toThrow('credential: Missing required field: api_key');
    });
  });
});
