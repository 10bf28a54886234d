import { describe, it, expect } from 'vitest';
import {
  computeRefreshAt,
  inspectUnverifiedClaims,
} from '../../token-validation/jwt-inspection.js';
import { TokenValidationErrorKind } from '../../errors/index.js';
import { unsignedJwt } from '../helpers/test-utils.js';

describe('inspectUnverifiedClaims', () => {
  it('should decode the payload without a signature check', () => {
    expect(inspectUnverifiedClaims(unsignedJwt({ iss: 'https://a.example.com', sub: 'u' }))).toEqual({
      iss: 'https://a.example.com',
      sub: 'u',
    });
  });

  it('should reject a value that is not a JWT', () => {
    let caught: unknown;
    try {
      inspectUnverifiedClaims('opaque-token');
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ kind: TokenValidationErrorKind.INVALID_TOKEN });
  });
});

describe('computeRefreshAt', () => {
  it('should land at three quarters of the lifetime', () => {
    expect(computeRefreshAt({ iat: 0, exp: 100 })).toBe(75);
    expect(computeRefreshAt({ iat: 1000, exp: 4600 })).toBe(3700);
  });

  it('should floor fractional results', () => {
    expect(computeRefreshAt({ iat: 0, exp: 3 })).toBe(2);
  });

  it('should count missing claims as zero', () => {
    expect(computeRefreshAt({})).toBe(0);
    expect(computeRefreshAt({ exp: 100 })).toBe(75);
  });
});
