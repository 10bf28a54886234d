/**
 * Unverified JWT inspection.
 *
 * Nothing here checks a signature. These helpers read our own tokens to time
 * refreshes and to route a token to its issuer's validator; they must never
 * decide whether a token is trusted. Use {@link TokenValidator} for that.
 */
import { decodeJwt, type JWTPayload } from 'jose';
import {
  TokenValidationError,
  TokenValidationErrorKind,
  toError,
} from '../errors/index.js';

export type UnverifiedClaims = JWTPayload;

/**
 * Decodes a JWT payload without verifying it.
 * @throws {TokenValidationError} `invalid_token` when the token is not a decodable JWT
 */
export function inspectUnverifiedClaims(token: string): UnverifiedClaims {
  try {
    return decodeJwt(token);
  } catch (error) {
    throw new TokenValidationError(
      `Token is not a decodable JWT: ${toError(error).message}`,
      TokenValidationErrorKind.INVALID_TOKEN,
      toError(error),
    );
  }
}

/**
 * Epoch second at which a token has used three quarters of its lifetime.
 * Missing `iat` or `exp` count as 0.
 */
export function computeRefreshAt(claims: UnverifiedClaims): number {
  const iat = claims.iat ?? 0;
  const exp = claims.exp ?? 0;
  return Math.floor(iat + (3 * (exp - iat)) / 4);
}
