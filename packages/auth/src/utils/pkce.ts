/**
 * PKCE (RFC 7636) and anti-forgery values for the authorization code flow.
 */
import { randomBytes, createHash } from 'crypto';

/**
 * A fresh code verifier: 32 random bytes, base64url encoded to 43
 * characters.
 * @public
 */
export function generateCodeVerifier(): string {
  return randomBytes(32).toString('base64url');
}

/**
 * The S256 challenge for a verifier.
 * @example
 * ```typescript
 * const verifier = generateCodeVerifier();
 * const url = buildAuthorizationUrl({ ...params, codeChallenge: generateCodeChallenge(verifier) });
 * // later: exchange the code together with `verifier`
 * ```
 * @public
 */
export function generateCodeChallenge(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

/**
 * Random value for the `state` parameter, checked again on the callback.
 * @public
 */
export function generateState(): string {
  return randomBytes(16).toString('base64url');
}

/**
 * Random value for the `nonce` parameter, echoed back in the ID token.
 * @public
 */
export function generateNonce(): string {
  return randomBytes(16).toString('base64url');
}
