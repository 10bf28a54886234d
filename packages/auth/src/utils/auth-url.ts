/**
 * Authorization request URL for the code flow
 */
import type { ExtraParams } from '../api-clients/types.js';

/**
 * Parameters for building an OAuth2 authorization URL with PKCE.
 * @public
 */
export interface AuthUrlParams {
  authorizationEndpoint: string;
  clientId: string;
  redirectUri: string;
  /** Random state parameter for CSRF protection */
  state: string;
  /** PKCE code challenge derived from the code verifier */
  codeChallenge: string;
  /** Replay protection value echoed back in the ID token */
  nonce?: string;
  scopes?: string[];
  audiences?: string[];
  extra?: ExtraParams;
}

/**
 * Builds an OAuth2 authorization URL with PKCE parameters.
 *
 * Constructs a complete authorization URL following RFC 6749 (OAuth2) and RFC 7636 (PKCE).
 * Scopes are space-joined into one `scope` parameter; every audience becomes
 * its own `audience` parameter. Extra parameters are appended last.
 * @param params - Authorization URL parameters
 * @returns Complete authorization URL ready for browser redirect
 * @example
 * ```typescript
 * const authUrl = buildAuthorizationUrl({
 *   authorizationEndpoint: 'https://login.example.com/authorize',
 *   clientId: 'my-client-id',
 *   redirectUri: 'http://localhost:8080/callback',
 *   state: 'random-state-value',
 *   codeChallenge: 'base64url-encoded-challenge',
 *   scopes: ['openid', 'profile'],
 * });
 * // Returns: https://login.example.com/authorize?response_type=code&client_id=...
 * ```
 * @public
 */
export function buildAuthorizationUrl(params: AuthUrlParams): URL {
  const authUrl = new URL(params.authorizationEndpoint);
  authUrl.searchParams.set('response_type', 'code');
  authUrl.searchParams.set('client_id', params.clientId);
  authUrl.searchParams.set('redirect_uri', params.redirectUri);
  authUrl.searchParams.set('state', params.state);
  authUrl.searchParams.set('code_challenge', params.codeChallenge);
  authUrl.searchParams.set('code_challenge_method', 'S256');

  if (params.nonce) {
    authUrl.searchParams.set('nonce', params.nonce);
  }

  if (params.scopes?.length) {
    authUrl.searchParams.set('scope', params.scopes.join(' '));
  }

  for (const audience of params.audiences ?? []) {
    authUrl.searchParams.append('audience', audience);
  }

  for (const [key, value] of Object.entries(params.extra ?? {})) {
    authUrl.searchParams.set(key, value);
  }

  return authUrl;
}
