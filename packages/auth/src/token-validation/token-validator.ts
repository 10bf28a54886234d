import {
  decodeProtectedHeader,
  errors,
  importJWK,
  jwtVerify,
  type JWK,
  type JWTPayload,
  type KeyLike,
} from 'jose';
import { logEvent } from '@credgate/core';
import {
  TokenValidationError,
  TokenValidationErrorKind,
  toError,
} from '../errors/index.js';
import {
  DEFAULT_CLOCK_SKEW_SECONDS,
  DEFAULT_MIN_JWKS_FETCH_INTERVAL_SECONDS,
} from '../constants.js';
import type { Jwk } from '../api-clients/types.js';

export const DEFAULT_ALLOWED_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
] as const;

export type TokenClaims = JWTPayload;

/**
 * Anything that can produce the current key set, usually a
 * {@link JwksApiClient}.
 * @public
 */
export interface JwksKeySource {
  jwksKeys(): Promise<Jwk[]>;
}

/**
 * @public
 */
export interface TokenValidatorOptions {
  clockSkewSeconds?: number;
  /** Floor between key set fetches triggered by unknown key ids. */
  minJwksFetchIntervalSeconds?: number;
  allowedAlgorithms?: readonly string[];
}

/**
 * @public
 */
export interface ValidateTokenParams {
  issuer: string;
  /** The single audience the token must be addressed to. */
  audience: string;
  /** When non-empty, the token must hold at least one of these scopes. */
  scopesAnyOf?: string[];
  nonce?: string;
}

const JWK_STRING_FIELDS = ['kty', 'kid', 'alg', 'use', 'n', 'e', 'crv', 'x', 'y'] as const;

function toJoseJwk(jwk: Jwk): JWK {
  const source: Record<string, unknown> = jwk;
  const result: JWK = {};
  for (const field of JWK_STRING_FIELDS) {
    const value = source[field];
    if (typeof value === 'string') {
      result[field] = value;
    }
  }
  return result;
}

function grantedScopes(claims: TokenClaims): string[] {
  if (typeof claims.scope === 'string') {
    return claims.scope.split(' ').filter((scope) => scope.length > 0);
  }
  if (Array.isArray(claims.scp)) {
    return claims.scp.filter((scope): scope is string => typeof scope === 'string');
  }
  if (typeof claims.scp === 'string') {
    return claims.scp.split(' ').filter((scope) => scope.length > 0);
  }
  return [];
}

function mapJoseError(error: unknown): TokenValidationError {
  const cause = toError(error);
  if (error instanceof TokenValidationError) {
    return error;
  }
  if (error instanceof errors.JWTExpired) {
    return new TokenValidationError(
      'Token has expired',
      TokenValidationErrorKind.EXPIRED,
      cause,
    );
  }
  if (error instanceof errors.JWTClaimValidationFailed) {
    switch (error.claim) {
      case 'nbf':
        return new TokenValidationError(
          'Token is not yet valid',
          TokenValidationErrorKind.NOT_YET_VALID,
          cause,
        );
      case 'iss':
        return new TokenValidationError(
          'Token issuer does not match the expected issuer',
          TokenValidationErrorKind.WRONG_ISSUER,
          cause,
        );
      case 'aud':
        return new TokenValidationError(
          'Token is not addressed to the expected audience',
          TokenValidationErrorKind.WRONG_AUDIENCE,
          cause,
        );
      default:
        return new TokenValidationError(
          `Token claim '${error.claim}' failed validation: ${error.reason}`,
          TokenValidationErrorKind.INVALID_TOKEN,
          cause,
        );
    }
  }
  if (error instanceof errors.JOSEAlgNotAllowed) {
    return new TokenValidationError(
      'Token signing algorithm is not allowed',
      TokenValidationErrorKind.INVALID_ALGORITHM,
      cause,
    );
  }
  return new TokenValidationError(
    `Token failed validation: ${cause.message}`,
    TokenValidationErrorKind.INVALID_TOKEN,
    cause,
  );
}

/**
 * Validates signed JWTs against an issuer's published keys.
 *
 * Keys are cached by `kid`. A token signed with an unknown key triggers one
 * key set refetch, at most once per `minJwksFetchIntervalSeconds`; a key
 * still missing afterwards fails with `unknown_signing_key`.
 *
 * Every failure is a {@link TokenValidationError} whose `kind` tells the
 * reasons apart.
 * @public
 */
export class TokenValidator {
  private readonly clockSkewSeconds: number;
  private readonly minJwksFetchIntervalMs: number;
  private readonly allowedAlgorithms: readonly string[];
  private readonly jwksByKid = new Map<string, Jwk>();
  private readonly importedKeys = new Map<string, KeyLike | Uint8Array>();
  private lastJwksFetch = 0;
  private pendingFetch?: Promise<void>;

  public constructor(
    private readonly jwksSource: JwksKeySource,
    options: TokenValidatorOptions = {},
  ) {
    this.clockSkewSeconds = options.clockSkewSeconds ?? DEFAULT_CLOCK_SKEW_SECONDS;
    this.minJwksFetchIntervalMs =
      (options.minJwksFetchIntervalSeconds ??
        DEFAULT_MIN_JWKS_FETCH_INTERVAL_SECONDS) * 1000;
    this.allowedAlgorithms = options.allowedAlgorithms ?? DEFAULT_ALLOWED_ALGORITHMS;
  }

  /**
   * Verifies signature, issuer, audience, time window and, when asked,
   * scopes and nonce. Returns the verified claims.
   */
  public async validateToken(
    token: string,
    params: ValidateTokenParams,
  ): Promise<TokenClaims> {
    if (!token) {
      throw new TokenValidationError(
        'Cannot validate an empty token',
        TokenValidationErrorKind.INVALID_ARGUMENT,
      );
    }
    if (!params.issuer) {
      throw new TokenValidationError(
        'An issuer is required to validate a token',
        TokenValidationErrorKind.INVALID_ARGUMENT,
      );
    }
    if (!params.audience) {
      throw new TokenValidationError(
        'An audience is required to validate a token',
        TokenValidationErrorKind.INVALID_ARGUMENT,
      );
    }

    let kid: string | undefined;
    let alg: string | undefined;
    try {
      ({ kid, alg } = decodeProtectedHeader(token));
    } catch (error) {
      throw mapJoseError(error);
    }

    if (!alg || !this.allowedAlgorithms.includes(alg)) {
      throw new TokenValidationError(
        `Token signing algorithm '${alg ?? 'none'}' is not allowed`,
        TokenValidationErrorKind.INVALID_ALGORITHM,
      );
    }
    if (!kid) {
      throw new TokenValidationError(
        'Token header does not name a signing key',
        TokenValidationErrorKind.INVALID_TOKEN,
      );
    }

    const key = await this.keyFor(kid, alg);

    let claims: TokenClaims;
    try {
      ({ payload: claims } = await jwtVerify(token, key, {
        issuer: params.issuer,
        audience: params.audience,
        algorithms: [...this.allowedAlgorithms],
        clockTolerance: this.clockSkewSeconds,
        requiredClaims: ['exp'],
      }));
    } catch (error) {
      throw mapJoseError(error);
    }

    if (params.nonce !== undefined && claims.nonce !== params.nonce) {
      throw new TokenValidationError(
        'Token nonce does not match the request nonce',
        TokenValidationErrorKind.INVALID_TOKEN,
      );
    }

    if (params.scopesAnyOf?.length) {
      const granted = grantedScopes(claims);
      if (!params.scopesAnyOf.some((scope) => granted.includes(scope))) {
        throw new TokenValidationError(
          `Token holds none of the required scopes: ${params.scopesAnyOf.join(' ')}`,
          TokenValidationErrorKind.SCOPE_NOT_GRANTED,
        );
      }
    }

    return claims;
  }

  /**
   * Validates an ID token, whose audience is the client id.
   */
  public async validateIdToken(
    token: string,
    issuer: string,
    clientId: string,
    nonce?: string,
  ): Promise<TokenClaims> {
    return this.validateToken(token, { issuer, audience: clientId, nonce });
  }

  private async keyFor(kid: string, alg: string): Promise<KeyLike | Uint8Array> {
    const imported = this.importedKeys.get(kid);
    if (imported) {
      return imported;
    }

    if (!this.jwksByKid.has(kid) && this.mayRefetch()) {
      await this.refreshJwks();
    }

    const jwk = this.jwksByKid.get(kid);
    if (!jwk) {
      throw new TokenValidationError(
        `No signing key with id '${kid}' in the issuer's key set`,
        TokenValidationErrorKind.UNKNOWN_SIGNING_KEY,
      );
    }

    try {
      const key = await importJWK(toJoseJwk(jwk), jwk.alg ?? alg);
      this.importedKeys.set(kid, key);
      return key;
    } catch (error) {
      throw new TokenValidationError(
        `Signing key '${kid}' could not be imported: ${toError(error).message}`,
        TokenValidationErrorKind.INVALID_ALGORITHM,
        toError(error),
      );
    }
  }

  private mayRefetch(): boolean {
    return (
      this.lastJwksFetch === 0 ||
      Date.now() - this.lastJwksFetch >= this.minJwksFetchIntervalMs
    );
  }

  private async refreshJwks(): Promise<void> {
    if (!this.pendingFetch) {
      this.pendingFetch = (async () => {
        const keys = await this.jwksSource.jwksKeys();
        this.lastJwksFetch = Date.now();
        this.jwksByKid.clear();
        this.importedKeys.clear();
        for (const key of keys) {
          if (key.kid) {
            this.jwksByKid.set(key.kid, key);
          }
        }
        logEvent('debug', 'auth:jwks_refreshed', { keyCount: keys.length });
      })();
    }
    try {
      await this.pendingFetch;
    } finally {
      this.pendingFetch = undefined;
    }
  }
}
