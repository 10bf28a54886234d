import { logEvent } from '@credgate/core';
import {
  AuthClientConfigError,
  TokenValidationError,
  TokenValidationErrorKind,
  toError,
} from '../errors/index.js';
import type { IntrospectionResponse } from '../api-clients/types.js';
import type { OidcAuthClient } from '../auth-clients/oidc-auth-client.js';
import { inspectUnverifiedClaims } from './jwt-inspection.js';
import type { TokenClaims, TokenValidator } from './token-validator.js';

/**
 * One issuer a resource server accepts tokens from.
 * @public
 */
export interface IssuerTrustEntry {
  issuer: string;
  /** The audience tokens from this issuer must be addressed to. */
  audience: string;
  tokenValidator: TokenValidator;
  /** Introspects tokens for remote revocation checks. */
  remoteValidator?: {
    validateAccessTokenRemote(token: string): Promise<IntrospectionResponse>;
  };
}

/**
 * @public
 */
export interface MultiIssuerValidationResult {
  issuer: string;
  claims: TokenClaims;
  /** Present when a remote revocation check ran. */
  introspection?: IntrospectionResponse;
}

/**
 * Validates bearer tokens from any of several trusted issuers.
 *
 * The token's unverified `iss` claim only selects which issuer's keys and
 * audience to validate against; trust comes from that validation. Issuers
 * are matched by exact string.
 * @public
 */
export class OidcMultiIssuerValidator {
  private readonly trusted = new Map<string, IssuerTrustEntry>();
  private readonly logResult: boolean;

  public constructor(
    entries: IssuerTrustEntry[],
    options: { logResult?: boolean } = {},
  ) {
    for (const entry of entries) {
      if (this.trusted.has(entry.issuer)) {
        throw new AuthClientConfigError(
          `Issuer '${entry.issuer}' is configured more than once`,
        );
      }
      this.trusted.set(entry.issuer, entry);
    }
    this.logResult = options.logResult ?? true;
  }

  /**
   * Builds trust entries from OIDC clients, each contributing its issuer,
   * its one configured audience, its key set and its introspection endpoint.
   */
  public static async fromAuthClients(
    clients: OidcAuthClient[],
    options: { logResult?: boolean } = {},
  ): Promise<OidcMultiIssuerValidator> {
    const entries = await Promise.all(
      clients.map(async (client): Promise<IssuerTrustEntry> => ({
        issuer: await client.issuer(),
        audience: client.singleConfiguredAudience(),
        tokenValidator: await client.tokenValidator(),
        remoteValidator: client,
      })),
    );
    return new OidcMultiIssuerValidator(entries, options);
  }

  public issuers(): string[] {
    return [...this.trusted.keys()];
  }

  /**
   * @throws {TokenValidationError} `untrusted_issuer` for an issuer not in the
   * trust set, `invalid_token` for a token without a readable `iss`, or the
   * kind the issuer's validator reports
   */
  public async validateAccessToken(
    token: string,
    options: { scopesAnyOf?: string[]; doRemoteRevocationCheck?: boolean } = {},
  ): Promise<MultiIssuerValidationResult> {
    if (!token) {
      throw new TokenValidationError(
        'Cannot validate an empty token',
        TokenValidationErrorKind.INVALID_ARGUMENT,
      );
    }

    const unverifiedIssuer = inspectUnverifiedClaims(token).iss;
    if (!unverifiedIssuer) {
      throw new TokenValidationError(
        'Token carries no issuer claim',
        TokenValidationErrorKind.INVALID_TOKEN,
      );
    }

    const entry = this.trusted.get(unverifiedIssuer);
    if (!entry) {
      this.report(unverifiedIssuer, undefined);
      throw new TokenValidationError(
        `Issuer '${unverifiedIssuer}' is not trusted`,
        TokenValidationErrorKind.UNTRUSTED_ISSUER,
      );
    }

    try {
      const claims = await entry.tokenValidator.validateToken(token, {
        issuer: entry.issuer,
        audience: entry.audience,
        scopesAnyOf: options.scopesAnyOf,
      });

      let introspection: IntrospectionResponse | undefined;
      if (options.doRemoteRevocationCheck) {
        if (!entry.remoteValidator) {
          throw new AuthClientConfigError(
            `No introspection is configured for issuer '${entry.issuer}'`,
          );
        }
        introspection = await entry.remoteValidator.validateAccessTokenRemote(token);
      }

      this.report(entry.issuer, claims);
      return { issuer: entry.issuer, claims, introspection };
    } catch (error) {
      this.report(entry.issuer, undefined, error);
      throw error;
    }
  }

  private report(issuer: string, claims: TokenClaims | undefined, error?: unknown): void {
    if (!this.logResult) {
      return;
    }
    if (claims) {
      logEvent('info', 'auth:token_validated', {
        issuer,
        sub: claims.sub,
        jti: claims.jti,
      });
      return;
    }
    logEvent('warn', 'auth:token_rejected', {
      issuer,
      kind: error instanceof TokenValidationError ? error.kind : undefined,
      error: error === undefined ? 'untrusted issuer' : toError(error).message,
    });
  }
}
