import { TokenValidationError, TokenValidationErrorKind } from '../errors/index.js';
import { OidcApiClient } from './oidc-api-client.js';
import {
  IntrospectionResponseSchema,
  type ClientAuthEnricher,
  type IntrospectionResponse,
} from './types.js';

type TokenTypeHint = 'access_token' | 'id_token' | 'refresh_token';

/**
 * Client for the token introspection endpoint (RFC 7662).
 *
 * Inactive tokens raise {@link TokenValidationError} with kind
 * `inactive_token`; active ones return the full introspection response.
 * @public
 */
export class IntrospectionApiClient extends OidcApiClient {
  public async validateAccessToken(
    token: string,
    authEnricher: ClientAuthEnricher,
  ): Promise<IntrospectionResponse> {
    return this.introspect(token, 'access_token', authEnricher);
  }

  public async validateIdToken(
    token: string,
    authEnricher: ClientAuthEnricher,
  ): Promise<IntrospectionResponse> {
    return this.introspect(token, 'id_token', authEnricher);
  }

  public async validateRefreshToken(
    token: string,
    authEnricher: ClientAuthEnricher,
  ): Promise<IntrospectionResponse> {
    return this.introspect(token, 'refresh_token', authEnricher);
  }

  private async introspect(
    token: string,
    tokenTypeHint: TokenTypeHint,
    authEnricher: ClientAuthEnricher,
  ): Promise<IntrospectionResponse> {
    if (!token) {
      throw new TokenValidationError(
        'Cannot introspect an empty token',
        TokenValidationErrorKind.INVALID_ARGUMENT,
      );
    }
    const enriched = await authEnricher(
      { token, token_type_hint: tokenTypeHint },
      this.endpointUri,
    );
    const response = await this.checkedPostFormJson(
      IntrospectionResponseSchema,
      enriched.payload,
      enriched.headers,
    );
    if (!response.active) {
      throw new TokenValidationError(
        `Auth server reports the ${tokenTypeHint} as inactive`,
        TokenValidationErrorKind.INACTIVE_TOKEN,
      );
    }
    return response;
  }
}
