import { OidcApiClient } from './oidc-api-client.js';
import type { ClientAuthEnricher } from './types.js';

/**
 * Client for the token revocation endpoint (RFC 7009).
 * @public
 */
export class RevocationApiClient extends OidcApiClient {
  public async revokeAccessToken(
    token: string,
    authEnricher: ClientAuthEnricher,
  ): Promise<void> {
    await this.revoke(token, 'access_token', authEnricher);
  }

  public async revokeRefreshToken(
    token: string,
    authEnricher: ClientAuthEnricher,
  ): Promise<void> {
    await this.revoke(token, 'refresh_token', authEnricher);
  }

  private async revoke(
    token: string,
    tokenTypeHint: 'access_token' | 'refresh_token',
    authEnricher: ClientAuthEnricher,
  ): Promise<void> {
    const enriched = await authEnricher(
      { token, token_type_hint: tokenTypeHint },
      this.endpointUri,
    );
    await this.checkedPostForm(enriched.payload, enriched.headers);
  }
}
