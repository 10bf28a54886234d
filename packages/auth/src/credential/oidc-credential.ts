import { DataIntegrityError } from '../errors/index.js';
import type { JsonObject } from '../persistence/json-file.js';
import type { TokenResponse } from '../api-clients/types.js';
import { Credential } from './credential.js';

const TOKEN_FIELDS = ['access_token', 'id_token', 'refresh_token'] as const;

/**
 * Token set returned by an OIDC token endpoint, persisted as JSON.
 *
 * Must hold at least one of `access_token`, `id_token` or `refresh_token`.
 * @public
 */
export class OidcCredential extends Credential {
  public override checkData(data: JsonObject | null): void {
    super.checkData(data);
    const hasToken = TOKEN_FIELDS.some((field) => {
      const value = data?.[field];
      return typeof value === 'string' && value.length > 0;
    });
    if (!hasToken) {
      throw new DataIntegrityError(
        'OIDC credential must contain at least one of access_token, id_token or refresh_token',
        { filePath: this.path() },
      );
    }
  }

  public accessToken(): string | undefined {
    return this.getString('access_token');
  }

  public idToken(): string | undefined {
    return this.getString('id_token');
  }

  public refreshToken(): string | undefined {
    return this.getString('refresh_token');
  }

  public tokenType(): string | undefined {
    return this.getString('token_type');
  }

  public scope(): string | undefined {
    return this.getString('scope');
  }

  /**
   * Builds a credential from a token endpoint response, stamping `_iat`
   * with the current time and `_exp` from `expires_in` when present.
   * @param response - Validated token endpoint response
   * @param filePath - Where the credential will be saved, if anywhere
   * @param nowSeconds - Issue time in epoch seconds
   */
  public static fromTokenResponse(
    response: TokenResponse,
    filePath?: string,
    nowSeconds: number = Math.floor(Date.now() / 1000),
  ): OidcCredential {
    const data: JsonObject = { ...response, _iat: nowSeconds };
    if (response.expires_in !== undefined) {
      data._exp = nowSeconds + response.expires_in;
    }
    const credential = new OidcCredential(null, filePath);
    credential.setData(data);
    return credential;
  }
}
