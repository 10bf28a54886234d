import { OidcApiClient } from './oidc-api-client.js';
import { UserinfoResponseSchema, type UserinfoResponse } from './types.js';

/**
 * Client for the OIDC userinfo endpoint.
 * @public
 */
export class UserinfoApiClient extends OidcApiClient {
  public async userinfoFromAccessToken(
    accessToken: string,
  ): Promise<UserinfoResponse> {
    return this.checkedGetJson(UserinfoResponseSchema, undefined, {
      Authorization: `Bearer ${accessToken}`,
    });
  }
}
