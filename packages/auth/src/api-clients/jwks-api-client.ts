import { OidcApiClient } from './oidc-api-client.js';
import { JwksSchema, type Jwk } from './types.js';

/**
 * Fetches the auth server's JSON Web Key Set. Every call goes to the
 * network; key caching belongs to the token validator.
 * @public
 */
export class JwksApiClient extends OidcApiClient {
  public async jwksKeys(): Promise<Jwk[]> {
    const jwks = await this.checkedGetJson(JwksSchema);
    return jwks.keys;
  }

  public async jwksKeysFromKid(kid: string): Promise<Jwk | undefined> {
    const keys = await this.jwksKeys();
    return keys.find((key) => key.kid === kid);
  }
}
