import type { ClientCredentialsClientConfig } from '../schemas.js';
import { OidcCredential } from '../credential/oidc-credential.js';
import type { RequestAuthenticator } from '../request-authenticator/request-authenticator.js';
import { RefreshOrReloginOidcTokenRequestAuthenticator } from '../request-authenticator/refreshing-oidc-request-authenticator.js';
import { OidcLoginAuthClient } from './oidc-auth-client.js';
import type { LoginOptions } from './types.js';

/**
 * Client credentials grant (RFC 6749 section 4.4). No user interaction, so
 * its default authenticator logs in again when it cannot refresh.
 * @public
 */
export class ClientCredentialsAuthClient extends OidcLoginAuthClient<ClientCredentialsClientConfig> {
  public override defaultRequestAuthenticator(tokenFile?: string): RequestAuthenticator {
    return new RefreshOrReloginOidcTokenRequestAuthenticator(
      new OidcCredential(null, tokenFile),
      this,
    );
  }

  protected async oidcFlowLogin(options: LoginOptions): Promise<OidcCredential> {
    const tokenClient = await this.tokenClient();
    const response = await tokenClient.getTokenFromClientCredentials(
      { clientId: this.oidcConfig.client_id, authEnricher: this.authEnricher },
      {
        scopes: options.requestedScopes,
        audiences: options.requestedAudiences,
        extra: options.extra,
      },
    );
    return this.credentialFor(response);
  }
}
