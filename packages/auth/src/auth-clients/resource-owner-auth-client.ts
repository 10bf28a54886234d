import type { ResourceOwnerClientConfig } from '../schemas.js';
import { AuthClientConfigError } from '../errors/index.js';
import { OidcCredential } from '../credential/oidc-credential.js';
import type { RequestAuthenticator } from '../request-authenticator/request-authenticator.js';
import { RefreshOrReloginOidcTokenRequestAuthenticator } from '../request-authenticator/refreshing-oidc-request-authenticator.js';
import { OidcLoginAuthClient } from './oidc-auth-client.js';
import type { LoginOptions } from './types.js';

/**
 * Resource owner password credentials grant (RFC 6749 section 4.3).
 *
 * Kept for servers that offer nothing better. Username and password come
 * from the login options, then the configuration, then a terminal prompt.
 * @public
 */
export class ResourceOwnerAuthClient extends OidcLoginAuthClient<ResourceOwnerClientConfig> {
  public override defaultRequestAuthenticator(tokenFile?: string): RequestAuthenticator {
    return new RefreshOrReloginOidcTokenRequestAuthenticator(
      new OidcCredential(null, tokenFile),
      this,
    );
  }

  protected async oidcFlowLogin(options: LoginOptions): Promise<OidcCredential> {
    const username = await this.resolve(
      'username',
      options.username ?? this.oidcConfig.username,
      options,
      () => this.presenter().promptForUsername(),
    );
    const password = await this.resolve(
      'password',
      options.password ?? this.oidcConfig.password,
      options,
      () => this.presenter().promptForPassword(),
    );

    const tokenClient = await this.tokenClient();
    const response = await tokenClient.getTokenFromPassword(
      {
        clientId: this.oidcConfig.client_id,
        username,
        password,
        authEnricher: this.authEnricher,
      },
      {
        scopes: options.requestedScopes,
        audiences: options.requestedAudiences,
        extra: options.extra,
      },
    );
    return this.credentialFor(response);
  }

  private async resolve(
    field: string,
    value: string | undefined,
    options: LoginOptions,
    prompt: () => Promise<string>,
  ): Promise<string> {
    if (value) {
      return value;
    }
    if (options.allowTtyPrompt) {
      const entered = await prompt();
      if (entered) {
        return entered;
      }
    }
    throw AuthClientConfigError.missingField(field, 'Resource owner login');
  }
}
