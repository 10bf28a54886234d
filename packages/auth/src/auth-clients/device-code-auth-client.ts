import { logEvent } from '@credgate/core';
import type { DeviceCodeClientConfig } from '../schemas.js';
import { LoginError, toError } from '../errors/index.js';
import type { OidcCredential } from '../credential/oidc-credential.js';
import type { DeviceAuthorizationResponse } from '../api-clients/types.js';
import { OidcLoginAuthClient } from './oidc-auth-client.js';
import type { DeviceLoginable, LoginOptions } from './types.js';

/**
 * Device authorization grant (RFC 8628).
 *
 * Login can run in one call, or split into {@link deviceLoginInitiate}
 * and {@link deviceLoginComplete} when the caller shows the code itself.
 * @public
 */
export class DeviceCodeAuthClient
  extends OidcLoginAuthClient<DeviceCodeClientConfig>
  implements DeviceLoginable
{
  public async deviceLoginInitiate(
    options: LoginOptions = {},
  ): Promise<DeviceAuthorizationResponse> {
    return this.initiate(this.applyConfigFallback(options));
  }

  /**
   * Polls until the user approves, denies, or the code expires.
   */
  public async deviceLoginComplete(
    initiation: DeviceAuthorizationResponse,
  ): Promise<OidcCredential> {
    const tokenClient = await this.tokenClient();
    const response = await tokenClient.pollForTokenFromDeviceCode({
      clientId: this.oidcConfig.client_id,
      deviceCode: initiation.device_code,
      timeoutSeconds: initiation.expires_in,
      intervalSeconds: initiation.interval,
      authEnricher: this.authEnricher,
    });
    return this.credentialFor(response);
  }

  protected async oidcFlowLogin(options: LoginOptions): Promise<OidcCredential> {
    if (!options.allowOpenBrowser && !options.allowTtyPrompt) {
      throw LoginError.noInteraction('Device code');
    }

    const initiation = await this.initiate(options);
    const verificationUri =
      initiation.verification_uri_complete ?? initiation.verification_uri;

    if (options.allowTtyPrompt) {
      await this.presenter().showDeviceCode({
        userCode: initiation.user_code,
        verificationUri: initiation.verification_uri,
        verificationUriComplete: initiation.verification_uri_complete,
        expiresInSeconds: initiation.expires_in,
      });
    }
    if (options.allowOpenBrowser) {
      try {
        await this.openBrowser(verificationUri);
      } catch (error) {
        logEvent('warn', 'auth:browser_open_failed', { error: toError(error).message });
      }
    }

    return this.deviceLoginComplete(initiation);
  }

  private async initiate(options: LoginOptions): Promise<DeviceAuthorizationResponse> {
    const client = await this.deviceAuthorizationClient();
    return client.requestDeviceCode(
      { clientId: this.oidcConfig.client_id, authEnricher: this.authEnricher },
      {
        scopes: options.requestedScopes,
        audiences: options.requestedAudiences,
        extra: options.extra,
      },
    );
  }
}
