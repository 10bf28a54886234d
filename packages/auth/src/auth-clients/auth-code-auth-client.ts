import { promises as fs } from 'fs';
import { logEvent } from '@credgate/core';
import type { AuthCodeClientConfig } from '../schemas.js';
import { LoginError, toError } from '../errors/index.js';
import type { OidcCredential } from '../credential/oidc-credential.js';
import type { AuthorizationRequest } from '../api-clients/authorization-api-client.js';
import type { TokenResponse } from '../api-clients/types.js';
import { inspectUnverifiedClaims } from '../token-validation/jwt-inspection.js';
import {
  generateCodeChallenge,
  generateCodeVerifier,
  generateNonce,
  generateState,
} from '../utils/pkce.js';
import { OidcLoginAuthClient } from './oidc-auth-client.js';
import type { LoginOptions } from './types.js';

/**
 * Authorization code flow with PKCE (RFC 6749 section 4.1, RFC 7636).
 *
 * With `allowOpenBrowser` the user's browser is sent to the authorization
 * URL and the code arrives at a loopback listener on `local_redirect_uri`
 * (or `redirect_uri`). With only `allowTtyPrompt` the URL is printed and the
 * user pastes the code back. A callback whose `state` does not match the
 * request is fatal, as is an ID token whose `nonce` does not match.
 * @public
 */
export class AuthCodeAuthClient extends OidcLoginAuthClient<AuthCodeClientConfig> {
  protected async oidcFlowLogin(options: LoginOptions): Promise<OidcCredential> {
    const codeVerifier = generateCodeVerifier();
    const request: AuthorizationRequest = {
      clientId: this.oidcConfig.client_id,
      redirectUri: this.oidcConfig.redirect_uri,
      state: generateState(),
      nonce: generateNonce(),
      codeChallenge: generateCodeChallenge(codeVerifier),
      scopes: options.requestedScopes,
      audiences: options.requestedAudiences,
      extra: options.extra,
    };

    const code = await this.obtainCode(request, options);
    const tokenClient = await this.tokenClient();
    const response = await tokenClient.getTokenFromCode({
      clientId: this.oidcConfig.client_id,
      redirectUri: this.oidcConfig.redirect_uri,
      code,
      codeVerifier,
      authEnricher: this.authEnricher,
    });
    this.checkNonce(response, request.nonce);
    return this.credentialFor(response);
  }

  private async obtainCode(
    request: AuthorizationRequest,
    options: LoginOptions,
  ): Promise<string> {
    const authorizationClient = await this.authorizationClient();

    if (options.allowOpenBrowser) {
      return authorizationClient.authcodeWithCallbackListener({
        request,
        listenUri: this.oidcConfig.local_redirect_uri ?? this.oidcConfig.redirect_uri,
        timeoutSeconds: options.timeoutSeconds,
        acknowledgementHtml: await this.acknowledgementHtml(),
        presentUrl: (url) => this.presentUrl(url, options.allowTtyPrompt ?? false),
      });
    }

    if (options.allowTtyPrompt) {
      const presenter = this.presenter();
      return authorizationClient.authcodeWithoutCallbackListener({
        request,
        promptForCode: (url) => presenter.promptForAuthorizationCode(url),
      });
    }

    throw LoginError.noInteraction('Authorization code');
  }

  private async presentUrl(url: string, allowTtyPrompt: boolean): Promise<void> {
    try {
      await this.openBrowser(url);
    } catch (error) {
      logEvent('warn', 'auth:browser_open_failed', { error: toError(error).message });
      await this.presenter().showAuthorizationUrl(url);
      return;
    }
    if (allowTtyPrompt) {
      await this.presenter().showAuthorizationUrl(url);
    }
  }

  private async acknowledgementHtml(): Promise<string | undefined> {
    if (this.oidcConfig.authorization_callback_acknowledgement) {
      return this.oidcConfig.authorization_callback_acknowledgement;
    }
    const file = this.oidcConfig.authorization_callback_acknowledgement_file;
    return file ? fs.readFile(file, 'utf-8') : undefined;
  }

  /**
   * The ID token comes straight from the token endpoint over TLS, so its
   * nonce is read without a signature check.
   */
  private checkNonce(response: TokenResponse, nonce: string | undefined): void {
    if (!response.id_token || !nonce) {
      return;
    }
    const claims = inspectUnverifiedClaims(response.id_token);
    if (claims.nonce !== undefined && claims.nonce !== nonce) {
      throw new LoginError('ID token nonce does not match the authorization request');
    }
  }
}
