import { buildAuthorizationUrl, type AuthUrlParams } from '../utils/auth-url.js';
import { LoginError } from '../errors/index.js';
import { OidcApiClient } from './oidc-api-client.js';
import { waitForAuthorizationCallback } from './callback-listener.js';

/**
 * Authorization request fields, minus the endpoint this client already knows.
 * @public
 */
export type AuthorizationRequest = Omit<AuthUrlParams, 'authorizationEndpoint'>;

/**
 * Client for the authorization endpoint. The endpoint is never called
 * directly: the user's browser visits the URL built here.
 * @public
 */
export class AuthorizationApiClient extends OidcApiClient {
  public authorizationUrl(request: AuthorizationRequest): string {
    return buildAuthorizationUrl({
      ...request,
      authorizationEndpoint: this.endpointUri,
    }).toString();
  }

  /**
   * Starts a loopback listener on `listenUri`, hands the authorization URL
   * to `presentUrl` once it is listening, and resolves with the code the
   * redirect delivers.
   *
   * The request's `redirectUri` is what the auth server sees; `listenUri`
   * is where the redirect is received, which differs behind port forwards.
   */
  public async authcodeWithCallbackListener(params: {
    request: AuthorizationRequest;
    listenUri: string;
    presentUrl: (url: string) => Promise<void>;
    timeoutSeconds?: number;
    acknowledgementHtml?: string;
  }): Promise<string> {
    const url = this.authorizationUrl(params.request);
    return waitForAuthorizationCallback({
      listenUri: params.listenUri,
      expectedState: params.request.state,
      timeoutSeconds: params.timeoutSeconds,
      acknowledgementHtml: params.acknowledgementHtml,
      onListening: () => params.presentUrl(url),
    });
  }

  /**
   * Presents the authorization URL and waits for the user to paste back the
   * code shown on the redirect page.
   */
  public async authcodeWithoutCallbackListener(params: {
    request: AuthorizationRequest;
    promptForCode: (url: string) => Promise<string>;
  }): Promise<string> {
    const code = (await params.promptForCode(this.authorizationUrl(params.request))).trim();
    if (!code) {
      throw new LoginError('No authorization code entered');
    }
    return code;
  }
}
