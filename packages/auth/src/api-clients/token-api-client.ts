import { logEvent } from '@credgate/core';
import { LoginError, OAuth2ErrorCode, OidcProtocolError } from '../errors/index.js';
import { delay } from '../utils/delay.js';
import { OidcApiClient } from './oidc-api-client.js';
import {
  TokenResponseSchema,
  type ClientAuthEnricher,
  type ExtraParams,
  type FormPayload,
  type TokenResponse,
} from './types.js';

export const DEVICE_CODE_GRANT_TYPE =
  'urn:ietf:params:oauth:grant-type:device_code';

/** Seconds added to the poll interval on `slow_down`. */
const SLOW_DOWN_INCREMENT_SECONDS = 5;
const DEFAULT_POLL_INTERVAL_SECONDS = 5;

/**
 * Scope, audience and extra parameters of a token request.
 * @public
 */
export interface TokenRequestOptions {
  scopes?: string[];
  audiences?: string[];
  extra?: ExtraParams;
}

/**
 * Parameters of a device code poll.
 * @public
 */
export interface DevicePollParams {
  clientId: string;
  deviceCode: string;
  /** Seconds before polling gives up. */
  timeoutSeconds: number;
  /** Server-requested poll interval in seconds. */
  intervalSeconds?: number;
  authEnricher: ClientAuthEnricher;
}

function requestFields(options: TokenRequestOptions = {}): FormPayload {
  return {
    scope: options.scopes?.length ? options.scopes.join(' ') : undefined,
    audience: options.audiences?.length ? options.audiences : undefined,
    ...options.extra,
  };
}

/**
 * Client for the token endpoint (RFC 6749 section 3.2).
 *
 * Every grant posts a form and expects a response carrying `access_token`.
 * @public
 */
export class TokenApiClient extends OidcApiClient {
  private async requestToken(
    payload: FormPayload,
    authEnricher: ClientAuthEnricher,
  ): Promise<TokenResponse> {
    const enriched = await authEnricher(payload, this.endpointUri);
    const response = await this.checkedPostFormJson(
      TokenResponseSchema,
      enriched.payload,
      enriched.headers,
    );
    logEvent('debug', 'auth:token_response', {
      endpoint: this.endpointUri,
      grantType: payload.grant_type,
      expiresIn: response.expires_in,
      hasRefreshToken: Boolean(response.refresh_token),
    });
    return response;
  }

  public async getTokenFromCode(params: {
    clientId: string;
    redirectUri: string;
    code: string;
    codeVerifier: string;
    authEnricher: ClientAuthEnricher;
  }): Promise<TokenResponse> {
    return this.requestToken(
      {
        grant_type: 'authorization_code',
        client_id: params.clientId,
        redirect_uri: params.redirectUri,
        code: params.code,
        code_verifier: params.codeVerifier,
      },
      params.authEnricher,
    );
  }

  /**
   * Exchanges a refresh token. Scopes are sent only when given.
   */
  public async getTokenFromRefresh(params: {
    clientId: string;
    refreshToken: string;
    authEnricher: ClientAuthEnricher;
    scopes?: string[];
    extra?: ExtraParams;
  }): Promise<TokenResponse> {
    return this.requestToken(
      {
        grant_type: 'refresh_token',
        client_id: params.clientId,
        refresh_token: params.refreshToken,
        ...requestFields({ scopes: params.scopes, extra: params.extra }),
      },
      params.authEnricher,
    );
  }

  public async getTokenFromClientCredentials(
    params: { clientId: string; authEnricher: ClientAuthEnricher },
    options?: TokenRequestOptions,
  ): Promise<TokenResponse> {
    return this.requestToken(
      {
        grant_type: 'client_credentials',
        client_id: params.clientId,
        ...requestFields(options),
      },
      params.authEnricher,
    );
  }

  public async getTokenFromPassword(
    params: {
      clientId: string;
      username: string;
      password: string;
      authEnricher: ClientAuthEnricher;
    },
    options?: TokenRequestOptions,
  ): Promise<TokenResponse> {
    return this.requestToken(
      {
        grant_type: 'password',
        client_id: params.clientId,
        username: params.username,
        password: params.password,
        ...requestFields(options),
      },
      params.authEnricher,
    );
  }

  /**
   * Polls for the token of a device authorization (RFC 8628 section 3.4).
   *
   * The first poll is immediate. `authorization_pending` waits one interval,
   * `slow_down` grows the interval by 5 seconds; any other server error ends
   * the poll.
   * @throws {LoginError} When the deadline passes before the user approves
   * @throws {OidcProtocolError} On `access_denied`, `expired_token` or other server errors
   */
  public async pollForTokenFromDeviceCode(
    params: DevicePollParams,
  ): Promise<TokenResponse> {
    const deadline = Date.now() + params.timeoutSeconds * 1000;
    let intervalSeconds = params.intervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS;
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        return await this.requestToken(
          {
            grant_type: DEVICE_CODE_GRANT_TYPE,
            client_id: params.clientId,
            device_code: params.deviceCode,
          },
          params.authEnricher,
        );
      } catch (error) {
        if (!(error instanceof OidcProtocolError)) {
          throw error;
        }
        if (error.errorCode === OAuth2ErrorCode.SLOW_DOWN) {
          intervalSeconds += SLOW_DOWN_INCREMENT_SECONDS;
        } else if (error.errorCode !== OAuth2ErrorCode.AUTHORIZATION_PENDING) {
          throw error;
        }
      }

      if (Date.now() + intervalSeconds * 1000 > deadline) {
        throw LoginError.timedOut('Device code', params.timeoutSeconds);
      }
      logEvent('debug', 'auth:device_poll_pending', {
        attempt,
        nextPollSeconds: intervalSeconds,
      });
      await delay(intervalSeconds * 1000);
    }
  }
}
