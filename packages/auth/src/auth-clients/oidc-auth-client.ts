import { logEvent } from '@credgate/core';
import type { OidcClientConfig } from '../schemas.js';
import {
  AuthClientConfigError,
  DataIntegrityError,
} from '../errors/index.js';
import { OidcCredential } from '../credential/oidc-credential.js';
import type { OidcApiClientOptions } from '../api-clients/oidc-api-client.js';
import { DiscoveryApiClient } from '../api-clients/discovery-api-client.js';
import { TokenApiClient } from '../api-clients/token-api-client.js';
import { AuthorizationApiClient } from '../api-clients/authorization-api-client.js';
import { DeviceAuthorizationApiClient } from '../api-clients/device-authorization-api-client.js';
import { IntrospectionApiClient } from '../api-clients/introspection-api-client.js';
import { RevocationApiClient } from '../api-clients/revocation-api-client.js';
import { UserinfoApiClient } from '../api-clients/userinfo-api-client.js';
import { JwksApiClient } from '../api-clients/jwks-api-client.js';
import type {
  ClientAuthEnricher,
  DiscoveryDocument,
  ExtraParams,
  IntrospectionResponse,
  TokenResponse,
  UserinfoResponse,
} from '../api-clients/types.js';
import {
  TokenValidator,
  type TokenClaims,
  type TokenValidatorOptions,
} from '../token-validation/token-validator.js';
import type { RequestAuthenticator } from '../request-authenticator/request-authenticator.js';
import { RefreshingOidcTokenRequestAuthenticator } from '../request-authenticator/refreshing-oidc-request-authenticator.js';
import { clientAuthEnricherFor } from './client-auth.js';
import {
  ConsolePresenter,
  openInBrowser,
  type BrowserOpener,
  type LoginPresenter,
} from './login-presenter.js';
import type {
  AccessTokenValidating,
  AuthClient,
  Loginable,
  LoginOptions,
  Refreshable,
} from './types.js';

/**
 * Collaborators injected into auth clients.
 * @public
 */
export interface AuthClientDeps {
  fetch?: typeof fetch;
  retryDelayMs?: number;
  presenter?: LoginPresenter;
  openBrowser?: BrowserOpener;
  validatorOptions?: TokenValidatorOptions;
}

type DiscoveredEndpoint =
  | 'authorization_endpoint'
  | 'device_authorization_endpoint'
  | 'introspection_endpoint'
  | 'jwks_uri'
  | 'revocation_endpoint'
  | 'token_endpoint'
  | 'userinfo_endpoint';

/**
 * Shared machinery of every OIDC client type.
 *
 * Endpoint clients are created on first use and cached. Each endpoint is
 * taken from the configuration when set there, otherwise from the discovery
 * document; an endpoint found in neither raises {@link AuthClientConfigError}.
 * @public
 */
export abstract class OidcAuthClient<TConfig extends OidcClientConfig = OidcClientConfig>
  implements AuthClient, AccessTokenValidating
{
  public readonly clientType: TConfig['client_type'];
  protected readonly oidcConfig: TConfig;
  protected readonly deps: AuthClientDeps;
  protected readonly authEnricher: ClientAuthEnricher;

  private _discovery?: DiscoveryApiClient;
  private _token?: TokenApiClient;
  private _authorization?: AuthorizationApiClient;
  private _deviceAuthorization?: DeviceAuthorizationApiClient;
  private _introspection?: IntrospectionApiClient;
  private _revocation?: RevocationApiClient;
  private _userinfo?: UserinfoApiClient;
  private _jwks?: JwksApiClient;
  private _validator?: TokenValidator;

  public constructor(config: TConfig, deps: AuthClientDeps = {}) {
    if (!config.auth_server) {
      throw AuthClientConfigError.missingField('auth_server', config.client_type);
    }
    if (!config.client_id) {
      throw AuthClientConfigError.missingField('client_id', config.client_type);
    }
    this.clientType = config.client_type;
    this.oidcConfig = config;
    this.deps = deps;
    this.authEnricher = clientAuthEnricherFor(config);
  }

  public config(): TConfig {
    return this.oidcConfig;
  }

  public abstract defaultRequestAuthenticator(tokenFile?: string): RequestAuthenticator;

  public async issuer(): Promise<string> {
    if (this.oidcConfig.issuer) {
      return this.oidcConfig.issuer;
    }
    return (await this.discoveryClient().discovery()).issuer;
  }

  public async discovery(): Promise<DiscoveryDocument> {
    return this.discoveryClient().discovery();
  }

  /**
   * Scopes the auth server advertises, or an empty list when it does not.
   */
  public async getScopes(): Promise<string[]> {
    return (await this.discovery()).scopes_supported ?? [];
  }

  public async tokenValidator(): Promise<TokenValidator> {
    if (!this._validator) {
      this._validator = new TokenValidator(
        await this.jwksClient(),
        this.deps.validatorOptions,
      );
    }
    return this._validator;
  }

  /**
   * Validates an access token against this client's issuer and keys.
   *
   * The audience is `requiredAudience` when given, otherwise the one
   * configured audience.
   * @throws {AuthClientConfigError} When no audience is given and the configuration does not hold exactly one
   * @throws {TokenValidationError} When the token is not valid
   */
  public async validateAccessTokenLocal(
    token: string,
    requiredAudience?: string,
    scopesAnyOf?: string[],
  ): Promise<TokenClaims> {
    const audience = requiredAudience || this.singleConfiguredAudience();
    const validator = await this.tokenValidator();
    return validator.validateToken(token, {
      issuer: await this.issuer(),
      audience,
      scopesAnyOf,
    });
  }

  public async validateAccessTokenRemote(token: string): Promise<IntrospectionResponse> {
    return (await this.introspectionClient()).validateAccessToken(token, this.authEnricher);
  }

  /**
   * Validates an ID token, whose audience is this client's id.
   */
  public async validateIdTokenLocal(token: string, nonce?: string): Promise<TokenClaims> {
    const validator = await this.tokenValidator();
    return validator.validateIdToken(
      token,
      await this.issuer(),
      this.oidcConfig.client_id,
      nonce,
    );
  }

  public async validateIdTokenRemote(token: string): Promise<IntrospectionResponse> {
    return (await this.introspectionClient()).validateIdToken(token, this.authEnricher);
  }

  public async validateRefreshTokenRemote(token: string): Promise<IntrospectionResponse> {
    return (await this.introspectionClient()).validateRefreshToken(token, this.authEnricher);
  }

  public async revokeAccessToken(token: string): Promise<void> {
    await (await this.revocationClient()).revokeAccessToken(token, this.authEnricher);
    logEvent('info', 'auth:token_revoked', { tokenType: 'access_token' });
  }

  public async revokeRefreshToken(token: string): Promise<void> {
    await (await this.revocationClient()).revokeRefreshToken(token, this.authEnricher);
    logEvent('info', 'auth:token_revoked', { tokenType: 'refresh_token' });
  }

  public async userinfoFromAccessToken(token: string): Promise<UserinfoResponse> {
    return (await this.userinfoClient()).userinfoFromAccessToken(token);
  }

  /**
   * The single configured audience.
   * @throws {AuthClientConfigError} When the configuration holds none or several
   */
  public singleConfiguredAudience(): string {
    const audiences = this.oidcConfig.audiences ?? [];
    const [audience] = audiences;
    if (audiences.length !== 1 || !audience) {
      throw AuthClientConfigError.ambiguousAudience(audiences.length);
    }
    return audience;
  }

  protected apiOptions(): OidcApiClientOptions {
    return { fetch: this.deps.fetch, retryDelayMs: this.deps.retryDelayMs };
  }

  protected presenter(): LoginPresenter {
    return this.deps.presenter ?? new ConsolePresenter();
  }

  protected async openBrowser(url: string): Promise<void> {
    await (this.deps.openBrowser ?? openInBrowser)(url);
  }

  protected discoveryClient(): DiscoveryApiClient {
    this._discovery ??= new DiscoveryApiClient(
      { authServer: this.oidcConfig.auth_server },
      this.apiOptions(),
    );
    return this._discovery;
  }

  protected async tokenClient(): Promise<TokenApiClient> {
    if (!this._token) {
      const endpoint = await this.resolveEndpoint(
        this.oidcConfig.token_endpoint,
        'token_endpoint',
      );
      this._token = new TokenApiClient(endpoint, this.apiOptions());
    }
    return this._token;
  }

  protected async authorizationClient(): Promise<AuthorizationApiClient> {
    if (!this._authorization) {
      const endpoint = await this.resolveEndpoint(
        this.oidcConfig.authorization_endpoint,
        'authorization_endpoint',
      );
      this._authorization = new AuthorizationApiClient(endpoint, this.apiOptions());
    }
    return this._authorization;
  }

  protected async deviceAuthorizationClient(): Promise<DeviceAuthorizationApiClient> {
    if (!this._deviceAuthorization) {
      const endpoint = await this.resolveEndpoint(
        this.oidcConfig.device_authorization_endpoint,
        'device_authorization_endpoint',
      );
      this._deviceAuthorization = new DeviceAuthorizationApiClient(
        endpoint,
        this.apiOptions(),
      );
    }
    return this._deviceAuthorization;
  }

  protected async introspectionClient(): Promise<IntrospectionApiClient> {
    if (!this._introspection) {
      const endpoint = await this.resolveEndpoint(
        this.oidcConfig.introspection_endpoint,
        'introspection_endpoint',
      );
      this._introspection = new IntrospectionApiClient(endpoint, this.apiOptions());
    }
    return this._introspection;
  }

  protected async revocationClient(): Promise<RevocationApiClient> {
    if (!this._revocation) {
      const endpoint = await this.resolveEndpoint(
        this.oidcConfig.revocation_endpoint,
        'revocation_endpoint',
      );
      this._revocation = new RevocationApiClient(endpoint, this.apiOptions());
    }
    return this._revocation;
  }

  protected async userinfoClient(): Promise<UserinfoApiClient> {
    if (!this._userinfo) {
      const endpoint = await this.resolveEndpoint(
        this.oidcConfig.userinfo_endpoint,
        'userinfo_endpoint',
      );
      this._userinfo = new UserinfoApiClient(endpoint, this.apiOptions());
    }
    return this._userinfo;
  }

  protected async jwksClient(): Promise<JwksApiClient> {
    if (!this._jwks) {
      const endpoint = await this.resolveEndpoint(
        this.oidcConfig.jwks_endpoint,
        'jwks_uri',
      );
      this._jwks = new JwksApiClient(endpoint, this.apiOptions());
    }
    return this._jwks;
  }

  protected credentialFor(response: TokenResponse): OidcCredential {
    return OidcCredential.fromTokenResponse(response);
  }

  private async resolveEndpoint(
    configured: string | undefined,
    discovered: DiscoveredEndpoint,
  ): Promise<string> {
    if (configured) {
      return configured;
    }
    const document = await this.discoveryClient().discovery();
    const endpoint = document[discovered];
    if (!endpoint) {
      throw AuthClientConfigError.missingEndpoint(discovered);
    }
    return endpoint;
  }
}

/**
 * OIDC clients that obtain tokens through a grant flow.
 *
 * {@link login} fills unset scopes, audiences, `organization` and
 * `project_id` from the configuration before running the flow;
 * {@link refresh} never adds configured scopes, so a down-scoped refresh
 * token stays down-scoped.
 * @public
 */
export abstract class OidcLoginAuthClient<TConfig extends OidcClientConfig = OidcClientConfig>
  extends OidcAuthClient<TConfig>
  implements Loginable<OidcCredential>, Refreshable
{
  public async login(options: LoginOptions = {}): Promise<OidcCredential> {
    const credential = await this.oidcFlowLogin(this.applyConfigFallback(options));
    logEvent('info', 'auth:token_acquired', {
      clientType: this.clientType,
      hasRefreshToken: Boolean(credential.refreshToken()),
    });
    return credential;
  }

  /**
   * Exchanges a refresh token. A response without a new refresh token keeps
   * the one that was used.
   */
  public async refresh(
    refreshToken: string,
    requestedScopes?: string[],
    extra?: ExtraParams,
  ): Promise<OidcCredential> {
    if (!refreshToken) {
      throw new DataIntegrityError('A refresh token is required to refresh');
    }
    const tokenClient = await this.tokenClient();
    const response = await tokenClient.getTokenFromRefresh({
      clientId: this.oidcConfig.client_id,
      refreshToken,
      authEnricher: this.authEnricher,
      scopes: requestedScopes,
      extra,
    });
    logEvent('info', 'auth:token_refresh', { clientType: this.clientType });
    return this.credentialFor({
      ...response,
      refresh_token: response.refresh_token ?? refreshToken,
    });
  }

  public defaultRequestAuthenticator(tokenFile?: string): RequestAuthenticator {
    return new RefreshingOidcTokenRequestAuthenticator(
      new OidcCredential(null, tokenFile),
      this,
    );
  }

  protected abstract oidcFlowLogin(options: LoginOptions): Promise<OidcCredential>;

  protected applyConfigFallback(options: LoginOptions): LoginOptions {
    const extra: ExtraParams = { ...options.extra };
    if (this.oidcConfig.organization && extra.organization === undefined) {
      extra.organization = this.oidcConfig.organization;
    }
    if (this.oidcConfig.project_id && extra.project_id === undefined) {
      extra.project_id = this.oidcConfig.project_id;
    }
    return {
      ...options,
      requestedScopes: options.requestedScopes?.length
        ? options.requestedScopes
        : this.oidcConfig.scopes,
      requestedAudiences: options.requestedAudiences?.length
        ? options.requestedAudiences
        : this.oidcConfig.audiences,
      extra,
    };
  }
}
