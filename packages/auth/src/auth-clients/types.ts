import type { AuthClientConfig, ClientType } from '../schemas.js';
import type { Credential } from '../credential/credential.js';
import type { OidcCredential } from '../credential/oidc-credential.js';
import type {
  DeviceAuthorizationResponse,
  ExtraParams,
  IntrospectionResponse,
} from '../api-clients/types.js';
import type { TokenClaims } from '../token-validation/token-validator.js';
import type { RequestAuthenticator } from '../request-authenticator/request-authenticator.js';

/**
 * Options of an interactive or non-interactive login.
 *
 * Unset scopes, audiences, `organization` and `project_id` fall back to the
 * client's configuration.
 * @public
 */
export interface LoginOptions {
  /** Lets the flow open a browser and listen for a loopback redirect. */
  allowOpenBrowser?: boolean;
  /** Lets the flow print to and read from the terminal. */
  allowTtyPrompt?: boolean;
  requestedScopes?: string[];
  requestedAudiences?: string[];
  extra?: ExtraParams;
  /** Resource owner and legacy logins only. */
  username?: string;
  /** Resource owner and legacy logins only. */
  password?: string;
  /** Bound on the user's interaction, in seconds. */
  timeoutSeconds?: number;
}

/**
 * Behaviour shared by every auth client.
 * @public
 */
export interface AuthClient {
  readonly clientType: ClientType;
  config(): AuthClientConfig;
  /**
   * Builds the request authenticator suited to this client, over a
   * credential stored at `tokenFile` (or held in memory when omitted).
   */
  defaultRequestAuthenticator(tokenFile?: string): RequestAuthenticator;
}

export interface Loginable<C extends Credential = Credential> {
  login(options?: LoginOptions): Promise<C>;
}

export interface Refreshable {
  refresh(
    refreshToken: string,
    requestedScopes?: string[],
    extra?: ExtraParams,
  ): Promise<OidcCredential>;
}

export interface DeviceLoginable {
  deviceLoginInitiate(options?: LoginOptions): Promise<DeviceAuthorizationResponse>;
  deviceLoginComplete(
    initiation: DeviceAuthorizationResponse,
  ): Promise<OidcCredential>;
}

/**
 * Local and remote validation of access tokens.
 */
export interface AccessTokenValidating {
  issuer(): Promise<string>;
  validateAccessTokenLocal(
    token: string,
    requiredAudience?: string,
    scopesAnyOf?: string[],
  ): Promise<TokenClaims>;
  validateAccessTokenRemote(token: string): Promise<IntrospectionResponse>;
}

function hasMethod(value: object, name: string): boolean {
  return name in value && typeof Reflect.get(value, name) === 'function';
}

export function isLoginable<T extends AuthClient>(
  client: T,
): client is T & Loginable {
  return hasMethod(client, 'login');
}

export function isRefreshable<T extends AuthClient>(
  client: T,
): client is T & Refreshable {
  return hasMethod(client, 'refresh');
}

export function isDeviceLoginable<T extends AuthClient>(
  client: T,
): client is T & DeviceLoginable {
  return (
    hasMethod(client, 'deviceLoginInitiate') &&
    hasMethod(client, 'deviceLoginComplete')
  );
}
