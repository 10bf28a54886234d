import { logEvent } from '@credgate/core';
import type { AuthClientConfig } from './schemas.js';
import { AuthClientConfigError } from './errors/index.js';
import type { Credential } from './credential/credential.js';
import type { OidcCredential } from './credential/oidc-credential.js';
import type { DeviceAuthorizationResponse } from './api-clients/types.js';
import type { RequestAuthenticator } from './request-authenticator/request-authenticator.js';
import {
  isDeviceLoginable,
  isLoginable,
  type AuthClient,
  type LoginOptions,
} from './auth-clients/types.js';
import type { AuthClientDeps } from './auth-clients/oidc-auth-client.js';
import { createAuthClient, type AnyAuthClient } from './auth-clients/factory.js';
import {
  loadAuthClientConfigFile,
  parseAuthClientConfig,
  type ConfigResolutionOptions,
} from './config/auth-client-config.js';

/**
 * @public
 */
export interface AuthInitOptions {
  /** Where the credential is kept. Omit for an in-memory credential. */
  tokenFile?: string;
  deps?: AuthClientDeps;
}

/**
 * An auth client, the request authenticator built for it, and the file
 * their credential lives in.
 *
 * Construct one per application context and pass it to the code that makes
 * requests; nothing here is shared through globals.
 *
 * @example
 * ```typescript
 * const auth = await Auth.initializeFromConfigFile('client.json', {
 *   tokenFile: '/home/me/.config/myapp/token.json',
 * });
 * await auth.login({ allowOpenBrowser: true, allowTtyPrompt: true });
 * const response = await auth.requestAuthenticator().fetch('https://api.example.com/items');
 * ```
 * @public
 */
export class Auth {
  private constructor(
    private readonly client: AnyAuthClient,
    private readonly authenticator: RequestAuthenticator,
    private readonly tokenFile?: string,
  ) {}

  public static initializeFromClient(
    client: AnyAuthClient,
    options: Pick<AuthInitOptions, 'tokenFile'> = {},
  ): Auth {
    return new Auth(
      client,
      client.defaultRequestAuthenticator(options.tokenFile),
      options.tokenFile,
    );
  }

  public static initializeFromConfig(
    config: AuthClientConfig,
    options: AuthInitOptions = {},
  ): Auth {
    return Auth.initializeFromClient(createAuthClient(config, options.deps), options);
  }

  public static initializeFromConfigDict(
    input: unknown,
    options: AuthInitOptions & ConfigResolutionOptions = {},
  ): Auth {
    return Auth.initializeFromConfig(parseAuthClientConfig(input, options), options);
  }

  public static async initializeFromConfigFile(
    configFile: string,
    options: AuthInitOptions & ConfigResolutionOptions = {},
  ): Promise<Auth> {
    return Auth.initializeFromConfig(
      await loadAuthClientConfigFile(configFile, options),
      options,
    );
  }

  public authClient(): AnyAuthClient {
    return this.client;
  }

  public requestAuthenticator(): RequestAuthenticator {
    return this.authenticator;
  }

  public tokenFilePath(): string | undefined {
    return this.tokenFile;
  }

  /**
   * Logs in, saves the credential to the token file and hands it to the
   * request authenticator.
   * @throws {AuthClientConfigError} When the client type has no login
   */
  public async login(options?: LoginOptions): Promise<Credential> {
    const client: AuthClient = this.client;
    if (!isLoginable(client)) {
      throw AuthClientConfigError.unsupportedOperation('login', client.clientType);
    }
    return this.adopt(await client.login(options));
  }

  public async deviceLoginInitiate(
    options?: LoginOptions,
  ): Promise<DeviceAuthorizationResponse> {
    const client: AuthClient = this.client;
    if (!isDeviceLoginable(client)) {
      throw AuthClientConfigError.unsupportedOperation(
        'device login',
        client.clientType,
      );
    }
    return client.deviceLoginInitiate(options);
  }

  public async deviceLoginComplete(
    initiation: DeviceAuthorizationResponse,
  ): Promise<OidcCredential> {
    const client: AuthClient = this.client;
    if (!isDeviceLoginable(client)) {
      throw AuthClientConfigError.unsupportedOperation(
        'device login',
        client.clientType,
      );
    }
    return this.adopt(await client.deviceLoginComplete(initiation));
  }

  private async adopt<C extends Credential>(credential: C): Promise<C> {
    credential.setPath(this.tokenFile);
    await credential.save();
    this.authenticator.updateCredential(credential);
    logEvent('info', 'auth:credential_saved', {
      clientType: this.client.clientType,
      path: this.tokenFile,
    });
    return credential;
  }
}
