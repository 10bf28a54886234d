import { z } from 'zod';
import type { PlanetLegacyConfig } from '../schemas.js';
import { AuthClientConfigError, DataIntegrityError } from '../errors/index.js';
import { LegacyApiKeyCredential } from '../credential/legacy-api-key-credential.js';
import { OidcApiClient } from '../api-clients/oidc-api-client.js';
import { inspectUnverifiedClaims } from '../token-validation/jwt-inspection.js';
import type { RequestAuthenticator } from '../request-authenticator/request-authenticator.js';
import { LegacyApiKeyRequestAuthenticator } from '../request-authenticator/api-key-request-authenticators.js';
import {
  ConsolePresenter,
  type LoginPresenter,
} from './login-presenter.js';
import type { AuthClientDeps } from './oidc-auth-client.js';
import type { AuthClient, Loginable, LoginOptions } from './types.js';

const LegacyLoginResponseSchema = z.object({ token: z.string().min(1) }).passthrough();

class LegacyLoginApiClient extends OidcApiClient {
  public async login(username: string, password: string): Promise<string> {
    const response = await this.checkedPostJsonJson(LegacyLoginResponseSchema, {
      username,
      password,
    });
    return response.token;
  }
}

/**
 * Exchanges a username and password at a legacy login endpoint for an API
 * key. The endpoint answers with a signed token whose `api_key` claim holds
 * the key.
 * @public
 */
export class LegacyApiKeyAuthClient implements AuthClient, Loginable<LegacyApiKeyCredential> {
  public readonly clientType = 'planet-legacy' as const;
  private readonly legacyConfig: PlanetLegacyConfig;
  private readonly deps: AuthClientDeps;
  private readonly api: LegacyLoginApiClient;

  public constructor(config: PlanetLegacyConfig, deps: AuthClientDeps = {}) {
    this.legacyConfig = config;
    this.deps = deps;
    this.api = new LegacyLoginApiClient(config.legacy_auth_endpoint, {
      fetch: deps.fetch,
      retryDelayMs: deps.retryDelayMs,
    });
  }

  public config(): PlanetLegacyConfig {
    return this.legacyConfig;
  }

  public async login(options: LoginOptions = {}): Promise<LegacyApiKeyCredential> {
    const presenter: LoginPresenter = this.deps.presenter ?? new ConsolePresenter();
    let username = options.username;
    let password = options.password;
    if (options.allowTtyPrompt) {
      username ||= await presenter.promptForUsername();
      password ||= await presenter.promptForPassword();
    }
    if (!username) {
      throw AuthClientConfigError.missingField('username', 'Legacy login');
    }
    if (!password) {
      throw AuthClientConfigError.missingField('password', 'Legacy login');
    }

    const token = await this.api.login(username, password);
    const apiKey = inspectUnverifiedClaims(token).api_key;
    if (typeof apiKey !== 'string' || apiKey.length === 0) {
      throw new DataIntegrityError('Legacy login response carries no api_key claim');
    }
    const credential = new LegacyApiKeyCredential(null);
    credential.setData({ token, api_key: apiKey });
    return credential;
  }

  public defaultRequestAuthenticator(tokenFile?: string): RequestAuthenticator {
    const data = this.legacyConfig.api_key ? { api_key: this.legacyConfig.api_key } : null;
    return new LegacyApiKeyRequestAuthenticator(new LegacyApiKeyCredential(data, tokenFile));
  }
}
