import type { StaticApiKeyConfig } from '../schemas.js';
import { StaticApiKeyCredential } from '../credential/static-api-key-credential.js';
import type { RequestAuthenticator } from '../request-authenticator/request-authenticator.js';
import { StaticApiKeyRequestAuthenticator } from '../request-authenticator/api-key-request-authenticators.js';
import type { AuthClient, Loginable } from './types.js';

/**
 * A key fixed in the configuration. Logging in only turns the configured key
 * into a credential that can be saved.
 * @public
 */
export class StaticApiKeyAuthClient implements AuthClient, Loginable<StaticApiKeyCredential> {
  public readonly clientType = 'static-api-key' as const;

  public constructor(private readonly keyConfig: StaticApiKeyConfig) {}

  public config(): StaticApiKeyConfig {
    return this.keyConfig;
  }

  public async login(): Promise<StaticApiKeyCredential> {
    return this.configuredCredential();
  }

  /**
   * Requests are stamped from the configured key; `tokenFile` is only
   * where a login saves it.
   */
  public defaultRequestAuthenticator(): RequestAuthenticator {
    return new StaticApiKeyRequestAuthenticator(this.configuredCredential());
  }

  private configuredCredential(): StaticApiKeyCredential {
    return new StaticApiKeyCredential({
      apiKey: this.keyConfig.api_key,
      prefix: this.keyConfig.bearer_token_prefix,
    });
  }
}
