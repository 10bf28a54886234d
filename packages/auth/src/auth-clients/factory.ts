import type { AuthClientConfig } from '../schemas.js';
import { AuthCodeAuthClient } from './auth-code-auth-client.js';
import { ClientCredentialsAuthClient } from './client-credentials-auth-client.js';
import { ClientValidatorAuthClient } from './client-validator-auth-client.js';
import { DeviceCodeAuthClient } from './device-code-auth-client.js';
import { LegacyApiKeyAuthClient } from './legacy-api-key-auth-client.js';
import { NoOpAuthClient } from './noop-auth-client.js';
import type { AuthClientDeps } from './oidc-auth-client.js';
import { ResourceOwnerAuthClient } from './resource-owner-auth-client.js';
import { StaticApiKeyAuthClient } from './static-api-key-auth-client.js';

/**
 * Every concrete auth client.
 * @public
 */
export type AnyAuthClient =
  | AuthCodeAuthClient
  | DeviceCodeAuthClient
  | ClientCredentialsAuthClient
  | ResourceOwnerAuthClient
  | ClientValidatorAuthClient
  | LegacyApiKeyAuthClient
  | StaticApiKeyAuthClient
  | NoOpAuthClient;

/**
 * Builds the auth client for a validated configuration.
 * @public
 */
export function createAuthClient(
  config: AuthClientConfig,
  deps: AuthClientDeps = {},
): AnyAuthClient {
  switch (config.client_type) {
    case 'oidc-auth-code':
    case 'oidc-auth-code-secret':
    case 'oidc-auth-code-pubkey':
      return new AuthCodeAuthClient(config, deps);
    case 'oidc-device-code':
    case 'oidc-device-code-secret':
    case 'oidc-device-code-pubkey':
      return new DeviceCodeAuthClient(config, deps);
    case 'oidc-client-credentials-secret':
    case 'oidc-client-credentials-pubkey':
      return new ClientCredentialsAuthClient(config, deps);
    case 'oidc-resource-owner':
    case 'oidc-resource-owner-secret':
    case 'oidc-resource-owner-pubkey':
      return new ResourceOwnerAuthClient(config, deps);
    case 'oidc-client-validator':
      return new ClientValidatorAuthClient(config, deps);
    case 'planet-legacy':
      return new LegacyApiKeyAuthClient(config, deps);
    case 'static-api-key':
      return new StaticApiKeyAuthClient(config);
    case 'none':
      return new NoOpAuthClient(config);
    default: {
      const _exhaustive: never = config;
      throw new Error(`Unsupported client type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
