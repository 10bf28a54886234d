export * from './types.js';
export {
  OidcAuthClient,
  OidcLoginAuthClient,
  type AuthClientDeps,
} from './oidc-auth-client.js';
export { AuthCodeAuthClient } from './auth-code-auth-client.js';
export { DeviceCodeAuthClient } from './device-code-auth-client.js';
export { ClientCredentialsAuthClient } from './client-credentials-auth-client.js';
export { ResourceOwnerAuthClient } from './resource-owner-auth-client.js';
export { ClientValidatorAuthClient } from './client-validator-auth-client.js';
export { LegacyApiKeyAuthClient } from './legacy-api-key-auth-client.js';
export { StaticApiKeyAuthClient } from './static-api-key-auth-client.js';
export { NoOpAuthClient } from './noop-auth-client.js';
export { createAuthClient, type AnyAuthClient } from './factory.js';
export {
  ConsolePresenter,
  openInBrowser,
  type BrowserOpener,
  type DeviceCodePrompt,
  type LoginPresenter,
} from './login-presenter.js';
export {
  clientAuthEnricherFor,
  clientSecretAuth,
  noClientAuth,
  privateKeyJwtAuth,
  CLIENT_ASSERTION_TYPE,
} from './client-auth.js';
