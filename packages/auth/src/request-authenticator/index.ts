export {
  RequestAuthenticator,
  SimpleInMemoryRequestAuthenticator,
  ForbiddenRequestAuthenticator,
  DEFAULT_AUTH_HEADER,
  DEFAULT_TOKEN_PREFIX,
  type RequestAuthenticatorOptions,
} from './request-authenticator.js';
export { CredentialRequestAuthenticator } from './credential-request-authenticator.js';
export {
  StaticApiKeyRequestAuthenticator,
  LegacyApiKeyRequestAuthenticator,
  LEGACY_TOKEN_PREFIX,
} from './api-key-request-authenticators.js';
export {
  RefreshingOidcTokenRequestAuthenticator,
  RefreshOrReloginOidcTokenRequestAuthenticator,
} from './refreshing-oidc-request-authenticator.js';
