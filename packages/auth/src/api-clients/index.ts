export * from './types.js';
export { OidcApiClient, type OidcApiClientOptions } from './oidc-api-client.js';
export { DiscoveryApiClient } from './discovery-api-client.js';
export {
  TokenApiClient,
  DEVICE_CODE_GRANT_TYPE,
  type TokenRequestOptions,
  type DevicePollParams,
} from './token-api-client.js';
export {
  AuthorizationApiClient,
  type AuthorizationRequest,
} from './authorization-api-client.js';
export {
  waitForAuthorizationCallback,
  DEFAULT_CALLBACK_ACKNOWLEDGEMENT,
  type CallbackListenerParams,
} from './callback-listener.js';
export { DeviceAuthorizationApiClient } from './device-authorization-api-client.js';
export { IntrospectionApiClient } from './introspection-api-client.js';
export { RevocationApiClient } from './revocation-api-client.js';
export { UserinfoApiClient } from './userinfo-api-client.js';
export { JwksApiClient } from './jwks-api-client.js';
