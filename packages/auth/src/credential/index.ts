export { Credential } from './credential.js';
export { OidcCredential } from './oidc-credential.js';
export {
  StaticApiKeyCredential,
  DEFAULT_BEARER_TOKEN_PREFIX,
} from './static-api-key-credential.js';
export { LegacyApiKeyCredential } from './legacy-api-key-credential.js';
