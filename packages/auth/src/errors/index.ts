export {
  AuthenticationError,
  AuthErrorCode,
  OAuth2ErrorCode,
  toError,
} from './authentication-error.js';
export { AuthClientConfigError } from './config-error.js';
export { OidcProtocolError } from './protocol-error.js';
export { OidcTransportError, TransportErrorCode } from './transport-error.js';
export {
  TokenValidationError,
  TokenValidationErrorKind,
} from './token-validation-error.js';
export { DataIntegrityError } from './data-integrity-error.js';
export { LoginError } from './login-error.js';
