import { AuthenticationError } from './authentication-error.js';

/**
 * Reasons a token can fail validation
 */
export enum TokenValidationErrorKind {
  EXPIRED = 'expired',
  NOT_YET_VALID = 'not_yet_valid',
  UNKNOWN_SIGNING_KEY = 'unknown_signing_key',
  INVALID_ALGORITHM = 'invalid_algorithm',
  WRONG_ISSUER = 'wrong_issuer',
  WRONG_AUDIENCE = 'wrong_audience',
  SCOPE_NOT_GRANTED = 'scope_not_granted',
  INVALID_ARGUMENT = 'invalid_argument',
  INVALID_TOKEN = 'invalid_token',
  UNTRUSTED_ISSUER = 'untrusted_issuer',
  INACTIVE_TOKEN = 'inactive_token',
}

export class TokenValidationError extends AuthenticationError<TokenValidationErrorKind> {
  public constructor(
    message: string,
    kind: TokenValidationErrorKind,
    cause?: Error,
  ) {
    super(message, kind, cause);
    this.name = 'TokenValidationError';
  }

  public get kind(): TokenValidationErrorKind {
    return this.code;
  }
}
