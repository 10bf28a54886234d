/**
 * Standard OAuth2 error codes as defined in RFC 6749, plus the device
 * authorization grant codes from RFC 8628 section 3.5
 */
export enum OAuth2ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  INVALID_CLIENT = 'invalid_client',
  INVALID_GRANT = 'invalid_grant',
  UNAUTHORIZED_CLIENT = 'unauthorized_client',
  UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type',
  INVALID_SCOPE = 'invalid_scope',
  ACCESS_DENIED = 'access_denied',
  UNSUPPORTED_RESPONSE_TYPE = 'unsupported_response_type',
  SERVER_ERROR = 'server_error',
  TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable',
  AUTHORIZATION_PENDING = 'authorization_pending',
  SLOW_DOWN = 'slow_down',
  EXPIRED_TOKEN = 'expired_token',
}

/**
 * Error codes raised by this library rather than by an authorization server
 */
export enum AuthErrorCode {
  CONFIG_ERROR = 'config_error',
  LOGIN_ERROR = 'login_error',
  DATA_INTEGRITY_ERROR = 'data_integrity_error',
  UNKNOWN_ERROR = 'unknown_error',
}

/**
 * Root of the library's error hierarchy.
 *
 * Never exposes tokens or other secrets in its message: anything that looks
 * like a bearer value or a `secret=value` pair is replaced before the message
 * is stored.
 *
 * @typeParam C - The code vocabulary of the concrete error class
 */
export class AuthenticationError<C extends string = string> extends Error {
  public readonly code: C;
  public readonly cause?: Error;

  public constructor(message: string, code: C, cause?: Error) {
    super(AuthenticationError.sanitizeMessage(message));
    this.name = 'AuthenticationError';
    this.code = code;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Sanitizes error messages to prevent sensitive data exposure
   */
  protected static sanitizeMessage(message: string): string {
    return message
      .replace(/\beyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, '[REDACTED_JWT]')
      .replace(/\b[a-zA-Z0-9+/]{40,}={0,2}/g, '[REDACTED_TOKEN]')
      .replace(/\bBearer\s+[a-zA-Z0-9._~+/-]+=*/gi, 'Bearer [REDACTED]')
      .replace(/\bBasic\s+[a-zA-Z0-9+/]+=*/gi, 'Basic [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\bpassword[=:]\s*[^\s&]+/gi, 'password=[REDACTED]');
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * Coerces an unknown thrown value to an Error for use as a `cause`.
 * @internal
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
