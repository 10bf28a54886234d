import { AuthenticationError, AuthErrorCode } from './authentication-error.js';

/**
 * Raised when an auth client configuration is malformed or incomplete, or
 * when an operation is asked of a client type that cannot perform it.
 * @public
 */
export class AuthClientConfigError extends AuthenticationError<AuthErrorCode.CONFIG_ERROR> {
  public constructor(message: string, cause?: Error) {
    super(message, AuthErrorCode.CONFIG_ERROR, cause);
    this.name = 'AuthClientConfigError';
  }

  /**
   * An endpoint is neither configured nor advertised by discovery.
   */
  public static missingEndpoint(endpoint: string): AuthClientConfigError {
    return new AuthClientConfigError(
      `Auth server does not advertise a ${endpoint} and none is configured`,
    );
  }

  public static missingField(field: string, context: string): AuthClientConfigError {
    return new AuthClientConfigError(`${context}: ${field} is required`);
  }

  public static unsupportedOperation(
    operation: string,
    clientType: string,
  ): AuthClientConfigError {
    return new AuthClientConfigError(
      `Operation '${operation}' is not supported by client type '${clientType}'`,
    );
  }

  public static ambiguousAudience(count: number): AuthClientConfigError {
    return new AuthClientConfigError(
      `Exactly one audience must be configured to validate access tokens, found ${count}`,
    );
  }
}
