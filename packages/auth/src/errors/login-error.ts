import { AuthenticationError, AuthErrorCode } from './authentication-error.js';

/**
 * An interactive login flow ended without a usable token
 */
export class LoginError extends AuthenticationError<AuthErrorCode.LOGIN_ERROR> {
  public constructor(message: string, cause?: Error) {
    super(message, AuthErrorCode.LOGIN_ERROR, cause);
    this.name = 'LoginError';
  }

  public static timedOut(flow: string, seconds: number): LoginError {
    return new LoginError(`${flow} login timed out after ${seconds} seconds`);
  }

  public static stateMismatch(): LoginError {
    return new LoginError(
      'Authorization callback state does not match the request state',
    );
  }

  public static noInteraction(flow: string): LoginError {
    return new LoginError(
      `${flow} login needs a browser or a terminal prompt, but both are disabled`,
    );
  }
}
