import { AuthenticationError } from './authentication-error.js';

/**
 * The authorization server answered with an OAuth2/OIDC error payload.
 *
 * `code` carries the server's error code verbatim (`invalid_grant`,
 * `authorization_pending`, ...), so callers can compare it against
 * {@link OAuth2ErrorCode} members.
 * @public
 */
export class OidcProtocolError extends AuthenticationError {
  public readonly errorDescription?: string;
  public readonly status: number;
  public readonly endpoint: string;

  public constructor(params: {
    errorCode: string;
    errorDescription?: string;
    status: number;
    endpoint: string;
  }) {
    const { errorCode, errorDescription, status, endpoint } = params;
    super(
      errorDescription
        ? `Auth server error ${errorCode}: ${errorDescription}`
        : `Auth server error ${errorCode}`,
      errorCode,
    );
    this.name = 'OidcProtocolError';
    this.errorDescription = errorDescription;
    this.status = status;
    this.endpoint = endpoint;
  }

  public get errorCode(): string {
    return this.code;
  }

  public override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errorDescription: this.errorDescription,
      status: this.status,
      endpoint: this.endpoint,
    };
  }
}
