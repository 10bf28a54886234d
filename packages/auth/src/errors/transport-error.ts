import { AuthenticationError } from './authentication-error.js';

/**
 * Transport-level failure categories for auth server requests
 */
export enum TransportErrorCode {
  HTTP_ERROR = 'http_error',
  INVALID_PAYLOAD = 'invalid_payload',
  NETWORK_ERROR = 'network_error',
}

/**
 * HTTP or payload failure talking to an auth server endpoint that did not
 * carry an OAuth2 error payload.
 */
export class OidcTransportError extends AuthenticationError<TransportErrorCode> {
  public readonly status?: number;
  public readonly endpoint: string;
  public readonly isRetryable: boolean;

  public constructor(
    message: string,
    code: TransportErrorCode,
    endpoint: string,
    options: { status?: number; isRetryable?: boolean; cause?: Error } = {},
  ) {
    super(message, code, options.cause);
    this.name = 'OidcTransportError';
    this.endpoint = endpoint;
    this.status = options.status;
    this.isRetryable = options.isRetryable ?? false;
  }

  public override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      endpoint: this.endpoint,
      isRetryable: this.isRetryable,
    };
  }

  public static httpError(endpoint: string, status: number, statusText: string): OidcTransportError {
    return new OidcTransportError(
      `HTTP ${status}${statusText ? ` ${statusText}` : ''} from ${endpoint}`,
      TransportErrorCode.HTTP_ERROR,
      endpoint,
      { status, isRetryable: status === 429 || status >= 500 },
    );
  }

  public static invalidPayload(endpoint: string, detail: string, status?: number): OidcTransportError {
    return new OidcTransportError(
      `Unexpected response from ${endpoint}: ${detail}`,
      TransportErrorCode.INVALID_PAYLOAD,
      endpoint,
      { status },
    );
  }

  public static networkError(endpoint: string, cause: Error): OidcTransportError {
    return new OidcTransportError(
      `Network error calling ${endpoint}: ${cause.message}`,
      TransportErrorCode.NETWORK_ERROR,
      endpoint,
      { isRetryable: true, cause },
    );
  }
}
