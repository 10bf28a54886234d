import { logEvent, type IAuthProvider } from '@credgate/core';
import { APP_HEADER, APP_NAME } from '../constants.js';
import { AuthClientConfigError } from '../errors/index.js';
import type { Credential } from '../credential/credential.js';

export const DEFAULT_AUTH_HEADER = 'Authorization';
export const DEFAULT_TOKEN_PREFIX = 'Bearer';

/**
 * @public
 */
export interface RequestAuthenticatorOptions {
  authHeader?: string;
  /** Prefix placed before the token; empty sends the bare token. */
  tokenPrefix?: string;
  tokenBody?: string;
}

/**
 * Stamps outgoing requests with an authorization header.
 *
 * The header value is `<prefix> <body>`, or the bare body without a prefix,
 * and is only sent once a token body exists. {@link preRequestHook} runs
 * before every stamp and may reload or refresh the token.
 * @public
 */
export abstract class RequestAuthenticator implements IAuthProvider {
  protected authHeader: string;
  protected tokenPrefix: string;
  protected tokenBody?: string;

  protected constructor(options: RequestAuthenticatorOptions = {}) {
    this.authHeader = options.authHeader ?? DEFAULT_AUTH_HEADER;
    this.tokenPrefix = options.tokenPrefix ?? DEFAULT_TOKEN_PREFIX;
    this.tokenBody = options.tokenBody;
  }

  /**
   * Brings the token body up to date. Called before every request.
   */
  public abstract preRequestHook(): Promise<void>;

  /**
   * Replaces the credential requests are stamped from. Authenticators that
   * hold no credential ignore the update.
   */
  public updateCredential(credential: Credential): void {
    logEvent('warn', 'auth:credential_update_ignored', {
      authenticator: this.constructor.name,
      credential: credential.constructor.name,
    });
  }

  public async getHeaders(): Promise<Record<string, string>> {
    await this.preRequestHook();
    const headers: Record<string, string> = { [APP_HEADER]: APP_NAME };
    const value = this.headerValue();
    if (value !== undefined) {
      headers[this.authHeader] = value;
    }
    return headers;
  }

  public async isValid(): Promise<boolean> {
    return Boolean(this.tokenBody);
  }

  /**
   * Adds the authorization and app headers to `headers`, keeping an app
   * header the caller already set.
   */
  public async authenticate(headers: Headers): Promise<Headers> {
    await this.preRequestHook();
    const value = this.headerValue();
    if (value !== undefined) {
      headers.set(this.authHeader, value);
    }
    if (!headers.has(APP_HEADER)) {
      headers.set(APP_HEADER, APP_NAME);
    }
    return headers;
  }

  /**
   * `fetch` with the request authenticated first.
   */
  public async fetch(
    input: string | URL | Request,
    init: RequestInit = {},
  ): Promise<Response> {
    const baseHeaders =
      init.headers ?? (input instanceof Request ? input.headers : undefined);
    const headers = await this.authenticate(new Headers(baseHeaders));
    return globalThis.fetch(input, { ...init, headers });
  }

  private headerValue(): string | undefined {
    if (!this.tokenBody) {
      return undefined;
    }
    return this.tokenPrefix ? `${this.tokenPrefix} ${this.tokenBody}` : this.tokenBody;
  }
}

/**
 * A fixed token held in memory. Never reloads or refreshes.
 * @public
 */
export class SimpleInMemoryRequestAuthenticator extends RequestAuthenticator {
  public constructor(options: RequestAuthenticatorOptions = {}) {
    super(options);
  }

  public async preRequestHook(): Promise<void> {}
}

/**
 * Refuses to authenticate anything. Used by clients that only validate
 * tokens presented to them.
 * @public
 */
export class ForbiddenRequestAuthenticator extends RequestAuthenticator {
  public constructor() {
    super();
  }

  public async preRequestHook(): Promise<void> {
    throw new AuthClientConfigError(
      'This auth client validates tokens only and cannot authenticate requests',
    );
  }
}
