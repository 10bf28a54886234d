import type { Credential } from '../credential/credential.js';
import {
  RequestAuthenticator,
  type RequestAuthenticatorOptions,
} from './request-authenticator.js';

/**
 * A request authenticator backed by a {@link Credential}.
 * @public
 */
export abstract class CredentialRequestAuthenticator<
  C extends Credential,
> extends RequestAuthenticator {
  protected _credential: C;

  protected constructor(credential: C, options?: RequestAuthenticatorOptions) {
    super(options);
    this._credential = credential;
  }

  public credential(): C {
    return this._credential;
  }

  /**
   * Swaps in a new credential and forgets the derived token body, so the
   * next request recomputes it.
   * @throws {TypeError} When the credential is not of the kind this authenticator holds
   */
  public override updateCredential(credential: Credential): void {
    if (!this.accepts(credential)) {
      throw new TypeError(
        `${this.constructor.name} cannot hold a ${credential.constructor.name}`,
      );
    }
    this._credential = credential;
    this.tokenBody = undefined;
  }

  protected abstract accepts(credential: Credential): credential is C;
}
