import type { Credential } from '../credential/credential.js';
import { StaticApiKeyCredential } from '../credential/static-api-key-credential.js';
import { LegacyApiKeyCredential } from '../credential/legacy-api-key-credential.js';
import { CredentialRequestAuthenticator } from './credential-request-authenticator.js';

/**
 * Sends a static API key with the prefix stored beside it.
 *
 * The backing file is re-read whenever it changes on disk.
 * @public
 */
export class StaticApiKeyRequestAuthenticator extends CredentialRequestAuthenticator<StaticApiKeyCredential> {
  public constructor(credential: StaticApiKeyCredential) {
    super(credential);
  }

  public async preRequestHook(): Promise<void> {
    await this._credential.lazyReload();
    this.tokenBody = this._credential.apiKey();
    this.tokenPrefix = this._credential.bearerTokenPrefix() ?? '';
  }

  protected accepts(credential: Credential): credential is StaticApiKeyCredential {
    return credential instanceof StaticApiKeyCredential;
  }
}

export const LEGACY_TOKEN_PREFIX = 'api-key';

/**
 * Sends a legacy API key as `api-key <key>`.
 * @public
 */
export class LegacyApiKeyRequestAuthenticator extends CredentialRequestAuthenticator<LegacyApiKeyCredential> {
  public constructor(credential: LegacyApiKeyCredential) {
    super(credential, { tokenPrefix: LEGACY_TOKEN_PREFIX });
  }

  public async preRequestHook(): Promise<void> {
    await this._credential.lazyLoad();
    this.tokenBody = this._credential.apiKey();
  }

  protected accepts(credential: Credential): credential is LegacyApiKeyCredential {
    return credential instanceof LegacyApiKeyCredential;
  }
}
