import { logEvent } from '@credgate/core';
import type { Credential } from '../credential/credential.js';
import { OidcCredential } from '../credential/oidc-credential.js';
import { DataIntegrityError, toError } from '../errors/index.js';
import type { Loginable, Refreshable } from '../auth-clients/types.js';
import {
  computeRefreshAt,
  inspectUnverifiedClaims,
} from '../token-validation/jwt-inspection.js';
import { CredentialRequestAuthenticator } from './credential-request-authenticator.js';

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Sends an OIDC access token and keeps it fresh.
 *
 * Once the token passes three quarters of its lifetime, the next request
 * first reloads the credential file, since another process sharing it may
 * already have refreshed. Only when the reloaded token is still due does it
 * refresh online and save the result to the same file.
 *
 * Reload and refresh failures are logged at `warn` and the request goes out
 * with the token already held. Concurrent requests share one maintenance pass.
 * @public
 */
export class RefreshingOidcTokenRequestAuthenticator<
  A extends Refreshable = Refreshable,
> extends CredentialRequestAuthenticator<OidcCredential> {
  protected refreshAt = 0;
  protected readonly authClient?: A;
  private maintenance?: Promise<void>;

  public constructor(credential: OidcCredential, authClient?: A) {
    super(credential);
    this.authClient = authClient;
  }

  /**
   * Epoch second after which the next request triggers maintenance.
   */
  public refreshTime(): number {
    return this.refreshAt;
  }

  public async preRequestHook(): Promise<void> {
    if (nowSeconds() <= this.refreshAt) {
      return;
    }
    if (!this.maintenance) {
      this.maintenance = this.maintain().finally(() => {
        this.maintenance = undefined;
      });
    }
    await this.maintenance;
  }

  public override updateCredential(credential: Credential): void {
    super.updateCredential(credential);
    this.refreshAt = 0;
  }

  protected accepts(credential: Credential): credential is OidcCredential {
    return credential instanceof OidcCredential;
  }

  /**
   * Obtains a replacement credential online.
   * @throws {DataIntegrityError} When the credential has no refresh token
   */
  protected async obtainFreshCredential(client: A): Promise<OidcCredential> {
    const refreshToken = this._credential.refreshToken();
    if (!refreshToken) {
      throw new DataIntegrityError('Credential has no refresh token to refresh with', {
        filePath: this._credential.path(),
      });
    }
    return client.refresh(refreshToken);
  }

  private async maintain(): Promise<void> {
    try {
      await this.loadToken();
    } catch (error) {
      logEvent('warn', 'auth:credential_reload_failed', {
        path: this._credential.path(),
        error: toError(error).message,
      });
    }

    if (nowSeconds() <= this.refreshAt) {
      return;
    }

    try {
      await this.refreshToken();
    } catch (error) {
      logEvent('warn', 'auth:credential_refresh_failed', {
        path: this._credential.path(),
        error: toError(error).message,
      });
    }
  }

  private async loadToken(): Promise<void> {
    if (this._credential.path()) {
      await this._credential.load();
    }
    const accessToken = this._credential.accessToken();
    if (!accessToken) {
      throw new DataIntegrityError('Credential has no access token', {
        filePath: this._credential.path(),
      });
    }
    this.refreshAt = computeRefreshAt(inspectUnverifiedClaims(accessToken));
    this.tokenBody = accessToken;
  }

  private async refreshToken(): Promise<void> {
    if (!this.authClient) {
      logEvent('debug', 'auth:refresh_skipped', { reason: 'no auth client' });
      return;
    }
    const fresh = await this.obtainFreshCredential(this.authClient);
    fresh.setPath(this._credential.path());
    await fresh.save();
    this._credential = fresh;
    logEvent('info', 'auth:credential_refreshed', { path: fresh.path() });
    await this.loadToken();
  }
}

/**
 * Like {@link RefreshingOidcTokenRequestAuthenticator}, but logs in again
 * when the credential holds no refresh token. Only for flows whose login
 * needs no user interaction.
 * @public
 */
export class RefreshOrReloginOidcTokenRequestAuthenticator extends RefreshingOidcTokenRequestAuthenticator<
  Refreshable & Loginable<OidcCredential>
> {
  protected override async obtainFreshCredential(
    client: Refreshable & Loginable<OidcCredential>,
  ): Promise<OidcCredential> {
    const refreshToken = this._credential.refreshToken();
    if (refreshToken) {
      return client.refresh(refreshToken);
    }
    logEvent('info', 'auth:relogin', { path: this._credential.path() });
    return client.login();
  }
}
