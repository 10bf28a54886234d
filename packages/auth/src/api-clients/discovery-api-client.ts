import { logEvent } from '@credgate/core';
import { OidcApiClient, type OidcApiClientOptions } from './oidc-api-client.js';
import { DiscoveryDocumentSchema, type DiscoveryDocument } from './types.js';

/**
 * Builds the well-known discovery URI of an auth server.
 * @internal
 */
export function discoveryUriFor(authServer: string): string {
  return `${authServer.replace(/\/+$/, '')}/.well-known/openid-configuration`;
}

/**
 * Fetches OpenID Provider Metadata once and caches it for the client's
 * lifetime. Concurrent callers share one request.
 * @public
 */
export class DiscoveryApiClient extends OidcApiClient {
  private cached?: DiscoveryDocument;
  private pending?: Promise<DiscoveryDocument>;

  public constructor(
    params: { authServer: string; discoveryUri?: string },
    options?: OidcApiClientOptions,
  ) {
    super(params.discoveryUri ?? discoveryUriFor(params.authServer), options);
  }

  public async discovery(): Promise<DiscoveryDocument> {
    if (this.cached) {
      return this.cached;
    }
    if (this.pending) {
      return this.pending;
    }

    this.pending = this.checkedGetJson(DiscoveryDocumentSchema);
    try {
      this.cached = await this.pending;
      logEvent('debug', 'auth:discovery_loaded', {
        endpoint: this.endpointUri,
        issuer: this.cached.issuer,
      });
      return this.cached;
    } finally {
      this.pending = undefined;
    }
  }
}
