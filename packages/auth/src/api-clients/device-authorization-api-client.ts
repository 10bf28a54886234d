import { OidcApiClient } from './oidc-api-client.js';
import type { TokenRequestOptions } from './token-api-client.js';
import {
  DeviceAuthorizationResponseSchema,
  type ClientAuthEnricher,
  type DeviceAuthorizationResponse,
} from './types.js';

/**
 * Client for the device authorization endpoint (RFC 8628 section 3.1).
 * @public
 */
export class DeviceAuthorizationApiClient extends OidcApiClient {
  public async requestDeviceCode(
    params: { clientId: string; authEnricher: ClientAuthEnricher },
    options: TokenRequestOptions = {},
  ): Promise<DeviceAuthorizationResponse> {
    const enriched = await params.authEnricher(
      {
        client_id: params.clientId,
        scope: options.scopes?.length ? options.scopes.join(' ') : undefined,
        audience: options.audiences?.length ? options.audiences : undefined,
        ...options.extra,
      },
      this.endpointUri,
    );
    return this.checkedPostFormJson(
      DeviceAuthorizationResponseSchema,
      enriched.payload,
      enriched.headers,
    );
  }
}
