import type { OidcClientValidatorConfig } from '../schemas.js';
import {
  ForbiddenRequestAuthenticator,
  type RequestAuthenticator,
} from '../request-authenticator/request-authenticator.js';
import { OidcAuthClient } from './oidc-auth-client.js';

/**
 * Validates tokens issued to others. Cannot log in or stamp requests.
 * @public
 */
export class ClientValidatorAuthClient extends OidcAuthClient<OidcClientValidatorConfig> {
  public defaultRequestAuthenticator(): RequestAuthenticator {
    return new ForbiddenRequestAuthenticator();
  }
}
