import type { NoneConfig } from '../schemas.js';
import {
  SimpleInMemoryRequestAuthenticator,
  type RequestAuthenticator,
} from '../request-authenticator/request-authenticator.js';
import type { AuthClient } from './types.js';

/**
 * For APIs that need no authentication. Its authenticator adds no
 * authorization header.
 * @public
 */
export class NoOpAuthClient implements AuthClient {
  public readonly clientType = 'none' as const;

  public constructor(private readonly noneConfig: NoneConfig = { client_type: 'none' }) {}

  public config(): NoneConfig {
    return this.noneConfig;
  }

  public defaultRequestAuthenticator(): RequestAuthenticator {
    return new SimpleInMemoryRequestAuthenticator();
  }
}
