import { DataIntegrityError } from '../errors/index.js';
import type { JsonObject } from '../persistence/json-file.js';
import { Credential } from './credential.js';

/**
 * API key obtained from a legacy username/password login endpoint.
 *
 * `token` keeps the signed login response the key was extracted from.
 * @public
 */
export class LegacyApiKeyCredential extends Credential {
  public override checkData(data: JsonObject | null): void {
    super.checkData(data);
    const apiKey = data?.api_key;
    if (typeof apiKey !== 'string' || apiKey.length === 0) {
      throw new DataIntegrityError(
        'Legacy credential: Missing required field: api_key',
        { filePath: this.path() },
      );
    }
  }

  public apiKey(): string | undefined {
    return this.getString('api_key');
  }

  public legacyJwt(): string | undefined {
    return this.getString('token');
  }
}
