import { ValidationUtils } from '@credgate/core';
import { DataIntegrityError } from '../errors/index.js';
import type { JsonObject } from '../persistence/json-file.js';
import { Credential } from './credential.js';

export const DEFAULT_BEARER_TOKEN_PREFIX = 'Bearer';

/**
 * A long-lived API key, sent as `<prefix> <api_key>`.
 * @public
 */
export class StaticApiKeyCredential extends Credential {
  /**
   * @param options - Literal key and prefix, or a file to load them from
   */
  public constructor(
    options: { apiKey?: string; prefix?: string; filePath?: string } = {},
  ) {
    const data: JsonObject | null = options.apiKey
      ? {
          api_key: options.apiKey,
          bearer_token_prefix: options.prefix ?? DEFAULT_BEARER_TOKEN_PREFIX,
        }
      : null;
    super(data, options.filePath);
  }

  public override checkData(data: JsonObject | null): void {
    super.checkData(data);
    const fields: JsonObject = data ?? {};
    try {
      ValidationUtils.validateRequired(
        fields,
        ['api_key'],
        'Static API key credential',
      );
    } catch (error) {
      throw new DataIntegrityError(
        error instanceof Error ? error.message : String(error),
        { filePath: this.path() },
      );
    }
    if (typeof data?.bearer_token_prefix !== 'string') {
      throw new DataIntegrityError(
        'Static API key credential: Missing required field: bearer_token_prefix',
        { filePath: this.path() },
      );
    }
  }

  public apiKey(): string | undefined {
    return this.getString('api_key');
  }

  public bearerTokenPrefix(): string | undefined {
    const value = this._data?.bearer_token_prefix;
    return typeof value === 'string' ? value : undefined;
  }
}
