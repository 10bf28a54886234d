import {
  EnvironmentResolutionError,
  EnvVarPatternResolver,
  logEvent,
} from '@credgate/core';
import { AuthClientConfigSchema, type AuthClientConfig } from '../schemas.js';
import { AuthClientConfigError, toError } from '../errors/index.js';
import { readJsonFile } from '../persistence/json-file.js';

/**
 * @public
 */
export interface ConfigResolutionOptions {
  /** Variables `${VAR}` placeholders resolve against. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** Set to false to leave placeholders as written. */
  resolveEnv?: boolean;
}

/**
 * Validates an auth client configuration object.
 *
 * String values may hold `${VAR}` or `${VAR:default}` placeholders, which
 * are resolved before validation.
 * @throws {AuthClientConfigError} Listing every invalid field, or naming an unresolvable variable
 * @public
 */
export function parseAuthClientConfig(
  input: unknown,
  options: ConfigResolutionOptions = {},
): AuthClientConfig {
  let resolved = input;
  if (options.resolveEnv ?? true) {
    try {
      resolved = new EnvVarPatternResolver({ envSource: options.env }).resolveDeep(input);
    } catch (error) {
      if (error instanceof EnvironmentResolutionError) {
        throw new AuthClientConfigError(
          `Auth client configuration: ${error.message}`,
          error,
        );
      }
      throw error;
    }
  }

  const result = AuthClientConfigSchema.safeParse(resolved);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new AuthClientConfigError(
      `Invalid auth client configuration: ${issues}`,
      result.error,
    );
  }
  return result.data;
}

/**
 * Reads and validates an auth client configuration file. Files ending in
 * `.sops.json` are decrypted with sops first.
 * @throws {AuthClientConfigError} When the file cannot be read or is invalid
 * @public
 */
export async function loadAuthClientConfigFile(
  filePath: string,
  options: ConfigResolutionOptions = {},
): Promise<AuthClientConfig> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw new AuthClientConfigError(
      `Failed to read auth client configuration ${filePath}: ${toError(error).message}`,
      toError(error),
    );
  }
  const config = parseAuthClientConfig(raw, options);
  logEvent('debug', 'auth:config_loaded', {
    filePath,
    clientType: config.client_type,
  });
  return config;
}
