/**
 * @public
 */
export interface EnvVarPatternResolverConfig {
  /** Variables placeholders resolve against. Defaults to `process.env`. */
  envSource?: Record<string, string | undefined>;
}

/**
 * A `${VAR}` placeholder in a configuration value named an unset variable
 * and carried no default.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      variable,
    );
  }
}

const PLACEHOLDER = /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/g;

/**
 * Fills `${VAR}` and `${VAR:default}` placeholders in auth client
 * configuration, so that secrets such as `client_secret` can live in the
 * environment instead of the config file.
 *
 * Substituted values are inserted as they are; placeholders inside them are
 * not expanded again.
 * @example
 * ```typescript
 * const config = new EnvVarPatternResolver().resolveDeep({
 *   auth_server: '${AUTH_HOST}/oauth2/${REALM:default}',
 *   client_secret: '${CLIENT_SECRET}',
 * });
 * ```
 * @public
 */
export class EnvVarPatternResolver {
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvVarPatternResolverConfig = {}) {
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * Returns a copy of a parsed JSON value with every string resolved.
   * Object keys and non-string leaves are kept.
   * @throws {EnvironmentResolutionError} When a placeholder without default names an unset variable
   */
  public resolveDeep(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.resolveString(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.resolveDeep(item));
    }
    if (typeof value === 'object' && value !== null) {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, this.resolveDeep(item)]),
      );
    }
    return value;
  }

  private resolveString(value: string): string {
    return value.replace(
      PLACEHOLDER,
      (_match, name: string, fallback: string | undefined) => {
        const resolved = this.envSource[name] ?? fallback;
        if (resolved === undefined) {
          throw EnvironmentResolutionError.missingVariable(name);
        }
        return resolved;
      },
    );
  }
}
