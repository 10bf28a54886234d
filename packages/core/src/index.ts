export * from './validation-utils.js';
export * from './auth/index.js';
export * from './result.js';

export * as RequestUtils from './utils/RequestUtils.js';

// Logging with redaction
export * from './logging/index.js';

export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
} from './env/environment-resolver.js';
export type { EnvVarPatternResolverConfig } from './env/environment-resolver.js';
