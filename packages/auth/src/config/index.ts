export {
  parseAuthClientConfig,
  loadAuthClientConfigFile,
  type ConfigResolutionOptions,
} from './auth-client-config.js';
