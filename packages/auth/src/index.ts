// Errors
export * from './errors/index.js';

// Configuration
export * from './schemas.js';
export * from './config/index.js';

// Credentials and persistence
export * from './credential/index.js';
export {
  FileBackedJsonObject,
} from './persistence/file-backed-json-object.js';
export {
  readJsonFile,
  writeJsonFile,
  isJsonObject,
  type JsonObject,
} from './persistence/json-file.js';

// Protocol
export * from './api-clients/index.js';
export * from './token-validation/index.js';
export * from './auth-clients/index.js';
export * from './request-authenticator/index.js';

export { Auth, type AuthInitOptions } from './auth.js';
export * from './constants.js';
