import { AuthenticationError, AuthErrorCode } from './authentication-error.js';

/**
 * Persisted or in-memory data failed its validity contract
 */
export class DataIntegrityError extends AuthenticationError<AuthErrorCode.DATA_INTEGRITY_ERROR> {
  public readonly filePath?: string;

  public constructor(message: string, options: { filePath?: string; cause?: Error } = {}) {
    super(message, AuthErrorCode.DATA_INTEGRITY_ERROR, options.cause);
    this.name = 'DataIntegrityError';
    this.filePath = options.filePath;
  }
}
