function prefixed(context: string | undefined, message: string): string {
  return context ? `${context}: ${message}` : message;
}

/**
 * Checks shared by endpoint clients and credentials. Failures are plain
 * `Error`s; callers wrap them in their own error type.
 * @example
 * ```typescript
 * ValidationUtils.validateUrl(tokenEndpoint, 'endpoint');
 * ValidationUtils.validateRequired(data, ['api_key'], 'Static API key credential');
 * ```
 * @public
 */
export const ValidationUtils = {
  /**
   * Rejects an empty or unparsable endpoint URL.
   */
  validateUrl(url: string, context?: string): void {
    if (!url) {
      throw new Error(prefixed(context, 'URL is required'));
    }
    if (!URL.canParse(url)) {
      throw new Error(prefixed(context, `Invalid URL format: ${url}`));
    }
  },

  /**
   * Rejects the first field that is missing or falsy.
   */
  validateRequired<T>(data: T, requiredFields: (keyof T)[], context?: string): void {
    const missing = requiredFields.find((field) => !data[field]);
    if (missing !== undefined) {
      throw new Error(prefixed(context, `Missing required field: ${String(missing)}`));
    }
  },
};
