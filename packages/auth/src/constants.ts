/**
 * Header identifying this library to auth servers and API backends.
 * @public
 */
export const APP_HEADER = 'X-Credgate-App';

/**
 * Value sent in {@link APP_HEADER}.
 * @public
 */
export const APP_NAME = 'credgate-auth';

/**
 * Maximum number of retries after an HTTP 429 from an auth server.
 * @public
 */
export const AUTH_MAX_RETRIES = 3;

/**
 * Base delay in milliseconds for exponential 429 backoff.
 * @public
 */
export const AUTH_RETRY_DELAY_MS = 1000;

/**
 * Allowed clock skew, in seconds, when checking `exp` and `nbf`.
 * @public
 */
export const DEFAULT_CLOCK_SKEW_SECONDS = 10;

/**
 * Minimum seconds between JWKS fetches triggered by unknown key ids.
 * @public
 */
export const DEFAULT_MIN_JWKS_FETCH_INTERVAL_SECONDS = 300;

/**
 * Default lifetime of a device or authorization code login, in seconds.
 * @public
 */
export const DEFAULT_LOGIN_TIMEOUT_SECONDS = 300;
