/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact for path-based redaction of sensitive fields.
 */

import pino from 'pino';

/**
 * Paths censored in every log record.
 *
 * fast-redact needs explicit paths, so every sensitive field is listed both at
 * the top level and one level deep.
 * @public
 */
export const REDACT_PATHS: readonly string[] = [
  // OAuth & OIDC tokens
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'id_token',
  '*.id_token',
  'token',
  '*.token',
  'device_code',
  '*.device_code',

  // Client authentication
  'client_secret',
  '*.client_secret',
  'client_assertion',
  '*.client_assertion',
  'client_privkey',
  '*.client_privkey',
  'client_privkey_password',
  '*.client_privkey_password',
  'password',
  '*.password',
  'api_key',
  '*.api_key',
  'authorization',
  '*.authorization',
  'Authorization',
  '*.Authorization',

  // PKCE
  'code_verifier',
  '*.code_verifier',
  'code',
  '*.code',

  // Generic sensitive patterns
  '*.secret',
  '*.SECRET',
  '*.credential',
];

const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

type PinoLevel = (typeof LOG_LEVELS)[number];

function isPinoLevel(value: string): value is PinoLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads the level from CREDGATE_LOG_LEVEL, falling back to 'warn'.
 * @internal
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): PinoLevel {
  const requested = (env.CREDGATE_LOG_LEVEL ?? '').trim().toLowerCase();
  return isPinoLevel(requested) ? requested : 'warn';
}

/**
 * Builds a logger with the shared redaction rules.
 *
 * Production code uses {@link rootLogger}; tests pass their own destination
 * to capture the records.
 * @param destination - Where JSON lines are written (stderr by default)
 * @param level - Minimum level to emit
 * @public
 */
export function createLogger(
  destination: pino.DestinationStream = pino.destination(2),
  level: PinoLevel = resolveLogLevel(),
): pino.Logger {
  return pino(
    {
      level,
      base: { name: 'credgate' },
      redact: {
        paths: [...REDACT_PATHS],
        censor: '[REDACTED]',
        remove: false,
      },
      serializers: {
        ...pino.stdSerializers,
        err: pino.stdSerializers.err,
      },
    },
    destination,
  );
}

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * Writes to stderr so that stdout stays free for command output.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'info';
 * rootLogger.info({ refresh_token: 'abc' }); // Logs: { refresh_token: '[REDACTED]' }
 * ```
 *
 * @public
 */
const rootLogger = createLogger();

export { rootLogger };
export type { PinoLevel };
