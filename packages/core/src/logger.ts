import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured log event through the root logger.
 *
 * The record carries the event identifier under `event` and the payload
 * fields merged beside it, so that redaction paths such as `*.access_token`
 * apply to the payload. Non-object payloads land under `data`.
 * @param level - Log severity level
 * @param event - Event identifier for categorization, e.g. `auth:token_refreshed`
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  if (!rootLogger.isLevelEnabled(level)) return;

  const payload = isRecord(data) ? { event, ...data } : { event, data };
  rootLogger[level](payload, event);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
