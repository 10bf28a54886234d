import { randomBytes } from 'crypto';

/**
 * Correlation id for one outgoing request and its retries, shaped
 * `[prefix_]<epoch ms>_<8 hex chars>`.
 * @public
 */
export function generateRequestId(prefix?: string): string {
  const suffix = randomBytes(4).toString('hex');
  const stamp = String(Date.now());
  return prefix ? `${prefix}_${stamp}_${suffix}` : `${stamp}_${suffix}`;
}
