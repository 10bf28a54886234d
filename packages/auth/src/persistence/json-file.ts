import { promises as fs } from 'fs';
import { dirname } from 'path';
import { logEvent } from '@credgate/core';
import { isSopsPath, sopsDecrypt, sopsEncryptInPlace } from '../utils/sops.js';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Produces a copy with nulls dropped and object keys sorted at every level.
 * @internal
 */
export function canonicalizeJson(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalizeJson);
  }
  if (isJsonObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .filter((key) => value[key] !== null && value[key] !== undefined)
        .map((key) => [key, canonicalizeJson(value[key])]),
    );
  }
  return value;
}

/**
 * Reads a JSON file, decrypting it with sops when the name ends in
 * `.sops.json`. The parsed value is returned unvalidated.
 * @public
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  logEvent('debug', 'json_file:read', { filePath });
  const text = isSopsPath(filePath)
    ? await sopsDecrypt(filePath)
    : await fs.readFile(filePath, 'utf8');
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

/**
 * Writes a JSON object readable only by its owner.
 *
 * Keys are sorted, nulls are omitted and the text is indented by two
 * spaces. Missing parent directories are created. A `.sops.json` file is
 * written in clear text and then encrypted in place.
 * @public
 */
export async function writeJsonFile(
  filePath: string,
  data: JsonObject,
): Promise<void> {
  logEvent('debug', 'json_file:write', { filePath });
  await fs.mkdir(dirname(filePath), { recursive: true, mode: 0o700 });
  const text = JSON.stringify(canonicalizeJson(data), null, 2);
  await fs.writeFile(filePath, text, { encoding: 'utf8', mode: 0o600 });
  // writeFile only applies the mode when it creates the file
  await fs.chmod(filePath, 0o600);

  if (isSopsPath(filePath)) {
    await sopsEncryptInPlace(filePath);
  }
}
