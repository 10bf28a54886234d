import { execFile } from 'child_process';
import { promisify } from 'util';
import { basename } from 'path';
import { logEvent } from '@credgate/core';

const execFileAsync = promisify(execFile);

const SOPS_SUFFIX = '.sops.json';

/**
 * Whether a file is stored sops-encrypted. Only field-level encrypted JSON
 * files named `*.sops.json` are recognized.
 * @public
 */
export function isSopsPath(filePath: string): boolean {
  const name = basename(filePath);
  return name.endsWith(SOPS_SUFFIX) && name.length > SOPS_SUFFIX.length;
}

/**
 * Decrypts a sops file and returns the clear text.
 *
 * Uses execFile with an argument array so the path is never interpreted by
 * a shell.
 * @public
 */
export async function sopsDecrypt(filePath: string): Promise<string> {
  logEvent('debug', 'sops:decrypt', { filePath });
  const { stdout } = await execFileAsync('sops', ['-d', filePath]);
  return stdout;
}

/**
 * Encrypts a clear-text JSON file in place.
 * @public
 */
export async function sopsEncryptInPlace(filePath: string): Promise<void> {
  logEvent('debug', 'sops:encrypt', { filePath });
  await execFileAsync('sops', [
    '-e',
    '--input-type',
    'json',
    '--output-type',
    'json',
    '-i',
    filePath,
  ]);
}
