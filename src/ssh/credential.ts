/**
 * Private Key Validation
 *
 * Runs before every connection attempt.
 */

import { chmod, readFile, stat } from 'node:fs/promises';

import type { Logger } from '../lib/logger.js';
import { expandPath } from '../lib/paths.js';

export type KeyValidation =
  | { valid: true; keyPath: string; key: Buffer }
  | { valid: false; keyPath: string; message: string };

/**
 * Check that the key file exists, tighten overly permissive mode bits, and
 * read it.
 *
 * Group or world access bits trigger a warning and a `chmod 600`; if that
 * fails the key is still used.
 */
export async function validatePrivateKey(keyPath: string, logger: Logger): Promise<KeyValidation> {
  const resolved = expandPath(keyPath);

  let mode: number;
  try {
    const stats = await stat(resolved);
    if (!stats.isFile()) {
      return { valid: false, keyPath: resolved, message: `SSH key is not a regular file: ${resolved}` };
    }
    mode = stats.mode;
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return { valid: false, keyPath: resolved, message: `SSH key not found: ${resolved}` };
    }
    return { valid: false, keyPath: resolved, message: `Cannot access SSH key ${resolved}: ${err.message}` };
  }

  if ((mode & 0o077) !== 0) {
    const current = (mode & 0o777).toString(8).padStart(3, '0');
    logger.warning(`SSH key ${resolved} has permissions ${current}; setting 600`);
    try {
      await chmod(resolved, 0o600);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warning(`Could not tighten permissions on ${resolved}: ${message}`);
    }
  }

  try {
    const key = await readFile(resolved);
    return { valid: true, keyPath: resolved, key };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { valid: false, keyPath: resolved, message: `Cannot read SSH key ${resolved}: ${message}` };
  }
}
