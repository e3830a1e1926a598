/**
 * Challenge Loader
 *
 * Reads challenge files from disk and validates them.
 */

import { readdir } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

import { ConfigLoadError, loadYamlFile } from '../config/loader.js';
import { ChallengeLoadError } from '../core/errors.js';
import type { ChallengeDefinition } from './types.js';
import { validateChallenge } from './validator.js';

/** JSON is a subset of YAML, so both go through js-yaml */
export const CHALLENGE_EXTENSIONS = ['.yaml', '.yml', '.json'];

export interface ChallengeDirectory {
  challenges: ChallengeDefinition[];
  /** Files that failed to load; they are skipped, not fatal */
  invalid: ChallengeLoadError[];
}

export function isChallengeFile(filePath: string): boolean {
  return CHALLENGE_EXTENSIONS.includes(extname(filePath).toLowerCase());
}

/**
 * Load and validate one challenge file.
 *
 * @throws ChallengeLoadError when the file is unreadable, has the wrong
 *   extension or fails validation
 */
export async function loadChallengeFile(filePath: string): Promise<ChallengeDefinition> {
  const absolutePath = resolve(filePath);

  if (!isChallengeFile(absolutePath)) {
    throw new ChallengeLoadError(
      `Unsupported challenge file type: ${filePath} (expected ${CHALLENGE_EXTENSIONS.join(', ')})`,
      'CHALLENGE_INVALID',
      absolutePath
    );
  }

  let data: unknown;
  try {
    data = await loadYamlFile(absolutePath);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      const code = error.reason === 'not_found' ? 'CHALLENGE_NOT_FOUND' : 'CHALLENGE_INVALID';
      throw new ChallengeLoadError(error.message, code, absolutePath);
    }
    throw error;
  }

  const result = validateChallenge(data, absolutePath);
  if (!result.valid) {
    throw new ChallengeLoadError(
      `Challenge ${filePath} is invalid`,
      'CHALLENGE_INVALID',
      absolutePath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  return result.challenge;
}

/**
 * Load every challenge file in a directory (not recursive).
 *
 * @throws ChallengeLoadError CHALLENGE_NOT_FOUND when the directory is
 *   missing, CHALLENGE_INVALID when two files share an id
 */
export async function loadChallengeDirectory(directory: string): Promise<ChallengeDirectory> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    throw new ChallengeLoadError(
      `Cannot read challenge directory ${directory}: ${err.message}`,
      'CHALLENGE_NOT_FOUND',
      directory
    );
  }

  const challenges: ChallengeDefinition[] = [];
  const invalid: ChallengeLoadError[] = [];
  const seen = new Map<string, string>();

  for (const entry of entries.filter(isChallengeFile).sort()) {
    const filePath = join(directory, entry);
    let challenge: ChallengeDefinition;
    try {
      challenge = await loadChallengeFile(filePath);
    } catch (error) {
      if (error instanceof ChallengeLoadError) {
        invalid.push(error);
        continue;
      }
      throw error;
    }

    const previous = seen.get(challenge.id);
    if (previous !== undefined) {
      throw new ChallengeLoadError(
        `Duplicate challenge id '${challenge.id}' in ${previous} and ${filePath}`,
        'CHALLENGE_INVALID',
        filePath
      );
    }
    seen.set(challenge.id, filePath);
    challenges.push(challenge);
  }

  return { challenges, invalid };
}

/**
 * @throws ChallengeLoadError CHALLENGE_NOT_FOUND when no valid challenge has the id
 */
export async function findChallenge(directory: string, id: string): Promise<ChallengeDefinition> {
  const { challenges } = await loadChallengeDirectory(directory);
  const challenge = challenges.find((candidate) => candidate.id === id);
  if (!challenge) {
    throw new ChallengeLoadError(`Challenge '${id}' not found in ${directory}`, 'CHALLENGE_NOT_FOUND', directory);
  }
  return challenge;
}
