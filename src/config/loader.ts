/**
 * Configuration Loader
 *
 * Loads YAML files (settings and challenges) from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

export type LoadFailure = 'not_found' | 'unreadable' | 'invalid_yaml';

/**
 * Error thrown when a YAML file cannot be read or parsed
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: LoadFailure,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

/**
 * Load and parse a YAML file.
 *
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigLoadError(`File not found: ${filePath}`, filePath, 'not_found', err);
    }
    if (err.code === 'EACCES') {
      throw new ConfigLoadError(`Permission denied reading ${filePath}`, filePath, 'unreadable', err);
    }
    throw new ConfigLoadError(`Failed to read ${filePath}: ${err.message}`, filePath, 'unreadable', err);
  }

  try {
    return yaml.load(content);
  } catch (error) {
    const err = error as yaml.YAMLException;
    throw new ConfigLoadError(`Invalid YAML syntax in ${filePath}: ${err.message}`, filePath, 'invalid_yaml', err);
  }
}
