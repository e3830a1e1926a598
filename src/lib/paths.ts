/**
 * Path Utilities
 *
 * Path expansion for settings files, key files and challenge directories.
 */

import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~, $VAR or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string = process.cwd()): string {
  let expanded = inputPath;

  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Get the directory a settings or challenge file lives in, used as the base
 * for relative paths inside it.
 */
export function baseDirOf(filePath: string): string {
  return dirname(resolve(filePath));
}

/**
 * Split a file name into stem and extension (without the dot).
 *
 * `ubuntu.qcow2` → `['ubuntu', 'qcow2']`, `disk` → `['disk', null]`.
 * A leading dot (hidden file) is part of the stem.
 */
export function splitExtension(fileName: string): [string, string | null] {
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0 || dot === fileName.length - 1) {
    return [fileName, null];
  }
  return [fileName.slice(0, dot), fileName.slice(dot + 1)];
}

/**
 * Quote a string for a POSIX shell.
 *
 * Wraps in single quotes and rewrites embedded single quotes as '\''.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
