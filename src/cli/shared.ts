/**
 * Shared command plumbing: settings, logger, context and error exit.
 */

import { createLabContext, type CredentialOverrides, type LabContext } from '../api.js';
import { loadSettings } from '../config/resolver.js';
import {
  ChallengeLoadError,
  ConfigError,
  EXIT_CODES,
  getExitCode,
  isLabkeeperError,
  type OperationError,
} from '../core/errors.js';
import { Logger } from '../lib/logger.js';
import { createOutput, type OutputFormatter } from './output.js';

/**
 * Options every command accepts (global or per command)
 */
export interface GlobalOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * SSH identity options accepted by the remote commands
 */
export interface SshOptions {
  user?: string;
  key?: string;
  port?: string;
}

export interface CommandSetup {
  output: OutputFormatter;
  context: LabContext;
}

/**
 * Load settings and build the context for a command. Settings errors are
 * reported and exit the process.
 */
export async function prepare(command: string, options: GlobalOptions): Promise<CommandSetup> {
  const logger = Logger.fromOptions(options);
  const output = createOutput(command, logger, options);

  try {
    const settings = await loadSettings(options.config);
    return { output, context: createLabContext(settings, logger, { verbose: options.verbose }) };
  } catch (error) {
    handleError(output, error);
  }
}

export function credentialOverrides(options: SshOptions): CredentialOverrides {
  const overrides: CredentialOverrides = {};
  if (options.user) overrides.user = options.user;
  if (options.key) overrides.keyPath = options.key;
  if (options.port) overrides.port = parseInteger(options.port, '--port');
  return overrides;
}

/**
 * Parse a whole-number option value.
 *
 * @throws Error when the value is not a non-negative integer
 */
export function parseInteger(value: string, flag: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${flag} expects a whole number, got '${value}'`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Seconds on the command line, milliseconds inside.
 */
export function parseSeconds(value: string, flag: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`${flag} expects a positive number of seconds, got '${value}'`);
  }
  return Math.round(seconds * 1000);
}

/**
 * Report a failed operation result and exit with its code.
 */
export function exitWithOperationError(output: OutputFormatter, error: OperationError): never {
  output.operationError(error);
  output.flush();
  process.exit(EXIT_CODES[error.code]);
}

/**
 * Handle errors and exit appropriately.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  if ((error instanceof ConfigError || error instanceof ChallengeLoadError) && error.validationErrors?.length) {
    output.error(error.message, error);
    output.validationError(error.validationErrors, error.code);
  } else if (isLabkeeperError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}
