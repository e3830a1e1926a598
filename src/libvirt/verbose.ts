/**
 * Verbose Output Helpers
 *
 * Formats virsh invocations for --verbose CLI output.
 * Used by VirshExecutor to print commands to stderr before execution.
 */

import { shellQuote } from '../lib/paths.js';

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[virsh] ';

/**
 * ANSI SGR 90, bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0, reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 * Returns false when stderr is piped, redirected, or non-interactive.
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Render an argument vector as a copy-pasteable shell line. Arguments that
 * contain anything beyond a conservative safe set are single-quoted.
 */
export function renderArgs(binary: string, args: readonly string[]): string {
  const parts = [binary, ...args].map((arg) =>
    /^[A-Za-z0-9_./:=@%+-]+$/.test(arg) ? arg : shellQuote(arg)
  );
  return parts.join(' ');
}

/**
 * Format a virsh invocation for verbose output.
 *
 * Produces a line fenced by blank lines, prefixed with `[virsh] ` and
 * optionally wrapped in ANSI gray (SGR 90).
 *
 * @param binary - virsh executable path
 * @param args - Argument vector passed to virsh
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(binary: string, args: readonly string[], ansi: boolean): string {
  const plain = `\n${PREFIX}${renderArgs(binary, args)}\n\n`;

  if (ansi) {
    return `${ANSI_GRAY}${plain}${ANSI_RESET}`;
  }

  return plain;
}
