/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { AssertionResult, Hint, ValidationVerdict } from '../challenge/types.js';
import type { ErrorCode, OperationError } from '../core/errors.js';
import type { LogEntry, Logger } from '../lib/logger.js';
import type { SnapshotDescriptor } from '../libvirt/types.js';
import type { CommandResult } from '../ssh/types.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CliResult {
  success: boolean;
  command: string;
  data: Record<string, unknown>;
  warnings: string[];
  log: LogEntry[];
  error?: ErrorOutput;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export type OutputMode = 'human' | 'json';

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object at
 * flush, together with whatever the logger buffered while the command ran.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CliResult;
  private indentLevel: number = 0;

  constructor(
    command: string,
    private readonly logger: Logger,
    options: { json?: boolean } = {}
  ) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
      data: {},
      warnings: [],
      log: [],
    };
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message and mark the command failed.
   */
  error(message: string, error?: Pick<OperationError, 'code' | 'suggestion'>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'OPERATION_FAILED',
      message,
      suggestion: error?.suggestion,
    };
  }

  /**
   * Report a failed operation result.
   */
  operationError(error: OperationError): void {
    this.error(error.message, error);
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    } else {
      this.result.warnings.push(message);
    }
  }

  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine}`);
      }
    }
  }

  // ===========================================================================
  // Snapshots
  // ===========================================================================

  snapshotTable(vm: string, snapshots: SnapshotDescriptor[]): void {
    if (this.mode === 'human') {
      if (snapshots.length === 0) {
        this.info(`No snapshots recorded for '${vm}'.`);
      } else {
        const rows = snapshots.map((snapshot) => [
          snapshot.name,
          snapshot.createdAt ? snapshot.createdAt.toISOString() : '-',
          snapshot.state,
          snapshot.kind,
          snapshot.description ?? snapshot.parseError ?? '',
        ]);
        this.table(['NAME', 'CREATED', 'STATE', 'KIND', 'DESCRIPTION'], rows);
      }
    }

    this.setData(
      'snapshots',
      snapshots.map((snapshot) => ({
        ...snapshot,
        createdAt: snapshot.createdAt ? snapshot.createdAt.toISOString() : null,
      }))
    );
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Print remote command output as it was produced.
   */
  commandOutput(result: CommandResult): void {
    if (this.mode === 'human') {
      if (result.stdout) process.stdout.write(result.stdout);
      if (result.stderr) process.stderr.write(result.stderr);
    }
    this.setData('stdout', result.stdout);
    this.setData('stderr', result.stderr);
    this.setData('exitStatus', result.exitStatus);
    this.setData('timedOut', result.timedOut);
  }

  // ===========================================================================
  // Challenges
  // ===========================================================================

  /**
   * Print validation errors under the error already reported, or under a
   * generic one.
   */
  validationError(errors: Array<{ path: string; message: string }>, code: ErrorCode = 'CHALLENGE_INVALID'): void {
    if (!this.result.error) {
      this.error('Validation failed', { code });
    }

    if (this.mode === 'human') {
      this.newline();
      for (const err of errors) {
        console.log(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code,
      message: this.result.error?.message ?? 'Validation failed',
      suggestion: this.result.error?.suggestion,
      details: { errors },
    };
  }

  verdict(verdict: ValidationVerdict, hints: Hint[]): void {
    if (this.mode === 'human') {
      for (const hint of hints) {
        this.info(`Hint (-${hint.cost}): ${hint.text}`);
      }
      if (hints.length > 0) {
        this.newline();
      }

      for (const result of verdict.results) {
        this.assertionLine(result);
      }
      this.newline();

      if (verdict.passed) {
        this.success(`Challenge '${verdict.challengeId}' passed: ${verdict.score}/${verdict.maxScore}`);
        if (verdict.flag) {
          this.info(`Flag: ${verdict.flag}`);
        }
      } else {
        console.log(`✗ Challenge '${verdict.challengeId}' not passed (achievable ${verdict.achievableScore}/${verdict.maxScore})`);
      }
    }

    this.result.success = verdict.passed;
    this.setData('verdict', verdict);
    this.setData('hints', hints);
  }

  private assertionLine(result: AssertionResult): void {
    const label = result.description ?? result.type;
    if (result.passed) {
      this.success(label);
      return;
    }
    console.log(`${this.getIndent()}✗ ${label}`);
    this.indent();
    if (result.error) {
      this.info(result.error);
    }
    for (const mismatch of result.mismatches) {
      this.info(`${mismatch.field}: expected ${JSON.stringify(mismatch.expected)}, got ${JSON.stringify(mismatch.observed)}`);
    }
    this.dedent();
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  setData(key: string, value: unknown): void {
    this.result.data[key] = value;
  }

  setSuccess(success: boolean): void {
    this.result.success = success;
  }

  /**
   * In JSON mode, prints the collected JSON with the logger's warnings and
   * buffered entries. Human output was already printed inline.
   */
  flush(): void {
    if (this.mode === 'json') {
      this.result.warnings.push(...this.logger.getWarnings());
      this.result.log = this.logger.getEntries();
      console.log(JSON.stringify(this.result, null, 2));
    }
  }
}

export function createOutput(command: string, logger: Logger, options: { json?: boolean }): OutputFormatter {
  return new OutputFormatter(command, logger, options);
}
