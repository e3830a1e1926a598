/**
 * Progress and warning sink shared by the snapshot engine, the SSH session
 * and the challenge runner.
 */

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json';

export type LogLevel = 'info' | 'success' | 'warning';

/**
 * One buffered log line (JSON mode keeps every entry)
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
}

const SYMBOLS: Record<LogLevel, string> = {
  info: '',
  success: '✓ ',
  warning: '⚠ ',
};

/**
 * Human mode prints as it goes. JSON mode stays silent and buffers entries
 * for the command's JSON document.
 *
 * Warnings are kept in both modes: a failed freeze, loose key permissions
 * or a failed remote mkdir are reported only as warnings, and the public
 * operations hand them back to callers.
 */
export class Logger {
  private readonly entries: LogEntry[] = [];
  private readonly warnings: string[] = [];

  constructor(private readonly mode: OutputMode = 'human') {}

  info(message: string): void {
    this.write('info', message);
  }

  success(message: string): void {
    this.write('success', message);
  }

  warning(message: string): void {
    this.warnings.push(message);
    this.write('warning', message);
  }

  /**
   * Warnings logged since construction.
   */
  getWarnings(): string[] {
    return [...this.warnings];
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  private write(level: LogLevel, message: string): void {
    if (this.mode === 'json') {
      this.entries.push({ level, message });
      return;
    }
    const line = `${SYMBOLS[level]}${message}`;
    if (level === 'warning') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  static fromOptions(options: { json?: boolean }): Logger {
    return new Logger(options.json ? 'json' : 'human');
  }
}
