/**
 * virsh Executor for libvirt Operations
 *
 * Spawns virsh with an argument vector against a fixed connection URI and
 * classifies failures from stderr.
 */

import { spawn } from 'node:child_process';

import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Error codes for virsh operations
 */
export type VirshErrorCode =
  | 'ACCESS_DENIED'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'AGENT_UNAVAILABLE'
  | 'INVALID_RESPONSE'
  | 'EXECUTION_FAILED'
  | 'VIRSH_NOT_AVAILABLE';

/**
 * Error thrown when a virsh invocation fails
 */
export class VirshError extends Error {
  constructor(
    message: string,
    public readonly code: VirshErrorCode,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly args: readonly string[]
  ) {
    super(message);
    this.name = 'VirshError';
  }
}

/**
 * Options for a single virsh invocation
 */
export interface VirshExecuteOptions {
  /** Timeout in milliseconds (default: 60000) */
  timeout?: number;
}

/**
 * Options for constructing a VirshExecutor
 */
export interface VirshExecutorOptions {
  /** Path to the virsh executable (default: 'virsh') */
  virshPath?: string;
  /** libvirt connection URI passed as `-c` (default: 'qemu:///system') */
  uri?: string;
  /** Default timeout in milliseconds */
  timeout?: number;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Runs virsh and returns its stdout.
 */
export class VirshExecutor {
  private readonly virshPath: string;
  private readonly uri: string;
  private readonly defaultTimeout: number;
  private readonly verbose: boolean;

  constructor(options?: VirshExecutorOptions) {
    this.virshPath = options?.virshPath ?? 'virsh';
    this.uri = options?.uri ?? 'qemu:///system';
    this.defaultTimeout = options?.timeout ?? 60000;
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Run virsh with the given arguments.
   *
   * @param args - Arguments after the connection URI, e.g. `['domstate', 'lab1']`
   * @returns Raw stdout
   * @throws VirshError if the process cannot be spawned, times out or exits non-zero
   */
  async execute(args: readonly string[], options: VirshExecuteOptions = {}): Promise<string> {
    const timeout = options.timeout ?? this.defaultTimeout;
    const fullArgs = ['-c', this.uri, ...args];

    if (this.verbose) {
      process.stderr.write(formatCommand(this.virshPath, fullArgs, supportsAnsi()));
    }

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.virshPath, fullArgs);

      let stdout = '';
      let stderr = '';
      let killed = false;

      const timeoutId = setTimeout(() => {
        killed = true;
        child.kill('SIGTERM');
        reject(
          new VirshError(
            `virsh timed out after ${timeout}ms`,
            'EXECUTION_FAILED',
            null,
            stderr,
            args
          )
        );
      }, timeout);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: Error) => {
        clearTimeout(timeoutId);
        if (!killed) {
          killed = true;
          reject(
            new VirshError(
              `Failed to spawn ${this.virshPath}: ${error.message}`,
              'VIRSH_NOT_AVAILABLE',
              null,
              stderr,
              args
            )
          );
        }
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (killed) return;

        if (code !== 0) {
          reject(
            new VirshError(
              this.formatErrorMessage(stderr, code),
              this.classifyError(stderr),
              code,
              stderr,
              args
            )
          );
          return;
        }

        resolve(stdout);
      });
    });
  }

  /**
   * Run virsh and parse stdout as JSON (used for guest agent replies).
   *
   * @throws VirshError with INVALID_RESPONSE when stdout is not JSON
   */
  async executeJson(args: readonly string[], options: VirshExecuteOptions = {}): Promise<unknown> {
    const stdout = await this.execute(args, options);
    const trimmed = stdout.trim();
    try {
      return JSON.parse(trimmed) as unknown;
    } catch {
      throw new VirshError(
        `Invalid JSON response from virsh: ${trimmed.slice(0, 200)}`,
        'INVALID_RESPONSE',
        0,
        '',
        args
      );
    }
  }

  /**
   * Classify the error based on stderr content.
   */
  private classifyError(stderr: string): VirshErrorCode {
    const lowerStderr = stderr.toLowerCase();

    if (
      lowerStderr.includes('guest agent is not') ||
      lowerStderr.includes('qemu agent') ||
      lowerStderr.includes('agent unresponsive') ||
      lowerStderr.includes('agent-unresponsive')
    ) {
      return 'AGENT_UNAVAILABLE';
    }

    if (
      lowerStderr.includes('permission denied') ||
      lowerStderr.includes('access denied') ||
      lowerStderr.includes('authentication failed') ||
      lowerStderr.includes('not authorized')
    ) {
      return 'ACCESS_DENIED';
    }

    if (
      lowerStderr.includes('failed to get domain') ||
      lowerStderr.includes('no domain with matching') ||
      lowerStderr.includes('no domain snapshot with matching') ||
      lowerStderr.includes('not found')
    ) {
      return 'NOT_FOUND';
    }

    if (lowerStderr.includes('already exists')) {
      return 'ALREADY_EXISTS';
    }

    if (lowerStderr.includes('failed to connect to the hypervisor')) {
      return 'VIRSH_NOT_AVAILABLE';
    }

    return 'EXECUTION_FAILED';
  }

  /**
   * Format a user-friendly error message from stderr.
   *
   * virsh reports failures as `error: ...` lines; those are kept and joined.
   */
  private formatErrorMessage(stderr: string, exitCode: number | null): string {
    const lines = stderr
      .replace(/\r/g, '')
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    const errorLines = lines
      .filter((line) => line.startsWith('error:'))
      .map((line) => line.slice('error:'.length).trim());

    if (errorLines.length > 0) {
      return errorLines.slice(0, 3).join(' | ');
    }

    if (lines.length > 0) {
      return lines.slice(0, 3).join(' | ');
    }

    return `virsh exited with code ${exitCode}`;
  }
}
