/**
 * SSH Session Layer
 *
 * One-shot and PTY command execution, readiness polling and SFTP upload.
 * Every operation opens its own connection and closes it before returning.
 * Failures come back inside the result; only broken calling contracts throw.
 */

import { stat } from 'node:fs/promises';
import { posix } from 'node:path';

import { ContractError, type ErrorCode } from '../core/errors.js';
import type { Clock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';
import { validatePrivateKey } from './credential.js';
import { editorQuitFor } from './editors.js';
import { SshTransportError, type SftpClient, type SshChannel, type SshConnection, type SshTransport } from './transport.js';
import type {
  CommandResult,
  CopyOptions,
  ExecuteOptions,
  ReadinessOptions,
  ReadinessResult,
  SshCredential,
  SshFailure,
  SshFailureKind,
  TransferResult,
} from './types.js';

export interface SshSessionOptions {
  /** Budget for TCP connect, handshake and authentication */
  connectTimeoutMs: number;
  /** Interval between channel polls */
  pollIntervalMs: number;
  /** Delay before an editor's quit keys are sent */
  editorWarmupMs: number;
}

export const DEFAULT_SESSION_OPTIONS: SshSessionOptions = {
  connectTimeoutMs: 10000,
  pollIntervalMs: 50,
  editorWarmupMs: 1000,
};

/** Command run to check readiness */
export const READINESS_COMMAND = "echo 'ready'";

const FAILURE_CODES: Record<SshFailureKind, ErrorCode> = {
  configuration: 'SSH_KEY_INVALID',
  auth: 'SSH_AUTH_FAILED',
  transport: 'SSH_CONNECTION_FAILED',
  timeout: 'SSH_TIMEOUT',
  remote: 'SSH_ERROR',
  unexpected: 'SSH_ERROR',
};

function failure(kind: SshFailureKind, message: string, host: string, code?: ErrorCode): SshFailure {
  return { kind, code: code ?? FAILURE_CODES[kind], message, host };
}

function failedCommand(error: SshFailure, stdout = '', stderr = ''): CommandResult {
  return { stdout, stderr, exitStatus: null, error, timedOut: error.kind === 'timeout' };
}

function assertCredential(credential: SshCredential): void {
  if (!credential.host || credential.host.trim() === '') {
    throw new ContractError('SSH credential requires a host');
  }
  if (!credential.username || credential.username.trim() === '') {
    throw new ContractError('SSH credential requires a username');
  }
  if (!credential.keyPath || credential.keyPath.trim() === '') {
    throw new ContractError('SSH credential requires a private key path');
  }
}

function assertTimeout(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ContractError(`${name} must be a positive number of milliseconds, got ${value}`);
  }
}

export class SshSession {
  private readonly options: SshSessionOptions;

  constructor(
    private readonly transport: SshTransport,
    private readonly clock: Clock,
    private readonly logger: Logger,
    options: Partial<SshSessionOptions> = {}
  ) {
    this.options = { ...DEFAULT_SESSION_OPTIONS, ...options };
  }

  /**
   * Run a command and collect its output.
   *
   * `timeoutMs` covers the whole call: connecting, opening the channel and
   * collecting output, which is polled every `pollIntervalMs`. On timeout
   * the channel is abandoned and the result carries `timedOut: true` with
   * no exit status.
   */
  async execute(credential: SshCredential, command: string, options: ExecuteOptions): Promise<CommandResult> {
    assertCredential(credential);
    if (command.trim() === '') {
      throw new ContractError('Command must not be empty');
    }
    assertTimeout('timeoutMs', options.timeoutMs);

    const deadline = this.clock.now() + options.timeoutMs;
    const opened = await this.open(credential, options.timeoutMs);
    if ('error' in opened) {
      return failedCommand(opened.error);
    }

    const { connection } = opened;
    try {
      const channel = await connection.exec(command, {
        pty: options.allocateTty === true,
        openTimeoutMs: Math.max(1, deadline - this.clock.now()),
      });
      return await this.collect(credential, channel, command, options, deadline);
    } catch (error) {
      return failedCommand(this.normalize(error, credential));
    } finally {
      connection.close();
    }
  }

  /**
   * Run a command on a pseudo-terminal. Full-screen editors are sent their
   * quit-without-saving keys after the warm-up delay.
   */
  executeInteractive(credential: SshCredential, command: string, timeoutMs: number): Promise<CommandResult> {
    return this.execute(credential, command, { timeoutMs, allocateTty: true });
  }

  /**
   * Poll with a trivial command until the host answers or `timeoutMs`
   * elapses. Each attempt, connect included, gets only the time left.
   * `pollIntervalMs` is the pause after a failed attempt; the last pause is
   * shortened to end at the deadline.
   */
  async waitReady(credential: SshCredential, options: ReadinessOptions): Promise<ReadinessResult> {
    assertCredential(credential);
    assertTimeout('timeoutMs', options.timeoutMs);
    assertTimeout('pollIntervalMs', options.pollIntervalMs);

    const deadline = this.clock.now() + options.timeoutMs;
    let attempts = 0;
    let lastError: string | null = null;

    for (;;) {
      attempts++;
      const remaining = Math.max(1, deadline - this.clock.now());
      const result = await this.execute(credential, READINESS_COMMAND, { timeoutMs: remaining });

      if (result.error === null && result.exitStatus === 0) {
        return { ready: true, attempts, lastError: null };
      }

      lastError = result.error?.message ?? `Readiness check exited with status ${result.exitStatus}`;
      if (result.error?.kind === 'configuration') {
        break;
      }

      const left = deadline - this.clock.now();
      if (left <= 0) {
        break;
      }
      await this.clock.sleep(Math.min(options.pollIntervalMs, left));
    }

    this.logger.warning(`${credential.host} not ready after ${attempts} attempt(s): ${lastError}`);
    return { ready: false, attempts, lastError };
  }

  /**
   * Upload a local file over SFTP.
   *
   * With `createDirs`, missing remote parents are created one level at a
   * time from the deepest existing ancestor down. A failed mkdir is only a
   * warning; the upload reports any real path problem.
   */
  async copyFile(
    credential: SshCredential,
    localPath: string,
    remotePath: string,
    options: CopyOptions = {}
  ): Promise<TransferResult> {
    assertCredential(credential);
    if (localPath.trim() === '' || remotePath.trim() === '') {
      throw new ContractError('copyFile requires both a local and a remote path');
    }

    try {
      const stats = await stat(localPath);
      if (!stats.isFile()) {
        return {
          success: false,
          error: failure('configuration', `Local path is not a file: ${localPath}`, credential.host, 'LOCAL_FILE_NOT_FOUND'),
        };
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        error: failure('configuration', `Local file not readable: ${localPath} (${message})`, credential.host, 'LOCAL_FILE_NOT_FOUND'),
      };
    }

    const opened = await this.open(credential);
    if ('error' in opened) {
      return { success: false, error: opened.error };
    }

    const { connection } = opened;
    let sftp: SftpClient | null = null;
    try {
      sftp = await connection.sftp();
      if (options.createDirs) {
        await this.ensureRemoteDirectory(sftp, posix.dirname(remotePath));
      }
      await sftp.put(localPath, remotePath);
      this.logger.success(`Copied ${localPath} to ${credential.host}:${remotePath}`);
      return { success: true, error: null };
    } catch (error) {
      return { success: false, error: this.normalize(error, credential) };
    } finally {
      sftp?.close();
      connection.close();
    }
  }

  private async ensureRemoteDirectory(sftp: SftpClient, directory: string): Promise<void> {
    const missing: string[] = [];
    let current = directory;

    while (current !== '/' && current !== '.' && current !== '' && !(await sftp.exists(current))) {
      missing.unshift(current);
      current = posix.dirname(current);
    }

    for (const dir of missing) {
      try {
        await sftp.mkdir(dir);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warning(`Could not create remote directory ${dir}: ${message}`);
      }
    }
  }

  /**
   * Connect within `budgetMs` when given, never beyond `connectTimeoutMs`.
   */
  private async open(
    credential: SshCredential,
    budgetMs: number = this.options.connectTimeoutMs
  ): Promise<{ connection: SshConnection } | { error: SshFailure }> {
    const key = await validatePrivateKey(credential.keyPath, this.logger);
    if (!key.valid) {
      return { error: failure('configuration', key.message, credential.host) };
    }

    try {
      const connection = await this.transport.connect({
        host: credential.host,
        port: credential.port ?? 22,
        username: credential.username,
        privateKey: key.key,
        passphrase: credential.passphrase,
        readyTimeoutMs: Math.max(1, Math.min(this.options.connectTimeoutMs, budgetMs)),
      });
      return { connection };
    } catch (error) {
      return { error: this.normalize(error, credential) };
    }
  }

  private async collect(
    credential: SshCredential,
    channel: SshChannel,
    command: string,
    options: ExecuteOptions,
    deadline: number
  ): Promise<CommandResult> {
    const started = this.clock.now();
    const editor = options.allocateTty ? editorQuitFor(command) : null;
    let quitSent = false;
    let stdout = '';
    let stderr = '';
    let timedOut = false;

    for (;;) {
      const chunk = channel.read();
      stdout += chunk.stdout;
      stderr += chunk.stderr;

      if (channel.isClosed()) {
        break;
      }

      const now = this.clock.now();
      if (editor && !quitSent && now - started >= this.options.editorWarmupMs) {
        this.logger.info(`Sending ${editor.family} quit sequence`);
        channel.write(editor.keys);
        quitSent = true;
      }

      if (now >= deadline) {
        timedOut = true;
        channel.close();
        break;
      }

      await this.clock.sleep(Math.min(this.options.pollIntervalMs, deadline - now));
    }

    const tail = channel.read();
    stdout += tail.stdout;
    stderr += tail.stderr;

    if (timedOut) {
      const message = `Command timed out after ${options.timeoutMs}ms on ${credential.host}`;
      this.logger.warning(message);
      return failedCommand(failure('timeout', message, credential.host), stdout, stderr);
    }

    const exitStatus = channel.exitStatus();
    if (exitStatus === null) {
      return failedCommand(
        failure('transport', `Channel to ${credential.host} closed without an exit status`, credential.host),
        stdout,
        stderr
      );
    }

    return { stdout, stderr, exitStatus, error: null, timedOut: false };
  }

  private normalize(error: unknown, credential: SshCredential): SshFailure {
    const target = `${credential.username}@${credential.host}:${credential.port ?? 22}`;
    if (error instanceof SshTransportError) {
      return failure(error.kind, `${target}: ${error.message}`, credential.host);
    }
    const message = error instanceof Error ? error.message : String(error);
    return failure('unexpected', `${target}: unexpected SSH error: ${message}`, credential.host);
  }
}
