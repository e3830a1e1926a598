/**
 * SSH Session Types
 */

import type { ErrorCode } from '../core/errors.js';

/**
 * Credentials for one connection attempt. Supplied per call, never stored.
 */
export interface SshCredential {
  host: string;
  /** Default: 22 */
  port?: number;
  username: string;
  /** Path to the private key; `~` is expanded */
  keyPath: string;
  passphrase?: string;
}

/**
 * Coarse failure class. Every SSH problem is reported as one of these,
 * never thrown.
 */
export type SshFailureKind =
  | 'configuration'
  | 'auth'
  | 'transport'
  | 'timeout'
  | 'remote'
  | 'unexpected';

export interface SshFailure {
  kind: SshFailureKind;
  code: ErrorCode;
  message: string;
  host: string;
}

/**
 * Outcome of one remote command. `error` describes connection or protocol
 * failure; a command that ran and failed has an exit status and no error.
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  /** Null when the command never reported an exit status */
  exitStatus: number | null;
  error: SshFailure | null;
  timedOut: boolean;
}

export interface ExecuteOptions {
  /** Overall budget for the command, from connect to exit */
  timeoutMs: number;
  /** Allocate a pseudo-terminal before exec */
  allocateTty?: boolean;
}

export interface ReadinessOptions {
  timeoutMs: number;
  pollIntervalMs: number;
}

export interface ReadinessResult {
  ready: boolean;
  attempts: number;
  lastError: string | null;
}

export interface CopyOptions {
  /** Create missing remote parent directories first */
  createDirs?: boolean;
}

export interface TransferResult {
  success: boolean;
  error: SshFailure | null;
}
