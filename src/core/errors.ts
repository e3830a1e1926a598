/**
 * Error Types for labkeeper
 *
 * Custom error classes with error codes for structured error handling.
 * Every code belongs to one failure category; callers of the public API
 * only ever see the normalized {@link OperationError} shape.
 */

/**
 * Error codes for all labkeeper errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'INVALID_ARGUMENT'
  | 'SSH_KEY_INVALID'
  | 'LOCAL_FILE_NOT_FOUND'
  | 'CHALLENGE_INVALID'
  | 'CHALLENGE_NOT_FOUND'
  | 'SSH_AUTH_FAILED'
  | 'SSH_CONNECTION_FAILED'
  | 'SSH_TIMEOUT'
  | 'SSH_ERROR'
  | 'VIRSH_NOT_AVAILABLE'
  | 'PERMISSION_DENIED'
  | 'VM_NOT_FOUND'
  | 'VM_ADDRESS_NOT_FOUND'
  | 'SNAPSHOT_NOT_FOUND'
  | 'SNAPSHOT_EXISTS'
  | 'NO_SNAPSHOT_DISKS'
  | 'HYPERVISOR_ERROR'
  | 'GUEST_AGENT_ERROR'
  | 'SETUP_FAILED'
  | 'ASSERTION_FAILED'
  | 'CONSISTENCY_ERROR'
  | 'OPERATION_FAILED';

/**
 * Failure categories.
 *
 * - configuration: bad input detected before any remote call, never retried
 * - connectivity: auth/transport/timeout, retried only by readiness polling
 * - environment: hypervisor, guest agent or setup failures
 * - assertion: learner-facing validation outcomes
 * - consistency: hypervisor and disk state disagree
 */
export type ErrorCategory =
  | 'configuration'
  | 'connectivity'
  | 'environment'
  | 'assertion'
  | 'consistency';

export const ERROR_CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  CONFIG_NOT_FOUND: 'configuration',
  CONFIG_INVALID_YAML: 'configuration',
  CONFIG_VALIDATION_FAILED: 'configuration',
  INVALID_ARGUMENT: 'configuration',
  SSH_KEY_INVALID: 'configuration',
  LOCAL_FILE_NOT_FOUND: 'configuration',
  CHALLENGE_INVALID: 'configuration',
  CHALLENGE_NOT_FOUND: 'configuration',
  SSH_AUTH_FAILED: 'connectivity',
  SSH_CONNECTION_FAILED: 'connectivity',
  SSH_TIMEOUT: 'connectivity',
  SSH_ERROR: 'connectivity',
  VIRSH_NOT_AVAILABLE: 'environment',
  PERMISSION_DENIED: 'environment',
  VM_NOT_FOUND: 'environment',
  VM_ADDRESS_NOT_FOUND: 'environment',
  SNAPSHOT_NOT_FOUND: 'environment',
  SNAPSHOT_EXISTS: 'environment',
  NO_SNAPSHOT_DISKS: 'environment',
  HYPERVISOR_ERROR: 'environment',
  GUEST_AGENT_ERROR: 'environment',
  SETUP_FAILED: 'environment',
  ASSERTION_FAILED: 'assertion',
  CONSISTENCY_ERROR: 'consistency',
  OPERATION_FAILED: 'environment',
};

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  INVALID_ARGUMENT: 1,
  SSH_KEY_INVALID: 1,
  LOCAL_FILE_NOT_FOUND: 1,
  CHALLENGE_INVALID: 1,
  CHALLENGE_NOT_FOUND: 1,
  SSH_AUTH_FAILED: 2,
  SSH_CONNECTION_FAILED: 2,
  SSH_TIMEOUT: 2,
  SSH_ERROR: 2,
  VIRSH_NOT_AVAILABLE: 2,
  PERMISSION_DENIED: 2,
  VM_NOT_FOUND: 1,
  VM_ADDRESS_NOT_FOUND: 2,
  SNAPSHOT_NOT_FOUND: 1,
  SNAPSHOT_EXISTS: 1,
  NO_SNAPSHOT_DISKS: 1,
  HYPERVISOR_ERROR: 2,
  GUEST_AGENT_ERROR: 2,
  SETUP_FAILED: 2,
  ASSERTION_FAILED: 3,
  CONSISTENCY_ERROR: 4,
  OPERATION_FAILED: 2,
};

/**
 * Normalized error shape returned by the public API.
 */
export interface OperationError {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  suggestion?: string;
}

/**
 * Base error class for all labkeeper errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class LabkeeperError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'LabkeeperError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, LabkeeperError.prototype);
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORIES[this.code];
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }

  toOperationError(): OperationError {
    const result: OperationError = {
      code: this.code,
      category: this.category,
      message: this.message,
    };
    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }
    return result;
  }
}

/**
 * Error for configuration-related issues (settings files, challenge files).
 */
export class ConfigError extends LabkeeperError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED' | 'SSH_KEY_INVALID',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Thrown when a caller breaks the calling contract (missing host, empty
 * command, non-positive timeout). The only failure the public API does
 * not return as a value.
 */
export class ContractError extends LabkeeperError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'ContractError';
    Object.setPrototypeOf(this, ContractError.prototype);
  }
}

/**
 * Error for hypervisor operation failures that are not more specific.
 */
export class HypervisorError extends LabkeeperError {
  constructor(
    message: string,
    code:
      | 'HYPERVISOR_ERROR'
      | 'VIRSH_NOT_AVAILABLE'
      | 'PERMISSION_DENIED'
      | 'VM_NOT_FOUND'
      | 'VM_ADDRESS_NOT_FOUND'
      | 'GUEST_AGENT_ERROR',
    suggestion?: string,
    public readonly stderr?: string
  ) {
    super(message, code, suggestion);
    this.name = 'HypervisorError';
    Object.setPrototypeOf(this, HypervisorError.prototype);
  }
}

/**
 * Error for snapshot lifecycle failures.
 */
export class SnapshotError extends LabkeeperError {
  constructor(
    message: string,
    code: 'SNAPSHOT_NOT_FOUND' | 'SNAPSHOT_EXISTS' | 'NO_SNAPSHOT_DISKS' | 'INVALID_ARGUMENT',
    public readonly vmName: string,
    public readonly snapshotName: string,
    suggestion?: string
  ) {
    super(message, code, suggestion);
    this.name = 'SnapshotError';
    Object.setPrototypeOf(this, SnapshotError.prototype);
  }
}

/**
 * The hypervisor reported success but the expected artifacts are missing.
 */
export class ConsistencyError extends LabkeeperError {
  constructor(
    message: string,
    public readonly missingPaths: string[]
  ) {
    super(
      message,
      'CONSISTENCY_ERROR',
      'Inspect the snapshot metadata and the image directory before reverting or deleting anything.'
    );
    this.name = 'ConsistencyError';
    Object.setPrototypeOf(this, ConsistencyError.prototype);
  }
}

/**
 * A challenge setup step failed. Reported as an environment problem, never
 * as a learner failure.
 */
export class SetupError extends LabkeeperError {
  constructor(
    message: string,
    public readonly stepIndex: number,
    public readonly stdout: string,
    public readonly stderr: string
  ) {
    super(message, 'SETUP_FAILED', 'Check that the VM is reachable and the setup commands are valid for its distribution.');
    this.name = 'SetupError';
    Object.setPrototypeOf(this, SetupError.prototype);
  }
}

/**
 * A challenge definition file could not be loaded or failed validation.
 */
export class ChallengeLoadError extends LabkeeperError {
  constructor(
    message: string,
    code: 'CHALLENGE_INVALID' | 'CHALLENGE_NOT_FOUND',
    public readonly filePath?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code);
    this.name = 'ChallengeLoadError';
    Object.setPrototypeOf(this, ChallengeLoadError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Check if an error is a LabkeeperError.
 */
export function isLabkeeperError(error: unknown): error is LabkeeperError {
  return error instanceof LabkeeperError;
}

/**
 * Normalize anything thrown into the public error shape.
 */
export function toOperationError(error: unknown): OperationError {
  if (isLabkeeperError(error)) {
    return error.toOperationError();
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    code: 'OPERATION_FAILED',
    category: ERROR_CATEGORIES.OPERATION_FAILED,
    message,
  };
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isLabkeeperError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
