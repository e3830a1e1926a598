/**
 * Caller-facing operations.
 *
 * Every function takes a {@link LabContext} and returns a result object with
 * `ok` and a normalized `error`. Expected failures (unreachable host, missing
 * snapshot, failed setup) come back as values; only a broken calling
 * contract throws {@link ContractError}.
 */

import { ChallengeRunner } from './challenge/runner.js';
import type { ChallengeDefinition, Hint, ValidationVerdict } from './challenge/types.js';
import type { ResolvedSettings } from './config/types.js';
import {
  ContractError,
  ERROR_CATEGORIES,
  toOperationError,
  type OperationError,
} from './core/errors.js';
import { systemClock, type Clock } from './lib/clock.js';
import type { Logger } from './lib/logger.js';
import { VirshExecutor } from './libvirt/executor.js';
import { VirshHypervisor, type Hypervisor } from './libvirt/hypervisor.js';
import { discoverGuestAddress } from './libvirt/interfaces.js';
import type { AddressSource, SnapshotDescriptor } from './libvirt/types.js';
import {
  SnapshotEngine,
  type CreateSnapshotOptions,
  type CreateSnapshotReport,
} from './snapshot/engine.js';
import { READINESS_COMMAND, SshSession } from './ssh/session.js';
import { NodeSshTransport } from './ssh/node-ssh-transport.js';
import type { SshTransport } from './ssh/transport.js';
import type { CommandResult, SshCredential, SshFailure } from './ssh/types.js';

/**
 * Everything an operation needs. Tests swap the hypervisor, transport and
 * clock for in-process fakes.
 */
export interface LabContext {
  hypervisor: Hypervisor;
  transport: SshTransport;
  clock: Clock;
  logger: Logger;
  settings: ResolvedSettings;
}

/**
 * Build the production context: virsh for the hypervisor, node-ssh for SSH.
 */
export function createLabContext(settings: ResolvedSettings, logger: Logger, options: { verbose?: boolean } = {}): LabContext {
  const executor = new VirshExecutor({
    virshPath: settings.hypervisor.virshPath,
    uri: settings.hypervisor.uri,
    timeout: settings.hypervisor.commandTimeoutMs,
    verbose: options.verbose ?? false,
  });
  return {
    hypervisor: new VirshHypervisor(executor),
    transport: new NodeSshTransport(),
    clock: systemClock,
    logger,
    settings,
  };
}

/**
 * Per-call overrides of the configured SSH identity.
 */
export interface CredentialOverrides {
  user?: string;
  keyPath?: string;
  port?: number;
}

export function credentialFor(context: LabContext, host: string, overrides: CredentialOverrides = {}): SshCredential {
  return {
    host,
    port: overrides.port ?? context.settings.ssh.port,
    username: overrides.user ?? context.settings.ssh.user,
    keyPath: overrides.keyPath ?? context.settings.ssh.keyPath,
  };
}

function sessionFor(context: LabContext): SshSession {
  return new SshSession(context.transport, context.clock, context.logger, {
    connectTimeoutMs: context.settings.ssh.connectTimeoutMs,
    editorWarmupMs: context.settings.ssh.editorWarmupMs,
  });
}

function engineFor(context: LabContext): SnapshotEngine {
  return new SnapshotEngine(context.hypervisor, context.logger, {
    agentTimeoutMs: context.settings.hypervisor.agentTimeoutMs,
  });
}

/**
 * Contract violations propagate; everything else becomes an OperationError.
 */
function capture(error: unknown): OperationError {
  if (error instanceof ContractError) {
    throw error;
  }
  return toOperationError(error);
}

export function fromSshFailure(failure: SshFailure): OperationError {
  return {
    code: failure.code,
    category: ERROR_CATEGORIES[failure.code],
    message: failure.message,
  };
}

// =============================================================================
// Snapshots
// =============================================================================

export type CreateSnapshotResult =
  | { ok: true; snapshot: CreateSnapshotReport; error: null }
  | { ok: false; snapshot: null; error: OperationError };

export async function createSnapshot(
  context: LabContext,
  vm: string,
  name: string,
  options: CreateSnapshotOptions = {}
): Promise<CreateSnapshotResult> {
  try {
    const snapshot = await engineFor(context).create(vm, name, options);
    return { ok: true, snapshot, error: null };
  } catch (error) {
    return { ok: false, snapshot: null, error: capture(error) };
  }
}

export type RevertSnapshotResult =
  | { ok: true; snapshot: SnapshotDescriptor; error: null }
  | { ok: false; snapshot: null; error: OperationError };

export async function revertSnapshot(context: LabContext, vm: string, name: string): Promise<RevertSnapshotResult> {
  try {
    const snapshot = await engineFor(context).revert(vm, name);
    return { ok: true, snapshot, error: null };
  } catch (error) {
    return { ok: false, snapshot: null, error: capture(error) };
  }
}

export type DeleteSnapshotResult =
  | { ok: true; orphanedOverlays: string[]; error: null }
  | { ok: false; orphanedOverlays: string[]; error: OperationError };

export async function deleteSnapshot(context: LabContext, vm: string, name: string): Promise<DeleteSnapshotResult> {
  try {
    const report = await engineFor(context).delete(vm, name);
    return { ok: true, orphanedOverlays: report.orphanedOverlays, error: null };
  } catch (error) {
    return { ok: false, orphanedOverlays: [], error: capture(error) };
  }
}

export type ListSnapshotsResult =
  | { ok: true; snapshots: SnapshotDescriptor[]; error: null }
  | { ok: false; snapshots: SnapshotDescriptor[]; error: OperationError };

export async function listSnapshots(context: LabContext, vm: string): Promise<ListSnapshotsResult> {
  try {
    const snapshots = await engineFor(context).list(vm);
    return { ok: true, snapshots, error: null };
  } catch (error) {
    return { ok: false, snapshots: [], error: capture(error) };
  }
}

// =============================================================================
// SSH
// =============================================================================

export interface RunCommandOptions extends CredentialOverrides {
  /** Default: the configured command timeout */
  timeoutMs?: number;
  allocateTty?: boolean;
}

/**
 * `ok` means the command ran to completion; `result.exitStatus` carries
 * its outcome.
 */
export type RunCommandResult =
  | { ok: true; result: CommandResult; error: null }
  | { ok: false; result: CommandResult; error: OperationError };

export async function runCommand(
  context: LabContext,
  host: string,
  command: string,
  options: RunCommandOptions = {}
): Promise<RunCommandResult> {
  const result = await sessionFor(context).execute(credentialFor(context, host, options), command, {
    timeoutMs: options.timeoutMs ?? context.settings.ssh.commandTimeoutMs,
    allocateTty: options.allocateTty ?? false,
  });
  if (result.error) {
    return { ok: false, result, error: fromSshFailure(result.error) };
  }
  return { ok: true, result, error: null };
}

export function runInteractiveCommand(
  context: LabContext,
  host: string,
  command: string,
  options: Omit<RunCommandOptions, 'allocateTty'> = {}
): Promise<RunCommandResult> {
  return runCommand(context, host, command, { ...options, allocateTty: true });
}

export interface WaitOptions extends CredentialOverrides {
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export type WaitResult =
  | { ok: true; attempts: number; error: null }
  | { ok: false; attempts: number; error: OperationError };

export async function waitForSSHReady(context: LabContext, host: string, options: WaitOptions = {}): Promise<WaitResult> {
  const readiness = await sessionFor(context).waitReady(credentialFor(context, host, options), {
    timeoutMs: options.timeoutMs ?? context.settings.ssh.readyTimeoutMs,
    pollIntervalMs: options.pollIntervalMs ?? context.settings.ssh.readyPollIntervalMs,
  });

  if (readiness.ready) {
    return { ok: true, attempts: readiness.attempts, error: null };
  }
  return {
    ok: false,
    attempts: readiness.attempts,
    error: {
      code: 'SSH_TIMEOUT',
      category: ERROR_CATEGORIES.SSH_TIMEOUT,
      message: `${host} did not become reachable over SSH: ${readiness.lastError ?? 'no attempt succeeded'}`,
      suggestion: 'Check that the VM is running and sshd is enabled.',
    },
  };
}

export interface CopyFileOptions extends CredentialOverrides {
  createDirs?: boolean;
}

export type CopyFileResult = { ok: true; error: null } | { ok: false; error: OperationError };

export async function copyFile(
  context: LabContext,
  host: string,
  localPath: string,
  remotePath: string,
  options: CopyFileOptions = {}
): Promise<CopyFileResult> {
  const transfer = await sessionFor(context).copyFile(credentialFor(context, host, options), localPath, remotePath, {
    createDirs: options.createDirs ?? false,
  });
  if (transfer.error) {
    return { ok: false, error: fromSshFailure(transfer.error) };
  }
  return { ok: true, error: null };
}

export type FindCredentialResult =
  | { ok: true; credential: SshCredential; attempts: number; error: null }
  | { ok: false; credential: null; attempts: number; error: OperationError };

/**
 * Try candidate identities in order with a trivial command; the first that
 * logs in and exits 0 wins. Each attempt gets `timeoutMs` (default: the
 * configured connect timeout).
 */
export async function findWorkingCredential(
  context: LabContext,
  host: string,
  candidates: CredentialOverrides[],
  options: { timeoutMs?: number } = {}
): Promise<FindCredentialResult> {
  if (candidates.length === 0) {
    throw new ContractError('findWorkingCredential requires at least one candidate');
  }

  const reasons: string[] = [];
  let lastCode: OperationError['code'] = 'SSH_ERROR';
  for (const [index, candidate] of candidates.entries()) {
    const credential = credentialFor(context, host, candidate);
    const attempt = await runCommand(context, host, READINESS_COMMAND, {
      ...candidate,
      timeoutMs: options.timeoutMs ?? context.settings.ssh.connectTimeoutMs,
    });
    if (attempt.ok && attempt.result.exitStatus === 0) {
      context.logger.info(`Logged in to ${host} as ${credential.username}`);
      return { ok: true, credential, attempts: index + 1, error: null };
    }
    lastCode = attempt.error?.code ?? 'SSH_ERROR';
    reasons.push(`${credential.username}: ${attempt.error?.message ?? `exited with status ${attempt.result.exitStatus}`}`);
  }

  return {
    ok: false,
    credential: null,
    attempts: candidates.length,
    error: {
      code: lastCode,
      category: ERROR_CATEGORIES[lastCode],
      message: `No candidate user could log in to ${host}: ${reasons.join('; ')}`,
      suggestion: 'Install the public key for one of the users or pass --user.',
    },
  };
}

// =============================================================================
// VM addresses
// =============================================================================

export type ResolveAddressResult =
  | { ok: true; address: string; source: AddressSource; error: null }
  | { ok: false; address: null; source: null; error: OperationError };

/**
 * Look up a VM's guest address: guest agent first, DHCP leases second.
 */
export async function resolveVmAddress(context: LabContext, vm: string): Promise<ResolveAddressResult> {
  if (vm.trim() === '') {
    throw new ContractError('resolveVmAddress requires a VM name');
  }
  try {
    const found = await discoverGuestAddress(context.hypervisor, vm, context.logger);
    return { ok: true, address: found.address, source: found.source, error: null };
  } catch (error) {
    return { ok: false, address: null, source: null, error: capture(error) };
  }
}

// =============================================================================
// Challenges
// =============================================================================

export interface RunChallengeOptions extends CredentialOverrides {
  /** Guest address; looked up from `vm` when absent */
  host?: string;
  vm?: string;
  /** Users tried in order before the run; the first that logs in is used */
  candidateUsers?: string[];
  simulate?: boolean;
  hintsRevealed?: number;
  keepSnapshot?: boolean;
  timeoutMs?: number;
}

/**
 * `ok` means the challenge ran; `verdict.passed` says whether the learner
 * passed.
 */
export type RunChallengeResult =
  | { ok: true; verdict: ValidationVerdict; revealedHints: Hint[]; error: null }
  | { ok: false; verdict: null; revealedHints: Hint[]; error: OperationError };

export async function runChallenge(
  context: LabContext,
  challenge: ChallengeDefinition,
  options: RunChallengeOptions
): Promise<RunChallengeResult> {
  if (options.host !== undefined && options.host.trim() === '') {
    throw new ContractError('runChallenge requires a non-empty host');
  }
  if (options.host === undefined && (options.vm === undefined || options.vm.trim() === '')) {
    throw new ContractError('runChallenge requires a host or a VM to look one up from');
  }

  let host = options.host;
  if (host === undefined) {
    const resolved = await resolveVmAddress(context, options.vm ?? '');
    if (!resolved.ok) {
      return { ok: false, verdict: null, revealedHints: [], error: resolved.error };
    }
    host = resolved.address;
  }

  const identity: CredentialOverrides = { user: options.user, keyPath: options.keyPath, port: options.port };
  let credential = credentialFor(context, host, identity);
  if (options.candidateUsers && options.candidateUsers.length > 0) {
    const found = await findWorkingCredential(
      context,
      host,
      options.candidateUsers.map((user) => ({ ...identity, user }))
    );
    if (!found.ok) {
      return { ok: false, verdict: null, revealedHints: [], error: found.error };
    }
    credential = found.credential;
  }

  const runner = new ChallengeRunner(sessionFor(context), engineFor(context), context.logger, context.clock);
  try {
    const report = await runner.run(challenge, {
      credential,
      commandTimeoutMs: options.timeoutMs ?? context.settings.ssh.commandTimeoutMs,
      vm: options.vm,
      simulate: options.simulate,
      hintsRevealed: options.hintsRevealed,
      keepSnapshot: options.keepSnapshot,
    });
    return { ok: true, verdict: report.verdict, revealedHints: report.revealedHints, error: null };
  } catch (error) {
    return { ok: false, verdict: null, revealedHints: [], error: capture(error) };
  }
}
