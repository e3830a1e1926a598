/**
 * Assertion Evaluators
 *
 * Each assertion type turns into one or more commands run on the VM
 * and a list of field mismatches. A command that fails to run (SSH error,
 * timeout) fails the assertion with `error` set.
 */

import { shellQuote } from '../lib/paths.js';
import type { CommandResult } from '../ssh/types.js';
import { countFromOutput, meetsThreshold } from './threshold.js';
import type {
  Assertion,
  AssertionResult,
  CommandAssertion,
  FileContainsAssertion,
  FileExistsAssertion,
  HistoryAssertion,
  Mismatch,
  OutputMatch,
  PortListeningAssertion,
  RunCommandAssertion,
  ServiceStatus,
  ServiceStatusAssertion,
  UserGroupAssertion,
} from './types.js';

/**
 * Runs a command on the VM under test.
 */
export type RemoteRunner = (command: string) => Promise<CommandResult>;

/** Raised inside an evaluator when a command could not run */
class CheckFailure extends Error {}

async function run(remote: RemoteRunner, command: string): Promise<CommandResult> {
  const result = await remote(command);
  if (result.error) {
    throw new CheckFailure(result.error.message);
  }
  return result;
}

function mismatch(field: string, observed: unknown, expected: unknown): Mismatch {
  return { field, observed, expected };
}

export function compileRegex(source: string): RegExp {
  return new RegExp(source, 'mu');
}

/**
 * Compare trimmed output against a match rule.
 */
export function outputMatches(output: string, match: OutputMatch): boolean {
  const trimmed = output.trim();
  switch (match.mode) {
    case 'exact':
      return trimmed === match.value.trim();
    case 'substring':
      return trimmed.includes(match.value);
    case 'pattern':
      return compileRegex(match.value).test(trimmed);
  }
}

function describeMatch(match: OutputMatch): string {
  switch (match.mode) {
    case 'exact':
      return match.value.trim();
    case 'substring':
      return `contains ${JSON.stringify(match.value)}`;
    case 'pattern':
      return `matches /${match.value}/`;
  }
}

// =============================================================================
// Evaluators
// =============================================================================

async function evaluateRunCommand(remote: RemoteRunner, assertion: RunCommandAssertion): Promise<Mismatch[]> {
  const result = await run(remote, assertion.command);
  const mismatches: Mismatch[] = [];

  if (result.exitStatus !== assertion.exitStatus) {
    mismatches.push(mismatch('exit_status', result.exitStatus, assertion.exitStatus));
  }
  if (assertion.stdout && !outputMatches(result.stdout, assertion.stdout)) {
    mismatches.push(mismatch('stdout', result.stdout.trim(), describeMatch(assertion.stdout)));
  }
  if (assertion.stderr && !outputMatches(result.stderr, assertion.stderr)) {
    mismatches.push(mismatch('stderr', result.stderr.trim(), describeMatch(assertion.stderr)));
  }
  return mismatches;
}

/**
 * `systemctl is-active` exits 0 for active and 3 for inactive; anything
 * else is reported as failed.
 */
export function serviceStatusFromExit(exitStatus: number | null): ServiceStatus {
  if (exitStatus === 0) return 'active';
  if (exitStatus === 3) return 'inactive';
  return 'failed';
}

async function evaluateServiceStatus(remote: RemoteRunner, assertion: ServiceStatusAssertion): Promise<Mismatch[]> {
  const service = shellQuote(assertion.service);
  const active = await run(remote, `systemctl is-active --quiet ${service}`);
  const status = serviceStatusFromExit(active.exitStatus);
  const mismatches: Mismatch[] = [];

  if (status !== assertion.expectedStatus) {
    mismatches.push(mismatch('status', status, assertion.expectedStatus));
  }
  if (assertion.checkEnabled) {
    const enabled = await run(remote, `systemctl is-enabled --quiet ${service}`);
    if (enabled.exitStatus !== 0) {
      mismatches.push(mismatch('enabled', false, true));
    }
  }
  return mismatches;
}

/**
 * Local ports from `ss -ln` output. The local address is the fourth
 * column; the port follows its last colon.
 */
export function parseListeningPorts(output: string): Set<number> {
  const ports = new Set<number>();
  for (const line of output.split('\n')) {
    const columns = line.trim().split(/\s+/);
    if (columns.length < 4 || columns[0] === 'State' || columns[0] === 'Netid') {
      continue;
    }
    const local = columns[3] ?? '';
    const port = Number.parseInt(local.slice(local.lastIndexOf(':') + 1), 10);
    if (Number.isInteger(port)) {
      ports.add(port);
    }
  }
  return ports;
}

async function evaluatePortListening(remote: RemoteRunner, assertion: PortListeningAssertion): Promise<Mismatch[]> {
  const flag = assertion.protocol === 'udp' ? '-lnu' : '-lnt';
  const result = await run(remote, `ss ${flag}`);
  if (result.exitStatus !== 0) {
    throw new CheckFailure(`ss exited with status ${result.exitStatus}: ${result.stderr.trim()}`);
  }

  const listening = parseListeningPorts(result.stdout).has(assertion.port);
  return listening === assertion.expectedState ? [] : [mismatch('listening', listening, assertion.expectedState)];
}

interface FileStat {
  type: string;
  owner: string;
  group: string;
  mode: string;
}

export function parseStat(output: string): FileStat | null {
  const [type, owner, group, mode] = output.trim().split('|');
  if (type === undefined || owner === undefined || group === undefined || mode === undefined) {
    return null;
  }
  return { type, owner, group, mode };
}

function fileTypeOf(statType: string): 'file' | 'directory' | 'other' {
  if (statType === 'regular file' || statType === 'regular empty file') return 'file';
  if (statType === 'directory') return 'directory';
  return 'other';
}

async function evaluateFileExists(remote: RemoteRunner, assertion: FileExistsAssertion): Promise<Mismatch[]> {
  const result = await run(remote, `stat -c '%F|%U|%G|%a' -- ${shellQuote(assertion.path)}`);
  const info = result.exitStatus === 0 ? parseStat(result.stdout) : null;
  const exists = info !== null;

  if (exists !== assertion.expectedState) {
    return [mismatch('exists', exists, assertion.expectedState)];
  }
  if (!info) {
    return [];
  }

  const mismatches: Mismatch[] = [];
  if (assertion.fileType !== 'any') {
    const type = fileTypeOf(info.type);
    if (type !== assertion.fileType) {
      mismatches.push(mismatch('type', type === 'other' ? info.type : type, assertion.fileType));
    }
  }
  if (assertion.owner !== null && info.owner !== assertion.owner) {
    mismatches.push(mismatch('owner', info.owner, assertion.owner));
  }
  if (assertion.group !== null && info.group !== assertion.group) {
    mismatches.push(mismatch('group', info.group, assertion.group));
  }
  if (assertion.permissions !== null && info.mode !== assertion.permissions) {
    mismatches.push(mismatch('permissions', info.mode, assertion.permissions));
  }
  return mismatches;
}

async function evaluateFileContains(remote: RemoteRunner, assertion: FileContainsAssertion): Promise<Mismatch[]> {
  const result = await run(remote, `cat -- ${shellQuote(assertion.path)}`);
  // An unreadable file does not contain anything
  const contains =
    result.exitStatus === 0 &&
    (assertion.match.mode === 'substring'
      ? result.stdout.includes(assertion.match.value)
      : compileRegex(assertion.match.value).test(result.stdout));

  return contains === assertion.expectedState ? [] : [mismatch('contains', contains, assertion.expectedState)];
}

async function evaluateUserGroup(remote: RemoteRunner, assertion: UserGroupAssertion): Promise<Mismatch[]> {
  let observed: boolean;

  switch (assertion.checkType) {
    case 'user_exists': {
      const result = await run(remote, `id -u ${shellQuote(assertion.username)}`);
      observed = result.exitStatus === 0;
      break;
    }
    case 'group_exists': {
      const result = await run(remote, `getent group ${shellQuote(assertion.group)}`);
      observed = result.exitStatus === 0;
      break;
    }
    case 'user_in_group': {
      const result = await run(remote, `id -Gn ${shellQuote(assertion.username)}`);
      observed = result.exitStatus === 0 && result.stdout.trim().split(/\s+/).includes(assertion.group);
      break;
    }
    case 'user_primary_group': {
      const result = await run(remote, `id -gn ${shellQuote(assertion.username)}`);
      observed = result.exitStatus === 0 && result.stdout.trim() === assertion.group;
      break;
    }
    case 'user_shell': {
      const result = await run(remote, `getent passwd ${shellQuote(assertion.username)}`);
      const shell = result.stdout.trim().split(':')[6];
      observed = result.exitStatus === 0 && shell === assertion.shell;
      break;
    }
  }

  return observed === assertion.expectedState ? [] : [mismatch(assertion.checkType, observed, assertion.expectedState)];
}

async function evaluateCommand(remote: RemoteRunner, assertion: CommandAssertion): Promise<Mismatch[]> {
  const result = await run(remote, assertion.command);
  const mismatches: Mismatch[] = [];

  if (result.exitStatus !== assertion.expectedExitStatus) {
    mismatches.push(mismatch('exit_status', result.exitStatus, assertion.expectedExitStatus));
  }
  if (assertion.expectedCount) {
    const count = countFromOutput(result.stdout);
    if (!meetsThreshold(count, assertion.expectedCount)) {
      mismatches.push(mismatch('count', count, assertion.expectedCount.source));
    }
  }
  return mismatches;
}

export function historyCommand(user: string | null): string {
  if (user === null) {
    return 'cat -- "$HOME/.bash_history"';
  }
  return `sudo -n cat -- "$(getent passwd ${shellQuote(user)} | cut -d: -f6)/.bash_history"`;
}

/**
 * History entries, without the `#<epoch>` lines bash writes when
 * HISTTIMEFORMAT is set.
 */
export function historyEntries(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !/^#\d+$/.test(line));
}

async function evaluateHistory(remote: RemoteRunner, assertion: HistoryAssertion): Promise<Mismatch[]> {
  const result = await run(remote, historyCommand(assertion.user));
  // A missing history file is an empty history
  const entries = result.exitStatus === 0 ? historyEntries(result.stdout) : [];
  const mismatches: Mismatch[] = [];

  if (assertion.commandPattern !== null) {
    const pattern = compileRegex(assertion.commandPattern);
    const count = entries.filter((entry) => pattern.test(entry)).length;
    if (!meetsThreshold(count, assertion.expectedCount)) {
      mismatches.push(mismatch('count', count, assertion.expectedCount.source));
    }
  }

  if (assertion.disallowedCommands.length > 0) {
    const patterns = assertion.disallowedCommands.map(compileRegex);
    const offending = entries.filter((entry) => patterns.some((pattern) => pattern.test(entry)));
    if (offending.length > 0) {
      mismatches.push(mismatch('disallowed', offending, []));
    }
  }

  return mismatches;
}

function mismatchesFor(remote: RemoteRunner, assertion: Assertion): Promise<Mismatch[]> {
  switch (assertion.type) {
    case 'run_command':
      return evaluateRunCommand(remote, assertion);
    case 'check_service_status':
      return evaluateServiceStatus(remote, assertion);
    case 'check_port_listening':
      return evaluatePortListening(remote, assertion);
    case 'check_file_exists':
      return evaluateFileExists(remote, assertion);
    case 'check_file_contains':
      return evaluateFileContains(remote, assertion);
    case 'check_user_group':
      return evaluateUserGroup(remote, assertion);
    case 'check_command':
      return evaluateCommand(remote, assertion);
    case 'check_history':
      return evaluateHistory(remote, assertion);
  }
}

/**
 * Evaluate one assertion. Never throws when a command could not run.
 */
export async function evaluateAssertion(remote: RemoteRunner, assertion: Assertion, index: number): Promise<AssertionResult> {
  const base = { index, type: assertion.type, description: assertion.description };
  try {
    const mismatches = await mismatchesFor(remote, assertion);
    return { ...base, passed: mismatches.length === 0, mismatches, error: null };
  } catch (error) {
    if (error instanceof CheckFailure) {
      return { ...base, passed: false, mismatches: [], error: error.message };
    }
    throw error;
  }
}
