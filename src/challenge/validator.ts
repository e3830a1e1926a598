/**
 * Challenge Validator
 *
 * Fail-closed validation of challenge definitions: JSON Schema first (Ajv),
 * then the cross-field rules the schema cannot express, then mapping to the
 * typed definition. Nothing here touches a VM.
 */

import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import { toValidationErrors, type ValidationError } from '../config/validator.js';
import challengeSchema from './schema.json' with { type: 'json' };
import { parseThreshold } from './threshold.js';
import type {
  Assertion,
  ChallengeDefinition,
  OutputMatch,
  RawAssertion,
  RawChallenge,
  RawStep,
  RawSuccessCriteria,
  RawUserGroupAssertion,
  Step,
  Threshold,
} from './types.js';

export type ChallengeValidationResult =
  | { valid: true; challenge: ChallengeDefinition }
  | { valid: false; errors: ValidationError[] };

export const DEFAULT_SCORE = 100;
export const DEFAULT_HISTORY_COUNT = '>0';

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
  discriminator: true,
});
addFormats.default(ajv);

const validate = ajv.compile<RawChallenge>(challengeSchema);

/**
 * Validate parsed challenge data and map it to a {@link ChallengeDefinition}.
 *
 * @param sourcePath - File the data came from, if any
 */
export function validateChallenge(data: unknown, sourcePath: string | null = null): ChallengeValidationResult {
  if (!validate(data)) {
    return { valid: false, errors: toValidationErrors(validate.errors) };
  }

  const errors = checkSemantics(data);
  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return { valid: true, challenge: toDefinition(data, sourcePath) };
}

// =============================================================================
// Cross-field rules
// =============================================================================

function issue(path: string, message: string): ValidationError {
  return { path, message, params: {} };
}

function countDefined(...values: unknown[]): number {
  return values.filter((value) => value !== undefined).length;
}

function checkSemantics(raw: RawChallenge): ValidationError[] {
  const errors: ValidationError[] = [];

  raw.validation.forEach((assertion, index) => {
    const path = `/validation/${index}`;

    switch (assertion.type) {
      case 'run_command': {
        const criteria = assertion.success_criteria ?? {};
        if (countDefined(criteria.stdout_equals, criteria.stdout_contains, criteria.stdout_matches_regex) > 1) {
          errors.push(issue(`${path}/success_criteria`, 'only one stdout comparison may be set'));
        }
        const stderrEmpty = criteria.stderr_empty === true ? true : undefined;
        if (countDefined(stderrEmpty, criteria.stderr_equals, criteria.stderr_contains, criteria.stderr_matches_regex) > 1) {
          errors.push(issue(`${path}/success_criteria`, 'only one stderr comparison may be set'));
        }
        break;
      }
      case 'check_file_contains':
        if (countDefined(assertion.text, assertion.matches_regex) !== 1) {
          errors.push(issue(path, 'exactly one of text or matches_regex is required'));
        }
        break;
      case 'check_user_group':
        for (const field of requiredUserGroupFields(assertion)) {
          if (assertion[field] === undefined) {
            errors.push(issue(path, `${assertion.check_type} requires ${field}`));
          }
        }
        break;
      case 'check_history':
        if (assertion.command_pattern === undefined && (assertion.disallowed_commands ?? []).length === 0) {
          errors.push(issue(path, 'command_pattern or disallowed_commands is required'));
        }
        if (assertion.expected_count !== undefined && assertion.command_pattern === undefined) {
          errors.push(issue(path, 'expected_count requires command_pattern'));
        }
        break;
      default:
        break;
    }
  });

  return errors;
}

function requiredUserGroupFields(assertion: RawUserGroupAssertion): Array<'username' | 'group' | 'shell'> {
  switch (assertion.check_type) {
    case 'user_exists':
      return ['username'];
    case 'group_exists':
      return ['group'];
    case 'user_in_group':
    case 'user_primary_group':
      return ['username', 'group'];
    case 'user_shell':
      return ['username', 'shell'];
  }
}

// =============================================================================
// Mapping
// =============================================================================

function toDefinition(raw: RawChallenge, sourcePath: string | null): ChallengeDefinition {
  let simulatedAction: Step | null = null;
  if (typeof raw.user_action_simulation === 'string') {
    simulatedAction = { type: 'run_command', command: raw.user_action_simulation, expectedExitStatus: 0, description: null };
  } else if (raw.user_action_simulation) {
    simulatedAction = toStep(raw.user_action_simulation);
  }

  return {
    id: raw.id,
    name: raw.name,
    description: raw.description,
    category: raw.category ?? null,
    difficulty: raw.difficulty ?? null,
    score: raw.score ?? DEFAULT_SCORE,
    concepts: raw.concepts ?? [],
    setup: (raw.setup ?? []).map(toStep),
    simulatedAction,
    validation: raw.validation.map(toAssertion),
    hints: (raw.hints ?? []).map((hint) => ({ text: hint.text, cost: hint.cost ?? 0 })),
    flag: raw.flag ?? null,
    sourcePath,
  };
}

function toStep(raw: RawStep): Step {
  if (raw.type === 'run_command') {
    return {
      type: 'run_command',
      command: raw.command,
      expectedExitStatus: raw.expected_exit_status ?? 0,
      description: raw.description ?? null,
    };
  }
  return {
    type: 'copy_file',
    source: raw.source,
    destination: raw.destination,
    createDirs: raw.create_dirs ?? true,
    description: raw.description ?? null,
  };
}

function stdoutMatch(criteria: RawSuccessCriteria): OutputMatch | null {
  if (criteria.stdout_equals !== undefined) return { mode: 'exact', value: criteria.stdout_equals };
  if (criteria.stdout_contains !== undefined) return { mode: 'substring', value: criteria.stdout_contains };
  if (criteria.stdout_matches_regex !== undefined) return { mode: 'pattern', value: criteria.stdout_matches_regex };
  return null;
}

function stderrMatch(criteria: RawSuccessCriteria): OutputMatch | null {
  if (criteria.stderr_empty === true) return { mode: 'exact', value: '' };
  if (criteria.stderr_equals !== undefined) return { mode: 'exact', value: criteria.stderr_equals };
  if (criteria.stderr_contains !== undefined) return { mode: 'substring', value: criteria.stderr_contains };
  if (criteria.stderr_matches_regex !== undefined) return { mode: 'pattern', value: criteria.stderr_matches_regex };
  return null;
}

/** Thresholds already passed the schema pattern */
function threshold(raw: string | number): Threshold {
  return parseThreshold(raw) ?? { operator: '==', value: 0, source: String(raw) };
}

function toAssertion(raw: RawAssertion): Assertion {
  const description = raw.description ?? null;

  switch (raw.type) {
    case 'run_command': {
      const criteria = raw.success_criteria ?? {};
      return {
        type: 'run_command',
        description,
        command: raw.command,
        exitStatus: criteria.exit_status ?? 0,
        stdout: stdoutMatch(criteria),
        stderr: stderrMatch(criteria),
      };
    }
    case 'check_service_status':
      return {
        type: 'check_service_status',
        description,
        service: raw.service,
        expectedStatus: raw.expected_status,
        checkEnabled: raw.check_enabled ?? false,
      };
    case 'check_port_listening':
      return {
        type: 'check_port_listening',
        description,
        port: raw.port,
        protocol: raw.protocol ?? 'tcp',
        expectedState: raw.expected_state,
      };
    case 'check_file_exists':
      return {
        type: 'check_file_exists',
        description,
        path: raw.path,
        expectedState: raw.expected_state,
        fileType: raw.file_type ?? 'any',
        owner: raw.owner ?? null,
        group: raw.group ?? null,
        permissions: raw.permissions ? normalizeMode(raw.permissions) : null,
      };
    case 'check_file_contains':
      return {
        type: 'check_file_contains',
        description,
        path: raw.path,
        match:
          raw.text !== undefined
            ? { mode: 'substring', value: raw.text }
            : { mode: 'pattern', value: raw.matches_regex ?? '' },
        expectedState: raw.expected_state,
      };
    case 'check_user_group':
      return toUserGroupAssertion(raw);
    case 'check_command':
      return {
        type: 'check_command',
        description,
        command: raw.command,
        expectedExitStatus: raw.expected_exit_status ?? 0,
        expectedCount: raw.expected_count !== undefined ? threshold(raw.expected_count) : null,
      };
    case 'check_history':
      return {
        type: 'check_history',
        description,
        commandPattern: raw.command_pattern ?? null,
        disallowedCommands: raw.disallowed_commands ?? [],
        expectedCount: threshold(raw.expected_count ?? DEFAULT_HISTORY_COUNT),
        user: raw.user ?? null,
      };
  }
}

/** `stat %a` prints modes without leading zeros */
export function normalizeMode(mode: string): string {
  const stripped = mode.replace(/^0+/, '');
  return stripped === '' ? '0' : stripped;
}

function toUserGroupAssertion(raw: RawUserGroupAssertion): Assertion {
  const base = {
    type: 'check_user_group' as const,
    description: raw.description ?? null,
    expectedState: raw.expected_state ?? true,
  };
  const username = raw.username ?? '';
  const group = raw.group ?? '';

  switch (raw.check_type) {
    case 'user_exists':
      return { ...base, checkType: 'user_exists', username };
    case 'group_exists':
      return { ...base, checkType: 'group_exists', group };
    case 'user_in_group':
      return { ...base, checkType: 'user_in_group', username, group };
    case 'user_primary_group':
      return { ...base, checkType: 'user_primary_group', username, group };
    case 'user_shell':
      return { ...base, checkType: 'user_shell', username, shell: raw.shell ?? '' };
  }
}
