/**
 * Challenge Types
 *
 * Raw YAML shapes (snake_case, as authored) and the typed definition the
 * engine runs. Raw shapes are only trusted after schema validation.
 */

// =============================================================================
// Raw YAML Input Types
// =============================================================================

export interface RawRunCommandStep {
  type: 'run_command';
  command: string;
  expected_exit_status?: number;
  description?: string;
}

export interface RawCopyFileStep {
  type: 'copy_file';
  source: string;
  destination: string;
  create_dirs?: boolean;
  description?: string;
}

export type RawStep = RawRunCommandStep | RawCopyFileStep;

export interface RawSuccessCriteria {
  exit_status?: number;
  stdout_equals?: string;
  stdout_contains?: string;
  stdout_matches_regex?: string;
  stderr_empty?: boolean;
  stderr_equals?: string;
  stderr_contains?: string;
  stderr_matches_regex?: string;
}

interface RawAssertionBase {
  description?: string;
}

export interface RawRunCommandAssertion extends RawAssertionBase {
  type: 'run_command';
  command: string;
  success_criteria?: RawSuccessCriteria;
}

export interface RawServiceStatusAssertion extends RawAssertionBase {
  type: 'check_service_status';
  service: string;
  expected_status: ServiceStatus;
  check_enabled?: boolean;
}

export interface RawPortListeningAssertion extends RawAssertionBase {
  type: 'check_port_listening';
  port: number;
  protocol?: 'tcp' | 'udp';
  expected_state: boolean;
}

export interface RawFileExistsAssertion extends RawAssertionBase {
  type: 'check_file_exists';
  path: string;
  expected_state: boolean;
  file_type?: FileType;
  owner?: string;
  group?: string;
  permissions?: string;
}

export interface RawFileContainsAssertion extends RawAssertionBase {
  type: 'check_file_contains';
  path: string;
  text?: string;
  matches_regex?: string;
  expected_state: boolean;
}

export interface RawUserGroupAssertion extends RawAssertionBase {
  type: 'check_user_group';
  check_type: UserGroupCheck;
  username?: string;
  group?: string;
  shell?: string;
  expected_state?: boolean;
}

export interface RawCommandAssertion extends RawAssertionBase {
  type: 'check_command';
  command: string;
  expected_exit_status?: number;
  expected_count?: string | number;
}

export interface RawHistoryAssertion extends RawAssertionBase {
  type: 'check_history';
  command_pattern?: string;
  disallowed_commands?: string[];
  expected_count?: string | number;
  user?: string;
}

export type RawAssertion =
  | RawRunCommandAssertion
  | RawServiceStatusAssertion
  | RawPortListeningAssertion
  | RawFileExistsAssertion
  | RawFileContainsAssertion
  | RawUserGroupAssertion
  | RawCommandAssertion
  | RawHistoryAssertion;

export interface RawHint {
  text: string;
  cost?: number;
}

/**
 * Root of a challenge file
 */
export interface RawChallenge {
  id: string;
  name: string;
  description: string;
  category?: string;
  difficulty?: string;
  score?: number;
  concepts?: string[];
  setup?: RawStep[];
  user_action_simulation?: string | RawStep;
  validation: RawAssertion[];
  hints?: RawHint[];
  flag?: string;
}

// =============================================================================
// Typed Definition
// =============================================================================

export type ServiceStatus = 'active' | 'inactive' | 'failed';
export type FileType = 'any' | 'file' | 'directory';
export type UserGroupCheck =
  | 'user_exists'
  | 'group_exists'
  | 'user_in_group'
  | 'user_primary_group'
  | 'user_shell';

export type Step =
  | { type: 'run_command'; command: string; expectedExitStatus: number; description: string | null }
  | { type: 'copy_file'; source: string; destination: string; createDirs: boolean; description: string | null };

export type ComparisonOperator = '>' | '>=' | '<' | '<=' | '==';

/**
 * Parsed count threshold such as `>0` or `==2`.
 */
export interface Threshold {
  operator: ComparisonOperator;
  value: number;
  /** Text as authored, for messages */
  source: string;
}

export interface OutputMatch {
  mode: 'exact' | 'substring' | 'pattern';
  value: string;
}

export interface RunCommandAssertion {
  type: 'run_command';
  description: string | null;
  command: string;
  exitStatus: number;
  stdout: OutputMatch | null;
  stderr: OutputMatch | null;
}

export interface ServiceStatusAssertion {
  type: 'check_service_status';
  description: string | null;
  service: string;
  expectedStatus: ServiceStatus;
  checkEnabled: boolean;
}

export interface PortListeningAssertion {
  type: 'check_port_listening';
  description: string | null;
  port: number;
  protocol: 'tcp' | 'udp';
  expectedState: boolean;
}

export interface FileExistsAssertion {
  type: 'check_file_exists';
  description: string | null;
  path: string;
  expectedState: boolean;
  fileType: FileType;
  owner: string | null;
  group: string | null;
  /** Octal mode without leading zeros, e.g. `644` */
  permissions: string | null;
}

export interface FileContainsAssertion {
  type: 'check_file_contains';
  description: string | null;
  path: string;
  match: { mode: 'substring' | 'pattern'; value: string };
  expectedState: boolean;
}

export type UserGroupAssertion = {
  type: 'check_user_group';
  description: string | null;
  expectedState: boolean;
} & (
  | { checkType: 'user_exists'; username: string }
  | { checkType: 'group_exists'; group: string }
  | { checkType: 'user_in_group'; username: string; group: string }
  | { checkType: 'user_primary_group'; username: string; group: string }
  | { checkType: 'user_shell'; username: string; shell: string }
);

export interface CommandAssertion {
  type: 'check_command';
  description: string | null;
  command: string;
  expectedExitStatus: number;
  expectedCount: Threshold | null;
}

export interface HistoryAssertion {
  type: 'check_history';
  description: string | null;
  commandPattern: string | null;
  disallowedCommands: string[];
  expectedCount: Threshold;
  /** Whose history to read; null means the connecting user */
  user: string | null;
}

export type Assertion =
  | RunCommandAssertion
  | ServiceStatusAssertion
  | PortListeningAssertion
  | FileExistsAssertion
  | FileContainsAssertion
  | UserGroupAssertion
  | CommandAssertion
  | HistoryAssertion;

export type AssertionType = Assertion['type'];

export interface Hint {
  text: string;
  cost: number;
}

export interface ChallengeDefinition {
  id: string;
  name: string;
  description: string;
  category: string | null;
  difficulty: string | null;
  score: number;
  concepts: string[];
  setup: Step[];
  simulatedAction: Step | null;
  validation: Assertion[];
  hints: Hint[];
  flag: string | null;
  /** File the definition was loaded from; relative step paths resolve against it */
  sourcePath: string | null;
}

// =============================================================================
// Results
// =============================================================================

export interface Mismatch {
  field: string;
  observed: unknown;
  expected: unknown;
}

export interface AssertionResult {
  index: number;
  type: AssertionType;
  description: string | null;
  passed: boolean;
  mismatches: Mismatch[];
  /** Command that could not run (SSH error, timeout); the assertion counts as failed */
  error: string | null;
}

export interface ValidationVerdict {
  challengeId: string;
  passed: boolean;
  results: AssertionResult[];
  maxScore: number;
  achievableScore: number;
  score: number;
  hintsUsed: number;
  flag: string | null;
}
