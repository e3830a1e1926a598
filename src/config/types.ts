/**
 * Configuration Types for labkeeper
 *
 * The optional `labkeeper.yaml` settings file as authored, and the resolved
 * settings with defaults applied, durations in milliseconds and paths
 * expanded.
 */

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root settings object parsed from labkeeper.yaml
 */
export interface LabkeeperSettingsFile {
  hypervisor?: HypervisorSettingsConfig;
  ssh?: SshSettingsConfig;
  challenges?: ChallengeSettingsConfig;
}

export interface HypervisorSettingsConfig {
  /** libvirt connection URI. Default: qemu:///system */
  uri?: string;
  /** virsh binary. Default: virsh */
  virsh_path?: string;
  /** Seconds before a virsh call is killed. Default: 60 */
  command_timeout?: number;
  /** Seconds for each guest agent command. Default: 10 */
  agent_timeout?: number;
}

export interface SshSettingsConfig {
  /** Default: student */
  user?: string;
  /** Users tried in order when `user` cannot log in. Default: none */
  fallback_users?: string[];
  /** Private key path. Default: ~/.ssh/id_ed25519 */
  key?: string;
  port?: number;
  /** Seconds. Default: 10 */
  connect_timeout?: number;
  /** Seconds. Default: 30 */
  command_timeout?: number;
  /** Seconds. Default: 120 */
  ready_timeout?: number;
  /** Seconds. Default: 5 */
  ready_poll_interval?: number;
  /** Seconds before editor quit keys are sent. Default: 1 */
  editor_warmup?: number;
}

export interface ChallengeSettingsConfig {
  /** Default: ./challenges */
  directory?: string;
}

// =============================================================================
// Resolved Types
// =============================================================================

export interface ResolvedHypervisorSettings {
  uri: string;
  virshPath: string;
  commandTimeoutMs: number;
  agentTimeoutMs: number;
}

export interface ResolvedSshSettings {
  user: string;
  fallbackUsers: string[];
  keyPath: string;
  port: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  readyTimeoutMs: number;
  readyPollIntervalMs: number;
  editorWarmupMs: number;
}

export interface ResolvedSettings {
  hypervisor: ResolvedHypervisorSettings;
  ssh: ResolvedSshSettings;
  challengeDirectory: string;
  /** Settings file the values came from; null when defaults were used */
  sourcePath: string | null;
}
