/**
 * Settings Resolver
 *
 * Applies defaults, converts seconds to milliseconds and expands paths
 * to produce the settings every command runs with.
 */

import { access } from 'node:fs/promises';
import { resolve } from 'node:path';

import { ConfigError } from '../core/errors.js';
import { baseDirOf, expandPath } from '../lib/paths.js';
import { ConfigLoadError, loadYamlFile } from './loader.js';
import type { LabkeeperSettingsFile, ResolvedSettings } from './types.js';
import { validateSettings } from './validator.js';

export const DEFAULT_SETTINGS_FILE = 'labkeeper.yaml';

/**
 * Default values when not specified in the settings file (seconds)
 */
const DEFAULTS = {
  uri: 'qemu:///system',
  virshPath: 'virsh',
  virshTimeout: 60,
  agentTimeout: 10,
  sshUser: 'student',
  sshKey: '~/.ssh/id_ed25519',
  sshPort: 22,
  connectTimeout: 10,
  commandTimeout: 30,
  readyTimeout: 120,
  readyPollInterval: 5,
  editorWarmup: 1,
  challengeDirectory: './challenges',
};

const seconds = (value: number): number => Math.round(value * 1000);

/**
 * Resolve validated settings.
 *
 * @param settings - Validated settings file content
 * @param sourcePath - Absolute path of the settings file, or null for pure defaults
 * @param cwd - Base for relative paths when there is no settings file
 */
export function resolveSettings(
  settings: LabkeeperSettingsFile,
  sourcePath: string | null,
  cwd: string = process.cwd()
): ResolvedSettings {
  const basePath = sourcePath ? baseDirOf(sourcePath) : cwd;
  const hypervisor = settings.hypervisor ?? {};
  const ssh = settings.ssh ?? {};

  return {
    hypervisor: {
      uri: hypervisor.uri ?? DEFAULTS.uri,
      virshPath: hypervisor.virsh_path ?? DEFAULTS.virshPath,
      commandTimeoutMs: seconds(hypervisor.command_timeout ?? DEFAULTS.virshTimeout),
      agentTimeoutMs: seconds(hypervisor.agent_timeout ?? DEFAULTS.agentTimeout),
    },
    ssh: {
      user: ssh.user ?? DEFAULTS.sshUser,
      fallbackUsers: [...(ssh.fallback_users ?? [])],
      keyPath: expandPath(ssh.key ?? DEFAULTS.sshKey, basePath),
      port: ssh.port ?? DEFAULTS.sshPort,
      connectTimeoutMs: seconds(ssh.connect_timeout ?? DEFAULTS.connectTimeout),
      commandTimeoutMs: seconds(ssh.command_timeout ?? DEFAULTS.commandTimeout),
      readyTimeoutMs: seconds(ssh.ready_timeout ?? DEFAULTS.readyTimeout),
      readyPollIntervalMs: seconds(ssh.ready_poll_interval ?? DEFAULTS.readyPollInterval),
      editorWarmupMs: seconds(ssh.editor_warmup ?? DEFAULTS.editorWarmup),
    },
    challengeDirectory: expandPath(settings.challenges?.directory ?? DEFAULTS.challengeDirectory, basePath),
    sourcePath,
  };
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load, validate and resolve settings.
 *
 * An explicit path must exist. Without one, `labkeeper.yaml` in `cwd` is
 * used when present, otherwise the defaults.
 *
 * @throws ConfigError CONFIG_NOT_FOUND, CONFIG_INVALID_YAML or CONFIG_VALIDATION_FAILED
 */
export async function loadSettings(configPath?: string, cwd: string = process.cwd()): Promise<ResolvedSettings> {
  let filePath: string;
  if (configPath) {
    filePath = resolve(cwd, configPath);
  } else {
    filePath = resolve(cwd, DEFAULT_SETTINGS_FILE);
    if (!(await exists(filePath))) {
      return resolveSettings({}, null, cwd);
    }
  }

  let data: unknown;
  try {
    data = await loadYamlFile(filePath);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      if (error.reason === 'invalid_yaml') {
        throw new ConfigError(error.message, 'CONFIG_INVALID_YAML', 'Check the YAML syntax.', filePath);
      }
      throw new ConfigError(
        error.message,
        'CONFIG_NOT_FOUND',
        'Pass an existing file with --config, or omit it to use the defaults.',
        filePath
      );
    }
    throw error;
  }

  const result = validateSettings(data);
  if (!result.valid) {
    throw new ConfigError(
      `Settings file ${filePath} is invalid`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed fields.',
      filePath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  return resolveSettings(result.settings, filePath, cwd);
}
