/**
 * Unit tests for settings resolution
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { mkdir, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';

import { loadSettings, resolveSettings } from '../../../src/config/resolver.js';
import { ConfigError } from '../../../src/core/errors.js';

const SETTINGS = join(import.meta.dirname, '../../fixtures/settings');

describe('resolveSettings', () => {
  it('should apply defaults when nothing is set', () => {
    const cwd = resolve('/work/lab');
    const settings = resolveSettings({}, null, cwd);

    assert.deepStrictEqual(settings, {
      hypervisor: {
        uri: 'qemu:///system',
        virshPath: 'virsh',
        commandTimeoutMs: 60000,
        agentTimeoutMs: 10000,
      },
      ssh: {
        user: 'student',
        fallbackUsers: [],
        keyPath: join(homedir(), '.ssh/id_ed25519'),
        port: 22,
        connectTimeoutMs: 10000,
        commandTimeoutMs: 30000,
        readyTimeoutMs: 120000,
        readyPollIntervalMs: 5000,
        editorWarmupMs: 1000,
      },
      challengeDirectory: resolve(cwd, 'challenges'),
      sourcePath: null,
    });
  });

  it('should convert fractional seconds to milliseconds', () => {
    const settings = resolveSettings({ hypervisor: { agent_timeout: 2.5 }, ssh: { editor_warmup: 0.25 } }, null, '/');

    assert.strictEqual(settings.hypervisor.agentTimeoutMs, 2500);
    assert.strictEqual(settings.ssh.editorWarmupMs, 250);
  });

  it('should keep fallback users in order', () => {
    const settings = resolveSettings({ ssh: { user: 'learner', fallback_users: ['ubuntu', 'root'] } }, null, '/');

    assert.strictEqual(settings.ssh.user, 'learner');
    assert.deepStrictEqual(settings.ssh.fallbackUsers, ['ubuntu', 'root']);
  });

  it('should resolve relative paths against the settings file', () => {
    const source = resolve('/labs/course/labkeeper.yaml');
    const settings = resolveSettings({ ssh: { key: 'keys/id_lab' }, challenges: { directory: 'tasks' } }, source, '/elsewhere');

    assert.strictEqual(settings.ssh.keyPath, resolve('/labs/course/keys/id_lab'));
    assert.strictEqual(settings.challengeDirectory, resolve('/labs/course/tasks'));
  });
});

describe('loadSettings', () => {
  it('should load and resolve an explicit file', async () => {
    const settings = await loadSettings(join(SETTINGS, 'full.yaml'));

    assert.strictEqual(settings.hypervisor.uri, 'qemu:///session');
    assert.strictEqual(settings.hypervisor.agentTimeoutMs, 2500);
    assert.strictEqual(settings.ssh.user, 'learner');
    assert.strictEqual(settings.ssh.port, 2222);
    assert.strictEqual(settings.ssh.keyPath, join(SETTINGS, 'keys/id_lab'));
    assert.strictEqual(settings.challengeDirectory, resolve(SETTINGS, '../challenges'));
    assert.strictEqual(settings.sourcePath, join(SETTINGS, 'full.yaml'));
  });

  it('should use defaults when no labkeeper.yaml is present', async () => {
    const cwd = join(tmpdir(), `labkeeper-${randomUUID()}`);
    await mkdir(cwd, { recursive: true });

    const settings = await loadSettings(undefined, cwd);

    assert.strictEqual(settings.sourcePath, null);
    assert.strictEqual(settings.challengeDirectory, join(cwd, 'challenges'));
  });

  it('should pick up labkeeper.yaml from the working directory', async () => {
    const cwd = join(tmpdir(), `labkeeper-${randomUUID()}`);
    await mkdir(cwd, { recursive: true });
    await writeFile(join(cwd, 'labkeeper.yaml'), 'ssh:\n  user: tutor\n');

    const settings = await loadSettings(undefined, cwd);

    assert.strictEqual(settings.ssh.user, 'tutor');
    assert.strictEqual(settings.sourcePath, join(cwd, 'labkeeper.yaml'));
  });

  it('should treat an empty file as defaults', async () => {
    const settings = await loadSettings(join(SETTINGS, 'empty.yaml'));

    assert.strictEqual(settings.ssh.port, 22);
  });

  it('should fail for a missing explicit file', async () => {
    await assert.rejects(
      () => loadSettings(join(SETTINGS, 'nope.yaml')),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.strictEqual(error.code, 'CONFIG_NOT_FOUND');
        return true;
      }
    );
  });

  it('should fail for broken YAML', async () => {
    await assert.rejects(
      () => loadSettings(join(SETTINGS, 'broken.yaml')),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.strictEqual(error.code, 'CONFIG_INVALID_YAML');
        return true;
      }
    );
  });

  it('should list every schema violation', async () => {
    const file = join(SETTINGS, 'bad-port.yaml');
    await assert.rejects(
      () => loadSettings(file),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.strictEqual(error.code, 'CONFIG_VALIDATION_FAILED');
        assert.strictEqual(error.message, `Settings file ${file} is invalid`);
        assert.deepStrictEqual(
          error.validationErrors?.map((entry) => entry.path).sort(),
          ['/ssh', '/ssh/port']
        );
        return true;
      }
    );
  });
});
