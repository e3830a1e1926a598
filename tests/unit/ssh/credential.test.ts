/**
 * Unit tests for private key validation
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { chmod, mkdir, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

import { Logger } from '../../../src/lib/logger.js';
import { validatePrivateKey } from '../../../src/ssh/credential.js';

async function scratchDir(): Promise<string> {
  const dir = join(tmpdir(), `labkeeper-cred-${randomUUID()}`);
  await mkdir(dir, { recursive: true });
  return dir;
}

describe('validatePrivateKey', () => {
  it('should read a key with owner-only permissions', async () => {
    const dir = await scratchDir();
    const keyPath = join(dir, 'id_test');
    await writeFile(keyPath, 'test-key-material\n');
    await chmod(keyPath, 0o600);
    const logger = new Logger('json');

    const result = await validatePrivateKey(keyPath, logger);

    assert.ok(result.valid);
    assert.strictEqual(result.key.toString(), 'test-key-material\n');
    assert.deepStrictEqual(logger.getWarnings(), []);
  });

  it('should tighten a group-readable key and warn', async () => {
    const dir = await scratchDir();
    const keyPath = join(dir, 'id_test');
    await writeFile(keyPath, 'test-key-material\n');
    await chmod(keyPath, 0o644);
    const logger = new Logger('json');

    const result = await validatePrivateKey(keyPath, logger);

    assert.ok(result.valid);
    assert.deepStrictEqual(logger.getWarnings(), [`SSH key ${keyPath} has permissions 644; setting 600`]);
    assert.strictEqual((await stat(keyPath)).mode & 0o777, 0o600);
  });

  it('should report a missing key', async () => {
    const dir = await scratchDir();
    const keyPath = join(dir, 'absent');

    const result = await validatePrivateKey(keyPath, new Logger('json'));

    assert.ok(!result.valid);
    assert.strictEqual(result.message, `SSH key not found: ${keyPath}`);
  });

  it('should reject a directory', async () => {
    const dir = await scratchDir();

    const result = await validatePrivateKey(dir, new Logger('json'));

    assert.ok(!result.valid);
    assert.strictEqual(result.message, `SSH key is not a regular file: ${dir}`);
  });
});
