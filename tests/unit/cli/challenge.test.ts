/**
 * Unit tests for challenge command option handling
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { candidateUsers } from '../../../src/cli/commands/challenge.js';
import { resolveSettings } from '../../../src/config/resolver.js';

describe('candidateUsers', () => {
  it('should try the configured user before the fallbacks', () => {
    const { ssh } = resolveSettings({ ssh: { user: 'learner', fallback_users: ['ubuntu', 'root'] } }, null, '/');

    assert.deepStrictEqual(candidateUsers({}, ssh), ['learner', 'ubuntu', 'root']);
  });

  it('should use only the --user given on the command line', () => {
    const { ssh } = resolveSettings({ ssh: { fallback_users: ['ubuntu'] } }, null, '/');

    assert.strictEqual(candidateUsers({ user: 'admin' }, ssh), undefined);
  });

  it('should leave the identity alone without fallbacks', () => {
    const { ssh } = resolveSettings({}, null, '/');

    assert.strictEqual(candidateUsers({}, ssh), undefined);
  });
});
