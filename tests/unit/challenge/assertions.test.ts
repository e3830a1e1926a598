/**
 * Unit tests for assertion evaluators
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  evaluateAssertion,
  historyCommand,
  historyEntries,
  outputMatches,
  parseListeningPorts,
  parseStat,
  serviceStatusFromExit,
  type RemoteRunner,
} from '../../../src/challenge/assertions.js';
import type { Assertion } from '../../../src/challenge/types.js';
import type { CommandResult } from '../../../src/ssh/types.js';

function result(stdout: string, exitStatus = 0, stderr = ''): CommandResult {
  return { stdout, stderr, exitStatus, error: null, timedOut: false };
}

const TIMEOUT: CommandResult = {
  stdout: '',
  stderr: '',
  exitStatus: null,
  error: { kind: 'timeout', code: 'SSH_TIMEOUT', message: 'Command timed out after 500ms on 10.0.0.5', host: '10.0.0.5' },
  timedOut: true,
};

/**
 * Fake VM answering from a table; unknown commands exit 127.
 */
function remoteFrom(table: Record<string, CommandResult>): RemoteRunner & { commands: string[] } {
  const commands: string[] = [];
  const remote = async (command: string): Promise<CommandResult> => {
    commands.push(command);
    return table[command] ?? result('', 127, `${command}: command not found`);
  };
  return Object.assign(remote, { commands });
}

const SS_OUTPUT = `State  Recv-Q Send-Q Local Address:Port  Peer Address:Port Process
LISTEN 0      511          0.0.0.0:80         0.0.0.0:*
LISTEN 0      128          0.0.0.0:22         0.0.0.0:*
LISTEN 0      511             [::]:8443          [::]:*
`;

describe('helpers', () => {
  it('should parse listening ports from ss output', () => {
    assert.deepStrictEqual([...parseListeningPorts(SS_OUTPUT)].sort((a, b) => a - b), [22, 80, 8443]);
  });

  it('should parse stat output', () => {
    assert.deepStrictEqual(parseStat('regular file|root|www-data|640\n'), {
      type: 'regular file',
      owner: 'root',
      group: 'www-data',
      mode: '640',
    });
    assert.strictEqual(parseStat('garbage'), null);
  });

  it('should map systemctl exit codes to states', () => {
    assert.strictEqual(serviceStatusFromExit(0), 'active');
    assert.strictEqual(serviceStatusFromExit(3), 'inactive');
    assert.strictEqual(serviceStatusFromExit(4), 'failed');
    assert.strictEqual(serviceStatusFromExit(null), 'failed');
  });

  it('should compare trimmed output', () => {
    assert.strictEqual(outputMatches('web01\n', { mode: 'exact', value: 'web01' }), true);
    assert.strictEqual(outputMatches('  web01  ', { mode: 'substring', value: 'eb0' }), true);
    assert.strictEqual(outputMatches('line1\nweb01\n', { mode: 'pattern', value: '^web\\d+$' }), true);
    assert.strictEqual(outputMatches('web01', { mode: 'exact', value: 'web' }), false);
  });

  it('should drop history timestamps and blank lines', () => {
    assert.deepStrictEqual(historyEntries('#1700000000\nls -la\n\n#1700000050\n  grep x y  \n'), ['ls -la', 'grep x y']);
  });

  it("should read another user's history through their home directory", () => {
    assert.strictEqual(historyCommand(null), 'cat -- "$HOME/.bash_history"');
    assert.strictEqual(
      historyCommand('bob'),
      `sudo -n cat -- "$(getent passwd 'bob' | cut -d: -f6)/.bash_history"`
    );
  });
});

describe('evaluateAssertion', () => {
  describe('run_command', () => {
    const assertion: Assertion = {
      type: 'run_command',
      description: 'Hostname is set',
      command: 'hostname',
      exitStatus: 0,
      stdout: { mode: 'exact', value: 'web01' },
      stderr: { mode: 'exact', value: '' },
    };

    it('should pass when every criterion holds', async () => {
      const outcome = await evaluateAssertion(remoteFrom({ hostname: result('web01\n') }), assertion, 0);

      assert.deepStrictEqual(outcome, {
        index: 0,
        type: 'run_command',
        description: 'Hostname is set',
        passed: true,
        mismatches: [],
        error: null,
      });
    });

    it('should report each failed criterion', async () => {
      const outcome = await evaluateAssertion(remoteFrom({ hostname: result('localhost\n', 1, 'warning\n') }), assertion, 2);

      assert.strictEqual(outcome.passed, false);
      assert.strictEqual(outcome.index, 2);
      assert.deepStrictEqual(outcome.mismatches, [
        { field: 'exit_status', observed: 1, expected: 0 },
        { field: 'stdout', observed: 'localhost', expected: 'web01' },
        { field: 'stderr', observed: 'warning', expected: '' },
      ]);
    });

    it('should report a command that could not run as an error', async () => {
      const outcome = await evaluateAssertion(remoteFrom({ hostname: TIMEOUT }), assertion, 0);

      assert.strictEqual(outcome.passed, false);
      assert.deepStrictEqual(outcome.mismatches, []);
      assert.strictEqual(outcome.error, 'Command timed out after 500ms on 10.0.0.5');
    });
  });

  describe('check_service_status', () => {
    const assertion: Assertion = {
      type: 'check_service_status',
      description: null,
      service: 'nginx',
      expectedStatus: 'active',
      checkEnabled: true,
    };

    it('should check both state and enablement', async () => {
      const remote = remoteFrom({
        "systemctl is-active --quiet 'nginx'": result('', 0),
        "systemctl is-enabled --quiet 'nginx'": result('', 0),
      });

      const outcome = await evaluateAssertion(remote, assertion, 0);

      assert.strictEqual(outcome.passed, true);
      assert.deepStrictEqual(remote.commands, [
        "systemctl is-active --quiet 'nginx'",
        "systemctl is-enabled --quiet 'nginx'",
      ]);
    });

    it('should report an inactive, disabled service', async () => {
      const remote = remoteFrom({
        "systemctl is-active --quiet 'nginx'": result('', 3),
        "systemctl is-enabled --quiet 'nginx'": result('', 1),
      });

      const outcome = await evaluateAssertion(remote, assertion, 0);

      assert.deepStrictEqual(outcome.mismatches, [
        { field: 'status', observed: 'inactive', expected: 'active' },
        { field: 'enabled', observed: false, expected: true },
      ]);
    });
  });

  describe('check_port_listening', () => {
    function portAssertion(port: number, expectedState: boolean): Assertion {
      return { type: 'check_port_listening', description: null, port, protocol: 'tcp', expectedState };
    }

    it('should pass for a listening port', async () => {
      const outcome = await evaluateAssertion(remoteFrom({ 'ss -lnt': result(SS_OUTPUT) }), portAssertion(80, true), 0);

      assert.strictEqual(outcome.passed, true);
    });

    it('should fail for a closed port', async () => {
      const outcome = await evaluateAssertion(remoteFrom({ 'ss -lnt': result(SS_OUTPUT) }), portAssertion(3306, true), 0);

      assert.deepStrictEqual(outcome.mismatches, [{ field: 'listening', observed: false, expected: true }]);
    });

    it('should pass when a port is expected to be closed', async () => {
      const outcome = await evaluateAssertion(remoteFrom({ 'ss -lnt': result(SS_OUTPUT) }), portAssertion(23, false), 0);

      assert.strictEqual(outcome.passed, true);
    });

    it('should use ss -lnu for UDP', async () => {
      const remote = remoteFrom({ 'ss -lnu': result('State Recv-Q Send-Q Local Address:Port Peer Address:Port\nUNCONN 0 0 0.0.0.0:53 0.0.0.0:*\n') });

      const outcome = await evaluateAssertion(
        remote,
        { type: 'check_port_listening', description: null, port: 53, protocol: 'udp', expectedState: true },
        0
      );

      assert.strictEqual(outcome.passed, true);
    });

    it('should treat a failing ss as a command error', async () => {
      const outcome = await evaluateAssertion(remoteFrom({}), portAssertion(80, true), 0);

      assert.strictEqual(outcome.error, 'ss exited with status 127: ss -lnt: command not found');
    });
  });

  describe('check_file_exists', () => {
    const statCommand = "stat -c '%F|%U|%G|%a' -- '/etc/app.conf'";

    it('should report a missing file', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ [statCommand]: result('', 1, 'stat: cannot statx') }),
        {
          type: 'check_file_exists',
          description: null,
          path: '/etc/app.conf',
          expectedState: true,
          fileType: 'any',
          owner: null,
          group: null,
          permissions: null,
        },
        0
      );

      assert.deepStrictEqual(outcome.mismatches, [{ field: 'exists', observed: false, expected: true }]);
    });

    it('should compare type, owner, group and mode', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ [statCommand]: result('regular file|root|root|644\n') }),
        {
          type: 'check_file_exists',
          description: null,
          path: '/etc/app.conf',
          expectedState: true,
          fileType: 'directory',
          owner: 'app',
          group: 'root',
          permissions: '600',
        },
        0
      );

      assert.deepStrictEqual(outcome.mismatches, [
        { field: 'type', observed: 'file', expected: 'directory' },
        { field: 'owner', observed: 'root', expected: 'app' },
        { field: 'permissions', observed: '644', expected: '600' },
      ]);
    });

    it('should pass when an absent file is expected', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ [statCommand]: result('', 1) }),
        {
          type: 'check_file_exists',
          description: null,
          path: '/etc/app.conf',
          expectedState: false,
          fileType: 'any',
          owner: null,
          group: null,
          permissions: null,
        },
        0
      );

      assert.strictEqual(outcome.passed, true);
    });
  });

  describe('check_file_contains', () => {
    const cat = "cat -- '/etc/ssh/sshd_config'";

    it('should find a substring', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ [cat]: result('Port 22\nPermitRootLogin no\n') }),
        {
          type: 'check_file_contains',
          description: null,
          path: '/etc/ssh/sshd_config',
          match: { mode: 'substring', value: 'PermitRootLogin no' },
          expectedState: true,
        },
        0
      );

      assert.strictEqual(outcome.passed, true);
    });

    it('should match a pattern line by line', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ [cat]: result('Port 22\nPermitRootLogin yes\n') }),
        {
          type: 'check_file_contains',
          description: null,
          path: '/etc/ssh/sshd_config',
          match: { mode: 'pattern', value: '^PermitRootLogin\\s+yes$' },
          expectedState: false,
        },
        0
      );

      assert.deepStrictEqual(outcome.mismatches, [{ field: 'contains', observed: true, expected: false }]);
    });

    it('should treat an unreadable file as not containing the text', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ [cat]: result('', 1, 'Permission denied') }),
        {
          type: 'check_file_contains',
          description: null,
          path: '/etc/ssh/sshd_config',
          match: { mode: 'substring', value: 'Port' },
          expectedState: true,
        },
        0
      );

      assert.deepStrictEqual(outcome.mismatches, [{ field: 'contains', observed: false, expected: true }]);
    });
  });

  describe('check_user_group', () => {
    it('should check group membership', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ "id -Gn 'bob'": result('bob docker\n') }),
        { type: 'check_user_group', description: null, expectedState: true, checkType: 'user_in_group', username: 'bob', group: 'sudo' },
        0
      );

      assert.deepStrictEqual(outcome.mismatches, [{ field: 'user_in_group', observed: false, expected: true }]);
    });

    it('should check the login shell', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ "getent passwd 'bob'": result('bob:x:1001:1001:Bob:/home/bob:/bin/zsh\n') }),
        { type: 'check_user_group', description: null, expectedState: true, checkType: 'user_shell', username: 'bob', shell: '/bin/zsh' },
        0
      );

      assert.strictEqual(outcome.passed, true);
    });

    it('should pass when a user is expected to be absent', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ "id -u 'mallory'": result('', 1) }),
        { type: 'check_user_group', description: null, expectedState: false, checkType: 'user_exists', username: 'mallory' },
        0
      );

      assert.strictEqual(outcome.passed, true);
    });

    it('should check the primary group and group existence', async () => {
      const remote = remoteFrom({
        "id -gn 'bob'": result('developers\n'),
        "getent group 'developers'": result('developers:x:2000:bob\n'),
      });

      const primary = await evaluateAssertion(
        remote,
        { type: 'check_user_group', description: null, expectedState: true, checkType: 'user_primary_group', username: 'bob', group: 'developers' },
        0
      );
      const group = await evaluateAssertion(
        remote,
        { type: 'check_user_group', description: null, expectedState: true, checkType: 'group_exists', group: 'developers' },
        1
      );

      assert.strictEqual(primary.passed, true);
      assert.strictEqual(group.passed, true);
    });
  });

  describe('check_command', () => {
    it('should compare a numeric count', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ 'grep -c Failed /var/log/auth.log': result('2\n') }),
        {
          type: 'check_command',
          description: null,
          command: 'grep -c Failed /var/log/auth.log',
          expectedExitStatus: 0,
          expectedCount: { operator: '>=', value: 3, source: '>=3' },
        },
        0
      );

      assert.deepStrictEqual(outcome.mismatches, [{ field: 'count', observed: 2, expected: '>=3' }]);
    });

    it('should count output lines', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ 'ls /srv/backups': result('a.tar\nb.tar\n') }),
        {
          type: 'check_command',
          description: null,
          command: 'ls /srv/backups',
          expectedExitStatus: 0,
          expectedCount: { operator: '==', value: 2, source: '2' },
        },
        0
      );

      assert.strictEqual(outcome.passed, true);
    });

    it('should check the exit status alone', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ 'test -d /srv/www': result('', 1) }),
        { type: 'check_command', description: null, command: 'test -d /srv/www', expectedExitStatus: 0, expectedCount: null },
        0
      );

      assert.deepStrictEqual(outcome.mismatches, [{ field: 'exit_status', observed: 1, expected: 0 }]);
    });
  });

  describe('check_history', () => {
    const history = '#1700000000\nsudo tail /var/log/auth.log\ngrep Failed /var/log/auth.log\nvim /var/log/auth.log\n';

    it('should count matching entries', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ 'cat -- "$HOME/.bash_history"': result(history) }),
        {
          type: 'check_history',
          description: null,
          commandPattern: '^grep .*Failed',
          disallowedCommands: [],
          expectedCount: { operator: '>', value: 0, source: '>0' },
          user: null,
        },
        0
      );

      assert.strictEqual(outcome.passed, true);
    });

    it('should list disallowed entries', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({ 'cat -- "$HOME/.bash_history"': result(history) }),
        {
          type: 'check_history',
          description: null,
          commandPattern: null,
          disallowedCommands: ['^vim? ', '^nano '],
          expectedCount: { operator: '>', value: 0, source: '>0' },
          user: null,
        },
        0
      );

      assert.deepStrictEqual(outcome.mismatches, [
        { field: 'disallowed', observed: ['vim /var/log/auth.log'], expected: [] },
      ]);
    });

    it('should treat a missing history file as empty', async () => {
      const outcome = await evaluateAssertion(
        remoteFrom({}),
        {
          type: 'check_history',
          description: null,
          commandPattern: '^grep',
          disallowedCommands: [],
          expectedCount: { operator: '>', value: 0, source: '>0' },
          user: 'bob',
        },
        0
      );

      assert.deepStrictEqual(outcome.mismatches, [{ field: 'count', observed: 0, expected: '>0' }]);
    });
  });
});
