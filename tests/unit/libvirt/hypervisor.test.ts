/**
 * Unit tests for the virsh-backed hypervisor
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { HypervisorError } from '../../../src/core/errors.js';
import { VirshError, VirshExecutor, type VirshExecuteOptions } from '../../../src/libvirt/executor.js';
import { translateVirshError, VirshHypervisor } from '../../../src/libvirt/hypervisor.js';

type Reply = string | VirshError;

/**
 * Executor that answers from a table keyed by subcommand.
 */
class ScriptedExecutor extends VirshExecutor {
  readonly calls: Array<{ args: readonly string[]; timeout: number | undefined }> = [];

  constructor(private readonly replies: Record<string, Reply>) {
    super();
  }

  override async execute(args: readonly string[], options: VirshExecuteOptions = {}): Promise<string> {
    this.calls.push({ args, timeout: options.timeout });
    const reply = this.replies[args[0] ?? ''];
    if (reply === undefined) {
      return '';
    }
    if (reply instanceof VirshError) {
      throw reply;
    }
    return reply;
  }
}

function virshError(code: VirshError['code'], message: string): VirshError {
  return new VirshError(message, code, 1, `error: ${message}`, []);
}

describe('translateVirshError', () => {
  const cases: Array<[VirshError['code'], string]> = [
    ['VIRSH_NOT_AVAILABLE', 'VIRSH_NOT_AVAILABLE'],
    ['ACCESS_DENIED', 'PERMISSION_DENIED'],
    ['NOT_FOUND', 'VM_NOT_FOUND'],
    ['AGENT_UNAVAILABLE', 'GUEST_AGENT_ERROR'],
    ['EXECUTION_FAILED', 'HYPERVISOR_ERROR'],
  ];

  for (const [from, to] of cases) {
    it(`should map ${from} to ${to}`, () => {
      assert.throws(
        () => translateVirshError(virshError(from, 'boom'), 'Context'),
        (error: unknown) => {
          assert.ok(error instanceof HypervisorError);
          assert.strictEqual(error.code, to);
          assert.strictEqual(error.message, 'Context: boom');
          return true;
        }
      );
    });
  }

  it('should rethrow anything else unchanged', () => {
    const original = new TypeError('bad');
    assert.throws(() => translateVirshError(original, 'Context'), (error: unknown) => error === original);
  });
});

describe('VirshHypervisor', () => {
  it('should resolve a domain and normalize its state', async () => {
    const hypervisor = new VirshHypervisor(new ScriptedExecutor({ domstate: 'shut off\n\n' }));

    assert.deepStrictEqual(await hypervisor.lookupDomain('lab1'), { name: 'lab1', state: 'shutoff' });
  });

  it('should return null for an unknown domain', async () => {
    const hypervisor = new VirshHypervisor(
      new ScriptedExecutor({ domstate: virshError('NOT_FOUND', "failed to get domain 'ghost'") })
    );

    assert.strictEqual(await hypervisor.lookupDomain('ghost'), null);
  });

  it('should split snapshot names one per line', async () => {
    const hypervisor = new VirshHypervisor(new ScriptedExecutor({ 'snapshot-list': 'base\n\n  lab-3 \n' }));

    assert.deepStrictEqual(await hypervisor.listSnapshotNames('lab1'), ['base', 'lab-3']);
  });

  it('should return null for a missing snapshot', async () => {
    const hypervisor = new VirshHypervisor(
      new ScriptedExecutor({ 'snapshot-dumpxml': virshError('NOT_FOUND', 'no domain snapshot with matching name') })
    );

    assert.strictEqual(await hypervisor.getSnapshotXml('lab1', 'nope'), null);
  });

  it('should pass the snapshot descriptor through a temporary file', async () => {
    const executor = new ScriptedExecutor({});
    const hypervisor = new VirshHypervisor(executor);

    await hypervisor.createSnapshot('lab1', '<domainsnapshot/>', { diskOnly: true, atomic: true });

    const args = executor.calls[0]?.args ?? [];
    assert.strictEqual(args[0], 'snapshot-create');
    assert.strictEqual(args[1], 'lab1');
    assert.strictEqual(args[2], '--xmlfile');
    assert.match(args[3] ?? '', /labkeeper-snapshot-.*snapshot\.xml$/);
    assert.deepStrictEqual(args.slice(4), ['--disk-only', '--atomic']);
  });

  it('should translate a failed revert', async () => {
    const hypervisor = new VirshHypervisor(
      new ScriptedExecutor({ 'snapshot-revert': virshError('EXECUTION_FAILED', 'revert refused') })
    );

    await assert.rejects(
      () => hypervisor.revertSnapshot('lab1', 'base', 'running'),
      (error: unknown) => {
        assert.ok(error instanceof HypervisorError);
        assert.strictEqual(error.code, 'HYPERVISOR_ERROR');
        assert.strictEqual(error.message, "Failed to revert 'lab1' to 'base': revert refused");
        return true;
      }
    );
  });

  it('should give guest agent commands their own timeout', async () => {
    const executor = new ScriptedExecutor({ 'qemu-agent-command': '{"return":3}\n' });
    const hypervisor = new VirshHypervisor(executor);

    const reply = await hypervisor.agentCommand('lab1', { execute: 'guest-fsfreeze-freeze' }, 4000);

    assert.deepStrictEqual(reply, { return: 3 });
    assert.deepStrictEqual(executor.calls[0]?.args, [
      'qemu-agent-command',
      'lab1',
      '{"execute":"guest-fsfreeze-freeze"}',
      '--timeout',
      '4',
    ]);
    assert.strictEqual(executor.calls[0]?.timeout, 9000);
  });

  it('should surface agent errors from the reply', async () => {
    const hypervisor = new VirshHypervisor(
      new ScriptedExecutor({ 'qemu-agent-command': '{"error":{"class":"GenericError","desc":"fsfreeze is disabled"}}' })
    );

    const reply = await hypervisor.agentCommand('lab1', { execute: 'guest-fsfreeze-freeze' }, 1000);

    assert.deepStrictEqual(reply, { error: { class: 'GenericError', desc: 'fsfreeze is disabled' } });
  });

  it('should report an unreachable agent as GUEST_AGENT_ERROR', async () => {
    const hypervisor = new VirshHypervisor(
      new ScriptedExecutor({ 'qemu-agent-command': virshError('AGENT_UNAVAILABLE', 'Guest agent is not responding') })
    );

    await assert.rejects(
      () => hypervisor.agentCommand('lab1', { execute: 'guest-fsfreeze-thaw' }, 1000),
      (error: unknown) => {
        assert.ok(error instanceof HypervisorError);
        assert.strictEqual(error.code, 'GUEST_AGENT_ERROR');
        return true;
      }
    );
  });

  it('should parse guest addresses from domifaddr', async () => {
    const executor = new ScriptedExecutor({
      domifaddr: [
        ' Name       MAC address          Protocol     Address',
        '-------------------------------------------------------------------------------',
        ' vnet3      52:54:00:aa:10:01    ipv4         192.168.122.50/24',
        '',
      ].join('\n'),
    });
    const hypervisor = new VirshHypervisor(executor);

    const rows = await hypervisor.interfaceAddresses('lab1', 'lease');

    assert.deepStrictEqual(rows, [
      { interface: 'vnet3', mac: '52:54:00:aa:10:01', family: 'ipv4', address: '192.168.122.50', prefix: 24 },
    ]);
    assert.deepStrictEqual(executor.calls[0]?.args, ['domifaddr', 'lab1', '--source', 'lease']);
  });

  it('should translate a failed address lookup', async () => {
    const hypervisor = new VirshHypervisor(
      new ScriptedExecutor({ domifaddr: virshError('AGENT_UNAVAILABLE', 'Guest agent is not responding') })
    );

    await assert.rejects(
      () => hypervisor.interfaceAddresses('lab1', 'agent'),
      (error: unknown) => {
        assert.ok(error instanceof HypervisorError);
        assert.strictEqual(error.code, 'GUEST_AGENT_ERROR');
        assert.strictEqual(error.message, "Failed to read agent addresses of 'lab1': Guest agent is not responding");
        return true;
      }
    );
  });
});
