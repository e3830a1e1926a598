/**
 * Unit tests for guest address discovery
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { HypervisorError } from '../../../src/core/errors.js';
import { Logger } from '../../../src/lib/logger.js';
import { discoverGuestAddress, parseInterfaceAddresses, pickGuestAddress } from '../../../src/libvirt/interfaces.js';
import type { InterfaceAddress } from '../../../src/libvirt/types.js';
import { FakeHypervisor } from '../../helpers/fake-hypervisor.js';

const AGENT_TABLE = [
  ' Name       MAC address          Protocol     Address',
  '-------------------------------------------------------------------------------',
  ' lo         00:00:00:00:00:00    ipv4         127.0.0.1/8',
  ' -          -                    ipv6         ::1/128',
  ' enp1s0     52:54:00:aa:10:01    ipv4         192.168.122.50/24',
  ' -          -                    ipv6         fe80::5054:ff:feaa:1001/64',
  '',
].join('\n');

function row(name: string, address: string, family: 'ipv4' | 'ipv6' = 'ipv4'): InterfaceAddress {
  return { interface: name, mac: '52:54:00:aa:10:01', family, address, prefix: 24 };
}

describe('parseInterfaceAddresses', () => {
  it('should read every row and carry names onto continuation rows', () => {
    assert.deepStrictEqual(parseInterfaceAddresses(AGENT_TABLE), [
      { interface: 'lo', mac: '00:00:00:00:00:00', family: 'ipv4', address: '127.0.0.1', prefix: 8 },
      { interface: 'lo', mac: '00:00:00:00:00:00', family: 'ipv6', address: '::1', prefix: 128 },
      { interface: 'enp1s0', mac: '52:54:00:aa:10:01', family: 'ipv4', address: '192.168.122.50', prefix: 24 },
      { interface: 'enp1s0', mac: '52:54:00:aa:10:01', family: 'ipv6', address: 'fe80::5054:ff:feaa:1001', prefix: 64 },
    ]);
  });

  it('should leave the prefix empty when none is printed', () => {
    assert.deepStrictEqual(parseInterfaceAddresses(' eth0 - ipv4 10.1.1.1\n'), [
      { interface: 'eth0', mac: null, family: 'ipv4', address: '10.1.1.1', prefix: null },
    ]);
  });

  it('should return nothing for an empty table', () => {
    const header = ' Name       MAC address          Protocol     Address\n------------------------------\n';
    assert.deepStrictEqual(parseInterfaceAddresses(header), []);
  });
});

describe('pickGuestAddress', () => {
  it('should skip loopback and link-local addresses', () => {
    assert.strictEqual(pickGuestAddress(parseInterfaceAddresses(AGENT_TABLE)), '192.168.122.50');
    assert.strictEqual(pickGuestAddress([row('eth0', '169.254.10.2'), row('eth1', '10.0.0.7')]), '10.0.0.7');
  });

  it('should return null without a usable IPv4 address', () => {
    assert.strictEqual(pickGuestAddress([row('eth0', 'fd00::7', 'ipv6')]), null);
  });
});

describe('discoverGuestAddress', () => {
  function setup(): { hypervisor: FakeHypervisor; logger: Logger } {
    const hypervisor = new FakeHypervisor();
    hypervisor.addDomain('web01', 'running', [{ target: 'vda', source: '/var/lib/libvirt/images/web01.qcow2' }]);
    return { hypervisor, logger: new Logger('json') };
  }

  it('should take the guest agent address when there is one', async () => {
    const { hypervisor, logger } = setup();
    hypervisor.addresses.agent = [row('enp1s0', '192.168.122.50')];
    hypervisor.addresses.lease = [row('vnet3', '192.168.122.99')];

    const found = await discoverGuestAddress(hypervisor, 'web01', logger);

    assert.deepStrictEqual(found, { address: '192.168.122.50', source: 'agent' });
    assert.deepStrictEqual(
      hypervisor.callsTo('interfaceAddresses').map((call) => call.args),
      [['web01', 'agent']]
    );
  });

  it('should fall back to the DHCP lease when the agent fails', async () => {
    const { hypervisor, logger } = setup();
    hypervisor.addresses.agent = new HypervisorError('Guest agent is not responding', 'GUEST_AGENT_ERROR');
    hypervisor.addresses.lease = [row('vnet3', '192.168.122.99')];

    const found = await discoverGuestAddress(hypervisor, 'web01', logger);

    assert.deepStrictEqual(found, { address: '192.168.122.99', source: 'lease' });
    assert.deepStrictEqual(logger.getEntries(), [
      { level: 'info', message: "No agent address for 'web01': Guest agent is not responding" },
      { level: 'info', message: "'web01' is at 192.168.122.99 (lease)" },
    ]);
  });

  it('should fail when no source has a usable address', async () => {
    const { hypervisor, logger } = setup();
    hypervisor.addresses.agent = new HypervisorError('Guest agent is not responding', 'GUEST_AGENT_ERROR');
    hypervisor.addresses.lease = [row('vnet3', '169.254.0.9')];

    await assert.rejects(
      () => discoverGuestAddress(hypervisor, 'web01', logger),
      (error: unknown) => {
        assert.ok(error instanceof HypervisorError);
        assert.strictEqual(error.code, 'VM_ADDRESS_NOT_FOUND');
        assert.strictEqual(
          error.message,
          "Could not determine an address for 'web01' (agent: Guest agent is not responding; lease: no usable IPv4 address)"
        );
        return true;
      }
    );
  });

  it('should report an unknown VM', async () => {
    const { hypervisor, logger } = setup();

    await assert.rejects(
      () => discoverGuestAddress(hypervisor, 'db01', logger),
      (error: unknown) => error instanceof HypervisorError && error.code === 'VM_NOT_FOUND'
    );
    assert.deepStrictEqual(hypervisor.callsTo('interfaceAddresses'), []);
  });
});
