/**
 * Guest address discovery through `virsh domifaddr`.
 */

import { HypervisorError } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import type { Hypervisor } from './hypervisor.js';
import type { AddressSource, InterfaceAddress } from './types.js';

const UNUSABLE_PREFIXES = ['127.', '169.254.'];

/** Sources asked, in order */
export const ADDRESS_SOURCES: readonly AddressSource[] = ['agent', 'lease'];

export interface GuestAddress {
  address: string;
  source: AddressSource;
}

/**
 * Parse the `domifaddr` table. Continuation rows print `-` for the name
 * and MAC and inherit them from the row above.
 */
export function parseInterfaceAddresses(output: string): InterfaceAddress[] {
  const rows: InterfaceAddress[] = [];
  let currentName: string | null = null;
  let currentMac: string | null = null;

  for (const line of output.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length !== 4) {
      continue;
    }
    const [name = '', mac = '', family = '', cidr = ''] = fields;
    if (family !== 'ipv4' && family !== 'ipv6') {
      continue;
    }

    if (name !== '-') {
      currentName = name;
      currentMac = mac === '-' ? null : mac;
    }
    if (currentName === null) {
      continue;
    }

    const [address = '', prefix] = cidr.split('/');
    rows.push({
      interface: currentName,
      mac: currentMac,
      family,
      address,
      prefix: prefix !== undefined && /^\d+$/.test(prefix) ? Number.parseInt(prefix, 10) : null,
    });
  }

  return rows;
}

/**
 * First IPv4 address that can reach the guest from the host: loopback and
 * link-local addresses are skipped.
 */
export function pickGuestAddress(addresses: InterfaceAddress[]): string | null {
  const usable = addresses.find(
    (entry) =>
      entry.family === 'ipv4' &&
      entry.interface !== 'lo' &&
      !UNUSABLE_PREFIXES.some((prefix) => entry.address.startsWith(prefix))
  );
  return usable?.address ?? null;
}

/**
 * Find the address the host can reach a VM on, asking the guest agent
 * first and the DHCP leases second. A source that fails is skipped.
 *
 * @throws HypervisorError VM_NOT_FOUND, or VM_ADDRESS_NOT_FOUND when no
 *   source yields a usable address
 */
export async function discoverGuestAddress(hypervisor: Hypervisor, vm: string, logger: Logger): Promise<GuestAddress> {
  const domain = await hypervisor.lookupDomain(vm);
  if (!domain) {
    throw new HypervisorError(`VM '${vm}' not found`, 'VM_NOT_FOUND', 'Check the VM name with `virsh list --all`.');
  }

  const reasons: string[] = [];
  for (const source of ADDRESS_SOURCES) {
    let rows: InterfaceAddress[];
    try {
      rows = await hypervisor.interfaceAddresses(domain.name, source);
    } catch (error) {
      if (!(error instanceof HypervisorError)) {
        throw error;
      }
      reasons.push(`${source}: ${error.message}`);
      logger.info(`No ${source} address for '${domain.name}': ${error.message}`);
      continue;
    }

    const address = pickGuestAddress(rows);
    if (address) {
      logger.info(`'${domain.name}' is at ${address} (${source})`);
      return { address, source };
    }
    reasons.push(`${source}: no usable IPv4 address`);
  }

  throw new HypervisorError(
    `Could not determine an address for '${domain.name}' (${reasons.join('; ')})`,
    'VM_ADDRESS_NOT_FOUND',
    'Start qemu-guest-agent in the VM or attach it to a libvirt network with DHCP.'
  );
}
