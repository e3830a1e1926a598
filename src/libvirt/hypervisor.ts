/**
 * Hypervisor Backend
 *
 * The narrow set of hypervisor primitives the snapshot engine consumes,
 * and the virsh-backed implementation of them. The engine receives a
 * Hypervisor explicitly so tests can substitute an in-memory backend.
 */

import { access, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { HypervisorError } from '../core/errors.js';
import {
  buildAgentCommandArgs,
  buildDomIfAddrArgs,
  buildDomStateArgs,
  buildDumpXmlArgs,
  buildSnapshotCreateArgs,
  buildSnapshotDeleteArgs,
  buildSnapshotDumpXmlArgs,
  buildSnapshotListArgs,
  buildSnapshotRevertArgs,
} from './commands.js';
import { VirshError, type VirshExecutor } from './executor.js';
import { parseInterfaceAddresses } from './interfaces.js';
import type {
  AddressSource,
  DomainHandle,
  GuestAgentCommand,
  GuestAgentResponse,
  InterfaceAddress,
  RevertTarget,
  SnapshotCreateFlags,
} from './types.js';
import { parseDomainState } from './xml.js';

export interface Hypervisor {
  /** Resolve a VM by name; null when no such domain exists */
  lookupDomain(name: string): Promise<DomainHandle | null>;
  /** Live domain configuration XML */
  getDomainXml(domain: string): Promise<string>;
  createSnapshot(domain: string, descriptorXml: string, flags: SnapshotCreateFlags): Promise<void>;
  listSnapshotNames(domain: string): Promise<string[]>;
  /** Snapshot metadata XML; null when the snapshot is not recorded */
  getSnapshotXml(domain: string, snapshot: string): Promise<string | null>;
  revertSnapshot(domain: string, snapshot: string, target: RevertTarget): Promise<void>;
  deleteSnapshot(domain: string, snapshot: string, options: { metadataOnly: boolean }): Promise<void>;
  /** Dispatch a guest agent command with its own timeout */
  agentCommand(domain: string, command: GuestAgentCommand, timeoutMs: number): Promise<GuestAgentResponse>;
  /** Whether an image path exists on the hypervisor host */
  fileExists(path: string): Promise<boolean>;
  /** Guest addresses as reported by the guest agent or the DHCP leases */
  interfaceAddresses(domain: string, source: AddressSource): Promise<InterfaceAddress[]>;
}

/**
 * Map a VirshError onto the labkeeper error taxonomy.
 */
export function translateVirshError(error: unknown, context: string): never {
  if (error instanceof VirshError) {
    switch (error.code) {
      case 'VIRSH_NOT_AVAILABLE':
        throw new HypervisorError(
          `${context}: ${error.message}`,
          'VIRSH_NOT_AVAILABLE',
          'Install libvirt-clients and make sure libvirtd is running.',
          error.stderr
        );
      case 'ACCESS_DENIED':
        throw new HypervisorError(
          `${context}: ${error.message}`,
          'PERMISSION_DENIED',
          'Add your user to the libvirt group or use a session URI you can access.',
          error.stderr
        );
      case 'NOT_FOUND':
        throw new HypervisorError(`${context}: ${error.message}`, 'VM_NOT_FOUND', undefined, error.stderr);
      case 'AGENT_UNAVAILABLE':
        throw new HypervisorError(
          `${context}: ${error.message}`,
          'GUEST_AGENT_ERROR',
          'Install and start qemu-guest-agent inside the VM.',
          error.stderr
        );
      default:
        throw new HypervisorError(`${context}: ${error.message}`, 'HYPERVISOR_ERROR', undefined, error.stderr);
    }
  }
  throw error;
}

function isNotFound(error: unknown): boolean {
  return error instanceof VirshError && error.code === 'NOT_FOUND';
}

/**
 * Hypervisor implemented by shelling out to virsh.
 */
export class VirshHypervisor implements Hypervisor {
  constructor(private readonly executor: VirshExecutor) {}

  async lookupDomain(name: string): Promise<DomainHandle | null> {
    let stdout: string;
    try {
      stdout = await this.executor.execute(buildDomStateArgs(name));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      translateVirshError(error, `Failed to look up VM '${name}'`);
    }
    const firstLine = stdout.split('\n')[0] ?? '';
    return { name, state: parseDomainState(firstLine) ?? 'nostate' };
  }

  async getDomainXml(domain: string): Promise<string> {
    try {
      return await this.executor.execute(buildDumpXmlArgs(domain));
    } catch (error) {
      translateVirshError(error, `Failed to read configuration of '${domain}'`);
    }
  }

  async createSnapshot(domain: string, descriptorXml: string, flags: SnapshotCreateFlags): Promise<void> {
    const dir = await mkdtemp(join(tmpdir(), 'labkeeper-snapshot-'));
    const xmlFile = join(dir, 'snapshot.xml');
    try {
      await writeFile(xmlFile, descriptorXml, 'utf-8');
      await this.executor.execute(buildSnapshotCreateArgs(domain, xmlFile, flags));
    } catch (error) {
      translateVirshError(error, `Snapshot creation failed for '${domain}'`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  async listSnapshotNames(domain: string): Promise<string[]> {
    try {
      const stdout = await this.executor.execute(buildSnapshotListArgs(domain));
      return stdout
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    } catch (error) {
      translateVirshError(error, `Failed to list snapshots of '${domain}'`);
    }
  }

  async getSnapshotXml(domain: string, snapshot: string): Promise<string | null> {
    try {
      return await this.executor.execute(buildSnapshotDumpXmlArgs(domain, snapshot));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      translateVirshError(error, `Failed to read snapshot '${snapshot}' of '${domain}'`);
    }
  }

  async revertSnapshot(domain: string, snapshot: string, target: RevertTarget): Promise<void> {
    try {
      await this.executor.execute(buildSnapshotRevertArgs(domain, snapshot, target));
    } catch (error) {
      translateVirshError(error, `Failed to revert '${domain}' to '${snapshot}'`);
    }
  }

  async deleteSnapshot(domain: string, snapshot: string, options: { metadataOnly: boolean }): Promise<void> {
    try {
      await this.executor.execute(buildSnapshotDeleteArgs(domain, snapshot, options.metadataOnly));
    } catch (error) {
      translateVirshError(error, `Failed to delete snapshot '${snapshot}' of '${domain}'`);
    }
  }

  async agentCommand(domain: string, command: GuestAgentCommand, timeoutMs: number): Promise<GuestAgentResponse> {
    let reply: unknown;
    try {
      // The process timeout leaves virsh room to report the agent timeout itself.
      reply = await this.executor.executeJson(
        buildAgentCommandArgs(domain, command, timeoutMs / 1000),
        { timeout: timeoutMs + 5000 }
      );
    } catch (error) {
      if (error instanceof VirshError) {
        throw new HypervisorError(
          `Guest agent command '${command.execute}' failed on '${domain}': ${error.message}`,
          'GUEST_AGENT_ERROR',
          'Install and start qemu-guest-agent inside the VM.',
          error.stderr
        );
      }
      throw error;
    }
    return toAgentResponse(reply);
  }

  async fileExists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async interfaceAddresses(domain: string, source: AddressSource): Promise<InterfaceAddress[]> {
    try {
      return parseInterfaceAddresses(await this.executor.execute(buildDomIfAddrArgs(domain, source)));
    } catch (error) {
      translateVirshError(error, `Failed to read ${source} addresses of '${domain}'`);
    }
  }
}

function toAgentResponse(reply: unknown): GuestAgentResponse {
  if (typeof reply !== 'object' || reply === null) {
    return { error: { desc: `Unexpected guest agent reply: ${JSON.stringify(reply)}` } };
  }
  const response: GuestAgentResponse = {};
  if ('return' in reply) {
    response.return = reply.return;
  }
  if ('error' in reply && typeof reply.error === 'object' && reply.error !== null) {
    const error = reply.error;
    response.error = {
      class: 'class' in error && typeof error.class === 'string' ? error.class : undefined,
      desc: 'desc' in error && typeof error.desc === 'string' ? error.desc : undefined,
    };
  }
  return response;
}
