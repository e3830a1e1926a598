/**
 * Snapshot Engine
 *
 * External, disk-only snapshot lifecycle: create, revert, delete, list.
 * Calls against one VM must be serialized by the caller.
 */

import { ConsistencyError, ContractError, HypervisorError, SnapshotError } from '../core/errors.js';
import type { Hypervisor } from '../libvirt/hypervisor.js';
import type { DomainHandle, RevertTarget, SnapshotDescriptor, SnapshotOverlay } from '../libvirt/types.js';
import { buildSnapshotXml, listSnapshotDisks, parseSnapshotXml } from '../libvirt/xml.js';
import type { Logger } from '../lib/logger.js';
import { freezeFilesystems, thawFilesystems } from './guest-agent.js';

/** Snapshot names end up in overlay file names */
export const SNAPSHOT_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export interface SnapshotEngineOptions {
  /** Timeout for each guest agent command, independent of virsh timeouts */
  agentTimeoutMs: number;
}

export interface CreateSnapshotOptions {
  description?: string;
  freezeFilesystem?: boolean;
}

export interface CreateSnapshotReport {
  name: string;
  overlays: SnapshotOverlay[];
  /** True when the guest filesystems were frozen for the snapshot */
  frozen: boolean;
}

export interface DeleteSnapshotReport {
  name: string;
  /** Overlay files left on disk by the metadata-only delete */
  orphanedOverlays: string[];
}

export class SnapshotEngine {
  private readonly options: SnapshotEngineOptions;

  constructor(
    private readonly hypervisor: Hypervisor,
    private readonly logger: Logger,
    options: Partial<SnapshotEngineOptions> = {}
  ) {
    this.options = { agentTimeoutMs: options.agentTimeoutMs ?? 10000 };
  }

  /**
   * Resolve a VM by name.
   *
   * @throws HypervisorError VM_NOT_FOUND
   */
  async resolve(vm: string): Promise<DomainHandle> {
    if (vm.trim() === '') {
      throw new ContractError('VM name must not be empty');
    }
    const handle = await this.hypervisor.lookupDomain(vm);
    if (!handle) {
      throw new HypervisorError(
        `VM '${vm}' not found`,
        'VM_NOT_FOUND',
        'Check the VM name with `virsh list --all`.'
      );
    }
    return handle;
  }

  /**
   * Create an external disk-only snapshot.
   *
   * Overlay files left behind by an earlier snapshot of the same name are
   * refused before anything is frozen. A failed freeze only warns. The
   * overlays named in the descriptor must exist afterwards, otherwise a
   * ConsistencyError is thrown even though the hypervisor accepted the
   * request. Thaw runs on every path that attempted a freeze.
   */
  async create(vm: string, name: string, options: CreateSnapshotOptions = {}): Promise<CreateSnapshotReport> {
    if (!SNAPSHOT_NAME_PATTERN.test(name)) {
      throw new SnapshotError(
        `Invalid snapshot name '${name}'`,
        'INVALID_ARGUMENT',
        vm,
        name,
        'Use letters, digits, dots, underscores and hyphens only.'
      );
    }

    const domain = await this.resolve(vm);

    if ((await this.hypervisor.getSnapshotXml(domain.name, name)) !== null) {
      throw new SnapshotError(
        `Snapshot '${name}' already exists for '${domain.name}'`,
        'SNAPSHOT_EXISTS',
        domain.name,
        name,
        'Delete the existing snapshot or pick another name.'
      );
    }

    const disks = listSnapshotDisks(await this.hypervisor.getDomainXml(domain.name), name);
    if (disks.length === 0) {
      throw new SnapshotError(
        `'${domain.name}' has no file-backed disks to snapshot`,
        'NO_SNAPSHOT_DISKS',
        domain.name,
        name
      );
    }

    // Overlays must not exist yet: the post-create check only proves
    // anything for fresh paths.
    const leftovers: string[] = [];
    for (const disk of disks) {
      if (await this.hypervisor.fileExists(disk.overlay)) {
        leftovers.push(disk.overlay);
      }
    }
    if (leftovers.length > 0) {
      throw new SnapshotError(
        `Overlay file(s) for snapshot '${name}' already exist on '${domain.name}': ${leftovers.join(', ')}`,
        'SNAPSHOT_EXISTS',
        domain.name,
        name,
        'Remove the leftover overlay files or pick another snapshot name.'
      );
    }

    const freezeAttempted = options.freezeFilesystem === true && domain.state === 'running';
    let frozen = false;

    if (options.freezeFilesystem && !freezeAttempted) {
      this.logger.info(`'${domain.name}' is ${domain.state}; skipping filesystem freeze`);
    }

    if (freezeAttempted) {
      const freeze = await freezeFilesystems(this.hypervisor, domain.name, this.options.agentTimeoutMs);
      if (freeze.ok) {
        frozen = true;
        this.logger.info(`Froze ${freeze.filesystems ?? 'all'} filesystem(s) on '${domain.name}'`);
      } else {
        this.logger.warning(`Filesystem freeze failed on '${domain.name}', continuing without it: ${freeze.reason}`);
      }
    }

    try {
      const descriptor = buildSnapshotXml(name, options.description ?? '', disks);
      await this.hypervisor.createSnapshot(domain.name, descriptor, { diskOnly: true, atomic: true });

      const missing: string[] = [];
      for (const disk of disks) {
        if (!(await this.hypervisor.fileExists(disk.overlay))) {
          missing.push(disk.overlay);
        }
      }
      if (missing.length > 0) {
        throw new ConsistencyError(
          `Snapshot '${name}' was recorded for '${domain.name}' but overlay file(s) are missing: ${missing.join(', ')}`,
          missing
        );
      }

      this.logger.success(`Snapshot '${name}' created for '${domain.name}'`);
      return {
        name,
        overlays: disks.map((disk) => ({ target: disk.target, path: disk.overlay })),
        frozen,
      };
    } finally {
      if (freezeAttempted) {
        const thaw = await thawFilesystems(this.hypervisor, domain.name, this.options.agentTimeoutMs);
        if (!thaw.ok) {
          const severity = frozen ? 'guest filesystems may still be frozen' : 'freeze had already failed';
          this.logger.warning(`Filesystem thaw failed on '${domain.name}' (${severity}): ${thaw.reason}`);
        }
      }
    }
  }

  /**
   * Make a recorded snapshot the active state, restoring the power state
   * it was taken in.
   *
   * @throws SnapshotError SNAPSHOT_NOT_FOUND
   */
  async revert(vm: string, name: string): Promise<SnapshotDescriptor> {
    const domain = await this.resolve(vm);
    const descriptor = await this.describe(domain.name, name);

    let target: RevertTarget = 'keep';
    if (descriptor.powerState === 'running') {
      target = 'running';
    } else if (descriptor.powerState === 'paused') {
      target = 'paused';
    }

    await this.hypervisor.revertSnapshot(domain.name, name, target);
    this.logger.success(`'${domain.name}' reverted to '${name}'`);
    return descriptor;
  }

  /**
   * Remove a snapshot's metadata. Overlay files stay on disk.
   *
   * @throws SnapshotError SNAPSHOT_NOT_FOUND, including on a repeated delete
   */
  async delete(vm: string, name: string): Promise<DeleteSnapshotReport> {
    const domain = await this.resolve(vm);
    if (domain.state === 'running') {
      this.logger.warning(`'${domain.name}' is running; deleting snapshot metadata anyway`);
    }

    const descriptor = await this.describe(domain.name, name);
    await this.hypervisor.deleteSnapshot(domain.name, name, { metadataOnly: true });

    const orphaned = descriptor.overlays.map((overlay) => overlay.path);
    if (orphaned.length > 0) {
      this.logger.info(`Overlay files left in place: ${orphaned.join(', ')}`);
    }
    this.logger.success(`Snapshot '${name}' deleted from '${domain.name}'`);
    return { name, orphanedOverlays: orphaned };
  }

  /**
   * List recorded snapshots. An entry whose metadata cannot be read or
   * parsed is returned as a placeholder with `kind: 'unknown'`.
   */
  async list(vm: string): Promise<SnapshotDescriptor[]> {
    const domain = await this.resolve(vm);
    const names = await this.hypervisor.listSnapshotNames(domain.name);
    const descriptors: SnapshotDescriptor[] = [];

    for (const name of names) {
      try {
        const xml = await this.hypervisor.getSnapshotXml(domain.name, name);
        if (xml === null) {
          throw new Error('snapshot disappeared while listing');
        }
        descriptors.push(parseSnapshotXml(xml));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warning(`Could not read snapshot '${name}' of '${domain.name}': ${message}`);
        descriptors.push(placeholder(name, message));
      }
    }

    return descriptors;
  }

  private async describe(domain: string, name: string): Promise<SnapshotDescriptor> {
    const xml = await this.hypervisor.getSnapshotXml(domain, name);
    if (xml === null) {
      throw new SnapshotError(
        `Snapshot '${name}' not found for '${domain}'`,
        'SNAPSHOT_NOT_FOUND',
        domain,
        name,
        'List available snapshots with `labkeeper snapshot list`.'
      );
    }
    return parseSnapshotXml(xml);
  }
}

function placeholder(name: string, parseError: string): SnapshotDescriptor {
  return {
    name,
    description: null,
    createdAt: null,
    state: 'unknown',
    powerState: null,
    overlays: [],
    kind: 'unknown',
    parseError,
  };
}
