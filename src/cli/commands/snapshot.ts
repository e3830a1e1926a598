/**
 * Snapshot Command Handlers
 *
 * create, revert, delete and list external disk-only snapshots of a VM.
 */

import { createSnapshot, deleteSnapshot, listSnapshots, revertSnapshot } from '../../api.js';
import { exitWithOperationError, handleError, prepare, type GlobalOptions } from '../shared.js';

export interface SnapshotCreateOptions extends GlobalOptions {
  description?: string;
  /** Commander sets this false for --no-freeze */
  freeze?: boolean;
}

export async function snapshotCreateCommand(vm: string, name: string, options: SnapshotCreateOptions): Promise<void> {
  const { output, context } = await prepare('snapshot create', options);

  try {
    const result = await createSnapshot(context, vm, name, {
      description: options.description,
      freezeFilesystem: options.freeze !== false,
    });
    if (!result.ok) {
      exitWithOperationError(output, result.error);
    }

    output.indent();
    for (const overlay of result.snapshot.overlays) {
      output.info(`${overlay.target}: ${overlay.path}`);
    }
    output.dedent();
    output.setData('snapshot', result.snapshot);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

export async function snapshotRevertCommand(vm: string, name: string, options: GlobalOptions): Promise<void> {
  const { output, context } = await prepare('snapshot revert', options);

  try {
    const result = await revertSnapshot(context, vm, name);
    if (!result.ok) {
      exitWithOperationError(output, result.error);
    }
    output.setData('snapshot', result.snapshot.name);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

export async function snapshotDeleteCommand(vm: string, name: string, options: GlobalOptions): Promise<void> {
  const { output, context } = await prepare('snapshot delete', options);

  try {
    const result = await deleteSnapshot(context, vm, name);
    if (!result.ok) {
      exitWithOperationError(output, result.error);
    }
    output.setData('orphanedOverlays', result.orphanedOverlays);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

export async function snapshotListCommand(vm: string, options: GlobalOptions): Promise<void> {
  const { output, context } = await prepare('snapshot list', options);

  try {
    const result = await listSnapshots(context, vm);
    if (!result.ok) {
      exitWithOperationError(output, result.error);
    }
    output.snapshotTable(vm, result.snapshots);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
