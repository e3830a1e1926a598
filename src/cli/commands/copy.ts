/**
 * Copy Command Handler
 *
 * Uploads a local file to a VM over SFTP.
 */

import { copyFile } from '../../api.js';
import {
  credentialOverrides,
  exitWithOperationError,
  handleError,
  prepare,
  type GlobalOptions,
  type SshOptions,
} from '../shared.js';

export interface CopyCommandOptions extends GlobalOptions, SshOptions {
  createDirs?: boolean;
}

export async function copyCommand(
  host: string,
  localPath: string,
  remotePath: string,
  options: CopyCommandOptions
): Promise<void> {
  const { output, context } = await prepare('copy', options);

  try {
    const result = await copyFile(context, host, localPath, remotePath, {
      ...credentialOverrides(options),
      createDirs: options.createDirs === true,
    });
    if (!result.ok) {
      exitWithOperationError(output, result.error);
    }

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
