/**
 * Exec Command Handler
 *
 * Runs one command on a VM over SSH and mirrors its output and exit status.
 */

import { runCommand } from '../../api.js';
import {
  credentialOverrides,
  exitWithOperationError,
  handleError,
  parseSeconds,
  prepare,
  type GlobalOptions,
  type SshOptions,
} from '../shared.js';

export interface ExecCommandOptions extends GlobalOptions, SshOptions {
  tty?: boolean;
  timeout?: string;
}

export async function execCommand(host: string, command: string, options: ExecCommandOptions): Promise<void> {
  const { output, context } = await prepare('exec', options);

  try {
    const result = await runCommand(context, host, command, {
      ...credentialOverrides(options),
      allocateTty: options.tty === true,
      timeoutMs: options.timeout ? parseSeconds(options.timeout, '--timeout') : undefined,
    });

    output.commandOutput(result.result);
    if (!result.ok) {
      exitWithOperationError(output, result.error);
    }

    const exitStatus = result.result.exitStatus ?? 1;
    output.setSuccess(exitStatus === 0);
    output.flush();
    process.exit(exitStatus);
  } catch (error) {
    handleError(output, error);
  }
}
