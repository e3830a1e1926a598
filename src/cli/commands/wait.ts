/**
 * Wait Command Handler
 *
 * Polls a VM until it accepts SSH connections.
 */

import { waitForSSHReady } from '../../api.js';
import {
  credentialOverrides,
  exitWithOperationError,
  handleError,
  parseSeconds,
  prepare,
  type GlobalOptions,
  type SshOptions,
} from '../shared.js';

export interface WaitCommandOptions extends GlobalOptions, SshOptions {
  timeout?: string;
  interval?: string;
}

export async function waitCommand(host: string, options: WaitCommandOptions): Promise<void> {
  const { output, context } = await prepare('wait', options);

  try {
    output.info(`Waiting for SSH on ${host}...`);
    const result = await waitForSSHReady(context, host, {
      ...credentialOverrides(options),
      timeoutMs: options.timeout ? parseSeconds(options.timeout, '--timeout') : undefined,
      pollIntervalMs: options.interval ? parseSeconds(options.interval, '--interval') : undefined,
    });

    output.setData('attempts', result.attempts);
    if (!result.ok) {
      exitWithOperationError(output, result.error);
    }

    output.success(`${host} is ready (${result.attempts} attempt${result.attempts === 1 ? '' : 's'})`);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
