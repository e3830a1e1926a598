/**
 * Challenge Command Handlers
 *
 * validate: check a challenge file without touching any VM.
 * list: show the challenges in the configured directory.
 * run: set up, validate and score a challenge on a VM.
 */

import { resolve } from 'node:path';

import { runChallenge } from '../../api.js';
import { findChallenge, loadChallengeDirectory, loadChallengeFile } from '../../challenge/loader.js';
import type { ResolvedSshSettings } from '../../config/types.js';
import { EXIT_CODES } from '../../core/errors.js';
import {
  credentialOverrides,
  exitWithOperationError,
  handleError,
  parseInteger,
  parseSeconds,
  prepare,
  type GlobalOptions,
  type SshOptions,
} from '../shared.js';

export async function challengeValidateCommand(file: string, options: GlobalOptions): Promise<void> {
  const { output } = await prepare('challenge validate', options);

  try {
    output.info(`Validating challenge: ${file}`);
    const challenge = await loadChallengeFile(resolve(file));

    output.success('Challenge valid');
    output.indent();
    output.info(`Id: ${challenge.id}`);
    output.info(`Setup steps: ${challenge.setup.length}`);
    output.info(`Assertions: ${challenge.validation.length}`);
    output.info(`Hints: ${challenge.hints.length}`);
    output.dedent();

    output.setData('challenge', {
      id: challenge.id,
      name: challenge.name,
      setup: challenge.setup.length,
      assertions: challenge.validation.length,
      hints: challenge.hints.length,
      score: challenge.score,
    });
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

export async function challengeListCommand(options: GlobalOptions): Promise<void> {
  const { output, context } = await prepare('challenge list', options);

  try {
    const { challenges, invalid } = await loadChallengeDirectory(context.settings.challengeDirectory);

    if (challenges.length === 0) {
      output.info(`No challenges found in ${context.settings.challengeDirectory}`);
    } else {
      output.table(
        ['ID', 'NAME', 'CATEGORY', 'DIFFICULTY', 'SCORE'],
        challenges.map((challenge) => [
          challenge.id,
          challenge.name,
          challenge.category ?? '-',
          challenge.difficulty ?? '-',
          String(challenge.score),
        ])
      );
    }
    for (const failure of invalid) {
      output.warning(`${failure.filePath ?? 'unknown file'}: ${failure.message}`);
    }

    output.setData(
      'challenges',
      challenges.map(({ id, name, category, difficulty, score }) => ({ id, name, category, difficulty, score }))
    );
    output.setData('invalid', invalid.map((failure) => ({ file: failure.filePath, message: failure.message })));
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

export interface ChallengeRunCommandOptions extends GlobalOptions, SshOptions {
  host?: string;
  vm?: string;
  simulate?: boolean;
  hints?: string;
  keepSnapshot?: boolean;
  timeout?: string;
}

/**
 * Configured fallback users apply only when no --user is given.
 */
export function candidateUsers(options: SshOptions, ssh: ResolvedSshSettings): string[] | undefined {
  if (options.user || ssh.fallbackUsers.length === 0) {
    return undefined;
  }
  return [ssh.user, ...ssh.fallbackUsers];
}

export async function challengeRunCommand(id: string, options: ChallengeRunCommandOptions): Promise<void> {
  const { output, context } = await prepare('challenge run', options);

  try {
    if (!options.host && !options.vm) {
      throw new Error('Pass --host, or --vm to look up its address');
    }
    const challenge = await findChallenge(context.settings.challengeDirectory, id);

    output.info(`Challenge: ${challenge.name}`);
    output.newline();

    const result = await runChallenge(context, challenge, {
      ...credentialOverrides(options),
      host: options.host,
      vm: options.vm,
      candidateUsers: candidateUsers(options, context.settings.ssh),
      simulate: options.simulate === true,
      hintsRevealed: options.hints ? parseInteger(options.hints, '--hints') : 0,
      keepSnapshot: options.keepSnapshot === true,
      timeoutMs: options.timeout ? parseSeconds(options.timeout, '--timeout') : undefined,
    });
    if (!result.ok) {
      exitWithOperationError(output, result.error);
    }

    output.verdict(result.verdict, result.revealedHints);
    output.flush();
    process.exit(result.verdict.passed ? 0 : EXIT_CODES.ASSERTION_FAILED);
  } catch (error) {
    handleError(output, error);
  }
}
