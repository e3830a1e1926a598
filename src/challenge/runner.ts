/**
 * Challenge Runner
 *
 * Drives one challenge attempt against a VM: optional safety snapshot,
 * setup, optional simulated learner action, validation and verdict.
 */

import { SetupError } from '../core/errors.js';
import { systemClock, type Clock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';
import { baseDirOf, expandPath } from '../lib/paths.js';
import type { SnapshotEngine } from '../snapshot/engine.js';
import type { SshSession } from '../ssh/session.js';
import type { CommandResult, SshCredential } from '../ssh/types.js';
import { evaluateAssertion, type RemoteRunner } from './assertions.js';
import { HintLedger } from './hints.js';
import type { AssertionResult, ChallengeDefinition, Hint, Step, ValidationVerdict } from './types.js';

export interface ChallengeRunOptions {
  credential: SshCredential;
  /** Per-command timeout for setup and checks */
  commandTimeoutMs: number;
  /** Domain to protect with a safety snapshot; none is taken when omitted */
  vm?: string;
  /** Run the challenge's simulated learner action before validating */
  simulate?: boolean;
  /** Number of hints the learner has revealed */
  hintsRevealed?: number;
  /** Leave the VM in its validated state and keep the safety snapshot */
  keepSnapshot?: boolean;
}

export interface ChallengeRunReport {
  verdict: ValidationVerdict;
  revealedHints: Hint[];
  /** Safety snapshot name, when one was taken */
  snapshot: string | null;
}

/** Step index reported for a failing simulated action */
export const SIMULATED_ACTION_INDEX = -1;

/**
 * Safety snapshot names carry a UTC timestamp, so a repeated run never
 * reuses the overlay paths of an earlier one.
 */
export function safetySnapshotName(challengeId: string, at: number): string {
  const stamp = new Date(at).toISOString().replace(/[-:.]/g, '');
  return `labkeeper-${challengeId}-${stamp}`;
}

export class ChallengeRunner {
  constructor(
    private readonly session: SshSession,
    private readonly snapshots: SnapshotEngine,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * @throws SetupError when a setup step or the simulated action fails
   */
  async run(challenge: ChallengeDefinition, options: ChallengeRunOptions): Promise<ChallengeRunReport> {
    const ledger = new HintLedger(challenge.hints, challenge.score);
    ledger.revealUpTo(options.hintsRevealed ?? 0);

    let snapshot: string | null = null;
    if (options.vm) {
      snapshot = safetySnapshotName(challenge.id, this.clock.now());
      await this.snapshots.create(options.vm, snapshot, {
        description: `Before challenge ${challenge.id}`,
        freezeFilesystem: true,
      });
    }

    try {
      for (const [index, step] of challenge.setup.entries()) {
        await this.runStep(challenge, step, index, options);
      }
      if (challenge.setup.length > 0) {
        this.logger.success(`Setup complete (${challenge.setup.length} step(s))`);
      }

      if (options.simulate && challenge.simulatedAction) {
        this.logger.info('Running simulated learner action');
        await this.runStep(challenge, challenge.simulatedAction, SIMULATED_ACTION_INDEX, options);
      }

      const verdict = await this.validate(challenge, options, ledger);
      return { verdict, revealedHints: ledger.revealed(), snapshot };
    } finally {
      if (options.vm && snapshot && !options.keepSnapshot) {
        await this.restore(options.vm, snapshot);
      }
    }
  }

  /**
   * Run every assertion and combine them. No short-circuit: each
   * assertion reports its own result.
   */
  async validate(
    challenge: ChallengeDefinition,
    options: Pick<ChallengeRunOptions, 'credential' | 'commandTimeoutMs'>,
    ledger: HintLedger = new HintLedger(challenge.hints, challenge.score)
  ): Promise<ValidationVerdict> {
    const remote = this.remote(options);
    const results: AssertionResult[] = [];

    for (const [index, assertion] of challenge.validation.entries()) {
      results.push(await evaluateAssertion(remote, assertion, index));
    }

    const passed = results.length > 0 && results.every((result) => result.passed);
    const achievableScore = ledger.achievableScore();

    return {
      challengeId: challenge.id,
      passed,
      results,
      maxScore: challenge.score,
      achievableScore,
      score: passed ? achievableScore : 0,
      hintsUsed: ledger.used,
      flag: passed ? challenge.flag : null,
    };
  }

  private remote(options: Pick<ChallengeRunOptions, 'credential' | 'commandTimeoutMs'>): RemoteRunner {
    return (command: string): Promise<CommandResult> =>
      this.session.execute(options.credential, command, { timeoutMs: options.commandTimeoutMs });
  }

  private async runStep(
    challenge: ChallengeDefinition,
    step: Step,
    index: number,
    options: ChallengeRunOptions
  ): Promise<void> {
    const label = index === SIMULATED_ACTION_INDEX ? 'Simulated action' : `Setup step ${index + 1}`;

    if (step.type === 'copy_file') {
      const base = challenge.sourcePath ? baseDirOf(challenge.sourcePath) : process.cwd();
      const source = expandPath(step.source, base);
      const transfer = await this.session.copyFile(options.credential, source, step.destination, {
        createDirs: step.createDirs,
      });
      if (!transfer.success) {
        throw new SetupError(`${label} failed: ${transfer.error?.message ?? 'copy failed'}`, index, '', '');
      }
      return;
    }

    const result = await this.session.execute(options.credential, step.command, {
      timeoutMs: options.commandTimeoutMs,
    });
    if (result.error) {
      throw new SetupError(`${label} failed: ${result.error.message}`, index, result.stdout, result.stderr);
    }
    if (result.exitStatus !== step.expectedExitStatus) {
      throw new SetupError(
        `${label} (${step.command}) exited with status ${result.exitStatus}, expected ${step.expectedExitStatus}`,
        index,
        result.stdout,
        result.stderr
      );
    }
  }

  /**
   * Put the VM back to its pre-challenge state. Failures are reported as
   * warnings so they do not hide the run's own outcome.
   */
  private async restore(vm: string, snapshot: string): Promise<void> {
    try {
      await this.snapshots.revert(vm, snapshot);
      await this.snapshots.delete(vm, snapshot);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warning(`Could not restore '${vm}' from '${snapshot}': ${message}`);
    }
  }
}
