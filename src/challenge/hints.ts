/**
 * Hint ledger for one challenge attempt.
 */

import { ContractError } from '../core/errors.js';
import type { Hint } from './types.js';

/**
 * Reveals hints in authored order. A revealed hint stays revealed; the
 * achievable score drops by each revealed hint's cost, never below zero.
 */
export class HintLedger {
  private revealedCount = 0;

  constructor(
    private readonly hints: readonly Hint[],
    private readonly maxScore: number
  ) {}

  /**
   * Reveal the next hint, or return null when all are revealed.
   */
  reveal(): Hint | null {
    const hint = this.hints[this.revealedCount];
    if (!hint) {
      return null;
    }
    this.revealedCount++;
    return hint;
  }

  /**
   * Reveal hints until `count` are revealed. Never hides any.
   */
  revealUpTo(count: number): Hint[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new ContractError(`Hint count must be a non-negative integer, got ${count}`);
    }
    while (this.revealedCount < Math.min(count, this.hints.length)) {
      this.reveal();
    }
    return this.revealed();
  }

  revealed(): Hint[] {
    return this.hints.slice(0, this.revealedCount);
  }

  get used(): number {
    return this.revealedCount;
  }

  get remaining(): number {
    return this.hints.length - this.revealedCount;
  }

  achievableScore(): number {
    const spent = this.revealed().reduce((total, hint) => total + hint.cost, 0);
    return Math.max(0, this.maxScore - spent);
  }
}
