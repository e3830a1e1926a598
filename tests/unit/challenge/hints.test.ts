/**
 * Unit tests for the hint ledger
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { HintLedger } from '../../../src/challenge/hints.js';
import { ContractError } from '../../../src/core/errors.js';

const HINTS = [
  { text: 'Look at systemctl', cost: 10 },
  { text: 'The unit is called nginx', cost: 25 },
  { text: 'Free nudge', cost: 0 },
];

describe('HintLedger', () => {
  it('should start with nothing revealed', () => {
    const ledger = new HintLedger(HINTS, 100);

    assert.strictEqual(ledger.used, 0);
    assert.strictEqual(ledger.remaining, 3);
    assert.strictEqual(ledger.achievableScore(), 100);
  });

  it('should reveal in order and deduct costs', () => {
    const ledger = new HintLedger(HINTS, 100);

    assert.deepStrictEqual(ledger.reveal(), HINTS[0]);
    assert.deepStrictEqual(ledger.reveal(), HINTS[1]);

    assert.strictEqual(ledger.used, 2);
    assert.strictEqual(ledger.achievableScore(), 65);
  });

  it('should return null once every hint is revealed', () => {
    const ledger = new HintLedger(HINTS, 100);
    ledger.revealUpTo(3);

    assert.strictEqual(ledger.reveal(), null);
    assert.strictEqual(ledger.remaining, 0);
  });

  it('should never hide a revealed hint', () => {
    const ledger = new HintLedger(HINTS, 100);
    ledger.revealUpTo(2);

    assert.deepStrictEqual(ledger.revealUpTo(1), HINTS.slice(0, 2));
  });

  it('should cap a request beyond the hint count', () => {
    const ledger = new HintLedger(HINTS, 100);

    assert.strictEqual(ledger.revealUpTo(10).length, 3);
  });

  it('should not drop below zero', () => {
    const ledger = new HintLedger([{ text: 'Expensive', cost: 80 }, { text: 'Also expensive', cost: 80 }], 100);
    ledger.revealUpTo(2);

    assert.strictEqual(ledger.achievableScore(), 0);
  });

  it('should reject a negative count', () => {
    const ledger = new HintLedger(HINTS, 100);

    assert.throws(() => ledger.revealUpTo(-1), ContractError);
  });
});
