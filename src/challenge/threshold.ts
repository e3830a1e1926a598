/**
 * Count thresholds: `>N`, `>=N`, `<N`, `<=N`, `==N` or a bare `N` (equality).
 */

import type { ComparisonOperator, Threshold } from './types.js';

const THRESHOLD_PATTERN = /^\s*(>=|<=|==|>|<)?\s*(\d+)\s*$/;

/**
 * Parse a threshold as authored. Returns null when the text is not one.
 */
export function parseThreshold(raw: string | number): Threshold | null {
  const source = String(raw).trim();
  if (typeof raw === 'number') {
    if (!Number.isInteger(raw) || raw < 0) {
      return null;
    }
    return { operator: '==', value: raw, source };
  }

  const match = THRESHOLD_PATTERN.exec(raw);
  if (!match) {
    return null;
  }

  const [, symbol, digits] = match;
  const operator: ComparisonOperator = isOperator(symbol) ? symbol : '==';
  return { operator, value: Number.parseInt(digits ?? '0', 10), source };
}

function isOperator(value: string | undefined): value is ComparisonOperator {
  return value === '>' || value === '>=' || value === '<' || value === '<=' || value === '==';
}

export function meetsThreshold(observed: number, threshold: Threshold): boolean {
  switch (threshold.operator) {
    case '>':
      return observed > threshold.value;
    case '>=':
      return observed >= threshold.value;
    case '<':
      return observed < threshold.value;
    case '<=':
      return observed <= threshold.value;
    case '==':
      return observed === threshold.value;
  }
}

/**
 * Count derived from command output: the whole trimmed output as an
 * integer when it is one, otherwise the number of non-empty lines.
 */
export function countFromOutput(stdout: string): number {
  const trimmed = stdout.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }
  return trimmed.split('\n').filter((line) => line.trim() !== '').length;
}
