import { maxUint256 } from 'viem';
import { GovernanceError, GovernanceErrorCode } from './errors.js';

// Weights and checkpoints are uint256 quantities; arithmetic fails closed.

export function add256(a: bigint, b: bigint, what = 'addition'): bigint {
  const sum = a + b;
  if (sum > maxUint256) {
    throw new GovernanceError(GovernanceErrorCode.ArithmeticOverflow, `${what} overflow`, {
      a: a.toString(),
      b: b.toString(),
    });
  }
  return sum;
}

export function sub256(a: bigint, b: bigint, what = 'subtraction'): bigint {
  if (b > a) {
    throw new GovernanceError(GovernanceErrorCode.ArithmeticUnderflow, `${what} underflow`, {
      a: a.toString(),
      b: b.toString(),
    });
  }
  return a - b;
}
