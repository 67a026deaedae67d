/**
 * Calldata for a proposal action: when a function signature is present the
 * payload is prefixed with its 4-byte selector, otherwise it is sent as is.
 */

import { concat, toFunctionSelector } from 'viem';
import type { Hex } from './types.js';

export function buildActionCalldata(signature: string, payload: Hex): Hex {
  if (signature.length === 0) return payload;
  return concat([toFunctionSelector(signature), payload]);
}
