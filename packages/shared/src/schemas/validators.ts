import { z } from 'zod';
import type { Address, Hex } from '../types/governance.js';

// ─── Hex / Address / Integer Validators ──────────────────
// Reusable Zod refinements for EVM-compatible data.

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const HEX_DATA_RE = /^0x([0-9a-fA-F]{2})*$/;
const SIGNATURE_RE = /^0x[0-9a-fA-F]{130}$/;
const UINT_RE = /^\d+$/;

/** Ethereum address: 0x + 40 hex chars */
export const zAddress = z.custom<Address>(
  (value) => typeof value === 'string' && ADDRESS_RE.test(value),
  'Invalid Ethereum address (expected 0x + 40 hex chars)',
);

/** Arbitrary hex data: 0x + even-length hex (calldata, etc.) */
export const zHexData = z.custom<Hex>(
  (value) => typeof value === 'string' && HEX_DATA_RE.test(value),
  'Invalid hex data (expected 0x + even hex length)',
);

/** 65-byte r ‖ s ‖ v signature */
export const zSignature = z.custom<Hex>(
  (value) => typeof value === 'string' && SIGNATURE_RE.test(value),
  'Invalid signature (expected 0x + 130 hex chars)',
);

/**
 * Unsigned integer given as a decimal string or a safe JSON integer.
 * Parses to bigint.
 */
export const zUint = z
  .union([
    z.string().regex(UINT_RE, 'Invalid unsigned integer (expected decimal digits)'),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((value) => BigInt(value));
