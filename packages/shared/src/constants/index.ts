// ─── Constants ───────────────────────────────────────────

/** Checkpoints between proposal creation and the start of voting. */
export const VOTING_DELAY = 1n;

/** Upper bound for a governor's proposalMaxOperations setting. */
export const MAX_PROPOSAL_OPERATIONS = 10;

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as const;

// EIP-712 ballot typing
export { BALLOT_TYPES, BALLOT_PRIMARY_TYPE } from './ballot.js';
