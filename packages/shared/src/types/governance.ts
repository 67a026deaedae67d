// ─── Governance Types ────────────────────────────────────

/** 0x-prefixed EVM address. */
export type Address = `0x${string}`;

/** 0x-prefixed hex data (calldata, signatures, digests). */
export type Hex = `0x${string}`;

/**
 * Lifecycle state of a proposal. Never stored: derived from the proposal's
 * fields and the checkpoint it is queried at.
 */
export type ProposalState =
  | 'Pending'
  | 'Active'
  | 'Canceled'
  | 'Defeated'
  | 'Succeeded'
  | 'Expired'
  | 'Executed'
  | 'Null';

/** Parallel action lists of a proposal (same length, same order). */
export interface ProposalActionsView {
  targets: Address[];
  signatures: string[];
  calldatas: Hex[];
}

/**
 * JSON view of a stored proposal. Weights and checkpoints are decimal strings.
 */
export interface ProposalView extends ProposalActionsView {
  id: string;
  proposer: Address;
  startBlock: string;
  endBlock: string;
  lifetimeEndBlock: string;
  forVotes: string;
  againstVotes: string;
  canceled: boolean;
  executed: boolean;
  state: ProposalState;
}

/** JSON view of one voter's receipt on one proposal. */
export interface ReceiptView {
  proposalId: string;
  voter: Address;
  hasVoted: boolean;
  support: boolean;
  votes: string;
}

/** JSON view of the immutable governor configuration. */
export interface GovernorConfigView {
  name: string;
  quorumVotes: string;
  proposalThreshold: string;
  proposalMaxOperations: number;
  votingDelay: string;
  votingPeriod: string;
  proposalLifetime: string;
  token: Address;
  chainId: number;
  verifyingContract: Address;
  proposalCount: string;
}
