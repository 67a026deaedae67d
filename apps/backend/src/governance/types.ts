import type { Address, Hex, ProposalState } from '@quorum-governor/shared';

export type { Address, Hex, ProposalState };

// ─── Configuration ───────────────────────────────────────

export interface GovernorConfig {
  name: string;
  quorumVotes: bigint;
  proposalThreshold: bigint;
  proposalMaxOperations: number;
  votingPeriod: bigint;
  /** Checkpoints after startBlock at which an unexecuted proposal expires. */
  proposalLifetime: bigint;
  /** Reference token whose voting weight governs. */
  token: Address;
  /** Ballot signature domain. */
  chainId: number;
  verifyingContract: Address;
}

// ─── Proposals ───────────────────────────────────────────

export interface ProposalActions {
  targets: Address[];
  /** Empty string means the calldata is sent verbatim. */
  signatures: string[];
  calldatas: Hex[];
}

export interface Receipt {
  hasVoted: boolean;
  support: boolean;
  votes: bigint;
}

/** Fields the state machine reads. */
export interface ProposalTally {
  startBlock: bigint;
  endBlock: bigint;
  lifetimeEndBlock: bigint;
  forVotes: bigint;
  againstVotes: bigint;
  canceled: boolean;
  executed: boolean;
}

export interface Proposal extends ProposalActions, ProposalTally {
  id: bigint;
  proposer: Address;
}

// ─── Collaborators ───────────────────────────────────────

/** Historical and current token-weighted voting power. */
export interface VotingWeightOracle {
  totalSupply(): Promise<bigint>;
  /** Weight `account` held at the end of `checkpoint`. */
  getPriorVotes(account: Address, checkpoint: bigint): Promise<bigint>;
}

export interface ActionCall {
  target: Address;
  value: bigint;
  data: Hex;
}

export type ActionCallResult =
  | { ok: true; returnData?: Hex }
  | { ok: false; reason: string };

/** Performs one external call per action. */
export interface ActionExecutor {
  invoke(call: ActionCall): Promise<ActionCallResult>;
}

/** Recovers the signer of a digest; null when nothing can be recovered. */
export interface SignatureVerifier {
  recover(digest: Hex, signature: Hex): Promise<Address | null>;
}

/** Monotonic checkpoint source (block height). */
export interface CheckpointClock {
  current(): Promise<bigint>;
}

// ─── Emitted records ─────────────────────────────────────

export interface ProposalCreatedEvent {
  type: 'ProposalCreated';
  id: bigint;
  proposer: Address;
  targets: Address[];
  signatures: string[];
  calldatas: Hex[];
  startBlock: bigint;
  endBlock: bigint;
  lifetimeEndBlock: bigint;
  description: string;
}

export interface VoteCastEvent {
  type: 'VoteCast';
  voter: Address;
  proposalId: bigint;
  support: boolean;
  votes: bigint;
}

export interface ProposalCanceledEvent {
  type: 'ProposalCanceled';
  id: bigint;
}

export interface ProposalExecutedEvent {
  type: 'ProposalExecuted';
  id: bigint;
  value: bigint;
}

export type GovernanceEvent =
  | ProposalCreatedEvent
  | VoteCastEvent
  | ProposalCanceledEvent
  | ProposalExecutedEvent;

export interface GovernanceEventSink {
  record(event: GovernanceEvent): void;
}
