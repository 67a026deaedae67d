/**
 * Quorum governor: proposal registry, vote accounting and batched execution.
 *
 * Lifecycle: PROPOSE → PENDING → ACTIVE → (DEFEATED | SUCCEEDED → EXECUTED | EXPIRED),
 * with CANCELED reachable from anything but EXECUTED.
 *
 * All mutations run through one WriteLock and check every precondition before
 * writing, so a rejected call leaves no trace. Queries take no lock; every write
 * happens in a single synchronous step after the last await, and the emitted
 * record goes to the sink before that step so a failing sink stores nothing.
 */

import { getAddress } from 'viem';
import { MAX_PROPOSAL_OPERATIONS, VOTING_DELAY } from '@quorum-governor/shared';
import { add256, sub256 } from './arithmetic.js';
import { ballotDigest } from './ballot.js';
import { buildActionCalldata } from './calldata.js';
import { GovernanceError, GovernanceErrorCode, InvalidConfigurationError } from './errors.js';
import { computeProposalState } from './proposalState.js';
import { WriteLock } from './writeLock.js';
import { logStoreSink } from '../storage/eventSink.js';
import type {
  ActionCallResult,
  ActionExecutor,
  Address,
  CheckpointClock,
  GovernanceEventSink,
  GovernorConfig,
  Hex,
  Proposal,
  ProposalActions,
  ProposalState,
  Receipt,
  SignatureVerifier,
  VotingWeightOracle,
} from './types.js';

export interface GovernanceEngineDeps {
  oracle: VotingWeightOracle;
  executor: ActionExecutor;
  verifier: SignatureVerifier;
  clock: CheckpointClock;
  /** Where emitted records go. Defaults to the JSONL log store. */
  sink?: GovernanceEventSink;
}

interface StoredProposal extends Proposal {
  receipts: Map<Address, Receipt>;
}

const EMPTY_RECEIPT: Readonly<Receipt> = Object.freeze({ hasVoted: false, support: false, votes: 0n });

/**
 * Bound checks for a governor configuration against the token's total supply.
 * Returns every violation found; empty when the configuration is usable.
 */
export function validateGovernorConfig(config: GovernorConfig, totalSupply: bigint): string[] {
  const violations: string[] = [];

  if (config.name.trim() === '') {
    violations.push('name is empty.');
  }
  if (config.quorumVotes <= 0n || config.quorumVotes >= totalSupply) {
    violations.push(`quorumVotes must be > 0 and < total supply (${totalSupply}), got ${config.quorumVotes}.`);
  }
  if (config.proposalThreshold <= 0n || config.proposalThreshold >= totalSupply) {
    violations.push(
      `proposalThreshold must be > 0 and < total supply (${totalSupply}), got ${config.proposalThreshold}.`,
    );
  }
  if (
    !Number.isInteger(config.proposalMaxOperations) ||
    config.proposalMaxOperations < 1 ||
    config.proposalMaxOperations > MAX_PROPOSAL_OPERATIONS
  ) {
    violations.push(
      `proposalMaxOperations must be an integer between 1 and ${MAX_PROPOSAL_OPERATIONS}, got ${config.proposalMaxOperations}.`,
    );
  }
  if (config.votingPeriod <= 0n) {
    violations.push(`votingPeriod must be > 0, got ${config.votingPeriod}.`);
  }
  if (config.proposalLifetime <= config.votingPeriod) {
    violations.push(
      `proposalLifetime must be > votingPeriod (${config.votingPeriod}), got ${config.proposalLifetime}.`,
    );
  }
  if (!Number.isInteger(config.chainId) || config.chainId <= 0) {
    violations.push(`chainId must be a positive integer, got ${config.chainId}.`);
  }

  return violations;
}

export class GovernanceEngine {
  readonly votingDelay = VOTING_DELAY;

  private readonly proposals: StoredProposal[] = [];
  private readonly latestProposalIds = new Map<Address, bigint>();
  private readonly lock = new WriteLock();
  private readonly oracle: VotingWeightOracle;
  private readonly executor: ActionExecutor;
  private readonly verifier: SignatureVerifier;
  private readonly clock: CheckpointClock;
  private readonly sink: GovernanceEventSink;

  private constructor(
    readonly config: Readonly<GovernorConfig>,
    deps: GovernanceEngineDeps,
  ) {
    this.oracle = deps.oracle;
    this.executor = deps.executor;
    this.verifier = deps.verifier;
    this.clock = deps.clock;
    this.sink = deps.sink ?? logStoreSink;
  }

  /**
   * Validate `config` against the oracle's current total supply and build a
   * governor with an empty registry.
   */
  static async create(config: GovernorConfig, deps: GovernanceEngineDeps): Promise<GovernanceEngine> {
    const totalSupply = await deps.oracle.totalSupply();
    const violations = validateGovernorConfig(config, totalSupply);
    if (violations.length > 0) {
      throw new InvalidConfigurationError(violations);
    }
    return new GovernanceEngine(
      Object.freeze({
        ...config,
        token: getAddress(config.token),
        verifyingContract: getAddress(config.verifyingContract),
      }),
      deps,
    );
  }

  // ─── Queries ─────────────────────────────────────────────

  get proposalCount(): bigint {
    return BigInt(this.proposals.length);
  }

  /** 0n when `proposer` has never proposed. */
  latestProposalId(proposer: Address): bigint {
    return this.latestProposalIds.get(getAddress(proposer)) ?? 0n;
  }

  async state(proposalId: bigint): Promise<ProposalState> {
    const proposal = this.requireProposal(proposalId);
    const now = await this.clock.current();
    return computeProposalState(proposal, now, this.config.quorumVotes);
  }

  getProposal(proposalId: bigint): Proposal {
    const { receipts: _receipts, ...proposal } = this.requireProposal(proposalId);
    return {
      ...proposal,
      targets: [...proposal.targets],
      signatures: [...proposal.signatures],
      calldatas: [...proposal.calldatas],
    };
  }

  getActions(proposalId: bigint): ProposalActions {
    const proposal = this.requireProposal(proposalId);
    return {
      targets: [...proposal.targets],
      signatures: [...proposal.signatures],
      calldatas: [...proposal.calldatas],
    };
  }

  getReceipt(proposalId: bigint, voter: Address): Receipt {
    const proposal = this.requireProposal(proposalId);
    const receipt = proposal.receipts.get(getAddress(voter)) ?? EMPTY_RECEIPT;
    return { ...receipt };
  }

  // ─── Mutations ───────────────────────────────────────────

  /**
   * Create a proposal for `proposer`. Returns the new proposal id.
   * `description` is not stored; it only travels on the ProposalCreated record.
   */
  propose(
    proposer: Address,
    targets: Address[],
    signatures: string[],
    calldatas: Hex[],
    description: string,
  ): Promise<bigint> {
    return this.lock.run(async () => {
      const caller = getAddress(proposer);
      const now = await this.clock.current();
      const priorCheckpoint = sub256(now, 1n, 'checkpoint');

      const weight = await this.oracle.getPriorVotes(caller, priorCheckpoint);
      if (weight <= this.config.proposalThreshold) {
        throw new GovernanceError(GovernanceErrorCode.InsufficientWeight, 'Proposer votes below proposal threshold', {
          proposer: caller,
          votes: weight.toString(),
          proposalThreshold: this.config.proposalThreshold.toString(),
        });
      }

      if (targets.length !== signatures.length || targets.length !== calldatas.length) {
        throw new GovernanceError(GovernanceErrorCode.MalformedProposal, 'Proposal function information arity mismatch', {
          targets: targets.length,
          signatures: signatures.length,
          calldatas: calldatas.length,
        });
      }
      if (targets.length === 0) {
        throw new GovernanceError(GovernanceErrorCode.MalformedProposal, 'Proposal must provide actions');
      }
      if (targets.length > this.config.proposalMaxOperations) {
        throw new GovernanceError(GovernanceErrorCode.MalformedProposal, 'Too many actions', {
          actions: targets.length,
          proposalMaxOperations: this.config.proposalMaxOperations,
        });
      }

      const latestId = this.latestProposalIds.get(caller);
      if (latestId !== undefined) {
        const latestState = computeProposalState(this.requireProposal(latestId), now, this.config.quorumVotes);
        if (latestState === 'Active' || latestState === 'Pending') {
          throw new GovernanceError(
            GovernanceErrorCode.ConflictingProposal,
            `One live proposal per proposer, found an already ${latestState.toLowerCase()} proposal`,
            { proposer: caller, latestProposalId: latestId.toString(), state: latestState },
          );
        }
      }

      const startBlock = add256(now, this.votingDelay, 'startBlock');
      const endBlock = add256(startBlock, this.config.votingPeriod, 'endBlock');
      const lifetimeEndBlock = add256(startBlock, this.config.proposalLifetime, 'lifetimeEndBlock');

      const proposal: StoredProposal = {
        id: this.proposalCount + 1n,
        proposer: caller,
        targets: targets.map((target) => getAddress(target)),
        signatures: [...signatures],
        calldatas: [...calldatas],
        startBlock,
        endBlock,
        lifetimeEndBlock,
        forVotes: 0n,
        againstVotes: 0n,
        canceled: false,
        executed: false,
        receipts: new Map(),
      };

      this.sink.record({
        type: 'ProposalCreated',
        id: proposal.id,
        proposer: caller,
        targets: [...proposal.targets],
        signatures: [...proposal.signatures],
        calldatas: [...proposal.calldatas],
        startBlock,
        endBlock,
        lifetimeEndBlock,
        description,
      });

      this.proposals.push(proposal);
      this.latestProposalIds.set(caller, proposal.id);
      return proposal.id;
    });
  }

  castVote(voter: Address, proposalId: bigint, support: boolean): Promise<Receipt> {
    return this.lock.run(() => this.castVoteAs(getAddress(voter), proposalId, support));
  }

  /** Vote as whoever signed the EIP-712 ballot for (proposalId, support). */
  async castVoteBySig(proposalId: bigint, support: boolean, signature: Hex): Promise<Receipt> {
    const digest = ballotDigest(this.config, proposalId, support);
    const signer = await this.verifier.recover(digest, signature);
    if (!signer) {
      throw new GovernanceError(GovernanceErrorCode.InvalidSignature, 'Invalid ballot signature', {
        proposalId: proposalId.toString(),
      });
    }
    return this.lock.run(() => this.castVoteAs(getAddress(signer), proposalId, support));
  }

  /**
   * Cancel a proposal whose proposer has fallen below the threshold. Anyone
   * may call this. A canceled proposal can be canceled again.
   */
  cancel(proposalId: bigint): Promise<void> {
    return this.lock.run(async () => {
      const proposal = this.requireProposal(proposalId);
      const now = await this.clock.current();
      const state = computeProposalState(proposal, now, this.config.quorumVotes);
      if (state === 'Executed') {
        throw new GovernanceError(GovernanceErrorCode.InvalidState, 'Cannot cancel executed proposal', {
          proposalId: proposalId.toString(),
          state,
        });
      }

      const priorCheckpoint = sub256(now, 1n, 'checkpoint');
      const weight = await this.oracle.getPriorVotes(proposal.proposer, priorCheckpoint);
      if (weight >= this.config.proposalThreshold) {
        throw new GovernanceError(GovernanceErrorCode.InsufficientWeight, 'Proposer above threshold', {
          proposalId: proposalId.toString(),
          proposer: proposal.proposer,
          votes: weight.toString(),
          proposalThreshold: this.config.proposalThreshold.toString(),
        });
      }

      this.sink.record({ type: 'ProposalCanceled', id: proposal.id });
      proposal.canceled = true;
    });
  }

  /**
   * Run every action of a succeeded proposal in order. Each sub-call carries
   * value 0; `value` is only reported on the ProposalExecuted record.
   *
   * The proposal only turns Executed once every action has succeeded. The
   * first failing action stops the run with ActionExecutionFailed; calls that
   * already went out stay done and the proposal stays Succeeded.
   */
  execute(proposalId: bigint, value = 0n): Promise<void> {
    return this.lock.run(async () => {
      const proposal = this.requireProposal(proposalId);
      const now = await this.clock.current();
      const state = computeProposalState(proposal, now, this.config.quorumVotes);
      if (state !== 'Succeeded') {
        throw new GovernanceError(GovernanceErrorCode.InvalidState, 'Proposal can only be executed if it is succeeded', {
          proposalId: proposalId.toString(),
          state,
        });
      }

      for (let index = 0; index < proposal.targets.length; index++) {
        const target = proposal.targets[index];
        let result: ActionCallResult;
        try {
          const data = buildActionCalldata(proposal.signatures[index], proposal.calldatas[index]);
          result = await this.executor.invoke({ target, value: 0n, data });
        } catch (err) {
          result = { ok: false, reason: err instanceof Error ? err.message : String(err) };
        }

        if (!result.ok) {
          throw new GovernanceError(
            GovernanceErrorCode.ActionExecutionFailed,
            `Action ${index} of proposal ${proposalId} failed: ${result.reason}`,
            { proposalId: proposalId.toString(), index, target, reason: result.reason },
          );
        }
      }

      this.sink.record({ type: 'ProposalExecuted', id: proposal.id, value });
      proposal.executed = true;
    });
  }

  // ─── Internals ───────────────────────────────────────────

  private async castVoteAs(voter: Address, proposalId: bigint, support: boolean): Promise<Receipt> {
    const proposal = this.requireProposal(proposalId);
    const now = await this.clock.current();
    const state = computeProposalState(proposal, now, this.config.quorumVotes);
    if (state !== 'Active') {
      throw new GovernanceError(GovernanceErrorCode.InvalidState, 'Voting is closed', {
        proposalId: proposalId.toString(),
        state,
      });
    }
    if (proposal.receipts.has(voter)) {
      throw new GovernanceError(GovernanceErrorCode.DuplicateVote, 'Voter already voted', {
        proposalId: proposalId.toString(),
        voter,
      });
    }

    const votes = await this.oracle.getPriorVotes(voter, proposal.startBlock);
    const forVotes = support ? add256(proposal.forVotes, votes, 'forVotes') : proposal.forVotes;
    const againstVotes = support ? proposal.againstVotes : add256(proposal.againstVotes, votes, 'againstVotes');

    const receipt: Receipt = { hasVoted: true, support, votes };
    this.sink.record({ type: 'VoteCast', voter, proposalId: proposal.id, support, votes });

    proposal.forVotes = forVotes;
    proposal.againstVotes = againstVotes;
    proposal.receipts.set(voter, receipt);
    return { ...receipt };
  }

  private requireProposal(proposalId: bigint): StoredProposal {
    const proposal = proposalId >= 1n && proposalId <= this.proposalCount
      ? this.proposals[Number(proposalId - 1n)]
      : undefined;
    if (!proposal) {
      throw new GovernanceError(GovernanceErrorCode.InvalidProposalId, 'Invalid proposal id', {
        proposalId: proposalId.toString(),
        proposalCount: this.proposalCount.toString(),
      });
    }
    return proposal;
  }
}
