import type { GovernorConfigView, ProposalActionsView, ProposalState, ProposalView, ReceiptView } from '@quorum-governor/shared';
import type { GovernanceEngine } from '../governance/engine.js';
import type { Address, Proposal, ProposalActions, Receipt } from '../governance/types.js';

// ─── JSON views (bigint → decimal string) ────────────────

export function proposalView(proposal: Proposal, state: ProposalState): ProposalView {
  return {
    id: proposal.id.toString(),
    proposer: proposal.proposer,
    ...actionsView(proposal),
    startBlock: proposal.startBlock.toString(),
    endBlock: proposal.endBlock.toString(),
    lifetimeEndBlock: proposal.lifetimeEndBlock.toString(),
    forVotes: proposal.forVotes.toString(),
    againstVotes: proposal.againstVotes.toString(),
    canceled: proposal.canceled,
    executed: proposal.executed,
    state,
  };
}

export function actionsView(actions: ProposalActions): ProposalActionsView {
  return {
    targets: [...actions.targets],
    signatures: [...actions.signatures],
    calldatas: [...actions.calldatas],
  };
}

export function receiptView(proposalId: bigint, voter: Address, receipt: Receipt): ReceiptView {
  return {
    proposalId: proposalId.toString(),
    voter,
    hasVoted: receipt.hasVoted,
    support: receipt.support,
    votes: receipt.votes.toString(),
  };
}

export function configView(engine: GovernanceEngine): GovernorConfigView {
  const { config } = engine;
  return {
    name: config.name,
    quorumVotes: config.quorumVotes.toString(),
    proposalThreshold: config.proposalThreshold.toString(),
    proposalMaxOperations: config.proposalMaxOperations,
    votingDelay: engine.votingDelay.toString(),
    votingPeriod: config.votingPeriod.toString(),
    proposalLifetime: config.proposalLifetime.toString(),
    token: config.token,
    chainId: config.chainId,
    verifyingContract: config.verifyingContract,
    proposalCount: engine.proposalCount.toString(),
  };
}
