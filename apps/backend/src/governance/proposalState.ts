import type { ProposalState, ProposalTally } from './types.js';

/**
 * Derive a proposal's state at checkpoint `now`. Rules are evaluated in a
 * fixed order; canceled short-circuits everything and the tally outcome is
 * read before the executed and expiry flags.
 */
export function computeProposalState(
  proposal: ProposalTally,
  now: bigint,
  quorumVotes: bigint,
): ProposalState {
  if (proposal.canceled) return 'Canceled';
  if (now <= proposal.startBlock) return 'Pending';
  if (now <= proposal.endBlock) return 'Active';
  if (proposal.forVotes <= proposal.againstVotes || proposal.forVotes < quorumVotes) return 'Defeated';
  if (proposal.executed) return 'Executed';
  if (now >= proposal.lifetimeEndBlock) return 'Expired';
  if (proposal.forVotes > proposal.againstVotes && proposal.forVotes >= quorumVotes) return 'Succeeded';
  return 'Null';
}
