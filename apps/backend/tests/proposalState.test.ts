import { describe, it, expect } from 'vitest';
import { computeProposalState } from '../src/governance/proposalState.js';
import type { ProposalTally } from '../src/governance/types.js';

const QUORUM = 100n;

function tally(overrides: Partial<ProposalTally> = {}): ProposalTally {
  return {
    startBlock: 10n,
    endBlock: 20n,
    lifetimeEndBlock: 30n,
    forVotes: 0n,
    againstVotes: 0n,
    canceled: false,
    executed: false,
    ...overrides,
  };
}

describe('computeProposalState', () => {
  it('is Pending up to and including the start checkpoint', () => {
    expect(computeProposalState(tally(), 9n, QUORUM)).toBe('Pending');
    expect(computeProposalState(tally(), 10n, QUORUM)).toBe('Pending');
  });

  it('is Active after the start up to and including the end checkpoint', () => {
    expect(computeProposalState(tally(), 11n, QUORUM)).toBe('Active');
    expect(computeProposalState(tally(), 20n, QUORUM)).toBe('Active');
  });

  it('is Defeated on a tie', () => {
    expect(computeProposalState(tally({ forVotes: 150n, againstVotes: 150n }), 21n, QUORUM)).toBe('Defeated');
  });

  it('is Defeated below quorum even without opposition', () => {
    expect(computeProposalState(tally({ forVotes: 99n }), 21n, QUORUM)).toBe('Defeated');
  });

  it('is Succeeded at exactly quorum with a majority', () => {
    expect(computeProposalState(tally({ forVotes: 100n, againstVotes: 99n }), 21n, QUORUM)).toBe('Succeeded');
  });

  it('is Expired from the lifetime end checkpoint on', () => {
    expect(computeProposalState(tally({ forVotes: 100n }), 29n, QUORUM)).toBe('Succeeded');
    expect(computeProposalState(tally({ forVotes: 100n }), 30n, QUORUM)).toBe('Expired');
  });

  it('reports Executed ahead of Expired', () => {
    expect(computeProposalState(tally({ forVotes: 100n, executed: true }), 35n, QUORUM)).toBe('Executed');
  });

  it('reports Canceled ahead of every other state', () => {
    const canceled = tally({ forVotes: 500n, canceled: true, executed: true });
    for (const now of [5n, 15n, 25n, 35n]) {
      expect(computeProposalState(canceled, now, QUORUM)).toBe('Canceled');
    }
  });

  it('reports the tally outcome ahead of the executed flag', () => {
    expect(computeProposalState(tally({ forVotes: 10n, executed: true }), 21n, QUORUM)).toBe('Defeated');
  });
});
