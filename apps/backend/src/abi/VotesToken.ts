/**
 * Minimal checkpointed votes token ABI: total supply and historical votes.
 * Matches COMP-style tokens (getPriorVotes reverts for a block not yet mined).
 */
export const VotesTokenAbi = [
  {
    inputs: [],
    name: 'totalSupply',
    outputs: [{ name: '', type: 'uint256' }],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: [
      { name: 'account', type: 'address' },
      { name: 'blockNumber', type: 'uint256' },
    ],
    name: 'getPriorVotes',
    outputs: [{ name: '', type: 'uint96' }],
    stateMutability: 'view',
    type: 'function',
  },
] as const;
