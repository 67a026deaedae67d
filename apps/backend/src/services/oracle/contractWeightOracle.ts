/**
 * Voting weight read from a deployed checkpointed votes token.
 */

import type { PublicClient } from 'viem';
import { VotesTokenAbi } from '../../abi/VotesToken.js';
import type { Address, VotingWeightOracle } from '../../governance/types.js';

export class ContractWeightOracle implements VotingWeightOracle {
  constructor(
    private readonly client: PublicClient,
    private readonly token: Address,
  ) {}

  totalSupply(): Promise<bigint> {
    return this.client.readContract({
      address: this.token,
      abi: VotesTokenAbi,
      functionName: 'totalSupply',
    });
  }

  getPriorVotes(account: Address, checkpoint: bigint): Promise<bigint> {
    return this.client.readContract({
      address: this.token,
      abi: VotesTokenAbi,
      functionName: 'getPriorVotes',
      args: [account, checkpoint],
    });
  }
}
