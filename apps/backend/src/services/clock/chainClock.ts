import type { PublicClient } from 'viem';
import type { CheckpointClock } from '../../governance/types.js';

/** Block height of the connected chain. */
export class ChainClock implements CheckpointClock {
  constructor(private readonly client: PublicClient) {}

  current(): Promise<bigint> {
    return this.client.getBlockNumber({ cacheTime: 0 });
  }
}
