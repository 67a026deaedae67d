/**
 * In-process checkpointed voting weight ledger.
 *
 * Each account keeps an ordered list of (fromCheckpoint, votes). A weight
 * written at checkpoint C is what the account holds at the end of C; lookups
 * binary-search the last entry at or before the requested checkpoint, and a
 * checkpoint that has not closed yet (>= the clock's current one) is rejected.
 */

import { getAddress } from 'viem';
import type { Address, CheckpointClock, VotingWeightOracle } from '../../governance/types.js';

interface Checkpoint {
  fromCheckpoint: bigint;
  votes: bigint;
}

export class CheckpointLedger implements VotingWeightOracle {
  private readonly checkpoints = new Map<Address, Checkpoint[]>();

  constructor(
    private readonly clock: CheckpointClock,
    private supply: bigint,
  ) {}

  async totalSupply(): Promise<bigint> {
    return this.supply;
  }

  setTotalSupply(supply: bigint): void {
    this.supply = supply;
  }

  /** Record `votes` as the account's weight from the clock's current checkpoint on. */
  async setVotes(account: Address, votes: bigint): Promise<void> {
    if (votes < 0n) throw new RangeError('votes must be >= 0');
    const at = await this.clock.current();
    const key = getAddress(account);
    const list = this.checkpoints.get(key) ?? [];
    const last = list[list.length - 1];

    if (last && last.fromCheckpoint === at) {
      last.votes = votes;
    } else {
      list.push({ fromCheckpoint: at, votes });
    }
    this.checkpoints.set(key, list);
  }

  async getCurrentVotes(account: Address): Promise<bigint> {
    const list = this.checkpoints.get(getAddress(account));
    return list && list.length > 0 ? list[list.length - 1].votes : 0n;
  }

  async getPriorVotes(account: Address, checkpoint: bigint): Promise<bigint> {
    const now = await this.clock.current();
    if (checkpoint >= now) {
      throw new RangeError(`getPriorVotes: checkpoint ${checkpoint} not yet determined (current ${now})`);
    }

    const list = this.checkpoints.get(getAddress(account));
    if (!list || list.length === 0) return 0n;
    if (list[list.length - 1].fromCheckpoint <= checkpoint) return list[list.length - 1].votes;
    if (list[0].fromCheckpoint > checkpoint) return 0n;

    let lower = 0;
    let upper = list.length - 1;
    while (upper > lower) {
      const center = upper - Math.floor((upper - lower) / 2);
      const cp = list[center];
      if (cp.fromCheckpoint === checkpoint) return cp.votes;
      if (cp.fromCheckpoint < checkpoint) {
        lower = center;
      } else {
        upper = center - 1;
      }
    }
    return list[lower].votes;
  }
}
