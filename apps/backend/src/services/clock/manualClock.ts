import type { CheckpointClock } from '../../governance/types.js';

/** In-process checkpoint counter, advanced explicitly. */
export class ManualClock implements CheckpointClock {
  constructor(private checkpoint = 0n) {}

  async current(): Promise<bigint> {
    return this.checkpoint;
  }

  now(): bigint {
    return this.checkpoint;
  }

  advance(by = 1n): bigint {
    if (by < 0n) throw new RangeError('Checkpoints only move forward');
    this.checkpoint += by;
    return this.checkpoint;
  }

  advanceTo(checkpoint: bigint): bigint {
    if (checkpoint < this.checkpoint) throw new RangeError('Checkpoints only move forward');
    this.checkpoint = checkpoint;
    return this.checkpoint;
  }
}
