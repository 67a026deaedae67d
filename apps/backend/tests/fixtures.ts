/**
 * Shared wiring for governor tests: a manual clock, an in-process checkpoint
 * ledger, an in-memory event sink and an executor that records every call.
 */

import { EcdsaSignatureVerifier } from '../src/governance/ballot.js';
import { GovernanceEngine } from '../src/governance/engine.js';
import type {
  ActionCall,
  ActionCallResult,
  ActionExecutor,
  Address,
  GovernorConfig,
  SignatureVerifier,
} from '../src/governance/types.js';
import { ManualClock } from '../src/services/clock/manualClock.js';
import { CheckpointLedger } from '../src/services/oracle/checkpointLedger.js';
import { MemoryEventSink } from '../src/storage/eventSink.js';

export const PROPOSER: Address = '0x1111111111111111111111111111111111111111';
export const VOTER: Address = '0x2222222222222222222222222222222222222222';
export const OTHER_VOTER: Address = '0x3333333333333333333333333333333333333333';
export const TARGET: Address = '0x4444444444444444444444444444444444444444';
export const SECOND_TARGET: Address = '0x5555555555555555555555555555555555555555';

export const TOTAL_SUPPLY = 1000n;
export const START_CHECKPOINT = 100n;

export const TEST_CONFIG: GovernorConfig = {
  name: 'Test Governor',
  quorumVotes: 100n,
  proposalThreshold: 10n,
  proposalMaxOperations: 10,
  votingPeriod: 10n,
  proposalLifetime: 20n,
  token: '0x6666666666666666666666666666666666666666',
  chainId: 31337,
  verifyingContract: '0x7777777777777777777777777777777777777777',
};

export class RecordingExecutor implements ActionExecutor {
  readonly calls: ActionCall[] = [];
  /** Index (within a run) of the call that fails; undefined means none. */
  failAt: number | undefined;
  private run = 0;

  resetRun(): void {
    this.run = 0;
  }

  async invoke(call: ActionCall): Promise<ActionCallResult> {
    this.calls.push(call);
    const index = this.run++;
    if (index === this.failAt) return { ok: false, reason: 'execution reverted' };
    return { ok: true };
  }
}

export interface TestGovernor {
  engine: GovernanceEngine;
  clock: ManualClock;
  ledger: CheckpointLedger;
  executor: RecordingExecutor;
  sink: MemoryEventSink;
}

export async function createTestGovernor(
  overrides: Partial<GovernorConfig> = {},
  options: { verifier?: SignatureVerifier; startAt?: bigint } = {},
): Promise<TestGovernor> {
  const clock = new ManualClock(options.startAt ?? START_CHECKPOINT);
  const ledger = new CheckpointLedger(clock, TOTAL_SUPPLY);
  const executor = new RecordingExecutor();
  const sink = new MemoryEventSink();
  const engine = await GovernanceEngine.create(
    { ...TEST_CONFIG, ...overrides },
    { oracle: ledger, executor, verifier: options.verifier ?? new EcdsaSignatureVerifier(), clock, sink },
  );
  return { engine, clock, ledger, executor, sink };
}

/** Propose a single no-signature action to TARGET on behalf of PROPOSER. */
export function proposeOne(engine: GovernanceEngine, proposer: Address = PROPOSER): Promise<bigint> {
  return engine.propose(proposer, [TARGET], [''], ['0x'], 'Test proposal');
}
