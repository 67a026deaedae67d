import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createRuntime, type GovernanceRuntime } from '../src/runtime.js';
import { InvalidConfigurationError } from '../src/governance/errors.js';
import { TARGET, TEST_CONFIG } from './fixtures.js';

const WEIGHTS_PATH = fileURLToPath(new URL('../../../deployments/memory-weights.example.json', import.meta.url));

let runtime: GovernanceRuntime | undefined;

afterEach(() => {
  runtime?.stop();
  runtime = undefined;
  vi.unstubAllEnvs();
});

describe('createRuntime', () => {
  it('seeds the memory ledger from the weights file', async () => {
    vi.stubEnv('MEMORY_WEIGHTS_PATH', WEIGHTS_PATH);
    runtime = await createRuntime(TEST_CONFIG, { mode: 'memory', memoryTotalSupply: 10_000_000n, memoryCheckpointIntervalMs: 12_000 });

    expect(runtime.mode).toBe('memory');
    expect(await runtime.clock.current()).toBe(1n);

    const id = await runtime.engine.propose(
      '0x1111111111111111111111111111111111111111',
      [TARGET],
      [''],
      ['0x'],
      'Seeded proposer',
    );
    expect(id).toBe(1n);
  });

  it('refuses the chain runtime without an RPC endpoint and signer', async () => {
    await expect(createRuntime(TEST_CONFIG, { mode: 'chain', memoryTotalSupply: 0n, memoryCheckpointIntervalMs: 12_000 })).rejects.toMatchObject({
      violations: [
        'RPC_URL is required when GOVERNOR_RUNTIME=chain.',
        'EXECUTOR_PRIVATE_KEY is required when GOVERNOR_RUNTIME=chain.',
      ],
    });
    await expect(createRuntime(TEST_CONFIG, { mode: 'chain', memoryTotalSupply: 0n, memoryCheckpointIntervalMs: 12_000 })).rejects.toBeInstanceOf(
      InvalidConfigurationError,
    );
  });
});
