/**
 * Wires the governor to its collaborators.
 *
 *   memory: in-process checkpoint ledger and a clock that ticks every
 *           MEMORY_CHECKPOINT_INTERVAL_MS; for local runs and demos.
 *   chain:  votes token and block height read over RPC_URL, actions sent
 *           from EXECUTOR_PRIVATE_KEY.
 */

import { readFileSync } from 'node:fs';
import { createPublicClient, createWalletClient, http, type Chain } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { zAddress, zUint } from '@quorum-governor/shared';
import { z } from 'zod';
import type { RuntimeConfig } from './config/governor.js';
import { EcdsaSignatureVerifier } from './governance/ballot.js';
import { GovernanceEngine } from './governance/engine.js';
import { InvalidConfigurationError } from './governance/errors.js';
import type { ActionExecutor, CheckpointClock, GovernorConfig } from './governance/types.js';
import { ChainClock } from './services/clock/chainClock.js';
import { ManualClock } from './services/clock/manualClock.js';
import { WalletActionExecutor } from './services/executor/walletActionExecutor.js';
import { CheckpointLedger } from './services/oracle/checkpointLedger.js';
import { ContractWeightOracle } from './services/oracle/contractWeightOracle.js';

const MemoryWeightsSchema = z.record(zUint);

export interface GovernanceRuntime {
  engine: GovernanceEngine;
  clock: CheckpointClock;
  mode: RuntimeConfig['mode'];
  stop(): void;
}

/** Memory-mode executor: accepts every call and logs it. */
const loggingExecutor: ActionExecutor = {
  async invoke(call) {
    console.log(`[executor:memory] ${call.target} value=${call.value} data=${call.data}`);
    return { ok: true };
  },
};

function readMemoryWeights(path: string): Array<[`0x${string}`, bigint]> {
  const parsed = MemoryWeightsSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  return Object.entries(parsed).map(([account, votes]): [`0x${string}`, bigint] => [zAddress.parse(account), votes]);
}

async function createMemoryRuntime(config: GovernorConfig, runtime: RuntimeConfig): Promise<GovernanceRuntime> {
  const clock = new ManualClock(0n);
  const ledger = new CheckpointLedger(clock, runtime.memoryTotalSupply);

  const weightsPath = process.env.MEMORY_WEIGHTS_PATH;
  if (weightsPath) {
    for (const [account, votes] of readMemoryWeights(weightsPath)) {
      await ledger.setVotes(account, votes);
    }
  }
  clock.advance();

  const engine = await GovernanceEngine.create(config, {
    oracle: ledger,
    executor: loggingExecutor,
    verifier: new EcdsaSignatureVerifier(),
    clock,
  });

  const timer = setInterval(() => clock.advance(), runtime.memoryCheckpointIntervalMs);
  timer.unref();

  return { engine, clock, mode: 'memory', stop: () => clearInterval(timer) };
}

async function createChainRuntime(config: GovernorConfig, runtime: RuntimeConfig): Promise<GovernanceRuntime> {
  const violations: string[] = [];
  if (!runtime.rpcUrl) violations.push('RPC_URL is required when GOVERNOR_RUNTIME=chain.');
  if (!runtime.executorPrivateKey) violations.push('EXECUTOR_PRIVATE_KEY is required when GOVERNOR_RUNTIME=chain.');
  if (!runtime.rpcUrl || !runtime.executorPrivateKey) {
    throw new InvalidConfigurationError(violations);
  }

  const chain: Chain = {
    id: config.chainId,
    name: config.name,
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
    rpcUrls: {
      default: { http: [runtime.rpcUrl] },
    },
  };

  const publicClient = createPublicClient({ chain, transport: http(runtime.rpcUrl) });
  const walletClient = createWalletClient({
    account: privateKeyToAccount(runtime.executorPrivateKey),
    chain,
    transport: http(runtime.rpcUrl),
  });

  const clock = new ChainClock(publicClient);
  const engine = await GovernanceEngine.create(config, {
    oracle: new ContractWeightOracle(publicClient, config.token),
    executor: new WalletActionExecutor(walletClient, publicClient),
    verifier: new EcdsaSignatureVerifier(),
    clock,
  });

  return { engine, clock, mode: 'chain', stop: () => {} };
}

export function createRuntime(config: GovernorConfig, runtime: RuntimeConfig): Promise<GovernanceRuntime> {
  return runtime.mode === 'chain' ? createChainRuntime(config, runtime) : createMemoryRuntime(config, runtime);
}
