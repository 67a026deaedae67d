/**
 * Governor configuration.
 * Loads from deployments/governor.json (or GOVERNOR_CONFIG_PATH) with GOVERNOR_* env overrides,
 * then shapes it with the shared GovernorConfigSchema. Bounds that depend on the token's total
 * supply are checked later, when the governor is created.
 *
 * Strict mode (GOVERNOR_STRICT=true):
 *   Fail-closed on placeholder addresses: rejects a zero token or verifying contract
 *   at load time. Intended for production / CI. Local dev runs without it.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { GovernorConfigSchema, ZERO_ADDRESS, zUint } from '@quorum-governor/shared';
import { InvalidConfigurationError } from '../governance/errors.js';
import type { GovernorConfig } from '../governance/types.js';

type Env = Record<string, string | undefined>;

export type RuntimeMode = 'memory' | 'chain';

export interface RuntimeConfig {
  mode: RuntimeMode;
  rpcUrl?: string;
  executorPrivateKey?: `0x${string}`;
  /** memory mode: total supply of the in-process ledger. */
  memoryTotalSupply: bigint;
  /** memory mode: milliseconds between clock ticks. */
  memoryCheckpointIntervalMs: number;
}

const MemoryRuntimeSchema = z.object({
  MEMORY_TOTAL_SUPPLY: zUint.default('10000000'),
  MEMORY_CHECKPOINT_INTERVAL_MS: z.coerce.number().int().positive().default(12_000),
});

const ENV_KEYS: Record<keyof GovernorConfig, string> = {
  name: 'GOVERNOR_NAME',
  quorumVotes: 'GOVERNOR_QUORUM_VOTES',
  proposalThreshold: 'GOVERNOR_PROPOSAL_THRESHOLD',
  proposalMaxOperations: 'GOVERNOR_PROPOSAL_MAX_OPERATIONS',
  votingPeriod: 'GOVERNOR_VOTING_PERIOD',
  proposalLifetime: 'GOVERNOR_PROPOSAL_LIFETIME',
  token: 'GOVERNOR_TOKEN_ADDRESS',
  chainId: 'GOVERNOR_CHAIN_ID',
  verifyingContract: 'GOVERNOR_VERIFYING_CONTRACT',
};

/** Whether GOVERNOR_STRICT=true is set in the environment. */
export function isStrictMode(env: Env = process.env): boolean {
  return env.GOVERNOR_STRICT === 'true';
}

function envString(env: Env, name: string): string | undefined {
  const value = env[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readConfigFile(env: Env): Record<string, unknown> {
  const candidates = env.GOVERNOR_CONFIG_PATH
    ? [env.GOVERNOR_CONFIG_PATH]
    : [
        resolve(process.cwd(), 'deployments', 'governor.json'),
        resolve(process.cwd(), '..', '..', 'deployments', 'governor.json'),
      ];
  const path = candidates.find((p) => existsSync(p));
  if (!path) return {};

  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new InvalidConfigurationError([`${path} must contain a JSON object.`]);
  }
  return { ...raw };
}

function validateStrict(config: GovernorConfig): void {
  const violations: string[] = [];
  if (config.token === ZERO_ADDRESS) {
    violations.push(`token is the zero address. Set ${ENV_KEYS.token} or update deployments/governor.json.`);
  }
  if (config.verifyingContract === ZERO_ADDRESS) {
    violations.push(
      `verifyingContract is the zero address. Set ${ENV_KEYS.verifyingContract} or update deployments/governor.json.`,
    );
  }
  if (violations.length > 0) {
    throw new InvalidConfigurationError(violations);
  }
}

/**
 * Read and shape the governor configuration. Environment values win over
 * the deployment file. Throws InvalidConfigurationError listing every field
 * that is missing or malformed.
 */
export function loadGovernorConfig(env: Env = process.env): GovernorConfig {
  const merged: Record<string, unknown> = readConfigFile(env);
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = envString(env, key);
    if (value !== undefined) merged[field] = value;
  }

  const parsed = GovernorConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const config: GovernorConfig = parsed.data;
  if (isStrictMode(env)) {
    validateStrict(config);
  }
  return config;
}

/** Runtime settings. Throws InvalidConfigurationError on a malformed memory-mode value. */
export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const mode: RuntimeMode = env.GOVERNOR_RUNTIME === 'chain' ? 'chain' : 'memory';
  const key = envString(env, 'EXECUTOR_PRIVATE_KEY');

  const memory = MemoryRuntimeSchema.safeParse({
    MEMORY_TOTAL_SUPPLY: envString(env, 'MEMORY_TOTAL_SUPPLY'),
    MEMORY_CHECKPOINT_INTERVAL_MS: envString(env, 'MEMORY_CHECKPOINT_INTERVAL_MS'),
  });
  if (!memory.success) {
    throw new InvalidConfigurationError(
      memory.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return {
    mode,
    rpcUrl: envString(env, 'RPC_URL'),
    executorPrivateKey: key === undefined ? undefined : key.startsWith('0x') ? `0x${key.slice(2)}` : `0x${key}`,
    memoryTotalSupply: memory.data.MEMORY_TOTAL_SUPPLY,
    memoryCheckpointIntervalMs: memory.data.MEMORY_CHECKPOINT_INTERVAL_MS,
  };
}
