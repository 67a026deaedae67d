#!/usr/bin/env node
// ─── Integration Health Harness ──────────────────────────
// Checks a running governor's read endpoints against the expected shapes.
//
// Usage:
//   BACKEND_URL=http://localhost:4000 npx tsx scripts/healthcheck.ts
//
// Exit code 0 = all passed, non-zero = failures detected.

import { z } from 'zod';

const BACKEND_URL = process.env.BACKEND_URL || 'http://localhost:4000';
const TIMEOUT_MS = 10_000;

// ─── Inline schemas (self-contained, no build dependency) ──

const DecimalSchema = z.string().regex(/^\d+$/);
const AddressSchema = z.string().regex(/^0x[0-9a-fA-F]{40}$/);

const HealthSchema = z.object({
  status: z.enum(['ok', 'degraded']),
  service: z.string(),
  timestamp: z.string(),
  mode: z.enum(['memory', 'chain']),
  checkpoint: z.object({ ok: z.boolean() }).passthrough(),
});

const GovernorConfigViewSchema = z.object({
  name: z.string(),
  quorumVotes: DecimalSchema,
  proposalThreshold: DecimalSchema,
  proposalMaxOperations: z.number().int(),
  votingDelay: DecimalSchema,
  votingPeriod: DecimalSchema,
  proposalLifetime: DecimalSchema,
  token: AddressSchema,
  chainId: z.number().int(),
  verifyingContract: AddressSchema,
  proposalCount: DecimalSchema,
});

const ProposalViewSchema = z.object({
  id: DecimalSchema,
  proposer: AddressSchema,
  targets: z.array(AddressSchema),
  signatures: z.array(z.string()),
  calldatas: z.array(z.string()),
  startBlock: DecimalSchema,
  endBlock: DecimalSchema,
  lifetimeEndBlock: DecimalSchema,
  forVotes: DecimalSchema,
  againstVotes: DecimalSchema,
  canceled: z.boolean(),
  executed: z.boolean(),
  state: z.enum(['Pending', 'Active', 'Canceled', 'Defeated', 'Succeeded', 'Expired', 'Executed', 'Null']),
});

const LogEventSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  type: z.string(),
  proposalId: z.string().optional(),
  payload: z.unknown(),
  level: z.enum(['INFO', 'WARN', 'ERROR']),
});

// ─── Test runner ─────────────────────────────────────────

interface TestResult {
  name: string;
  endpoint: string;
  passed: boolean;
  detail?: string;
}

const results: TestResult[] = [];

async function fetchJSON(path: string): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), TIMEOUT_MS);
  try {
    const res = await fetch(`${BACKEND_URL}${path}`, { signal: controller.signal });
    if (!res.ok) throw new Error(`HTTP ${res.status}: ${await res.text()}`);
    return await res.json();
  } finally {
    clearTimeout(timer);
  }
}

async function runTest(name: string, endpoint: string, fn: () => Promise<void>) {
  try {
    await fn();
    results.push({ name, endpoint, passed: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    results.push({ name, endpoint, passed: false, detail: msg });
  }
}

// ─── Tests ───────────────────────────────────────────────

async function main() {
  console.log(`\n🔍 Governor Integration Health Check`);
  console.log(`   Backend: ${BACKEND_URL}\n`);

  await runTest('Health endpoint', 'GET /health', async () => {
    HealthSchema.parse(await fetchJSON('/health'));
  });

  let proposalCount = 0n;
  await runTest('Governor config', 'GET /api/governance/config', async () => {
    const config = GovernorConfigViewSchema.parse(await fetchJSON('/api/governance/config'));
    proposalCount = BigInt(config.proposalCount);
  });

  if (proposalCount > 0n) {
    await runTest('Latest proposal', `GET /api/governance/proposals/${proposalCount}`, async () => {
      ProposalViewSchema.parse(await fetchJSON(`/api/governance/proposals/${proposalCount}`));
    });
  }

  await runTest('Event log', 'GET /api/governance/events', async () => {
    z.object({ events: z.array(LogEventSchema) }).parse(await fetchJSON('/api/governance/events?limit=5'));
  });

  // ─── Report ──────────────────────────────────────────

  console.log('─'.repeat(60));
  let failed = 0;
  for (const r of results) {
    const icon = r.passed ? '✅' : '❌';
    console.log(`  ${icon}  ${r.name.padEnd(30)} ${r.endpoint}`);
    if (!r.passed && r.detail) {
      // Truncate long Zod errors
      const lines = r.detail.split('\n').slice(0, 5).join('\n    ');
      console.log(`       ${lines}`);
      failed++;
    }
  }
  console.log('─'.repeat(60));
  console.log(`\n  Total: ${results.length}  Passed: ${results.length - failed}  Failed: ${failed}\n`);

  if (failed > 0) {
    console.log('❌ Integration health check FAILED\n');
    process.exit(1);
  } else {
    console.log('✅ All integration checks PASSED\n');
    process.exit(0);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(2);
});
