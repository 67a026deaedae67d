/**
 * HTTP surface under /api/governance, served from an in-process listener.
 */

import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../src/app.js';
import { CALLER_HEADER } from '../src/middleware/caller.js';
import { OTHER_VOTER, PROPOSER, TARGET, TEST_CONFIG, VOTER, createTestGovernor, type TestGovernor } from './fixtures.js';

let gov: TestGovernor;
let server: Server;
let baseUrl: string;

beforeEach(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  gov = await createTestGovernor();
  await gov.ledger.setVotes(PROPOSER, 11n);
  await gov.ledger.setVotes(VOTER, 150n);
  gov.clock.advance();

  const app = createApp({ engine: gov.engine, clock: gov.clock, mode: 'memory', stop: () => {} });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP listener');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

async function call(method: string, path: string, body?: unknown, caller?: string) {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (caller) headers[CALLER_HEADER] = caller;
  const res = await fetch(`${baseUrl}/api/governance${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const json: unknown = await res.json();
  return { status: res.status, json };
}

const PROPOSAL = { targets: [TARGET], signatures: [''], calldatas: ['0x'], description: 'Test proposal' };

describe('governance API', () => {
  it('serves the governor configuration', async () => {
    const { status, json } = await call('GET', '/config');
    expect(status).toBe(200);
    expect(json).toEqual({
      name: 'Test Governor',
      quorumVotes: '100',
      proposalThreshold: '10',
      proposalMaxOperations: 10,
      votingDelay: '1',
      votingPeriod: '10',
      proposalLifetime: '20',
      token: TEST_CONFIG.token,
      chainId: 31337,
      verifyingContract: TEST_CONFIG.verifyingContract,
      proposalCount: '0',
    });
  });

  it('requires a caller to propose', async () => {
    const { status, json } = await call('POST', '/proposals', PROPOSAL);
    expect(status).toBe(401);
    expect(json).toMatchObject({ code: 'UNAUTHENTICATED' });
  });

  it('runs a proposal from creation to execution', async () => {
    const created = await call('POST', '/proposals', PROPOSAL, PROPOSER);
    expect(created).toEqual({ status: 201, json: { proposalId: '1' } });

    const pending = await call('GET', '/proposals/1');
    expect(pending.json).toMatchObject({ id: '1', proposer: PROPOSER, startBlock: '102', state: 'Pending' });

    gov.clock.advance(2n);
    const vote = await call('POST', '/proposals/1/votes', { support: true }, VOTER);
    expect(vote).toEqual({
      status: 201,
      json: { proposalId: '1', voter: VOTER, hasVoted: true, support: true, votes: '150' },
    });

    const again = await call('POST', '/proposals/1/votes', { support: true }, VOTER);
    expect(again.status).toBe(409);
    expect(again.json).toMatchObject({ code: 'DUPLICATE_VOTE' });

    gov.clock.advance(TEST_CONFIG.votingPeriod);
    const executed = await call('POST', '/proposals/1/execute', {});
    expect(executed).toEqual({ status: 200, json: { proposalId: '1', state: 'Executed' } });

    const receipt = await call('GET', `/proposals/1/receipts/${VOTER}`);
    expect(receipt.json).toMatchObject({ hasVoted: true, votes: '150' });

    const latest = await call('GET', `/proposers/${PROPOSER}/latest`);
    expect(latest.json).toEqual({ proposer: PROPOSER, latestProposalId: '1' });
  });

  it('maps governor rejections to status codes', async () => {
    const malformed = await call('POST', '/proposals', { ...PROPOSAL, signatures: ['', ''] }, PROPOSER);
    expect(malformed.status).toBe(400);
    expect(malformed.json).toMatchObject({ code: 'MALFORMED_PROPOSAL' });

    const missing = await call('GET', '/proposals/9/state');
    expect(missing.status).toBe(404);
    expect(missing.json).toMatchObject({ code: 'INVALID_PROPOSAL_ID' });

    const weak = await call('POST', '/proposals', PROPOSAL, OTHER_VOTER);
    expect(weak.status).toBe(403);
    expect(weak.json).toMatchObject({ code: 'INSUFFICIENT_WEIGHT' });
  });

  it('rejects malformed requests before they reach the governor', async () => {
    const badId = await call('GET', '/proposals/abc');
    expect(badId.status).toBe(400);
    expect(badId.json).toMatchObject({ error: 'Invalid proposal id', code: 'VALIDATION' });

    const badVote = await call('POST', '/proposals/1/votes', { support: 'yes' }, VOTER);
    expect(badVote.status).toBe(400);
    expect(badVote.json).toMatchObject({ error: 'Invalid vote', code: 'VALIDATION' });
  });
});
