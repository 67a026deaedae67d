import { describe, it, expect } from 'vitest';
import { ProposeRequestSchema } from '@quorum-governor/shared';
import { GovernanceError, GovernanceErrorCode, InvalidConfigurationError } from '../src/governance/errors.js';
import { toHttpError, validationError } from '../src/routes/httpErrors.js';

describe('toHttpError', () => {
  it('maps governance errors by code', () => {
    expect(toHttpError(new GovernanceError(GovernanceErrorCode.DuplicateVote, 'Voter already voted'))).toEqual({
      status: 409,
      body: { error: 'Voter already voted', code: 'DUPLICATE_VOTE' },
    });
    expect(
      toHttpError(new GovernanceError(GovernanceErrorCode.InvalidProposalId, 'Invalid proposal id', { proposalId: '9' })),
    ).toEqual({
      status: 404,
      body: { error: 'Invalid proposal id', code: 'INVALID_PROPOSAL_ID', details: { proposalId: '9' } },
    });
  });

  it('keeps configuration violations in the details', () => {
    const { status, body } = toHttpError(new InvalidConfigurationError(['name is empty.']));
    expect(status).toBe(500);
    expect(body.details).toEqual({ violations: ['name is empty.'] });
  });

  it('hides unexpected errors', () => {
    expect(toHttpError(new Error('database exploded'))).toEqual({
      status: 500,
      body: { error: 'Internal error', code: 'SERVER_ERROR' },
    });
  });
});

describe('validationError', () => {
  it('reports field errors with status 400', () => {
    const parsed = ProposeRequestSchema.safeParse({ targets: [], signatures: [], calldatas: [] });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const { status, body } = validationError('proposal', parsed.error);
    expect(status).toBe(400);
    expect(body.error).toBe('Invalid proposal');
    expect(body.code).toBe('VALIDATION');
    expect(body.details).toEqual({ formErrors: [], fieldErrors: { description: ['Required'] } });
  });
});
