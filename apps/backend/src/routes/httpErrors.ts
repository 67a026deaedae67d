import type { ZodError } from 'zod';
import { GovernanceErrorCode, isGovernanceError } from '../governance/errors.js';

export interface HttpErrorBody {
  error: string;
  code: string;
  details?: unknown;
}

export interface HttpError {
  status: number;
  body: HttpErrorBody;
}

const STATUS_BY_CODE: Record<GovernanceErrorCode, number> = {
  [GovernanceErrorCode.InvalidConfiguration]: 500,
  [GovernanceErrorCode.InsufficientWeight]: 403,
  [GovernanceErrorCode.MalformedProposal]: 400,
  [GovernanceErrorCode.ConflictingProposal]: 409,
  [GovernanceErrorCode.InvalidProposalId]: 404,
  [GovernanceErrorCode.InvalidState]: 409,
  [GovernanceErrorCode.DuplicateVote]: 409,
  [GovernanceErrorCode.InvalidSignature]: 403,
  [GovernanceErrorCode.ArithmeticOverflow]: 422,
  [GovernanceErrorCode.ArithmeticUnderflow]: 422,
  [GovernanceErrorCode.ActionExecutionFailed]: 502,
};

export function validationError(what: string, error: ZodError): HttpError {
  return {
    status: 400,
    body: { error: `Invalid ${what}`, code: 'VALIDATION', details: error.flatten() },
  };
}

/** Map a thrown value onto a response. Unknown errors become a 500 without details. */
export function toHttpError(err: unknown): HttpError {
  if (isGovernanceError(err)) {
    return {
      status: STATUS_BY_CODE[err.code],
      body: {
        error: err.message,
        code: err.code,
        ...(err.details === undefined ? {} : { details: err.details }),
      },
    };
  }
  return { status: 500, body: { error: 'Internal error', code: 'SERVER_ERROR' } };
}
