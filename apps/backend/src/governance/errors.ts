/**
 * Governance error taxonomy. Every precondition failure of the governor is a
 * GovernanceError raised before any state is written.
 */

export const GovernanceErrorCode = {
  InvalidConfiguration: 'INVALID_CONFIGURATION',
  InsufficientWeight: 'INSUFFICIENT_WEIGHT',
  MalformedProposal: 'MALFORMED_PROPOSAL',
  ConflictingProposal: 'CONFLICTING_PROPOSAL',
  InvalidProposalId: 'INVALID_PROPOSAL_ID',
  InvalidState: 'INVALID_STATE',
  DuplicateVote: 'DUPLICATE_VOTE',
  InvalidSignature: 'INVALID_SIGNATURE',
  ArithmeticOverflow: 'ARITHMETIC_OVERFLOW',
  ArithmeticUnderflow: 'ARITHMETIC_UNDERFLOW',
  ActionExecutionFailed: 'ACTION_EXECUTION_FAILED',
} as const;

export type GovernanceErrorCode = typeof GovernanceErrorCode[keyof typeof GovernanceErrorCode];

export class GovernanceError extends Error {
  constructor(
    public readonly code: GovernanceErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GovernanceError';
  }
}

/**
 * Thrown by the governor factory with every bound violation at once, so a
 * misconfigured deployment can be fixed in one pass.
 */
export class InvalidConfigurationError extends GovernanceError {
  public readonly violations: string[];

  constructor(violations: string[]) {
    const header = `Governor configuration rejected (${violations.length} violation(s)):`;
    const body = violations.map((v, i) => `  ${i + 1}. ${v}`).join('\n');
    super(GovernanceErrorCode.InvalidConfiguration, `${header}\n${body}`, { violations });
    this.name = 'InvalidConfigurationError';
    this.violations = violations;
  }
}

export function isGovernanceError(err: unknown): err is GovernanceError {
  return err instanceof GovernanceError;
}
