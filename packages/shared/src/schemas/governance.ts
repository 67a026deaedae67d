import { z } from 'zod';
import { zAddress, zHexData, zSignature, zUint } from './validators.js';

// ─── Governance Zod Schemas ─────────────────────────────

/**
 * Body of a propose request. List lengths are not refined
 * here: mismatches surface as the governor's MalformedProposal.
 */
export const ProposeRequestSchema = z.object({
  targets: z.array(zAddress),
  signatures: z.array(z.string()),
  calldatas: z.array(zHexData),
  description: z.string(),
});

export const CastVoteRequestSchema = z.object({
  support: z.boolean(),
});

export const CastVoteBySigRequestSchema = z.object({
  support: z.boolean(),
  signature: zSignature,
});

export const ExecuteRequestSchema = z.object({
  value: zUint.optional(),
});

/** Path parameter for a proposal id. */
export const ProposalIdParamSchema = zUint;

/**
 * Raw governor configuration, as read from deployment JSON or environment.
 * Bounds relative to total supply are enforced by the governor itself.
 */
export const GovernorConfigSchema = z.object({
  name: z.string().min(1),
  quorumVotes: zUint,
  proposalThreshold: zUint,
  proposalMaxOperations: z.coerce.number().int(),
  votingPeriod: zUint,
  proposalLifetime: zUint,
  token: zAddress,
  chainId: z.coerce.number().int().positive(),
  verifyingContract: zAddress,
});
