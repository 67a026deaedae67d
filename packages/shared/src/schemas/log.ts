import { z } from 'zod';

// ─── Event Log Zod Schemas ──────────────────────────────

export const LogEventTypeSchema = z.enum([
  'PROPOSAL_CREATED', 'VOTE_CAST', 'PROPOSAL_CANCELED', 'PROPOSAL_EXECUTED', 'PROPOSAL_EXECUTE_FAIL',
  'ERROR',
]);

export const LogLevelSchema = z.enum(['INFO', 'WARN', 'ERROR']);

export const LogEventSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  type: LogEventTypeSchema,
  proposalId: z.string().optional(),
  payload: z.unknown(),
  level: LogLevelSchema,
});
