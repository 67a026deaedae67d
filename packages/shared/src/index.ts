// ─── @quorum-governor/shared barrel export ───────────────

// Types
export type {
  Address,
  Hex,
  ProposalState,
  ProposalActionsView,
  ProposalView,
  ReceiptView,
  GovernorConfigView,
} from './types/governance.js';

export type {
  LogEventType,
  LogLevel,
  LogEvent,
} from './types/log.js';

// Schemas
export {
  ProposeRequestSchema,
  CastVoteRequestSchema,
  CastVoteBySigRequestSchema,
  ExecuteRequestSchema,
  ProposalIdParamSchema,
  GovernorConfigSchema,
} from './schemas/governance.js';

export {
  LogEventTypeSchema,
  LogLevelSchema,
  LogEventSchema,
} from './schemas/log.js';

// ─── Validators ──────────────────────────────────────────
export {
  zAddress,
  zHexData,
  zSignature,
  zUint,
} from './schemas/validators.js';

// Constants
export * from './constants/index.js';
