// ─── Event Log Types ─────────────────────────────────────

/**
 * Structured log event persisted for every emitted governance record
 * and for failures worth keeping next to them.
 */
export type LogEventType =
  | 'PROPOSAL_CREATED'
  | 'VOTE_CAST'
  | 'PROPOSAL_CANCELED'
  | 'PROPOSAL_EXECUTED'
  | 'PROPOSAL_EXECUTE_FAIL'
  | 'ERROR';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface LogEvent {
  id: string;
  timestamp: number; // ms
  type: LogEventType;
  proposalId?: string;
  payload: unknown;
  level: LogLevel;
}
