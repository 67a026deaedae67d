import type { LogEvent, LogEventType } from '@quorum-governor/shared';
import type { GovernanceEvent, GovernanceEventSink } from '../governance/types.js';
import { appendLog, createLogEvent } from './logStore.js';

const LOG_TYPES: Record<GovernanceEvent['type'], LogEventType> = {
  ProposalCreated: 'PROPOSAL_CREATED',
  VoteCast: 'VOTE_CAST',
  ProposalCanceled: 'PROPOSAL_CANCELED',
  ProposalExecuted: 'PROPOSAL_EXECUTED',
};

function proposalIdOf(event: GovernanceEvent): bigint {
  return event.type === 'VoteCast' ? event.proposalId : event.id;
}

/** Map an emitted governance record onto a log event. */
export function toLogEvent(event: GovernanceEvent): LogEvent {
  return createLogEvent(LOG_TYPES[event.type], event, 'INFO', proposalIdOf(event).toString());
}

/** Appends every emitted record to the JSONL log store. */
export const logStoreSink: GovernanceEventSink = {
  record(event) {
    appendLog(toLogEvent(event));
  },
};

/** Keeps records in memory, in emission order. */
export class MemoryEventSink implements GovernanceEventSink {
  readonly events: GovernanceEvent[] = [];

  record(event: GovernanceEvent): void {
    this.events.push(event);
  }

  ofType<T extends GovernanceEvent['type']>(type: T): Extract<GovernanceEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<GovernanceEvent, { type: T }> => e.type === type);
  }
}
