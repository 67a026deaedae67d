import { describe, it, expect } from 'vitest';
import { LogEventSchema } from '@quorum-governor/shared';
import { MemoryEventSink, toLogEvent } from '../src/storage/eventSink.js';
import { serializeLogEvent } from '../src/storage/logStore.js';
import { PROPOSER, VOTER } from './fixtures.js';

describe('toLogEvent', () => {
  it('tags vote records with their proposal id', () => {
    const event = toLogEvent({ type: 'VoteCast', voter: VOTER, proposalId: 3n, support: true, votes: 150n });
    expect(event.type).toBe('VOTE_CAST');
    expect(event.proposalId).toBe('3');
    expect(event.level).toBe('INFO');
  });

  it('serializes weights as decimal strings', () => {
    const event = toLogEvent({ type: 'ProposalExecuted', id: 2n, value: 0n });
    const line: unknown = JSON.parse(serializeLogEvent(event));

    expect(LogEventSchema.safeParse(line).success).toBe(true);
    expect(line).toMatchObject({
      type: 'PROPOSAL_EXECUTED',
      proposalId: '2',
      payload: { type: 'ProposalExecuted', id: '2', value: '0' },
    });
  });
});

describe('MemoryEventSink', () => {
  it('filters records by type in emission order', () => {
    const sink = new MemoryEventSink();
    sink.record({ type: 'ProposalCanceled', id: 1n });
    sink.record({ type: 'VoteCast', voter: PROPOSER, proposalId: 1n, support: false, votes: 11n });
    sink.record({ type: 'ProposalCanceled', id: 2n });

    expect(sink.ofType('ProposalCanceled').map((e) => e.id)).toEqual([1n, 2n]);
    expect(sink.events).toHaveLength(3);
  });
});
