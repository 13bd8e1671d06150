import { buildLedgerEvent, computeEventHash, verifyHashChain, EventDraft } from '../eventBuilder';
import { GENESIS_HEAD, LedgerEvent } from '../eventTypes';

function draft(overrides: Partial<EventDraft> = {}): EventDraft {
  return {
    eventType: 'TRANSFER',
    actorId: 'alice',
    payload: { from: 'alice', to: 'bob', amount: '5' },
    blockNumber: 3,
    timestamp: '2026-01-28T12:00:00.000Z',
    ...overrides,
  };
}

function buildChain(length: number): LedgerEvent[] {
  const events: LedgerEvent[] = [];
  let head = GENESIS_HEAD;
  for (let i = 0; i < length; i++) {
    const built = buildLedgerEvent(head, draft({ eventId: `evt-${i}` }));
    events.push(built.event);
    head = built.head;
  }
  return events;
}

describe('buildLedgerEvent', () => {
  it('should start the chain at GENESIS', () => {
    const { event, head } = buildLedgerEvent(GENESIS_HEAD, draft({ eventId: 'evt-0' }));

    expect(event.sequenceNumber).toBe(0);
    expect(event.prevEventHash).toBe('GENESIS');
    expect(event.eventId).toBe('evt-0');
    expect(event.eventHash).toMatch(/^[0-9a-f]{64}$/);
    expect(head).toEqual({ sequenceNumber: 0, eventHash: event.eventHash });
  });

  it('should hash every field except the timestamp', () => {
    const a = buildLedgerEvent(GENESIS_HEAD, draft({ eventId: 'evt-0' })).event;
    const b = buildLedgerEvent(GENESIS_HEAD, draft({ eventId: 'evt-0', timestamp: '2030-01-01T00:00:00.000Z' })).event;
    const c = buildLedgerEvent(GENESIS_HEAD, draft({ eventId: 'evt-0', payload: { amount: '6' } })).event;

    expect(b.eventHash).toBe(a.eventHash);
    expect(c.eventHash).not.toBe(a.eventHash);
  });

  it('should generate an event id when none is given', () => {
    const { event } = buildLedgerEvent(GENESIS_HEAD, draft());
    expect(event.eventId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should agree with computeEventHash', () => {
    const { event } = buildLedgerEvent(GENESIS_HEAD, draft({ eventId: 'evt-0' }));
    const { eventHash, ...rest } = event;
    expect(computeEventHash(rest)).toBe(eventHash);
  });
});

describe('verifyHashChain', () => {
  it('should accept an intact chain', () => {
    expect(verifyHashChain(buildChain(3), 'GENESIS')).toEqual({ valid: true });
    expect(verifyHashChain([])).toEqual({ valid: true });
  });

  it('should locate a tampered event', () => {
    const events = buildChain(3);
    events[1] = { ...events[1], payload: { from: 'alice', to: 'mallory', amount: '5' } };

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.brokenAt).toBe(1);
    expect(result.error).toMatch(/^Event 1 hash mismatch/);
  });

  it('should detect a broken link', () => {
    const [first] = buildChain(1);
    const orphan = buildLedgerEvent(GENESIS_HEAD, draft({ eventId: 'evt-x' })).event;

    expect(verifyHashChain([first, orphan])).toEqual({
      valid: false,
      brokenAt: 1,
      error: 'Event 1 is not linked to event 0',
    });
  });

  it('should detect a sequence gap', () => {
    const [first] = buildChain(1);
    const skipped = buildLedgerEvent(
      { sequenceNumber: 5, eventHash: first.eventHash },
      draft({ eventId: 'evt-6' })
    ).event;

    expect(verifyHashChain([first, skipped])).toEqual({
      valid: false,
      brokenAt: 1,
      error: 'Event 1 has sequence 6, expected 1',
    });
  });

  it('should check the first link against the expected predecessor', () => {
    const result = verifyHashChain(buildChain(1), 'other');
    expect(result.brokenAt).toBe(0);
    expect(result.error).toBe('First event prevEventHash mismatch: expected other, got GENESIS');
  });
});
