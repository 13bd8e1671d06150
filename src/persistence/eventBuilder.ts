import * as crypto from 'crypto';
import { ChainHead, LedgerEvent, LedgerEventType } from './eventTypes';
import { canonicalStringify, computeHash } from './canonicalSerialize';

/**
 * Compute the hash of a ledger event (timestamp excluded).
 */
export function computeEventHash(event: Omit<LedgerEvent, 'eventHash'>): string {
  return computeHash(
    canonicalStringify({
      eventId: event.eventId,
      sequenceNumber: event.sequenceNumber,
      blockNumber: event.blockNumber,
      eventType: event.eventType,
      actorId: event.actorId,
      payload: event.payload,
      prevEventHash: event.prevEventHash,
    })
  );
}

export interface EventDraft {
  eventType: LedgerEventType;
  payload: Record<string, unknown>;
  actorId?: string;
  blockNumber: number;
  timestamp: string;
  eventId?: string;
}

/**
 * Append one event to the chain that ends at `head`.
 */
export function buildLedgerEvent(
  head: ChainHead,
  draft: EventDraft
): { event: LedgerEvent; head: ChainHead } {
  const partial: Omit<LedgerEvent, 'eventHash'> = {
    eventId: draft.eventId ?? crypto.randomUUID(),
    sequenceNumber: head.sequenceNumber + 1,
    blockNumber: draft.blockNumber,
    timestamp: draft.timestamp,
    eventType: draft.eventType,
    actorId: draft.actorId,
    payload: draft.payload,
    prevEventHash: head.eventHash,
  };
  const event: LedgerEvent = { ...partial, eventHash: computeEventHash(partial) };
  return { event, head: { sequenceNumber: event.sequenceNumber, eventHash: event.eventHash } };
}

/**
 * Verify hashes, links and sequence numbers of a contiguous run of events.
 */
export function verifyHashChain(
  events: LedgerEvent[],
  expectedPrevHash?: string
): { valid: boolean; brokenAt?: number; error?: string } {
  if (events.length === 0) {
    return { valid: true };
  }

  if (expectedPrevHash !== undefined && events[0].prevEventHash !== expectedPrevHash) {
    return {
      valid: false,
      brokenAt: 0,
      error: `First event prevEventHash mismatch: expected ${expectedPrevHash}, got ${events[0].prevEventHash}`,
    };
  }

  for (let i = 0; i < events.length; i++) {
    const { eventHash, ...rest } = events[i];
    const expectedHash = computeEventHash(rest);
    if (eventHash !== expectedHash) {
      return {
        valid: false,
        brokenAt: i,
        error: `Event ${i} hash mismatch: expected ${expectedHash}, got ${eventHash}`,
      };
    }

    if (i === 0) continue;
    const prev = events[i - 1];
    if (events[i].prevEventHash !== prev.eventHash) {
      return {
        valid: false,
        brokenAt: i,
        error: `Event ${i} is not linked to event ${i - 1}`,
      };
    }
    if (events[i].sequenceNumber !== prev.sequenceNumber + 1) {
      return {
        valid: false,
        brokenAt: i,
        error: `Event ${i} has sequence ${events[i].sequenceNumber}, expected ${prev.sequenceNumber + 1}`,
      };
    }
  }

  return { valid: true };
}
