export interface LedgerEvent {
  eventId: string;
  sequenceNumber: number;
  blockNumber: number;
  timestamp: string; // ISO string, excluded from hash
  eventType: LedgerEventType;
  actorId?: string;
  payload: Record<string, unknown>; // amounts as decimal strings
  prevEventHash: string;
  eventHash: string;
}

export type LedgerEventType =
  | 'REWARDS_UPDATED'
  | 'REWARDS_TOGGLED'
  | 'PROTOCOL_FEE_UPDATED'
  | 'PROTOCOL_FEE_RECIPIENT_UPDATED'
  | 'TRANSFER'
  | 'COLLABORATORS_LINKED';

export const LEDGER_EVENT_TYPES: readonly LedgerEventType[] = [
  'REWARDS_UPDATED',
  'REWARDS_TOGGLED',
  'PROTOCOL_FEE_UPDATED',
  'PROTOCOL_FEE_RECIPIENT_UPDATED',
  'TRANSFER',
  'COLLABORATORS_LINKED',
];

export function isLedgerEventType(value: unknown): value is LedgerEventType {
  return LEDGER_EVENT_TYPES.some(t => t === value);
}

/**
 * Position of the last emitted event (-1 before the first one)
 */
export interface ChainHead {
  sequenceNumber: number;
  eventHash: string;
}

export const GENESIS_HASH = 'GENESIS';

export const GENESIS_HEAD: ChainHead = { sequenceNumber: -1, eventHash: GENESIS_HASH };
