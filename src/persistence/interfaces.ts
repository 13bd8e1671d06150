import { LedgerEvent, LedgerEventType } from './eventTypes';
import { LedgerGlobals } from '../services/serviceTypes';
import { CheckpointRow } from '../checkpointLedger';
import { PrincipalRow } from '../services/principalBook';

export interface BlockRange {
  from: number;
  to: number;
}

export interface IEventStore {
  append(events: LedgerEvent[]): Promise<void>;
  queryByType(eventType: LedgerEventType, blockRange?: BlockRange): Promise<LedgerEvent[]>;
  queryByActor(actorId: string, blockRange?: BlockRange): Promise<LedgerEvent[]>;
  listFrom(sequenceNumber: number, limit?: number): Promise<LedgerEvent[]>;
  getLastEvent(): Promise<LedgerEvent | undefined>;
}

// ── Ledger store ────────────────────────────────────────────────────

/**
 * One persisted step: the full globals plus only the rows that changed
 */
export interface LedgerCommit {
  globals: LedgerGlobals;
  checkpoints: CheckpointRow[];
  principals: PrincipalRow[];
}

export interface StoredLedger {
  globals: LedgerGlobals;
  checkpoints: CheckpointRow[];
  principals: PrincipalRow[];
}

export interface ILedgerStore {
  commit(commit: LedgerCommit): Promise<void>;
  load(): Promise<StoredLedger | undefined>;
}
