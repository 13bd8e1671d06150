import type Database from 'better-sqlite3';
import { LedgerEvent, LedgerEventType, isLedgerEventType } from '../eventTypes';
import { BlockRange, IEventStore } from '../interfaces';
import { isRecord } from '../../types';

interface EventRow {
  event_id: string;
  sequence_number: number;
  block_number: number;
  timestamp: string;
  event_type: string;
  actor_id: string | null;
  payload: string;
  prev_event_hash: string;
  event_hash: string;
}

interface EventInsert {
  eventId: string;
  sequenceNumber: number;
  blockNumber: number;
  timestamp: string;
  eventType: string;
  actorId: string | null;
  payload: string;
  prevEventHash: string;
  eventHash: string;
}

const MAX_BLOCK = Number.MAX_SAFE_INTEGER;

export class SqliteEventStore implements IEventStore {
  private stmtInsert: Database.Statement<[EventInsert]>;
  private stmtByType: Database.Statement<[string, number, number], EventRow>;
  private stmtByActor: Database.Statement<[string, number, number], EventRow>;
  private stmtFrom: Database.Statement<[number, number], EventRow>;
  private stmtLast: Database.Statement<[], EventRow>;

  constructor(private db: Database.Database) {
    this.stmtInsert = db.prepare<[EventInsert]>(`
      INSERT INTO events (event_id, sequence_number, block_number, timestamp, event_type, actor_id, payload, prev_event_hash, event_hash)
      VALUES (@eventId, @sequenceNumber, @blockNumber, @timestamp, @eventType, @actorId, @payload, @prevEventHash, @eventHash)
    `);
    this.stmtByType = db.prepare<[string, number, number], EventRow>(
      'SELECT * FROM events WHERE event_type = ? AND block_number >= ? AND block_number <= ? ORDER BY sequence_number ASC'
    );
    this.stmtByActor = db.prepare<[string, number, number], EventRow>(
      'SELECT * FROM events WHERE actor_id = ? AND block_number >= ? AND block_number <= ? ORDER BY sequence_number ASC'
    );
    this.stmtFrom = db.prepare<[number, number], EventRow>(
      'SELECT * FROM events WHERE sequence_number >= ? ORDER BY sequence_number ASC LIMIT ?'
    );
    this.stmtLast = db.prepare<[], EventRow>(
      'SELECT * FROM events ORDER BY sequence_number DESC LIMIT 1'
    );
  }

  async append(events: LedgerEvent[]): Promise<void> {
    const insertMany = this.db.transaction((evts: LedgerEvent[]) => {
      for (const e of evts) {
        this.stmtInsert.run({
          eventId: e.eventId,
          sequenceNumber: e.sequenceNumber,
          blockNumber: e.blockNumber,
          timestamp: e.timestamp,
          eventType: e.eventType,
          actorId: e.actorId ?? null,
          payload: JSON.stringify(e.payload),
          prevEventHash: e.prevEventHash,
          eventHash: e.eventHash,
        });
      }
    });
    insertMany(events);
  }

  async queryByType(eventType: LedgerEventType, blockRange?: BlockRange): Promise<LedgerEvent[]> {
    const rows = this.stmtByType.all(eventType, blockRange?.from ?? 0, blockRange?.to ?? MAX_BLOCK);
    return rows.map(rowToEvent);
  }

  async queryByActor(actorId: string, blockRange?: BlockRange): Promise<LedgerEvent[]> {
    const rows = this.stmtByActor.all(actorId, blockRange?.from ?? 0, blockRange?.to ?? MAX_BLOCK);
    return rows.map(rowToEvent);
  }

  async listFrom(sequenceNumber: number, limit = 100): Promise<LedgerEvent[]> {
    return this.stmtFrom.all(sequenceNumber, limit).map(rowToEvent);
  }

  async getLastEvent(): Promise<LedgerEvent | undefined> {
    const row = this.stmtLast.get();
    return row ? rowToEvent(row) : undefined;
  }
}

function rowToEvent(row: EventRow): LedgerEvent {
  if (!isLedgerEventType(row.event_type)) {
    throw new Error(`Unknown event type in store: ${row.event_type}`);
  }
  const payload: unknown = JSON.parse(row.payload);
  if (!isRecord(payload)) {
    throw new Error(`Corrupt payload for event ${row.event_id}`);
  }
  return {
    eventId: row.event_id,
    sequenceNumber: row.sequence_number,
    blockNumber: row.block_number,
    timestamp: row.timestamp,
    eventType: row.event_type,
    actorId: row.actor_id ?? undefined,
    payload,
    prevEventHash: row.prev_event_hash,
    eventHash: row.event_hash,
  };
}
