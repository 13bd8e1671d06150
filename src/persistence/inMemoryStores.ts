import { LedgerEvent, LedgerEventType } from './eventTypes';
import { BlockRange, IEventStore, ILedgerStore, LedgerCommit, StoredLedger } from './interfaces';
import { LedgerGlobals } from '../services/serviceTypes';
import { CheckpointRow } from '../checkpointLedger';
import { PrincipalRow } from '../services/principalBook';

function inRange(event: LedgerEvent, blockRange?: BlockRange): boolean {
  if (!blockRange) return true;
  return event.blockNumber >= blockRange.from && event.blockNumber <= blockRange.to;
}

export class InMemoryEventStore implements IEventStore {
  private events: LedgerEvent[] = [];

  async append(events: LedgerEvent[]): Promise<void> {
    this.events.push(...events);
  }

  async queryByType(eventType: LedgerEventType, blockRange?: BlockRange): Promise<LedgerEvent[]> {
    return this.events.filter(e => e.eventType === eventType && inRange(e, blockRange));
  }

  async queryByActor(actorId: string, blockRange?: BlockRange): Promise<LedgerEvent[]> {
    return this.events.filter(e => e.actorId === actorId && inRange(e, blockRange));
  }

  async listFrom(sequenceNumber: number, limit = 100): Promise<LedgerEvent[]> {
    return this.events.filter(e => e.sequenceNumber >= sequenceNumber).slice(0, limit);
  }

  async getLastEvent(): Promise<LedgerEvent | undefined> {
    return this.events.length > 0 ? this.events[this.events.length - 1] : undefined;
  }

  getAllEvents(): LedgerEvent[] {
    return [...this.events];
  }

  clear(): void {
    this.events = [];
  }
}

export class InMemoryLedgerStore implements ILedgerStore {
  private globals: LedgerGlobals | undefined;
  private checkpoints = new Map<string, CheckpointRow>();
  private principals = new Map<string, PrincipalRow>();

  async commit(commit: LedgerCommit): Promise<void> {
    this.globals = {
      accumulator: { ...commit.globals.accumulator },
      fees: { ...commit.globals.fees },
      roles: { ...commit.globals.roles },
      chainHead: { ...commit.globals.chainHead },
      roundingAllowance: commit.globals.roundingAllowance,
    };
    for (const row of commit.checkpoints) {
      this.checkpoints.set(row.accountId, { ...row });
    }
    for (const row of commit.principals) {
      this.principals.set(row.accountId, { ...row });
    }
  }

  async load(): Promise<StoredLedger | undefined> {
    if (!this.globals) return undefined;
    return {
      globals: this.globals,
      checkpoints: [...this.checkpoints.values()].map(row => ({ ...row })),
      principals: [...this.principals.values()].map(row => ({ ...row })),
    };
  }

  clear(): void {
    this.globals = undefined;
    this.checkpoints.clear();
    this.principals.clear();
  }
}

export function createInMemoryStores(): {
  event: InMemoryEventStore;
  ledger: InMemoryLedgerStore;
} {
  return {
    event: new InMemoryEventStore(),
    ledger: new InMemoryLedgerStore(),
  };
}
