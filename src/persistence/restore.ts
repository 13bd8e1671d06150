/**
 * Rebuild the ledger and the principal book from a ledger store after restart.
 */

import { RewardLedger } from '../services/rewardLedger';
import { InMemoryPrincipalBook } from '../services/principalBook';
import { BlockClock, ProtocolFeeConfig } from '../types';
import { IEventStore, ILedgerStore } from './interfaces';
import { verifyHashChain } from './eventBuilder';

export interface RestoreOptions {
  clock: BlockClock;
  admin: string;
  fees?: ProtocolFeeConfig;
  now?: () => Date;
}

export interface RestoredLedger {
  ledger: RewardLedger;
  principals: InMemoryPrincipalBook;
  restored: boolean;
}

export async function restoreLedger(
  stores: { event: IEventStore; ledger: ILedgerStore },
  options: RestoreOptions
): Promise<RestoredLedger> {
  const stored = await stores.ledger.load();

  if (!stored) {
    const principals = new InMemoryPrincipalBook();
    const ledger = new RewardLedger({ ...options, principals });
    return { ledger, principals, restored: false };
  }

  // The stored chain head must match the last persisted event
  const lastEvent = await stores.event.getLastEvent();
  const head = stored.globals.chainHead;
  if ((lastEvent?.eventHash ?? null) !== (head.sequenceNumber < 0 ? null : head.eventHash)) {
    throw new Error(
      `Event log does not match ledger state: head ${head.sequenceNumber}/${head.eventHash}, ` +
      `last event ${lastEvent ? `${lastEvent.sequenceNumber}/${lastEvent.eventHash}` : 'none'}`
    );
  }
  if (lastEvent) {
    const tail = await stores.event.listFrom(Math.max(0, lastEvent.sequenceNumber - 99), 100);
    const chain = verifyHashChain(tail);
    if (!chain.valid) {
      throw new Error(`Event log is corrupt: ${chain.error}`);
    }
  }

  const principals = InMemoryPrincipalBook.fromRows(stored.principals);
  const ledger = new RewardLedger(
    { ...options, principals },
    { globals: stored.globals, checkpoints: stored.checkpoints }
  );
  return { ledger, principals, restored: true };
}
