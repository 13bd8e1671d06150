import { RewardLedger } from '../services/rewardLedger';
import { InMemoryPrincipalBook } from '../services/principalBook';
import { IEventStore, ILedgerStore } from './interfaces';
import { LedgerEvent } from './eventTypes';

/**
 * Write what the ledger changed since the previous call: new events first,
 * then globals plus the touched checkpoint and principal rows.
 *
 * When a store write rejects, whatever it did not store goes back to the
 * ledger and the book, and the next call writes it.
 */
export async function persistLedger(
  ledger: RewardLedger,
  principals: InMemoryPrincipalBook,
  stores: { event: IEventStore; ledger: ILedgerStore }
): Promise<{ events: LedgerEvent[]; checkpointCount: number; principalCount: number }> {
  const events = ledger.drainEvents();
  const checkpoints = ledger.takeDirtyCheckpoints();
  const principalRows = principals.takeDirtyRows();

  try {
    if (events.length > 0) {
      await stores.event.append(events);
    }
  } catch (err) {
    ledger.requeue(events, checkpoints);
    principals.requeue(principalRows);
    throw err;
  }

  try {
    await stores.ledger.commit({
      globals: ledger.globals(),
      checkpoints,
      principals: principalRows,
    });
  } catch (err) {
    ledger.requeue([], checkpoints);
    principals.requeue(principalRows);
    throw err;
  }

  return { events, checkpointCount: checkpoints.length, principalCount: principalRows.length };
}
