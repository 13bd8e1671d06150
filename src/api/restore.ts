/**
 * Restore API state from a ledger store after server restart.
 */

import { ApiState, ROLE_IDENTITIES, createApiState } from './state';
import { ServerConfig } from './config';
import { ManualBlockClock } from '../blockClock';
import { restoreLedger } from '../persistence/restore';
import { IEventStore, ILedgerStore } from '../persistence/interfaces';

export async function restoreApiState(
  stores: { event: IEventStore; ledger: ILedgerStore },
  config: Pick<ServerConfig, 'keys' | 'protocolFee' | 'protocolFeeRecipient'>
): Promise<{ state: ApiState; restored: boolean }> {
  const clock = new ManualBlockClock();

  // Fee settings from the environment only seed a fresh ledger
  const { ledger, principals, restored } = await restoreLedger(stores, {
    clock,
    admin: ROLE_IDENTITIES.admin,
    fees: {
      protocolFee: config.protocolFee,
      protocolFeeRecipient: config.protocolFeeRecipient,
    },
  });

  // Clock resumes one block after the last accumulator update
  clock.advanceTo(ledger.accumulator().lastUpdateBlockNumber + 1);

  const state = createApiState({ ledger, principals, clock, stores, keys: config.keys });
  return { state, restored };
}
