import * as crypto from 'crypto';
import { RewardLedger } from '../services/rewardLedger';
import { InMemoryPrincipalBook } from '../services/principalBook';
import { StakingService } from '../services/stakingService';
import { LedgerRole } from '../services/serviceTypes';
import { ManualBlockClock } from '../blockClock';
import { IEventStore, ILedgerStore } from '../persistence/interfaces';
import { LedgerEvent } from '../persistence/eventTypes';
import { persistLedger } from '../persistence/persistLedger';
import { RoleKeys } from './config';

const LEDGER_ROLES: readonly LedgerRole[] = ['admin', 'rewardsOracle', 'distributor', 'principalOracle'];

/**
 * Identities the ledger knows each privileged caller by
 */
export const ROLE_IDENTITIES: Record<LedgerRole, string> = {
  admin: 'role:admin',
  rewardsOracle: 'role:rewards-oracle',
  distributor: 'role:distributor',
  principalOracle: 'role:principal-oracle',
};

/**
 * Who an X-Api-Key belongs to
 */
export type ApiCaller =
  | { kind: 'role'; role: LedgerRole }
  | { kind: 'account'; accountId: string };

/**
 * API state container for the HTTP server
 */
export interface ApiState {
  ledger: RewardLedger;
  principals: InMemoryPrincipalBook;
  staking: StakingService;
  clock: ManualBlockClock;

  // Storage backends
  stores: {
    event: IEventStore;
    ledger: ILedgerStore;
  };

  // Minimal auth: apiKey → caller, accountId → accountKey
  callers: Map<string, ApiCaller>;
  accountKeys: Map<string, string>;
}

export interface ApiStateOptions {
  ledger: RewardLedger;
  principals: InMemoryPrincipalBook;
  clock: ManualBlockClock;
  stores: { event: IEventStore; ledger: ILedgerStore };
  keys: RoleKeys;
}

/**
 * Create API state. A ledger whose collaborators are not linked yet gets the
 * configured role identities linked by its admin.
 */
export function createApiState(options: ApiStateOptions): ApiState {
  const { ledger, principals, clock, stores, keys } = options;

  const callers = new Map<string, ApiCaller>();
  for (const role of LEDGER_ROLES) {
    callers.set(keys[role], { kind: 'role', role });
  }

  if (ledger.roles().rewardsOracle === null) {
    ledger.linkCollaborators(ROLE_IDENTITIES.admin, {
      rewardsOracle: ROLE_IDENTITIES.rewardsOracle,
      distributor: ROLE_IDENTITIES.distributor,
      principalOracle: ROLE_IDENTITIES.principalOracle,
    });
  }

  return {
    ledger,
    principals,
    staking: new StakingService(ledger, principals, ROLE_IDENTITIES.principalOracle),
    clock,
    stores,
    callers,
    accountKeys: new Map(),
  };
}

/**
 * Issue a fresh API key for an account
 */
export function issueAccountKey(state: ApiState, accountId: string): string {
  const accountKey = crypto.randomBytes(32).toString('hex');
  state.accountKeys.set(accountId, accountKey);
  state.callers.set(accountKey, { kind: 'account', accountId });
  return accountKey;
}

/**
 * Flush the ledger's pending events and touched rows to the stores
 */
export async function persistState(state: ApiState): Promise<LedgerEvent[]> {
  const { events } = await persistLedger(state.ledger, state.principals, state.stores);
  return events;
}
