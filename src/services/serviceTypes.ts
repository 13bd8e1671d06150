import {
  AccumulatorState,
  BlockClock,
  LedgerRoles,
  PrincipalOracle,
  ProtocolFeeConfig,
} from '../types';
import { ChainHead } from '../persistence/eventTypes';
import { CheckpointRow } from '../checkpointLedger';

// ---------------------------------------------------------------------------
// Ledger state
// ---------------------------------------------------------------------------

/**
 * Everything besides the checkpoints that a ledger needs to resume
 */
export interface LedgerGlobals {
  accumulator: AccumulatorState;
  fees: ProtocolFeeConfig;
  roles: LedgerRoles;
  chainHead: ChainHead;
  roundingAllowance: bigint; // upper bound on floor-division dust left in the pool
}

export interface RestoredLedgerState {
  globals: LedgerGlobals;
  checkpoints: CheckpointRow[];
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export interface RewardLedgerOptions {
  principals: PrincipalOracle;
  clock: BlockClock;
  admin: string;
  fees?: ProtocolFeeConfig;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Role labels (error messages)
// ---------------------------------------------------------------------------

export type LedgerRole = keyof LedgerRoles;

export const ROLE_LABELS: Record<LedgerRole, string> = {
  admin: 'admin',
  rewardsOracle: 'rewards oracle',
  distributor: 'distributor',
  principalOracle: 'principal oracle',
};
