/**
 * Shared fixtures for ledger tests.
 */

import { CheckpointLedger } from '../checkpointLedger';
import { AccrualContext } from '../accrualEngine';
import { ManualBlockClock } from '../blockClock';
import { InMemoryPrincipalBook } from '../services/principalBook';
import { RewardLedger } from '../services/rewardLedger';
import { StakingService } from '../services/stakingService';
import { LedgerError, LedgerErrorCode, isLedgerError } from '../errors';

export const ADMIN = 'admin';
export const ORACLE = 'oracle';
export const DISTRIBUTOR_ROLE = 'distributor';
export const PRINCIPAL_ORACLE = 'principal-oracle';
export const FIXED_NOW = new Date('2026-01-28T12:00:00Z');

/**
 * Run `fn` and return the LedgerError it throws, failing the test when it
 * returns normally or throws anything else.
 */
export function catchLedgerError(fn: () => unknown): LedgerError {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  if (!isLedgerError(caught)) {
    throw new Error(`Expected a LedgerError, got ${caught === undefined ? 'no error' : String(caught)}`);
  }
  return caught;
}

export function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): LedgerError {
  const err = catchLedgerError(fn);
  expect(err.code).toBe(code);
  return err;
}

/** Bare engine context over an empty checkpoint ledger */
export function makeContext(): AccrualContext & { ledger: CheckpointLedger; principals: InMemoryPrincipalBook } {
  return { ledger: new CheckpointLedger(), principals: new InMemoryPrincipalBook() };
}

export interface LedgerFixture {
  clock: ManualBlockClock;
  principals: InMemoryPrincipalBook;
  ledger: RewardLedger;
  staking: StakingService;
}

/**
 * Ledger service with all collaborators linked, at block 1
 */
export function makeLedger(protocolFee = 0, protocolFeeRecipient: string | null = null): LedgerFixture {
  const clock = new ManualBlockClock();
  const principals = new InMemoryPrincipalBook();
  const ledger = new RewardLedger({
    principals,
    clock,
    admin: ADMIN,
    fees: { protocolFee, protocolFeeRecipient },
    now: () => FIXED_NOW,
  });
  ledger.linkCollaborators(ADMIN, {
    rewardsOracle: ORACLE,
    distributor: DISTRIBUTOR_ROLE,
    principalOracle: PRINCIPAL_ORACLE,
  });
  const staking = new StakingService(ledger, principals, PRINCIPAL_ORACLE);
  return { clock, principals, ledger, staking };
}
