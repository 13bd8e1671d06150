import { AccrualContext, computeBalance } from './accrualEngine';
import { DISTRIBUTOR, realAccount } from './types';

export interface ConservationReport {
  totalRewards: bigint;
  settledTotal: bigint; // sum of every known balance at the current accumulator
  shortfall: bigint; // totalRewards - settledTotal (negative means over-issued)
  tolerance: bigint;
  accountCount: number; // real accounts included (the distributor is always included)
  valid: boolean;
}

/**
 * Check that the balances of all known accounts add up to the rewards issued.
 *
 * Floor division leaves dust in the pool, so a shortfall up to `tolerance`
 * units is accepted. The default is `roundingAllowance` (the dust bound the
 * ledger has accumulated over its settlements and reports) plus one unit per
 * balance read here. Balances above the issued total are never accepted.
 *
 * This walks every account and is meant for audits, never for accrual.
 */
export function auditConservation(
  ctx: AccrualContext,
  rewardPerToken: bigint,
  totalRewards: bigint,
  accountIds: string[],
  tolerance?: bigint,
  roundingAllowance = 0n
): ConservationReport {
  let settledTotal = computeBalance(ctx, DISTRIBUTOR, rewardPerToken);
  for (const accountId of accountIds) {
    settledTotal += computeBalance(ctx, realAccount(accountId), rewardPerToken);
  }

  const shortfall = totalRewards - settledTotal;
  const allowed = tolerance ?? roundingAllowance + BigInt(accountIds.length + 1);

  return {
    totalRewards,
    settledTotal,
    shortfall,
    tolerance: allowed,
    accountCount: accountIds.length,
    valid: shortfall >= 0n && shortfall <= allowed,
  };
}
