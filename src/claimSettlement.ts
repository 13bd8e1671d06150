import { AccrualContext, creditCheckpoint, debitCheckpoint } from './accrualEngine';
import { DISTRIBUTOR, RealAccount } from './types';

export interface ClaimSettlement {
  accountId: string;
  amount: bigint;
  distributorBalance: bigint;
  accountBalance: bigint;
}

/**
 * Move `amount` of settled reward from the distributor account to `account`.
 *
 * Both sides are settled at the same accumulator value. The debit comes
 * first, so an insufficient distributor balance aborts before the account is
 * touched.
 *
 * @throws LedgerError UNDERFLOW when the distributor balance is below `amount`
 */
export function settleDistributorClaim(
  ctx: AccrualContext,
  account: RealAccount,
  amount: bigint,
  rewardPerToken: bigint
): ClaimSettlement {
  const distributorBalance = debitCheckpoint(ctx, DISTRIBUTOR, amount, rewardPerToken, 'claim');
  const accountBalance = creditCheckpoint(ctx, account, amount, rewardPerToken);
  return { accountId: account.id, amount, distributorBalance, accountBalance };
}
