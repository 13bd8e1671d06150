import { AccrualContext, computeBalance } from './accrualEngine';
import { LedgerError, LedgerErrorCodes } from './errors';
import { RealAccount } from './types';

/**
 * Freeze or unfreeze an account's accrual.
 *
 * The checkpoint is settled at the current accumulator before the flag flips:
 * when freezing, everything earned so far is kept and nothing accrues
 * afterwards; when unfreezing, the frozen reward is kept and accrual resumes
 * from `rewardPerToken`.
 *
 * @throws LedgerError NO_OP when the flag already has this value
 * @returns the settled (frozen or resumed) balance
 */
export function setOptedOut(
  ctx: AccrualContext,
  account: RealAccount,
  optedOut: boolean,
  rewardPerToken: bigint
): bigint {
  if (ctx.ledger.isOptedOut(account) === optedOut) {
    throw new LedgerError(
      LedgerErrorCodes.NO_OP,
      `Account ${account.id} is already ${optedOut ? 'opted out' : 'accruing'}`
    );
  }

  const balance = computeBalance(ctx, account, rewardPerToken);
  ctx.ledger.set(account, { accruedReward: balance, rewardPerTokenAtCheckpoint: rewardPerToken });
  ctx.ledger.setOptedOut(account, optedOut);
  return balance;
}
