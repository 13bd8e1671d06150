import { AccrualContext, creditCheckpoint, debitCheckpoint } from './accrualEngine';
import { LedgerError, LedgerErrorCodes } from './errors';
import { AccumulatorState, RealAccount } from './types';

export interface TransferResult {
  from: string;
  to: string;
  amount: bigint;
  senderBalance: bigint;
  recipientBalance: bigint;
}

/**
 * Move settled reward between two accounts.
 *
 * Refused in the same block as the latest accumulator update, so a transfer
 * never races a reward distribution that is still being applied. The sender is
 * settled and debited before the recipient is settled, which keeps a transfer
 * to oneself balance-neutral.
 *
 * @throws LedgerError STALE_ACCUMULATOR when blockNumber <= lastUpdateBlockNumber
 * @throws LedgerError UNDERFLOW when the sender's balance is below `amount`
 */
export function transferReward(
  ctx: AccrualContext,
  accumulator: Readonly<AccumulatorState>,
  from: RealAccount,
  to: RealAccount,
  amount: bigint,
  blockNumber: number
): TransferResult {
  if (blockNumber <= accumulator.lastUpdateBlockNumber) {
    throw new LedgerError(
      LedgerErrorCodes.STALE_ACCUMULATOR,
      `Cannot transfer during rewards update (block ${blockNumber}, last update ${accumulator.lastUpdateBlockNumber})`
    );
  }

  const rewardPerToken = accumulator.rewardPerToken;
  const senderBalance = debitCheckpoint(ctx, from, amount, rewardPerToken, 'transfer');
  const recipientBalance = creditCheckpoint(ctx, to, amount, rewardPerToken);

  return { from: from.id, to: to.id, amount, senderBalance, recipientBalance };
}
