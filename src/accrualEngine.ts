/**
 * Lazy per-account reward accrual ("reward per share").
 *
 * balance = accruedReward + principal * (rewardPerToken - rewardPerTokenAtCheckpoint) / SCALE
 *
 * Nothing here iterates over accounts: an account is settled only when it is
 * read, refreshed, or takes part in a transfer or claim.
 */

import { CheckpointLedger } from './checkpointLedger';
import { SCALE, mulDiv, subUint } from './fixedPoint';
import { LedgerAccount, PrincipalOracle } from './types';

export interface AccrualContext {
  ledger: CheckpointLedger;
  principals: PrincipalOracle;
}

/**
 * Principal backing an account; the distributor's principal is the total
 * tracked by the proof-based distributor.
 */
export function principalFor(principals: PrincipalOracle, account: LedgerAccount): bigint {
  return account.kind === 'distributor'
    ? principals.distributorPrincipal()
    : principals.principalOf(account.id);
}

function accrue(
  accruedReward: bigint,
  principal: bigint,
  fromRewardPerToken: bigint,
  toRewardPerToken: bigint
): bigint {
  const periodRewardPerToken = subUint(toRewardPerToken, fromRewardPerToken, 'accrual period');
  return accruedReward + mulDiv(principal, periodRewardPerToken, SCALE);
}

/**
 * Current balance of an account at the given accumulator value. Read-only.
 *
 * Fast path (no principal lookup): the checkpoint is already at
 * `rewardPerToken`, or the account is opted out.
 */
export function computeBalance(
  ctx: AccrualContext,
  account: LedgerAccount,
  rewardPerToken: bigint
): bigint {
  const checkpoint = ctx.ledger.get(account);
  if (rewardPerToken === checkpoint.rewardPerTokenAtCheckpoint || ctx.ledger.isOptedOut(account)) {
    return checkpoint.accruedReward;
  }

  const principal = principalFor(ctx.principals, account);
  if (principal === 0n) {
    return checkpoint.accruedReward;
  }

  return accrue(
    checkpoint.accruedReward,
    principal,
    checkpoint.rewardPerTokenAtCheckpoint,
    rewardPerToken
  );
}

/**
 * Settle an account's checkpoint at `newRewardPerToken`.
 *
 * No-op for opted-out accounts and when the pointer is already current. With
 * zero principal the reward stays the same but the pointer still advances.
 *
 * @returns whether the account is opted out
 */
export function refreshCheckpoint(
  ctx: AccrualContext,
  account: LedgerAccount,
  newRewardPerToken: bigint
): boolean {
  const optedOut = ctx.ledger.isOptedOut(account);
  if (optedOut) return true;

  const checkpoint = ctx.ledger.get(account);
  if (newRewardPerToken === checkpoint.rewardPerTokenAtCheckpoint) return false;

  const principal = principalFor(ctx.principals, account);
  const accruedReward =
    principal === 0n
      ? checkpoint.accruedReward
      : accrue(
          checkpoint.accruedReward,
          principal,
          checkpoint.rewardPerTokenAtCheckpoint,
          newRewardPerToken
        );

  ctx.ledger.set(account, { accruedReward, rewardPerTokenAtCheckpoint: newRewardPerToken });
  return false;
}

/**
 * Refresh two accounts against one accumulator snapshot.
 */
export function refreshCheckpoints(
  ctx: AccrualContext,
  first: LedgerAccount,
  second: LedgerAccount,
  rewardPerToken: bigint
): [boolean, boolean] {
  return [
    refreshCheckpoint(ctx, first, rewardPerToken),
    refreshCheckpoint(ctx, second, rewardPerToken),
  ];
}

/**
 * Settle an account at `rewardPerToken` and add `amount` to it.
 * Applies to opted-out accounts too: their frozen reward is the base.
 *
 * @returns the new balance
 */
export function creditCheckpoint(
  ctx: AccrualContext,
  account: LedgerAccount,
  amount: bigint,
  rewardPerToken: bigint
): bigint {
  const balance = computeBalance(ctx, account, rewardPerToken) + amount;
  ctx.ledger.set(account, { accruedReward: balance, rewardPerTokenAtCheckpoint: rewardPerToken });
  return balance;
}

/**
 * Settle an account at `rewardPerToken` and subtract `amount` from it.
 *
 * @throws LedgerError UNDERFLOW when the settled balance is below `amount`
 * @returns the new balance
 */
export function debitCheckpoint(
  ctx: AccrualContext,
  account: LedgerAccount,
  amount: bigint,
  rewardPerToken: bigint,
  context = 'debit'
): bigint {
  const balance = subUint(computeBalance(ctx, account, rewardPerToken), amount, context);
  ctx.ledger.set(account, { accruedReward: balance, rewardPerTokenAtCheckpoint: rewardPerToken });
  return balance;
}
