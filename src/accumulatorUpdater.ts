import { AccrualContext, computeBalance, creditCheckpoint } from './accrualEngine';
import { FEE_DENOMINATOR, SCALE, mulDiv, subUint, toUint128 } from './fixedPoint';
import {
  AccumulatorState,
  DISTRIBUTOR,
  ProtocolFeeConfig,
  realAccount,
} from './types';

export interface UpdaterContext extends AccrualContext {
  accumulator: AccumulatorState;
  fees: ProtocolFeeConfig;
}

/**
 * Outcome of one reward report (payload of the RewardsUpdated event)
 */
export interface RewardsUpdate {
  periodRewards: bigint;
  totalRewards: bigint;
  rewardPerToken: bigint;
  distributorReward: bigint; // change of the distributor balance this period
  protocolReward: bigint; // fee merged into the distributor (0 when a recipient is set)
}

/**
 * Advance the global accumulator to `newTotalRewards`.
 *
 * Period rewards net of the protocol fee are spread over all staked principal
 * by raising rewardPerToken. The distributor balance is measured before and
 * after the accumulator moves, so its checkpoint absorbs exactly the period's
 * reward on its principal (plus the fee when no recipient is configured) no
 * matter how its principal changed since the last report.
 *
 * Mutates ctx.accumulator and the checkpoints; the caller provides atomicity.
 *
 * @throws LedgerError UNDERFLOW when newTotalRewards is below totalRewards
 * @throws LedgerError DIVISION_BY_ZERO when rewards arrive with nothing staked
 */
export function applyTotalRewards(
  ctx: UpdaterContext,
  newTotalRewards: bigint,
  blockNumber: number
): RewardsUpdate {
  const { accumulator, fees } = ctx;
  const periodRewards = subUint(newTotalRewards, accumulator.totalRewards, 'total rewards');

  if (periodRewards === 0n) {
    accumulator.lastUpdateBlockNumber = blockNumber;
    accumulator.version += 1;
    return {
      periodRewards: 0n,
      totalRewards: newTotalRewards,
      rewardPerToken: accumulator.rewardPerToken,
      distributorReward: 0n,
      protocolReward: 0n,
    };
  }

  const protocolReward = mulDiv(periodRewards, BigInt(fees.protocolFee), FEE_DENOMINATOR);
  const prevRewardPerToken = accumulator.rewardPerToken;
  const newRewardPerToken = toUint128(
    prevRewardPerToken +
      mulDiv(periodRewards - protocolReward, SCALE, ctx.principals.totalStakedPrincipal())
  );

  const prevDistributorBalance = computeBalance(ctx, DISTRIBUTOR, prevRewardPerToken);

  accumulator.totalRewards = toUint128(newTotalRewards);
  accumulator.rewardPerToken = newRewardPerToken;

  let newDistributorBalance = computeBalance(ctx, DISTRIBUTOR, newRewardPerToken);

  const recipient = fees.protocolFeeRecipient;
  if (protocolReward > 0n) {
    if (recipient === null) {
      newDistributorBalance += protocolReward;
    } else {
      creditCheckpoint(ctx, realAccount(recipient), protocolReward, newRewardPerToken);
    }
  }

  if (newDistributorBalance !== prevDistributorBalance) {
    ctx.ledger.set(DISTRIBUTOR, {
      accruedReward: newDistributorBalance,
      rewardPerTokenAtCheckpoint: newRewardPerToken,
    });
  }

  accumulator.lastUpdateBlockNumber = blockNumber;
  accumulator.version += 1;

  return {
    periodRewards,
    totalRewards: newTotalRewards,
    rewardPerToken: newRewardPerToken,
    distributorReward: subUint(newDistributorBalance, prevDistributorBalance, 'distributor reward'),
    protocolReward: recipient === null ? protocolReward : 0n,
  };
}
