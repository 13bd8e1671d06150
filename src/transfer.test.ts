import { transferReward } from './transfer';
import { applyTotalRewards, UpdaterContext } from './accumulatorUpdater';
import { computeBalance } from './accrualEngine';
import { createAccumulatorState, realAccount } from './types';
import { expectLedgerError, makeContext } from './tests/helpers';
import { InMemoryPrincipalBook } from './services/principalBook';

const alice = realAccount('alice');
const carol = realAccount('carol');

describe('transferReward', () => {
  let ctx: UpdaterContext & { principals: InMemoryPrincipalBook };

  beforeEach(() => {
    ctx = {
      ...makeContext(),
      accumulator: createAccumulatorState(),
      fees: { protocolFee: 0, protocolFeeRecipient: null },
    };
    ctx.principals.setPrincipal('alice', 400n);
    ctx.principals.setPrincipal('carol', 600n);
    applyTotalRewards(ctx, 100n, 5); // alice 40, carol 60
  });

  it('should move settled reward between accounts', () => {
    const result = transferReward(ctx, ctx.accumulator, alice, carol, 15n, 6);

    expect(result).toEqual({
      from: 'alice',
      to: 'carol',
      amount: 15n,
      senderBalance: 25n,
      recipientBalance: 75n,
    });
    expect(computeBalance(ctx, alice, ctx.accumulator.rewardPerToken)).toBe(25n);
    expect(computeBalance(ctx, carol, ctx.accumulator.rewardPerToken)).toBe(75n);
  });

  it('should refuse transfers in the block of the last rewards update', () => {
    const err = expectLedgerError(
      () => transferReward(ctx, ctx.accumulator, alice, carol, 1n, 5),
      'STALE_ACCUMULATOR'
    );
    expect(err.message).toBe('Cannot transfer during rewards update (block 5, last update 5)');
  });

  it('should refuse amounts above the sender balance', () => {
    const err = expectLedgerError(
      () => transferReward(ctx, ctx.accumulator, alice, carol, 41n, 6),
      'UNDERFLOW'
    );
    expect(err.message).toBe('transfer: 40 - 41 is negative');
  });

  it('should leave a self-transfer balance-neutral', () => {
    const result = transferReward(ctx, ctx.accumulator, alice, alice, 10n, 6);

    expect(result.senderBalance).toBe(30n);
    expect(result.recipientBalance).toBe(40n);
    expect(computeBalance(ctx, alice, ctx.accumulator.rewardPerToken)).toBe(40n);
  });
});
