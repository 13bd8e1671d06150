import { LedgerFixture, ADMIN, DISTRIBUTOR_ROLE, ORACLE, makeLedger } from '../tests/helpers';
import { NULL_ACCOUNT_ID } from '../types';

const STAKERS = ['s1', 's2', 's3', 's4', 's5', 's6'];
const TREASURY = 'treasury';

/** Deterministic 64-bit LCG; next(bound) returns a value in [0, bound) */
function seededRandom(seed: bigint): (bound: bigint) => bigint {
  let state = seed;
  return (bound: bigint) => {
    state = (state * 6364136223846793005n + 1442695040888963407n) % (1n << 64n);
    return (state >> 16n) % bound;
  };
}

describe('conservation over a long mixed sequence', () => {
  let fx: LedgerFixture;
  let next: (bound: bigint) => bigint;

  function pick(ids: string[]): string {
    return ids[Number(next(BigInt(ids.length)))];
  }

  function step(op: bigint): void {
    const { ledger, staking, principals, clock } = fx;
    switch (op) {
      case 0n:
        ledger.reportTotalRewards(ORACLE, ledger.totalRewardsIssued() + 1n + next(1_000_000n));
        break;
      case 1n:
        staking.setStake(pick(STAKERS), 1n + next(10n ** 21n));
        break;
      case 2n: {
        const from = pick(STAKERS);
        staking.moveStake(from, pick(STAKERS), next(principals.principalOf(from) + 1n));
        break;
      }
      case 3n: {
        const id = pick(STAKERS);
        staking.setDistributorTracking(id, !ledger.isOptedOut(id));
        break;
      }
      case 4n:
        ledger.claim(DISTRIBUTOR_ROLE, pick(STAKERS), next(ledger.balanceOf(NULL_ACCOUNT_ID) + 1n));
        break;
      case 5n: {
        clock.advance();
        const from = pick([...STAKERS, TREASURY]);
        ledger.transfer(from, pick([...STAKERS, TREASURY]), next(ledger.balanceOf(from) + 1n));
        break;
      }
      case 6n:
        ledger.setProtocolFeeRecipient(ADMIN, next(2n) === 0n ? TREASURY : null);
        break;
      default:
        ledger.setProtocolFee(ADMIN, Number(next(3000n)));
        ledger.refreshCheckpoint(pick([...STAKERS, TREASURY]));
    }
  }

  beforeEach(() => {
    fx = makeLedger(500, TREASURY);
    next = seededRandom(20260128n);
    for (const id of STAKERS) {
      fx.staking.setStake(id, 1n + next(10n ** 21n));
    }
    fx.clock.advance();
  });

  it('should never over-issue and stay within the rounding allowance', () => {
    let rewardPerToken = fx.ledger.rewardPerToken();

    for (let i = 0; i < 600; i++) {
      step(next(8n));

      const report = fx.staking.audit();
      expect(report.shortfall).toBeGreaterThanOrEqual(0n);
      expect(report.valid).toBe(true);
      expect(fx.ledger.rewardPerToken()).toBeGreaterThanOrEqual(rewardPerToken);
      rewardPerToken = fx.ledger.rewardPerToken();
    }

    expect(fx.ledger.totalRewardsIssued()).toBeGreaterThan(0n);
    expect(fx.ledger.globals().roundingAllowance).toBeGreaterThan(0n);
  });
});
