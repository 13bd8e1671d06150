import { RewardLedger } from './rewardLedger';
import { InMemoryPrincipalBook } from './principalBook';
import { LedgerError, LedgerErrorCodes } from '../errors';
import { DISTRIBUTOR, realAccount } from '../types';
import { ConservationReport } from '../conservation';

export interface StakeChange {
  accountId: string;
  previousPrincipal: bigint;
  principal: bigint;
  distributorTracked: boolean;
}

export interface StakingSummary {
  totalStakedPrincipal: bigint;
  distributorPrincipal: bigint;
  stakerCount: number;
}

/**
 * Principal-oracle side of the ledger.
 *
 * Every principal change settles the affected checkpoints at the current
 * accumulator first (the account, and the distributor whenever the account's
 * stake counts towards distributor principal), so past rewards are always
 * priced with the principal that earned them.
 */
export class StakingService {
  constructor(
    private ledger: RewardLedger,
    private book: InMemoryPrincipalBook,
    private callerId: string
  ) {}

  setStake(accountId: string, principal: bigint): StakeChange {
    if (principal < 0n) {
      throw new LedgerError(LedgerErrorCodes.INVALID_AMOUNT, `Stake cannot be negative: ${principal}`);
    }
    const account = realAccount(accountId);
    const previousPrincipal = this.book.principalOf(account.id);

    this.ledger.refreshCheckpoints(account, DISTRIBUTOR);
    this.book.setPrincipal(account.id, principal);

    return {
      accountId: account.id,
      previousPrincipal,
      principal,
      distributorTracked: this.book.isDistributorTracked(account.id),
    };
  }

  /**
   * Move principal between two accounts (a stake transfer).
   */
  moveStake(fromId: string, toId: string, amount: bigint): [StakeChange, StakeChange] {
    if (amount < 0n) {
      throw new LedgerError(LedgerErrorCodes.INVALID_AMOUNT, `Amount cannot be negative: ${amount}`);
    }
    const from = realAccount(fromId);
    const to = realAccount(toId);
    const fromPrincipal = this.book.principalOf(from.id);
    if (amount > fromPrincipal) {
      throw new LedgerError(
        LedgerErrorCodes.UNDERFLOW,
        `moveStake: ${from.id} holds ${fromPrincipal}, cannot move ${amount}`
      );
    }

    this.ledger.refreshCheckpoints(from, to);
    this.ledger.refreshCheckpoint(DISTRIBUTOR);

    const toPrincipal = this.book.principalOf(to.id);
    this.book.setPrincipal(from.id, fromPrincipal - amount);
    this.book.setPrincipal(to.id, this.book.principalOf(to.id) + amount);

    return [
      {
        accountId: from.id,
        previousPrincipal: fromPrincipal,
        principal: this.book.principalOf(from.id),
        distributorTracked: this.book.isDistributorTracked(from.id),
      },
      {
        accountId: to.id,
        previousPrincipal: toPrincipal,
        principal: this.book.principalOf(to.id),
        distributorTracked: this.book.isDistributorTracked(to.id),
      },
    ];
  }

  /**
   * Hand an account's reward tracking to the proof-based distributor (or take
   * it back). The account's checkpoint is frozen or resumed, and its stake
   * moves into or out of distributor principal.
   *
   * @returns the account's balance at the moment of the switch
   */
  setDistributorTracking(accountId: string, tracked: boolean): bigint {
    const account = realAccount(accountId);
    this.ledger.refreshCheckpoint(DISTRIBUTOR);
    const balance = this.ledger.setOptedOut(this.callerId, account.id, tracked);
    this.book.setDistributorTracked(account.id, tracked);
    return balance;
  }

  /**
   * Conservation audit covering every staker as well as every checkpoint
   */
  audit(tolerance?: bigint): ConservationReport {
    return this.ledger.auditConservation({ tolerance, accountIds: this.book.accountIds() });
  }

  summary(): StakingSummary {
    return {
      totalStakedPrincipal: this.book.totalStakedPrincipal(),
      distributorPrincipal: this.book.distributorPrincipal(),
      stakerCount: this.book.stakerCount,
    };
  }
}
