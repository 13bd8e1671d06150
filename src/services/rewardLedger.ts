import { CheckpointLedger, CheckpointRow } from '../checkpointLedger';
import {
  AccrualContext,
  computeBalance,
  refreshCheckpoint as refreshAccountCheckpoint,
  refreshCheckpoints as refreshAccountCheckpoints,
} from '../accrualEngine';
import { RewardsUpdate, applyTotalRewards } from '../accumulatorUpdater';
import { ClaimSettlement, settleDistributorClaim } from '../claimSettlement';
import { setOptedOut as toggleOptOut } from '../optOutRegistry';
import { TransferResult, transferReward } from '../transfer';
import { ConservationReport, auditConservation } from '../conservation';
import { FEE_DENOMINATOR, SCALE } from '../fixedPoint';
import { LedgerError, LedgerErrorCodes } from '../errors';
import {
  AccumulatorState,
  BlockClock,
  Checkpoint,
  CollaboratorLinks,
  DEFAULT_PROTOCOL_FEE_CONFIG,
  LedgerAccount,
  LedgerRoles,
  NULL_ACCOUNT_ID,
  PrincipalOracle,
  ProtocolFeeConfig,
  createAccumulatorState,
  realAccount,
  resolveAccount,
} from '../types';
import { ChainHead, GENESIS_HEAD, LedgerEvent, LedgerEventType } from '../persistence/eventTypes';
import { buildLedgerEvent } from '../persistence/eventBuilder';
import {
  LedgerGlobals,
  LedgerRole,
  ROLE_LABELS,
  RestoredLedgerState,
  RewardLedgerOptions,
} from './serviceTypes';

type AccountRef = string | LedgerAccount;

function toAccount(ref: AccountRef): LedgerAccount {
  return typeof ref === 'string' ? resolveAccount(ref) : ref;
}

function assertAmount(amount: bigint, action: string): void {
  if (amount < 0n) {
    throw new LedgerError(LedgerErrorCodes.INVALID_AMOUNT, `${action}: amount cannot be negative (${amount})`);
  }
}

/**
 * Reward ledger service.
 *
 * Owns the checkpoints, the accumulator, the fee configuration and the role
 * assignments, and exposes the ledger's operations to callers:
 * - privileged operations check the caller against the linked role
 * - every mutating call is atomic: on failure all state is restored and no
 *   event is emitted
 * - successful calls append hash-chained events to an outbox that the
 *   persistence layer drains
 */
export class RewardLedger {
  private readonly checkpoints: CheckpointLedger;
  private readonly accumulatorState: AccumulatorState;
  private readonly feeConfig: ProtocolFeeConfig;
  private readonly roleConfig: LedgerRoles;
  private readonly principals: PrincipalOracle;
  private readonly clock: BlockClock;
  private readonly now: () => Date;
  private chainHead: ChainHead;
  private roundingAllowance: bigint;
  private outbox: LedgerEvent[] = [];

  constructor(options: RewardLedgerOptions, restored?: RestoredLedgerState) {
    this.principals = options.principals;
    this.clock = options.clock;
    this.now = options.now ?? (() => new Date());

    if (restored) {
      this.checkpoints = CheckpointLedger.fromRows(restored.checkpoints);
      this.accumulatorState = { ...restored.globals.accumulator };
      this.feeConfig = { ...restored.globals.fees };
      this.roleConfig = { ...restored.globals.roles };
      this.chainHead = { ...restored.globals.chainHead };
      this.roundingAllowance = restored.globals.roundingAllowance;
    } else {
      this.checkpoints = new CheckpointLedger();
      this.accumulatorState = createAccumulatorState();
      const fees = options.fees ?? DEFAULT_PROTOCOL_FEE_CONFIG;
      this.feeConfig = {
        protocolFee: fees.protocolFee,
        protocolFeeRecipient:
          fees.protocolFeeRecipient === null ? null : realAccount(fees.protocolFeeRecipient).id,
      };
      this.roleConfig = {
        admin: options.admin,
        rewardsOracle: null,
        distributor: null,
        principalOracle: null,
      };
      this.chainHead = { ...GENESIS_HEAD };
      this.roundingAllowance = 0n;
    }
    validateFee(this.feeConfig.protocolFee);
  }

  private get ctx(): AccrualContext {
    return { ledger: this.checkpoints, principals: this.principals };
  }

  // ── Reads ─────────────────────────────────────────────────────────

  /**
   * Current balance; the null account id reads the distributor.
   */
  balanceOf(account: AccountRef): bigint {
    return computeBalance(this.ctx, toAccount(account), this.accumulatorState.rewardPerToken);
  }

  totalRewardsIssued(): bigint {
    return this.accumulatorState.totalRewards;
  }

  rewardPerToken(): bigint {
    return this.accumulatorState.rewardPerToken;
  }

  checkpointOf(account: AccountRef): Checkpoint {
    return this.checkpoints.get(toAccount(account));
  }

  isOptedOut(account: AccountRef): boolean {
    return this.checkpoints.isOptedOut(toAccount(account));
  }

  accumulator(): Readonly<AccumulatorState> {
    return { ...this.accumulatorState };
  }

  feeSettings(): Readonly<ProtocolFeeConfig> {
    return { ...this.feeConfig };
  }

  roles(): Readonly<LedgerRoles> {
    return { ...this.roleConfig };
  }

  accountIds(): string[] {
    return this.checkpoints.accountIds();
  }

  /**
   * Conservation audit over every account with a checkpoint, plus
   * `options.accountIds` (stakers that were never settled have no checkpoint).
   * Without a tolerance the accumulated rounding allowance is used.
   */
  auditConservation(options: { tolerance?: bigint; accountIds?: Iterable<string> } = {}): ConservationReport {
    const accountIds = new Set(this.checkpoints.accountIds());
    for (const accountId of options.accountIds ?? []) {
      accountIds.add(accountId);
    }
    return auditConservation(
      this.ctx,
      this.accumulatorState.rewardPerToken,
      this.accumulatorState.totalRewards,
      [...accountIds].sort(),
      options.tolerance,
      this.roundingAllowance
    );
  }

  // ── Checkpoint refresh (anyone) ───────────────────────────────────

  /**
   * Settle one account at the current accumulator.
   * @returns whether the account is opted out
   */
  refreshCheckpoint(account: AccountRef): boolean {
    const target = toAccount(account);
    return this.atomically(() =>
      refreshAccountCheckpoint(this.ctx, target, this.accumulatorState.rewardPerToken)
    );
  }

  /**
   * Settle two accounts against a single read of the accumulator.
   */
  refreshCheckpoints(first: AccountRef, second: AccountRef): [boolean, boolean] {
    const a = toAccount(first);
    const b = toAccount(second);
    return this.atomically(() => {
      const rewardPerToken = this.accumulatorState.rewardPerToken;
      return refreshAccountCheckpoints(this.ctx, a, b, rewardPerToken);
    });
  }

  // ── Rewards oracle ────────────────────────────────────────────────

  reportTotalRewards(caller: string, newTotalRewards: bigint): RewardsUpdate {
    this.requireRole(caller, 'rewardsOracle', 'reportTotalRewards');
    assertAmount(newTotalRewards, 'reportTotalRewards');

    const blockNumber = this.clock.currentBlock();
    const stakedPrincipal = this.principals.totalStakedPrincipal();
    const update = this.atomically(() =>
      applyTotalRewards(
        {
          ...this.ctx,
          accumulator: this.accumulatorState,
          fees: this.feeConfig,
        },
        newTotalRewards,
        blockNumber
      )
    );
    if (update.periodRewards > 0n) {
      // flooring rewardPerToken leaves less than stakedPrincipal / SCALE in the pool
      this.roundingAllowance += (stakedPrincipal + SCALE - 1n) / SCALE;
    }

    this.emit('REWARDS_UPDATED', caller, {
      periodRewards: update.periodRewards.toString(),
      totalRewards: update.totalRewards.toString(),
      rewardPerToken: update.rewardPerToken.toString(),
      distributorReward: update.distributorReward.toString(),
      protocolReward: update.protocolReward.toString(),
    });
    return update;
  }

  // ── Distributor ───────────────────────────────────────────────────

  claim(caller: string, accountId: string, amount: bigint): ClaimSettlement {
    this.requireRole(caller, 'distributor', 'claim');
    assertAmount(amount, 'claim');
    const account = realAccount(accountId);

    const settlement = this.atomically(() =>
      settleDistributorClaim(this.ctx, account, amount, this.accumulatorState.rewardPerToken)
    );

    this.emit('TRANSFER', caller, {
      from: NULL_ACCOUNT_ID,
      to: account.id,
      amount: amount.toString(),
    });
    return settlement;
  }

  // ── Principal oracle ──────────────────────────────────────────────

  /**
   * @returns the balance frozen (or resumed) at the current accumulator
   */
  setOptedOut(caller: string, accountId: string, optedOut: boolean): bigint {
    this.requireRole(caller, 'principalOracle', 'setOptedOut');
    const account = realAccount(accountId);

    const balance = this.atomically(() =>
      toggleOptOut(this.ctx, account, optedOut, this.accumulatorState.rewardPerToken)
    );

    this.emit('REWARDS_TOGGLED', caller, { account: account.id, optedOut });
    return balance;
  }

  // ── Transfers ─────────────────────────────────────────────────────

  /**
   * Move settled reward from `from` to `to`. Authenticating `from` is the
   * caller's responsibility.
   */
  transfer(from: string, to: string, amount: bigint): TransferResult {
    assertAmount(amount, 'transfer');
    const sender = realAccount(from);
    const recipient = realAccount(to);
    const blockNumber = this.clock.currentBlock();

    const result = this.atomically(() =>
      transferReward(this.ctx, this.accumulatorState, sender, recipient, amount, blockNumber)
    );

    this.emit('TRANSFER', sender.id, {
      from: sender.id,
      to: recipient.id,
      amount: amount.toString(),
    });
    return result;
  }

  // ── Administration ────────────────────────────────────────────────

  setProtocolFee(caller: string, protocolFee: number): void {
    this.requireRole(caller, 'admin', 'setProtocolFee');
    validateFee(protocolFee);
    this.feeConfig.protocolFee = protocolFee;
    this.emit('PROTOCOL_FEE_UPDATED', caller, { protocolFee });
  }

  /**
   * @param recipient account id, or null to merge the fee into the distributor
   */
  setProtocolFeeRecipient(caller: string, recipient: string | null): void {
    this.requireRole(caller, 'admin', 'setProtocolFeeRecipient');
    const resolved = recipient === null ? null : realAccount(recipient).id;
    this.feeConfig.protocolFeeRecipient = resolved;
    this.emit('PROTOCOL_FEE_RECIPIENT_UPDATED', caller, { recipient: resolved });
  }

  linkCollaborators(caller: string, links: CollaboratorLinks): void {
    this.requireRole(caller, 'admin', 'linkCollaborators');
    const { rewardsOracle, distributor, principalOracle } = this.roleConfig;
    if (rewardsOracle !== null || distributor !== null || principalOracle !== null) {
      throw new LedgerError(LedgerErrorCodes.ALREADY_LINKED, 'Collaborators are already linked');
    }
    for (const [role, id] of Object.entries(links)) {
      if (typeof id !== 'string' || id.trim() === '') {
        throw new LedgerError(LedgerErrorCodes.INVALID_ACCOUNT, `Missing identity for ${role}`);
      }
    }

    this.roleConfig.rewardsOracle = links.rewardsOracle;
    this.roleConfig.distributor = links.distributor;
    this.roleConfig.principalOracle = links.principalOracle;
    this.emit('COLLABORATORS_LINKED', caller, {
      rewardsOracle: links.rewardsOracle,
      distributor: links.distributor,
      principalOracle: links.principalOracle,
    });
  }

  // ── Persistence hooks ─────────────────────────────────────────────

  /** Events emitted since the previous call, oldest first */
  drainEvents(): LedgerEvent[] {
    const events = this.outbox;
    this.outbox = [];
    return events;
  }

  /** Checkpoint rows written since the previous call */
  takeDirtyCheckpoints(): CheckpointRow[] {
    return this.checkpoints.takeDirtyRows();
  }

  /**
   * Put back what a failed store write took: events go to the front of the
   * outbox, rows are marked dirty again and re-read at their current values.
   */
  requeue(events: LedgerEvent[], checkpoints: CheckpointRow[]): void {
    this.outbox = [...events, ...this.outbox];
    this.checkpoints.markDirty(checkpoints.map(row => row.accountId));
  }

  globals(): LedgerGlobals {
    return {
      accumulator: { ...this.accumulatorState },
      fees: { ...this.feeConfig },
      roles: { ...this.roleConfig },
      chainHead: { ...this.chainHead },
      roundingAllowance: this.roundingAllowance,
    };
  }

  // ── Internals ─────────────────────────────────────────────────────

  private requireRole(caller: string, role: LedgerRole, action: string): void {
    const expected = this.roleConfig[role];
    if (expected === null || caller !== expected) {
      throw new LedgerError(
        LedgerErrorCodes.UNAUTHORIZED,
        `${action}: caller "${caller}" is not the ${ROLE_LABELS[role]}`
      );
    }
  }

  private atomically<T>(operation: () => T): T {
    const accumulator = { ...this.accumulatorState };
    const fees = { ...this.feeConfig };
    this.checkpoints.begin();
    const settled = this.checkpoints.settlementCount;
    try {
      const result = operation();
      this.roundingAllowance += BigInt(this.checkpoints.settlementCount - settled);
      this.checkpoints.commit();
      return result;
    } catch (err) {
      this.checkpoints.rollback();
      Object.assign(this.accumulatorState, accumulator);
      Object.assign(this.feeConfig, fees);
      throw err;
    }
  }

  private emit(eventType: LedgerEventType, actorId: string, payload: Record<string, unknown>): void {
    const { event, head } = buildLedgerEvent(this.chainHead, {
      eventType,
      actorId,
      payload,
      blockNumber: this.clock.currentBlock(),
      timestamp: this.now().toISOString(),
    });
    this.chainHead = head;
    this.outbox.push(event);
  }
}

function validateFee(protocolFee: number): void {
  if (!Number.isInteger(protocolFee) || protocolFee < 0 || BigInt(protocolFee) >= FEE_DENOMINATOR) {
    throw new LedgerError(
      LedgerErrorCodes.INVALID_FEE,
      `Protocol fee must be an integer in [0, ${FEE_DENOMINATOR}), got ${protocolFee}`
    );
  }
}
