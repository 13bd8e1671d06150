import {
  Checkpoint,
  LedgerAccount,
  RealAccount,
  ZERO_CHECKPOINT,
  NULL_ACCOUNT_ID,
  accountKey,
} from './types';
import { toUint128 } from './fixedPoint';

/**
 * Flat representation of one checkpoint, used by the stores.
 * The distributor is stored under NULL_ACCOUNT_ID.
 */
export interface CheckpointRow {
  accountId: string;
  accruedReward: bigint;
  rewardPerTokenAtCheckpoint: bigint;
  optedOut: boolean;
}

interface JournalEntry {
  checkpoint: Checkpoint | undefined;
  optedOut: boolean;
  dirty: boolean;
}

/**
 * Per-account checkpoints plus opt-out flags.
 *
 * Accounts never referenced read as a zero checkpoint. Writes are recorded in
 * an undo journal while a transaction is open (begin/commit/rollback), and the
 * keys written since the last takeDirtyRows() are tracked so that stores only
 * persist what a call actually touched.
 *
 * settlementCount counts writes that moved a checkpoint's rewardPerToken
 * pointer: each one may have floored up to one unit of accrual away.
 */
export class CheckpointLedger {
  private accounts = new Map<string, Checkpoint>();
  private distributor: Checkpoint = { ...ZERO_CHECKPOINT };
  private optedOut = new Set<string>();
  private dirty = new Set<string>();
  private journal: Map<string, JournalEntry> | null = null;
  private settlements = 0;
  private settlementsAtBegin = 0;

  get(account: LedgerAccount): Checkpoint {
    const stored = account.kind === 'distributor' ? this.distributor : this.accounts.get(account.id);
    return stored ? { ...stored } : { ...ZERO_CHECKPOINT };
  }

  /**
   * Store a checkpoint. Both fields must fit the uint128 storage slot.
   */
  set(account: LedgerAccount, checkpoint: Checkpoint): void {
    const value: Checkpoint = {
      accruedReward: toUint128(checkpoint.accruedReward),
      rewardPerTokenAtCheckpoint: toUint128(checkpoint.rewardPerTokenAtCheckpoint),
    };
    const key = accountKey(account);
    this.record(key);
    if (this.get(account).rewardPerTokenAtCheckpoint !== value.rewardPerTokenAtCheckpoint) {
      this.settlements += 1;
    }

    if (account.kind === 'distributor') {
      this.distributor = value;
    } else {
      this.accounts.set(account.id, value);
    }
    this.dirty.add(key);
  }

  isOptedOut(account: LedgerAccount): boolean {
    return account.kind === 'account' && this.optedOut.has(account.id);
  }

  setOptedOut(account: RealAccount, flag: boolean): void {
    this.record(account.id);
    if (flag) {
      this.optedOut.add(account.id);
    } else {
      this.optedOut.delete(account.id);
    }
    this.dirty.add(account.id);
  }

  /** Identifiers of every real account that has a stored checkpoint */
  accountIds(): string[] {
    return [...this.accounts.keys()];
  }

  get settlementCount(): number {
    return this.settlements;
  }

  // ── Transactions ──────────────────────────────────────────────────

  begin(): void {
    if (this.journal) {
      throw new Error('CheckpointLedger: transaction already open');
    }
    this.journal = new Map();
    this.settlementsAtBegin = this.settlements;
  }

  commit(): void {
    this.journal = null;
  }

  rollback(): void {
    const journal = this.journal;
    this.journal = null;
    if (!journal) return;
    this.settlements = this.settlementsAtBegin;

    for (const [key, entry] of journal) {
      if (key === NULL_ACCOUNT_ID) {
        this.distributor = entry.checkpoint ?? { ...ZERO_CHECKPOINT };
      } else if (entry.checkpoint) {
        this.accounts.set(key, entry.checkpoint);
      } else {
        this.accounts.delete(key);
      }

      if (entry.optedOut) this.optedOut.add(key);
      else this.optedOut.delete(key);

      if (entry.dirty) this.dirty.add(key);
      else this.dirty.delete(key);
    }
  }

  private record(key: string): void {
    if (!this.journal || this.journal.has(key)) return;
    const checkpoint = key === NULL_ACCOUNT_ID ? this.distributor : this.accounts.get(key);
    this.journal.set(key, {
      checkpoint: checkpoint ? { ...checkpoint } : undefined,
      optedOut: this.optedOut.has(key),
      dirty: this.dirty.has(key),
    });
  }

  // ── Persistence ───────────────────────────────────────────────────

  /**
   * Rows written since the previous call, then resets the dirty set
   */
  takeDirtyRows(): CheckpointRow[] {
    const rows = [...this.dirty].sort().map(key => this.rowFor(key));
    this.dirty.clear();
    return rows;
  }

  /**
   * Mark rows as unwritten again after a failed store write
   */
  markDirty(accountIds: Iterable<string>): void {
    for (const key of accountIds) {
      this.dirty.add(key);
    }
  }

  private rowFor(key: string): CheckpointRow {
    const checkpoint =
      (key === NULL_ACCOUNT_ID ? this.distributor : this.accounts.get(key)) ?? ZERO_CHECKPOINT;
    return {
      accountId: key,
      accruedReward: checkpoint.accruedReward,
      rewardPerTokenAtCheckpoint: checkpoint.rewardPerTokenAtCheckpoint,
      optedOut: this.optedOut.has(key),
    };
  }

  static fromRows(rows: CheckpointRow[]): CheckpointLedger {
    const ledger = new CheckpointLedger();
    for (const row of rows) {
      const checkpoint: Checkpoint = {
        accruedReward: toUint128(row.accruedReward),
        rewardPerTokenAtCheckpoint: toUint128(row.rewardPerTokenAtCheckpoint),
      };
      if (row.accountId === NULL_ACCOUNT_ID) {
        ledger.distributor = checkpoint;
        continue;
      }
      ledger.accounts.set(row.accountId, checkpoint);
      if (row.optedOut) ledger.optedOut.add(row.accountId);
    }
    return ledger;
  }
}
