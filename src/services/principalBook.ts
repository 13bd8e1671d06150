/**
 * In-process principal oracle.
 *
 * Stands in for the external staking-principal ledger: it records each
 * account's stake and whether that stake's rewards are tracked by the
 * proof-based distributor. Distributor-tracked stakes make up
 * distributorPrincipal(); every stake counts towards totalStakedPrincipal().
 *
 * The book only holds numbers. Changing a stake without settling the
 * account's checkpoint first would re-price past rewards, so mutations go
 * through StakingService, which refreshes checkpoints before touching the book.
 */

import { PrincipalOracle } from '../types';

export interface PrincipalRow {
  accountId: string;
  principal: bigint;
  distributorTracked: boolean;
}

export class InMemoryPrincipalBook implements PrincipalOracle {
  private stakes = new Map<string, bigint>();
  private tracked = new Set<string>();
  private total = 0n;
  private trackedTotal = 0n;
  private dirty = new Set<string>();

  principalOf(accountId: string): bigint {
    return this.stakes.get(accountId) ?? 0n;
  }

  distributorPrincipal(): bigint {
    return this.trackedTotal;
  }

  totalStakedPrincipal(): bigint {
    return this.total;
  }

  isDistributorTracked(accountId: string): boolean {
    return this.tracked.has(accountId);
  }

  setPrincipal(accountId: string, principal: bigint): void {
    if (principal < 0n) {
      throw new Error(`Principal cannot be negative: ${principal}`);
    }
    const previous = this.principalOf(accountId);
    this.total += principal - previous;
    if (this.tracked.has(accountId)) {
      this.trackedTotal += principal - previous;
    }
    if (principal === 0n) {
      this.stakes.delete(accountId);
    } else {
      this.stakes.set(accountId, principal);
    }
    this.dirty.add(accountId);
  }

  setDistributorTracked(accountId: string, tracked: boolean): void {
    if (this.tracked.has(accountId) === tracked) return;
    const principal = this.principalOf(accountId);
    if (tracked) {
      this.tracked.add(accountId);
      this.trackedTotal += principal;
    } else {
      this.tracked.delete(accountId);
      this.trackedTotal -= principal;
    }
    this.dirty.add(accountId);
  }

  /** Accounts holding a stake */
  accountIds(): string[] {
    return [...this.stakes.keys()].sort();
  }

  /** Number of accounts holding a stake */
  get stakerCount(): number {
    return this.stakes.size;
  }

  takeDirtyRows(): PrincipalRow[] {
    const rows = [...this.dirty].sort().map(accountId => ({
      accountId,
      principal: this.principalOf(accountId),
      distributorTracked: this.tracked.has(accountId),
    }));
    this.dirty.clear();
    return rows;
  }

  /** Mark rows as unwritten again after a failed store write */
  requeue(rows: PrincipalRow[]): void {
    for (const row of rows) {
      this.dirty.add(row.accountId);
    }
  }

  static fromRows(rows: PrincipalRow[]): InMemoryPrincipalBook {
    const book = new InMemoryPrincipalBook();
    for (const row of rows) {
      book.setPrincipal(row.accountId, row.principal);
      book.setDistributorTracked(row.accountId, row.distributorTracked);
    }
    book.dirty.clear();
    return book;
  }
}
