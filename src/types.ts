/**
 * Reward Checkpoint Ledger - Core Types
 */

import { LedgerError, LedgerErrorCodes } from './errors';

// ---------------------------------------------------------------------------
// Accounts
// ---------------------------------------------------------------------------

/**
 * Identifier under which the virtual distributor account is addressed by
 * external callers (the "null account").
 */
export const NULL_ACCOUNT_ID = '0x0000000000000000000000000000000000000000';

/**
 * A depositor tracked individually by this ledger
 */
export interface RealAccount {
  kind: 'account';
  id: string;
}

/**
 * Aggregate of all principal whose rewards are claimed through the
 * proof-based distributor instead of being tracked per account here
 */
export interface DistributorAccount {
  kind: 'distributor';
}

export type LedgerAccount = RealAccount | DistributorAccount;

export const DISTRIBUTOR: DistributorAccount = { kind: 'distributor' };

/**
 * Parse an external identifier into a real account.
 * Rejects blank identifiers and the reserved null identifier.
 */
export function realAccount(id: string): RealAccount {
  const trimmed = id.trim();
  if (trimmed === '' || trimmed.toLowerCase() === NULL_ACCOUNT_ID) {
    throw new LedgerError(
      LedgerErrorCodes.INVALID_ACCOUNT,
      `Not a valid account identifier: "${id}"`
    );
  }
  return { kind: 'account', id: trimmed };
}

/**
 * Resolve an external identifier for read paths, where the null identifier
 * designates the distributor.
 */
export function resolveAccount(id: string): LedgerAccount {
  return id.trim().toLowerCase() === NULL_ACCOUNT_ID ? DISTRIBUTOR : realAccount(id);
}

/**
 * External identifier of an account (events, storage rows, API responses)
 */
export function accountKey(account: LedgerAccount): string {
  return account.kind === 'distributor' ? NULL_ACCOUNT_ID : account.id;
}

// ---------------------------------------------------------------------------
// Checkpoints and accumulator
// ---------------------------------------------------------------------------

/**
 * Settled reward of one account
 */
export interface Checkpoint {
  accruedReward: bigint; // balance as of rewardPerTokenAtCheckpoint
  rewardPerTokenAtCheckpoint: bigint; // accumulator value at last settlement (1e18 scale)
}

export const ZERO_CHECKPOINT: Readonly<Checkpoint> = {
  accruedReward: 0n,
  rewardPerTokenAtCheckpoint: 0n,
};

/**
 * Global accumulator. Passed by reference into the updater; `version`
 * increments on every reward report.
 */
export interface AccumulatorState {
  totalRewards: bigint; // cumulative rewards ever reported
  rewardPerToken: bigint; // cumulative reward per unit of principal (1e18 scale)
  lastUpdateBlockNumber: number;
  version: number;
}

export function createAccumulatorState(): AccumulatorState {
  return {
    totalRewards: 0n,
    rewardPerToken: 0n,
    lastUpdateBlockNumber: 0,
    version: 0,
  };
}

/**
 * Protocol fee configuration
 */
export interface ProtocolFeeConfig {
  protocolFee: number; // parts per 10,000, < 10,000
  protocolFeeRecipient: string | null; // null: fee is merged into the distributor
}

export const DEFAULT_PROTOCOL_FEE_CONFIG: ProtocolFeeConfig = {
  protocolFee: 0,
  protocolFeeRecipient: null,
};

/**
 * Caller identities allowed to invoke privileged operations.
 * Collaborators are null until linked by the admin.
 */
export interface LedgerRoles {
  admin: string;
  rewardsOracle: string | null;
  distributor: string | null;
  principalOracle: string | null;
}

export interface CollaboratorLinks {
  rewardsOracle: string;
  distributor: string;
  principalOracle: string;
}

// ---------------------------------------------------------------------------
// External collaborators
// ---------------------------------------------------------------------------

/**
 * Source of staked principal. The ledger never stores principal itself.
 */
export interface PrincipalOracle {
  principalOf(accountId: string): bigint;
  /** Principal whose rewards are tracked by the proof-based distributor */
  distributorPrincipal(): bigint;
  totalStakedPrincipal(): bigint;
}

/**
 * Height of the current unit of work
 */
export interface BlockClock {
  currentBlock(): number;
}

/** Narrow an unknown parsed JSON value to a plain object */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
