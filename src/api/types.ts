import { LedgerErrorCode, LedgerErrorCodes } from '../errors';

// ============================================================================
// Account registration
// ============================================================================

export interface RegisterAccountResponse {
  success: boolean;
  accountId: string;
  accountKey: string; // X-Api-Key for transfers from this account
}

// ============================================================================
// Balances & checkpoints (amounts are decimal strings of base units)
// ============================================================================

export interface BalanceResponse {
  success: boolean;
  accountId: string;
  balance: string;
  formatted: string;
  optedOut: boolean;
}

export interface CheckpointResponse {
  success: boolean;
  accountId: string;
  accruedReward: string;
  rewardPerTokenAtCheckpoint: string;
  optedOut: boolean;
}

// ============================================================================
// Rewards
// ============================================================================

export interface RewardsStatusResponse {
  success: boolean;
  totalRewards: string;
  rewardPerToken: string;
  lastUpdateBlockNumber: number;
  version: number;
  currentBlock: number;
  protocolFee: number;
  protocolFeeRecipient: string | null;
}

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  ...LedgerErrorCodes,
  MISSING_API_KEY: 'MISSING_API_KEY',
  INVALID_API_KEY: 'INVALID_API_KEY',
  INVALID_REQUEST: 'INVALID_REQUEST',
  DUPLICATE_ACCOUNT: 'DUPLICATE_ACCOUNT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status for each ledger failure
 */
export const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, number> = {
  UNAUTHORIZED: 403,
  UNDERFLOW: 422,
  OVERFLOW: 422,
  INVALID_ACCOUNT: 400,
  NO_OP: 409,
  STALE_ACCUMULATOR: 409,
  DIVISION_BY_ZERO: 409,
  INVALID_FEE: 400,
  INVALID_AMOUNT: 400,
  ALREADY_LINKED: 409,
};
