/**
 * Ledger error kinds.
 *
 * Every failure aborts the whole call; the service restores the state it held
 * before the call started, so callers never observe a partial update.
 */

export const LedgerErrorCodes = {
  UNAUTHORIZED: 'UNAUTHORIZED',
  UNDERFLOW: 'UNDERFLOW',
  OVERFLOW: 'OVERFLOW',
  INVALID_ACCOUNT: 'INVALID_ACCOUNT',
  NO_OP: 'NO_OP',
  STALE_ACCUMULATOR: 'STALE_ACCUMULATOR',
  DIVISION_BY_ZERO: 'DIVISION_BY_ZERO',
  INVALID_FEE: 'INVALID_FEE',
  INVALID_AMOUNT: 'INVALID_AMOUNT',
  ALREADY_LINKED: 'ALREADY_LINKED',
} as const;

export type LedgerErrorCode = (typeof LedgerErrorCodes)[keyof typeof LedgerErrorCodes];

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
