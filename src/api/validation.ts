import { Response } from 'express';
import { isLedgerError } from '../errors';
import { isRecord } from '../types';
import { ErrorCode, ErrorCodes, LEDGER_ERROR_STATUS } from './types';

const AMOUNT_PATTERN = /^\d{1,39}$/;

/** Field of a JSON body, undefined when the body is not an object */
export function readField(body: unknown, field: string): unknown {
  return isRecord(body) ? body[field] : undefined;
}

/**
 * Parse an amount in base units: a decimal string of digits, or a safe
 * non-negative integer. Returns null for anything else.
 */
export function parseAmount(value: unknown): bigint | null {
  if (typeof value === 'string' && AMOUNT_PATTERN.test(value)) {
    return BigInt(value);
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  return null;
}

/** Clamp a query-string integer to [min, max] with a fallback default */
export function parseQueryInt(raw: unknown, defaultVal: number, min: number, max: number): number {
  const parsed = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (Number.isNaN(parsed) || parsed < min) return defaultVal;
  return Math.min(parsed, max);
}

export function sendError(res: Response, status: number, code: ErrorCode, error: string): void {
  res.status(status).json({ success: false, error, code });
}

/**
 * Map a failure to a response: ledger errors keep their code, anything else
 * is logged and reported as 500.
 */
export function handleRouteError(res: Response, err: unknown, context: string): void {
  if (isLedgerError(err)) {
    sendError(res, LEDGER_ERROR_STATUS[err.code], err.code, err.message);
    return;
  }
  console.error(`Error ${context}:`, err);
  sendError(res, 500, ErrorCodes.INTERNAL_ERROR, 'Internal server error');
}
