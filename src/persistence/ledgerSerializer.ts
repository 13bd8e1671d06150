/**
 * LedgerGlobals serializer for SQLite storage.
 * bigint fields are written as decimal strings so JSON round-trips exactly.
 */

import { LedgerGlobals } from '../services/serviceTypes';
import { isRecord } from '../types';

interface SerializedLedgerGlobals {
  accumulator: {
    totalRewards: string;
    rewardPerToken: string;
    lastUpdateBlockNumber: number;
    version: number;
  };
  fees: {
    protocolFee: number;
    protocolFeeRecipient: string | null;
  };
  roles: {
    admin: string;
    rewardsOracle: string | null;
    distributor: string | null;
    principalOracle: string | null;
  };
  chainHead: {
    sequenceNumber: number;
    eventHash: string;
  };
  roundingAllowance: string;
}

// ── Serialize ──────────────────────────────────────────────────────

export function serializeLedgerGlobals(globals: LedgerGlobals): string {
  const serialized: SerializedLedgerGlobals = {
    accumulator: {
      totalRewards: globals.accumulator.totalRewards.toString(),
      rewardPerToken: globals.accumulator.rewardPerToken.toString(),
      lastUpdateBlockNumber: globals.accumulator.lastUpdateBlockNumber,
      version: globals.accumulator.version,
    },
    fees: { ...globals.fees },
    roles: { ...globals.roles },
    chainHead: { ...globals.chainHead },
    roundingAllowance: globals.roundingAllowance.toString(),
  };
  return JSON.stringify(serialized);
}

// ── Deserialize ────────────────────────────────────────────────────

function section(obj: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = obj[key];
  if (!isRecord(value)) {
    throw new Error(`Corrupt ledger globals: "${key}" is not an object`);
  }
  return value;
}

function readString(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new Error(`Corrupt ledger globals: "${key}" is not a string`);
  }
  return value;
}

function readNullableString(obj: Record<string, unknown>, key: string): string | null {
  const value = obj[key];
  return value === null ? null : readString(obj, key);
}

function readInteger(obj: Record<string, unknown>, key: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new Error(`Corrupt ledger globals: "${key}" is not an integer`);
  }
  return value;
}

function readBigInt(obj: Record<string, unknown>, key: string): bigint {
  const text = readString(obj, key);
  if (!/^\d+$/.test(text)) {
    throw new Error(`Corrupt ledger globals: "${key}" is not an unsigned integer`);
  }
  return BigInt(text);
}

export function deserializeLedgerGlobals(json: string): LedgerGlobals {
  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed)) {
    throw new Error('Corrupt ledger globals: not an object');
  }

  const accumulator = section(parsed, 'accumulator');
  const fees = section(parsed, 'fees');
  const roles = section(parsed, 'roles');
  const chainHead = section(parsed, 'chainHead');

  return {
    accumulator: {
      totalRewards: readBigInt(accumulator, 'totalRewards'),
      rewardPerToken: readBigInt(accumulator, 'rewardPerToken'),
      lastUpdateBlockNumber: readInteger(accumulator, 'lastUpdateBlockNumber'),
      version: readInteger(accumulator, 'version'),
    },
    fees: {
      protocolFee: readInteger(fees, 'protocolFee'),
      protocolFeeRecipient: readNullableString(fees, 'protocolFeeRecipient'),
    },
    roles: {
      admin: readString(roles, 'admin'),
      rewardsOracle: readNullableString(roles, 'rewardsOracle'),
      distributor: readNullableString(roles, 'distributor'),
      principalOracle: readNullableString(roles, 'principalOracle'),
    },
    chainHead: {
      sequenceNumber: readInteger(chainHead, 'sequenceNumber'),
      eventHash: readString(chainHead, 'eventHash'),
    },
    roundingAllowance: readBigInt(parsed, 'roundingAllowance'),
  };
}
