/**
 * Server configuration, read once from the environment at startup.
 */

export type StoreBackend = 'sqlite' | 'memory';

export interface RoleKeys {
  admin: string;
  rewardsOracle: string;
  distributor: string;
  principalOracle: string;
}

export interface ServerConfig {
  port: number;
  storeBackend: StoreBackend;
  dbPath: string;
  keys: RoleKeys;
  blockCron: string;
  blockTimezone: string;
  protocolFee: number;
  protocolFeeRecipient: string | null;
}

function parseInteger(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parseBackend(raw: string | undefined): StoreBackend {
  if (raw === undefined || raw === '' || raw === 'sqlite') return 'sqlite';
  if (raw === 'memory') return 'memory';
  throw new Error(`STORE_BACKEND must be "sqlite" or "memory", got "${raw}"`);
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const keys: RoleKeys = {
    admin: env.ADMIN_KEY || 'test-admin-key',
    rewardsOracle: env.ORACLE_KEY || 'test-oracle-key',
    distributor: env.DISTRIBUTOR_KEY || 'test-distributor-key',
    principalOracle: env.PRINCIPAL_ORACLE_KEY || 'test-principal-oracle-key',
  };
  if (new Set(Object.values(keys)).size !== Object.keys(keys).length) {
    throw new Error('ADMIN_KEY, ORACLE_KEY, DISTRIBUTOR_KEY and PRINCIPAL_ORACLE_KEY must differ');
  }

  return {
    port: parseInteger(env.PORT, 'PORT', 3000),
    storeBackend: parseBackend(env.STORE_BACKEND),
    dbPath: env.DB_PATH || './data/rewards.db',
    keys,
    blockCron: env.BLOCK_CRON || '*/12 * * * * *',
    blockTimezone: env.BLOCK_TIMEZONE || 'UTC',
    protocolFee: parseInteger(env.PROTOCOL_FEE, 'PROTOCOL_FEE', 0),
    protocolFeeRecipient: env.PROTOCOL_FEE_RECIPIENT || null,
  };
}
