import { loadServerConfig } from '../config';

describe('loadServerConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadServerConfig({});

    expect(config).toEqual({
      port: 3000,
      storeBackend: 'sqlite',
      dbPath: './data/rewards.db',
      keys: {
        admin: 'test-admin-key',
        rewardsOracle: 'test-oracle-key',
        distributor: 'test-distributor-key',
        principalOracle: 'test-principal-oracle-key',
      },
      blockCron: '*/12 * * * * *',
      blockTimezone: 'UTC',
      protocolFee: 0,
      protocolFeeRecipient: null,
    });
  });

  it('should read overrides', () => {
    const config = loadServerConfig({
      PORT: '8080',
      STORE_BACKEND: 'memory',
      PROTOCOL_FEE: '250',
      PROTOCOL_FEE_RECIPIENT: 'treasury',
    });

    expect(config.port).toBe(8080);
    expect(config.storeBackend).toBe('memory');
    expect(config.protocolFee).toBe(250);
    expect(config.protocolFeeRecipient).toBe('treasury');
  });

  it('should reject a malformed port', () => {
    expect(() => loadServerConfig({ PORT: 'eighty' })).toThrow(
      'PORT must be a non-negative integer, got "eighty"'
    );
  });

  it('should reject an unknown backend', () => {
    expect(() => loadServerConfig({ STORE_BACKEND: 'postgres' })).toThrow(
      'STORE_BACKEND must be "sqlite" or "memory", got "postgres"'
    );
  });

  it('should reject shared role keys', () => {
    expect(() => loadServerConfig({ ADMIN_KEY: 'same-key', ORACLE_KEY: 'same-key' })).toThrow(
      'ADMIN_KEY, ORACLE_KEY, DISTRIBUTOR_KEY and PRINCIPAL_ORACLE_KEY must differ'
    );
  });
});
