import { createSqliteStores, SqliteStores } from '../sqlite';
import { persistLedger } from '../persistLedger';
import { restoreLedger } from '../restore';
import { buildLedgerEvent } from '../eventBuilder';
import { GENESIS_HEAD } from '../eventTypes';
import { ManualBlockClock } from '../../blockClock';
import { MAX_UINT128 } from '../../fixedPoint';
import { NULL_ACCOUNT_ID } from '../../types';
import { ADMIN, ORACLE, makeLedger } from '../../tests/helpers';

describe('SQLite stores', () => {
  let stores: SqliteStores;

  beforeEach(() => {
    stores = createSqliteStores(':memory:');
  });

  afterEach(() => {
    stores.db.close();
  });

  describe('SqliteEventStore', () => {
    it('should store and return events with their payloads', async () => {
      const first = buildLedgerEvent(GENESIS_HEAD, {
        eventType: 'REWARDS_TOGGLED',
        actorId: 'principal-oracle',
        payload: { account: 'bob', optedOut: true },
        blockNumber: 1,
        timestamp: '2026-01-28T12:00:00.000Z',
        eventId: 'evt-0',
      });
      const second = buildLedgerEvent(first.head, {
        eventType: 'REWARDS_UPDATED',
        actorId: 'oracle',
        payload: { totalRewards: '100' },
        blockNumber: 2,
        timestamp: '2026-01-28T12:00:12.000Z',
        eventId: 'evt-1',
      });
      await stores.event.append([first.event, second.event]);

      expect(await stores.event.getLastEvent()).toEqual(second.event);
      expect(await stores.event.queryByType('REWARDS_TOGGLED')).toEqual([first.event]);
      expect(await stores.event.queryByActor('oracle', { from: 3, to: 10 })).toEqual([]);
      expect((await stores.event.listFrom(0)).map(e => e.eventId)).toEqual(['evt-0', 'evt-1']);
    });

    it('should refuse a duplicate sequence number', async () => {
      const { event } = buildLedgerEvent(GENESIS_HEAD, {
        eventType: 'TRANSFER',
        payload: {},
        blockNumber: 1,
        timestamp: '2026-01-28T12:00:00.000Z',
        eventId: 'evt-0',
      });
      await stores.event.append([event]);

      await expect(stores.event.append([{ ...event, eventId: 'evt-dup' }])).rejects.toThrow();
      expect(await stores.event.listFrom(0)).toHaveLength(1);
    });
  });

  describe('SqliteLedgerStore', () => {
    it('should load nothing from an empty database', async () => {
      expect(await stores.ledger.load()).toBeUndefined();
    });

    it('should keep uint128 values exact', async () => {
      const { ledger } = makeLedger();
      await stores.ledger.commit({
        globals: ledger.globals(),
        checkpoints: [
          { accountId: 'alice', accruedReward: MAX_UINT128, rewardPerTokenAtCheckpoint: MAX_UINT128, optedOut: true },
        ],
        principals: [{ accountId: 'alice', principal: MAX_UINT128, distributorTracked: true }],
      });

      const loaded = await stores.ledger.load();

      expect(loaded?.globals).toEqual(ledger.globals());
      expect(loaded?.checkpoints).toEqual([
        { accountId: 'alice', accruedReward: MAX_UINT128, rewardPerTokenAtCheckpoint: MAX_UINT128, optedOut: true },
      ]);
      expect(loaded?.principals).toEqual([{ accountId: 'alice', principal: MAX_UINT128, distributorTracked: true }]);
    });
  });

  it('should restore a persisted ledger', async () => {
    const fx = makeLedger(1000);
    fx.staking.setStake('alice', 400n);
    fx.staking.setStake('bob', 600n);
    fx.staking.setDistributorTracking('bob', true);
    fx.clock.advance();
    fx.ledger.reportTotalRewards(ORACLE, 100n);
    await persistLedger(fx.ledger, fx.principals, stores);

    const { ledger, principals, restored } = await restoreLedger(stores, {
      clock: new ManualBlockClock(3),
      admin: ADMIN,
    });

    expect(restored).toBe(true);
    expect(ledger.balanceOf('alice')).toBe(36n);
    expect(ledger.balanceOf(NULL_ACCOUNT_ID)).toBe(64n);
    expect(ledger.isOptedOut('bob')).toBe(true);
    expect(ledger.globals()).toEqual(fx.ledger.globals());
    expect(principals.distributorPrincipal()).toBe(600n);
  });
});
