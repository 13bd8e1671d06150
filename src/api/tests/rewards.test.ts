import request from 'supertest';
import { ErrorCodes } from '../types';
import { KEYS, TestApp, makeTestApp, reportRewards, setStake } from './helpers';

describe('/rewards and /distributor endpoints', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = makeTestApp();
    await setStake(t.app, 'alice', '400');
    await setStake(t.app, 'bob', '600');
    await request(t.app)
      .post('/principal/opt-out')
      .set('X-Api-Key', KEYS.principalOracle)
      .send({ accountId: 'bob', optedOut: true });
  });

  describe('POST /rewards/report', () => {
    it('should advance the accumulator', async () => {
      const response = await reportRewards(t.app, '100');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        periodRewards: '100',
        totalRewards: '100',
        rewardPerToken: '100000000000000000',
        distributorReward: '60',
        protocolReward: '0',
        blockNumber: 1,
      });

      const status = await request(t.app).get('/rewards');
      expect(status.body).toEqual({
        success: true,
        totalRewards: '100',
        rewardPerToken: '100000000000000000',
        lastUpdateBlockNumber: 1,
        version: 1,
        currentBlock: 1,
        protocolFee: 0,
        protocolFeeRecipient: null,
      });
    });

    it('should persist the new globals', async () => {
      await reportRewards(t.app, '100');

      const stored = await t.stores.ledger.load();
      expect(stored?.globals.accumulator.totalRewards).toBe(100n);
      expect(stored?.globals.accumulator.version).toBe(1);
    });

    it('should require an API key', async () => {
      const response = await request(t.app).post('/rewards/report').send({ totalRewards: '100' });

      expect(response.status).toBe(401);
      expect(response.body.code).toBe(ErrorCodes.MISSING_API_KEY);
    });

    it('should reject an unknown API key', async () => {
      const response = await request(t.app)
        .post('/rewards/report')
        .set('X-Api-Key', 'wrong-key')
        .send({ totalRewards: '100' });

      expect(response.status).toBe(401);
      expect(response.body.code).toBe(ErrorCodes.INVALID_API_KEY);
    });

    it('should reject other roles with 403', async () => {
      const response = await request(t.app)
        .post('/rewards/report')
        .set('X-Api-Key', KEYS.admin)
        .send({ totalRewards: '100' });

      expect(response.status).toBe(403);
      expect(response.body.code).toBe(ErrorCodes.UNAUTHORIZED);
    });

    it('should reject a decreasing total with 422', async () => {
      await reportRewards(t.app, '100');

      const response = await reportRewards(t.app, '50');

      expect(response.status).toBe(422);
      expect(response.body.code).toBe(ErrorCodes.UNDERFLOW);
    });

    it('should reject a malformed total', async () => {
      const response = await reportRewards(t.app, '1.5');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCodes.INVALID_REQUEST);
    });

    it('should refuse rewards with nothing staked', async () => {
      const empty = makeTestApp();

      const response = await reportRewards(empty.app, '100');

      expect(response.status).toBe(409);
      expect(response.body.code).toBe(ErrorCodes.DIVISION_BY_ZERO);
    });
  });

  describe('GET /rewards/audit', () => {
    it('should confirm conservation', async () => {
      await reportRewards(t.app, '100');

      const response = await request(t.app).get('/rewards/audit');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        valid: true,
        totalRewards: '100',
        settledTotal: '100',
        shortfall: '0',
        tolerance: '5',
        accountCount: 2,
      });
    });

    it('should reject a malformed tolerance', async () => {
      const response = await request(t.app).get('/rewards/audit?tolerance=-1');

      expect(response.status).toBe(400);
    });
  });

  describe('POST /distributor/claim', () => {
    beforeEach(async () => {
      await reportRewards(t.app, '100');
    });

    it('should pay a claim from the distributor balance', async () => {
      const response = await request(t.app)
        .post('/distributor/claim')
        .set('X-Api-Key', KEYS.distributor)
        .send({ accountId: 'bob', amount: '60' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        accountId: 'bob',
        amount: '60',
        distributorBalance: '0',
        accountBalance: '60',
      });
    });

    it('should reject a claim above the distributor balance', async () => {
      const response = await request(t.app)
        .post('/distributor/claim')
        .set('X-Api-Key', KEYS.distributor)
        .send({ accountId: 'bob', amount: '61' });

      expect(response.status).toBe(422);
      expect(response.body.code).toBe(ErrorCodes.UNDERFLOW);
      expect(response.body.error).toBe('claim: 60 - 61 is negative');
    });

    it('should only accept the distributor key', async () => {
      const response = await request(t.app)
        .post('/distributor/claim')
        .set('X-Api-Key', KEYS.rewardsOracle)
        .send({ accountId: 'bob', amount: '1' });

      expect(response.status).toBe(403);
    });
  });

  describe('GET /events', () => {
    beforeEach(async () => {
      await reportRewards(t.app, '100');
    });

    it('should page through the event log', async () => {
      const response = await request(t.app).get('/events');

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(3);
      expect(response.body.events.map((e: { eventType: string }) => e.eventType)).toEqual([
        'COLLABORATORS_LINKED',
        'REWARDS_TOGGLED',
        'REWARDS_UPDATED',
      ]);

      const page = await request(t.app).get('/events?from=2&limit=5');
      expect(page.body.count).toBe(1);
    });

    it('should filter by type and actor', async () => {
      const byType = await request(t.app).get('/events?type=REWARDS_UPDATED');
      expect(byType.body.count).toBe(1);
      expect(byType.body.events[0].payload.totalRewards).toBe('100');

      const byActor = await request(t.app).get('/events?actor=role:principal-oracle');
      expect(byActor.body.count).toBe(1);
    });

    it('should narrow a filter to a block range', async () => {
      const atReport = await request(t.app).get('/events?type=REWARDS_UPDATED&fromBlock=1&toBlock=1');
      expect(atReport.body.count).toBe(1);

      const later = await request(t.app).get('/events?type=REWARDS_UPDATED&fromBlock=2');
      expect(later.status).toBe(200);
      expect(later.body.count).toBe(0);

      const byActor = await request(t.app).get('/events?actor=role:principal-oracle&toBlock=0');
      expect(byActor.body.count).toBe(0);
    });

    it('should reject a malformed block range', async () => {
      const reversed = await request(t.app).get('/events?type=REWARDS_UPDATED&fromBlock=3&toBlock=2');
      expect(reversed.status).toBe(400);
      expect(reversed.body.code).toBe(ErrorCodes.INVALID_REQUEST);

      const text = await request(t.app).get('/events?actor=alice&fromBlock=soon');
      expect(text.status).toBe(400);
    });

    it('should reject an unknown event type', async () => {
      const response = await request(t.app).get('/events?type=BOGUS');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCodes.INVALID_REQUEST);
    });
  });
});
