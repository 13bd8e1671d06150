import request from 'supertest';
import { ErrorCodes } from '../types';
import { KEYS, TestApp, makeTestApp, reportRewards, setStake } from './helpers';

describe('/principal endpoints', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = makeTestApp();
    await setStake(t.app, 'alice', '400');
    await setStake(t.app, 'bob', '600');
  });

  function optOut(accountId: string, optedOut: boolean) {
    return request(t.app)
      .post('/principal/opt-out')
      .set('X-Api-Key', KEYS.principalOracle)
      .send({ accountId, optedOut });
  }

  it('should summarize principal', async () => {
    await optOut('bob', true);

    const response = await request(t.app).get('/principal');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      totalStakedPrincipal: '1000',
      distributorPrincipal: '600',
      stakerCount: 2,
    });
  });

  it('should read one stake', async () => {
    const response = await request(t.app).get('/principal/stakes/alice');

    expect(response.body).toEqual({
      success: true,
      accountId: 'alice',
      principal: '400',
      distributorTracked: false,
    });
  });

  it('should report the previous principal on update', async () => {
    const response = await request(t.app)
      .put('/principal/stakes/alice')
      .set('X-Api-Key', KEYS.principalOracle)
      .send({ principal: 250 });

    expect(response.status).toBe(200);
    expect(response.body.previousPrincipal).toBe('400');
    expect(response.body.principal).toBe('250');
  });

  it('should reject an invalid principal', async () => {
    const response = await request(t.app)
      .put('/principal/stakes/alice')
      .set('X-Api-Key', KEYS.principalOracle)
      .send({ principal: 'lots' });

    expect(response.status).toBe(400);
    expect(response.body.code).toBe(ErrorCodes.INVALID_REQUEST);
  });

  it('should only accept the principal oracle key', async () => {
    const response = await request(t.app)
      .put('/principal/stakes/alice')
      .set('X-Api-Key', KEYS.admin)
      .send({ principal: '1' });

    expect(response.status).toBe(403);
  });

  it('should settle rewards before stake changes', async () => {
    await reportRewards(t.app, '100'); // alice 40, bob 60

    const response = await request(t.app)
      .post('/principal/move')
      .set('X-Api-Key', KEYS.principalOracle)
      .send({ from: 'alice', to: 'carol', amount: '100' });

    expect(response.status).toBe(200);
    expect(response.body.from).toEqual({
      accountId: 'alice',
      previousPrincipal: '400',
      principal: '300',
      distributorTracked: false,
    });
    expect(response.body.to.principal).toBe('100');

    const checkpoint = await request(t.app).get('/accounts/alice/checkpoint');
    expect(checkpoint.body.accruedReward).toBe('40');
  });

  it('should refuse to move more than the stake', async () => {
    const response = await request(t.app)
      .post('/principal/move')
      .set('X-Api-Key', KEYS.principalOracle)
      .send({ from: 'alice', to: 'carol', amount: '401' });

    expect(response.status).toBe(422);
    expect(response.body.error).toBe('moveStake: alice holds 400, cannot move 401');
  });

  it('should freeze the balance on opt-out', async () => {
    await reportRewards(t.app, '100');

    const response = await optOut('alice', true);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true, accountId: 'alice', optedOut: true, balance: '40' });
  });

  it('should reject a repeated opt-out with 409', async () => {
    await optOut('bob', true);

    const response = await optOut('bob', true);

    expect(response.status).toBe(409);
    expect(response.body.code).toBe(ErrorCodes.NO_OP);
    expect(t.state.principals.distributorPrincipal()).toBe(600n);
  });

  it('should reject a non-boolean flag', async () => {
    const response = await request(t.app)
      .post('/principal/opt-out')
      .set('X-Api-Key', KEYS.principalOracle)
      .send({ accountId: 'bob', optedOut: 'yes' });

    expect(response.status).toBe(400);
  });
});
