/**
 * Test helpers for the HTTP API: an app over in-memory stores with the
 * placeholder role keys the server uses by default.
 */

import request from 'supertest';
import { createApp } from '../app';
import { ApiState, ROLE_IDENTITIES, createApiState } from '../state';
import { RoleKeys } from '../config';
import { ManualBlockClock } from '../../blockClock';
import { InMemoryPrincipalBook } from '../../services/principalBook';
import { RewardLedger } from '../../services/rewardLedger';
import { createInMemoryStores } from '../../persistence/inMemoryStores';
import { ProtocolFeeConfig } from '../../types';

export const KEYS: RoleKeys = {
  admin: 'test-admin-key',
  rewardsOracle: 'test-oracle-key',
  distributor: 'test-distributor-key',
  principalOracle: 'test-principal-oracle-key',
};

export interface TestApp {
  state: ApiState;
  app: ReturnType<typeof createApp>;
  stores: ReturnType<typeof createInMemoryStores>;
}

export function makeTestApp(
  fees: ProtocolFeeConfig = { protocolFee: 0, protocolFeeRecipient: null }
): TestApp {
  const stores = createInMemoryStores();
  const clock = new ManualBlockClock();
  const principals = new InMemoryPrincipalBook();
  const ledger = new RewardLedger({
    principals,
    clock,
    admin: ROLE_IDENTITIES.admin,
    fees,
    now: () => new Date('2026-01-28T12:00:00Z'),
  });
  const state = createApiState({ ledger, principals, clock, stores, keys: KEYS });
  return { state, app: createApp(state), stores };
}

/**
 * Register an account and return its API key
 */
export async function registerAccount(app: TestApp['app'], accountId: string): Promise<string> {
  const response = await request(app).post('/accounts/register').send({ accountId });
  expect(response.status).toBe(201);
  return response.body.accountKey;
}

export async function setStake(app: TestApp['app'], accountId: string, principal: string): Promise<void> {
  const response = await request(app)
    .put(`/principal/stakes/${accountId}`)
    .set('X-Api-Key', KEYS.principalOracle)
    .send({ principal });
  expect(response.status).toBe(200);
}

export async function reportRewards(app: TestApp['app'], totalRewards: string): Promise<request.Response> {
  return request(app)
    .post('/rewards/report')
    .set('X-Api-Key', KEYS.rewardsOracle)
    .send({ totalRewards });
}
