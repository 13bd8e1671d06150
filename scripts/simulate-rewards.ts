/**
 * Reward ledger simulation
 *
 * Runs an in-process ledger through a short scenario and prints balances and
 * the conservation audit after each step:
 *   1. Stake alice 400 and bob 600, hand bob's rewards to the distributor
 *   2. Report 100 in rewards with a 10% protocol fee
 *   3. Pay bob's claim from the distributor
 *   4. Alice transfers part of her reward to carol
 *
 * Usage:
 *   npm run simulate
 */

import { ManualBlockClock } from '../src/blockClock';
import { InMemoryPrincipalBook } from '../src/services/principalBook';
import { RewardLedger } from '../src/services/rewardLedger';
import { StakingService } from '../src/services/stakingService';
import { createInMemoryStores } from '../src/persistence/inMemoryStores';
import { persistLedger } from '../src/persistence/persistLedger';
import { verifyHashChain } from '../src/persistence/eventBuilder';
import { NULL_ACCOUNT_ID } from '../src/types';

const ADMIN = 'admin';
const ORACLE = 'rewards-oracle';
const DISTRIBUTOR = 'distributor';
const PRINCIPAL_ORACLE = 'principal-oracle';
const ACCOUNTS = ['alice', 'bob', 'carol'];

async function main() {
  const clock = new ManualBlockClock();
  const principals = new InMemoryPrincipalBook();
  const ledger = new RewardLedger({
    principals,
    clock,
    admin: ADMIN,
    fees: { protocolFee: 1000, protocolFeeRecipient: null },
  });
  const staking = new StakingService(ledger, principals, PRINCIPAL_ORACLE);
  const stores = createInMemoryStores();

  ledger.linkCollaborators(ADMIN, {
    rewardsOracle: ORACLE,
    distributor: DISTRIBUTOR,
    principalOracle: PRINCIPAL_ORACLE,
  });

  const report = (step: string) => {
    console.log(`\n── ${step} (block ${clock.currentBlock()})`);
    console.log(`  distributor: ${ledger.balanceOf(NULL_ACCOUNT_ID)}`);
    for (const accountId of ACCOUNTS) {
      const frozen = ledger.isOptedOut(accountId) ? ' (opted out)' : '';
      console.log(`  ${accountId}: ${ledger.balanceOf(accountId)}${frozen}`);
    }
    const audit = staking.audit();
    console.log(
      `  audit: issued ${audit.totalRewards}, settled ${audit.settledTotal}, ` +
      `shortfall ${audit.shortfall} → ${audit.valid ? 'OK' : 'VIOLATED'}`
    );
  };

  staking.setStake('alice', 400n);
  staking.setStake('bob', 600n);
  staking.setDistributorTracking('bob', true);
  await persistLedger(ledger, principals, stores);
  report('Staked');

  clock.advance();
  const update = ledger.reportTotalRewards(ORACLE, 100n);
  await persistLedger(ledger, principals, stores);
  console.log(
    `\nReported 100: rewardPerToken ${update.rewardPerToken}, ` +
    `distributor +${update.distributorReward}, protocol fee ${update.protocolReward}`
  );
  report('Rewards reported');

  clock.advance();
  ledger.claim(DISTRIBUTOR, 'bob', 54n);
  await persistLedger(ledger, principals, stores);
  report('Bob claimed 54');

  ledger.transfer('alice', 'carol', 6n);
  await persistLedger(ledger, principals, stores);
  report('Alice sent 6 to carol');

  const events = stores.event.getAllEvents();
  const chain = verifyHashChain(events);
  console.log(`\n${events.length} events, hash chain ${chain.valid ? 'valid' : `broken at ${chain.brokenAt}`}`);
}

main().catch(err => {
  console.error('Simulation failed:', err);
  process.exit(1);
});
