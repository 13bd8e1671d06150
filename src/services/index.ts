export { RewardLedger } from './rewardLedger';
export { InMemoryPrincipalBook, PrincipalRow } from './principalBook';
export { StakingService, StakeChange, StakingSummary } from './stakingService';
export {
  LedgerGlobals,
  LedgerRole,
  RestoredLedgerState,
  RewardLedgerOptions,
  ROLE_LABELS,
} from './serviceTypes';
