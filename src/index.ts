// Core ledger
export * from './types';
export * from './errors';
export * from './fixedPoint';
export { CheckpointLedger, CheckpointRow } from './checkpointLedger';
export {
  AccrualContext,
  computeBalance,
  refreshCheckpoint,
  refreshCheckpoints,
  creditCheckpoint,
  debitCheckpoint,
  principalFor,
} from './accrualEngine';
export { UpdaterContext, RewardsUpdate, applyTotalRewards } from './accumulatorUpdater';
export { ClaimSettlement, settleDistributorClaim } from './claimSettlement';
export { setOptedOut } from './optOutRegistry';
export { TransferResult, transferReward } from './transfer';
export { ConservationReport, auditConservation } from './conservation';
export { ManualBlockClock } from './blockClock';

// Services
export * from './services';

// Persistence
export * from './persistence';
export { createSqliteStores, SqliteStores } from './persistence/sqlite';
