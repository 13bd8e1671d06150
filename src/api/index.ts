// API Types
export * from './types';

// Configuration
export { loadServerConfig, ServerConfig, RoleKeys, StoreBackend } from './config';

// API State
export {
  ApiState,
  ApiCaller,
  ROLE_IDENTITIES,
  createApiState,
  issueAccountKey,
  persistState,
} from './state';
export { restoreApiState } from './restore';

// Express App
export { createApp } from './app';

// Middleware
export { requireRole, resolveCaller } from './middleware/roleAuth';

// Routes
export { createAccountsRouter } from './routes/accounts';
export { createTransfersRouter } from './routes/transfers';
export { createRewardsRouter } from './routes/rewards';
export { createDistributorRouter } from './routes/distributor';
export { createPrincipalRouter } from './routes/principal';
export { createAdminRouter } from './routes/admin';
export { createEventsRouter } from './routes/events';

// Scheduler
export { BlockScheduler, SchedulerConfig } from './scheduler';
