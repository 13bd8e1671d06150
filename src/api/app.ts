import express, { Express, Request, Response, NextFunction } from 'express';
import { ApiState } from './state';
import { createAccountsRouter } from './routes/accounts';
import { createTransfersRouter } from './routes/transfers';
import { createRewardsRouter } from './routes/rewards';
import { createDistributorRouter } from './routes/distributor';
import { createPrincipalRouter } from './routes/principal';
import { createAdminRouter } from './routes/admin';
import { createEventsRouter } from './routes/events';
import { ErrorCodes } from './types';

/**
 * Create an Express app with all routes configured
 */
export function createApp(state: ApiState): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    const accumulator = state.ledger.accumulator();
    res.json({
      status: 'ok',
      currentBlock: state.clock.currentBlock(),
      lastUpdateBlockNumber: accumulator.lastUpdateBlockNumber,
      version: accumulator.version,
      accounts: state.ledger.accountIds().length,
      stakers: state.principals.stakerCount,
      registeredAccounts: state.accountKeys.size,
    });
  });

  // Mount routes
  app.use('/accounts', createAccountsRouter(state));
  app.use('/transfers', createTransfersRouter(state));
  app.use('/rewards', createRewardsRouter(state));
  app.use('/distributor', createDistributorRouter(state));
  app.use('/principal', createPrincipalRouter(state));
  app.use('/admin', createAdminRouter(state));
  app.use('/events', createEventsRouter(state));

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      code: ErrorCodes.INTERNAL_ERROR,
    });
  });

  return app;
}
