import { Router, Request, Response } from 'express';
import { ApiState, persistState } from '../state';
import { ErrorCodes } from '../types';
import { requireRole } from '../middleware/roleAuth';
import { handleRouteError, parseAmount, readField, sendError } from '../validation';
import { StakeChange } from '../../services/stakingService';

function stakeChangeBody(change: StakeChange) {
  return {
    accountId: change.accountId,
    previousPrincipal: change.previousPrincipal.toString(),
    principal: change.principal.toString(),
    distributorTracked: change.distributorTracked,
  };
}

/**
 * Create router for the staking principal oracle
 */
export function createPrincipalRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /principal
   * Principal totals
   */
  router.get('/', (_req: Request, res: Response) => {
    const summary = state.staking.summary();
    res.status(200).json({
      success: true,
      totalStakedPrincipal: summary.totalStakedPrincipal.toString(),
      distributorPrincipal: summary.distributorPrincipal.toString(),
      stakerCount: summary.stakerCount,
    });
  });

  /**
   * GET /principal/stakes/:accountId
   */
  router.get('/stakes/:accountId', (req: Request, res: Response) => {
    const { accountId } = req.params;
    res.status(200).json({
      success: true,
      accountId,
      principal: state.principals.principalOf(accountId).toString(),
      distributorTracked: state.principals.isDistributorTracked(accountId),
    });
  });

  /**
   * PUT /principal/stakes/:accountId
   * Set an account's stake. Body: { principal }
   */
  router.put('/stakes/:accountId', requireRole(state, 'principalOracle'), async (req: Request, res: Response) => {
    const principal = parseAmount(readField(req.body, 'principal'));
    if (principal === null) {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'principal must be a non-negative integer');
      return;
    }

    try {
      const change = state.staking.setStake(req.params.accountId, principal);
      await persistState(state);
      res.status(200).json({ success: true, ...stakeChangeBody(change) });
    } catch (error) {
      handleRouteError(res, error, 'setting stake');
    }
  });

  /**
   * POST /principal/move
   * Move stake between accounts. Body: { from, to, amount }
   */
  router.post('/move', requireRole(state, 'principalOracle'), async (req: Request, res: Response) => {
    const from = readField(req.body, 'from');
    const to = readField(req.body, 'to');
    const amount = parseAmount(readField(req.body, 'amount'));

    if (typeof from !== 'string' || typeof to !== 'string' || amount === null) {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'from, to and a non-negative integer amount are required');
      return;
    }

    try {
      const [fromChange, toChange] = state.staking.moveStake(from, to, amount);
      await persistState(state);
      res.status(200).json({
        success: true,
        from: stakeChangeBody(fromChange),
        to: stakeChangeBody(toChange),
      });
    } catch (error) {
      handleRouteError(res, error, 'moving stake');
    }
  });

  /**
   * POST /principal/opt-out
   * Hand an account's rewards to the distributor or take them back.
   * Body: { accountId, optedOut }
   */
  router.post('/opt-out', requireRole(state, 'principalOracle'), async (req: Request, res: Response) => {
    const accountId = readField(req.body, 'accountId');
    const optedOut = readField(req.body, 'optedOut');

    if (typeof accountId !== 'string' || typeof optedOut !== 'boolean') {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'accountId and boolean optedOut are required');
      return;
    }

    try {
      const balance = state.staking.setDistributorTracking(accountId, optedOut);
      await persistState(state);
      res.status(200).json({
        success: true,
        accountId: accountId.trim(),
        optedOut,
        balance: balance.toString(),
      });
    } catch (error) {
      handleRouteError(res, error, 'toggling opt-out');
    }
  });

  return router;
}
