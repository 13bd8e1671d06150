import { Router, Request, Response } from 'express';
import { ApiState, ROLE_IDENTITIES, persistState } from '../state';
import { ErrorCodes } from '../types';
import { requireRole } from '../middleware/roleAuth';
import { handleRouteError, parseAmount, readField, sendError } from '../validation';

/**
 * Create router for the proof-based distributor
 */
export function createDistributorRouter(state: ApiState): Router {
  const router = Router();

  /**
   * POST /distributor/claim
   * Pay a proven claim out of the distributor balance. Body: { accountId, amount }
   */
  router.post('/claim', requireRole(state, 'distributor'), async (req: Request, res: Response) => {
    const accountId = readField(req.body, 'accountId');
    const amount = parseAmount(readField(req.body, 'amount'));

    if (typeof accountId !== 'string' || amount === null) {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'accountId and a non-negative integer amount are required');
      return;
    }

    try {
      const settlement = state.ledger.claim(ROLE_IDENTITIES.distributor, accountId, amount);
      await persistState(state);

      res.status(200).json({
        success: true,
        accountId: settlement.accountId,
        amount: settlement.amount.toString(),
        distributorBalance: settlement.distributorBalance.toString(),
        accountBalance: settlement.accountBalance.toString(),
      });
    } catch (error) {
      handleRouteError(res, error, 'settling claim');
    }
  });

  return router;
}
