import { Router, Request, Response } from 'express';
import { ApiState, persistState } from '../state';
import { ErrorCodes } from '../types';
import { resolveCaller } from '../middleware/roleAuth';
import { handleRouteError, parseAmount, readField, sendError } from '../validation';
import { realAccount } from '../../types';

/**
 * Create router for reward transfers between accounts
 */
export function createTransfersRouter(state: ApiState): Router {
  const router = Router();

  /**
   * POST /transfers
   * Body: { from, to, amount }. X-Api-Key must be the sender's account key.
   */
  router.post('/', async (req: Request, res: Response) => {
    const caller = resolveCaller(state, req, res);
    if (!caller) return;

    const from = readField(req.body, 'from');
    const to = readField(req.body, 'to');
    const amount = parseAmount(readField(req.body, 'amount'));

    if (typeof from !== 'string' || typeof to !== 'string' || amount === null) {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'from, to and a non-negative integer amount are required');
      return;
    }

    try {
      const sender = realAccount(from);
      if (caller.kind !== 'account' || caller.accountId !== sender.id) {
        sendError(res, 403, ErrorCodes.UNAUTHORIZED, `API key does not belong to ${sender.id}`);
        return;
      }

      const result = state.ledger.transfer(sender.id, to, amount);
      await persistState(state);

      res.status(200).json({
        success: true,
        from: result.from,
        to: result.to,
        amount: result.amount.toString(),
        senderBalance: result.senderBalance.toString(),
        recipientBalance: result.recipientBalance.toString(),
        blockNumber: state.clock.currentBlock(),
      });
    } catch (error) {
      handleRouteError(res, error, 'transferring rewards');
    }
  });

  return router;
}
