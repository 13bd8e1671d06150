import { Router, Request, Response } from 'express';
import { ApiState, ROLE_IDENTITIES, persistState } from '../state';
import { ErrorCodes } from '../types';
import { requireRole } from '../middleware/roleAuth';
import { handleRouteError, readField, sendError } from '../validation';

/**
 * Create router for admin endpoints
 */
export function createAdminRouter(state: ApiState): Router {
  const router = Router();

  // All admin endpoints require the admin key
  router.use(requireRole(state, 'admin'));

  /**
   * POST /admin/protocol-fee
   * Body: { protocolFee } in basis points
   */
  router.post('/protocol-fee', async (req: Request, res: Response) => {
    const protocolFee = readField(req.body, 'protocolFee');
    if (typeof protocolFee !== 'number') {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'protocolFee must be a number of basis points');
      return;
    }

    try {
      state.ledger.setProtocolFee(ROLE_IDENTITIES.admin, protocolFee);
      await persistState(state);
      console.log(`Admin: protocol fee set to ${protocolFee} bps`);
      res.status(200).json({ success: true, protocolFee });
    } catch (error) {
      handleRouteError(res, error, 'setting protocol fee');
    }
  });

  /**
   * POST /admin/protocol-fee-recipient
   * Body: { recipient } (account id, or null to merge the fee into the distributor)
   */
  router.post('/protocol-fee-recipient', async (req: Request, res: Response) => {
    const recipient = readField(req.body, 'recipient');
    if (recipient !== null && typeof recipient !== 'string') {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'recipient must be an account id or null');
      return;
    }

    try {
      state.ledger.setProtocolFeeRecipient(ROLE_IDENTITIES.admin, recipient);
      await persistState(state);
      const configured = state.ledger.feeSettings().protocolFeeRecipient;
      console.log(`Admin: protocol fee recipient set to ${configured ?? 'distributor'}`);
      res.status(200).json({ success: true, recipient: configured });
    } catch (error) {
      handleRouteError(res, error, 'setting protocol fee recipient');
    }
  });

  return router;
}
