import { Router, Request, Response } from 'express';
import { ApiState, issueAccountKey, persistState } from '../state';
import { BalanceResponse, CheckpointResponse, RegisterAccountResponse, ErrorCodes } from '../types';
import { handleRouteError, readField, sendError } from '../validation';
import { formatUnits } from '../../fixedPoint';
import { realAccount } from '../../types';

/** Validate accountId format: 1-64 chars, no control characters */
function isValidAccountId(id: string): boolean {
  return id.length >= 1 && id.length <= 64 && !/[\x00-\x1f]/.test(id);
}

/**
 * Create router for account endpoints
 */
export function createAccountsRouter(state: ApiState): Router {
  const router = Router();

  /**
   * POST /accounts/register
   * Issue an API key for an account. Body: { accountId }
   */
  router.post('/register', (req: Request, res: Response) => {
    const accountId = readField(req.body, 'accountId');

    if (typeof accountId !== 'string' || !isValidAccountId(accountId.trim())) {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'accountId must be 1-64 printable characters');
      return;
    }

    try {
      const account = realAccount(accountId);
      if (state.accountKeys.has(account.id)) {
        sendError(res, 409, ErrorCodes.DUPLICATE_ACCOUNT, `Account already registered: ${account.id}`);
        return;
      }

      const response: RegisterAccountResponse = {
        success: true,
        accountId: account.id,
        accountKey: issueAccountKey(state, account.id),
      };
      res.status(201).json(response);
    } catch (error) {
      handleRouteError(res, error, 'registering account');
    }
  });

  /**
   * POST /accounts/refresh
   * Settle two accounts against one accumulator read. Body: { first, second }
   * (placed before param routes to avoid /:accountId conflict)
   */
  router.post('/refresh', async (req: Request, res: Response) => {
    const first = readField(req.body, 'first');
    const second = readField(req.body, 'second');

    if (typeof first !== 'string' || typeof second !== 'string') {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'first and second account ids are required');
      return;
    }

    try {
      const optedOut = state.ledger.refreshCheckpoints(first, second);
      await persistState(state);
      res.status(200).json({ success: true, optedOut });
    } catch (error) {
      handleRouteError(res, error, 'refreshing checkpoints');
    }
  });

  /**
   * GET /accounts/:accountId/balance
   * The null account id reads the distributor
   */
  router.get('/:accountId/balance', (req: Request, res: Response) => {
    const { accountId } = req.params;

    try {
      const balance = state.ledger.balanceOf(accountId);
      const response: BalanceResponse = {
        success: true,
        accountId,
        balance: balance.toString(),
        formatted: formatUnits(balance),
        optedOut: state.ledger.isOptedOut(accountId),
      };
      res.status(200).json(response);
    } catch (error) {
      handleRouteError(res, error, 'reading balance');
    }
  });

  /**
   * GET /accounts/:accountId/checkpoint
   */
  router.get('/:accountId/checkpoint', (req: Request, res: Response) => {
    const { accountId } = req.params;

    try {
      const checkpoint = state.ledger.checkpointOf(accountId);
      const response: CheckpointResponse = {
        success: true,
        accountId,
        accruedReward: checkpoint.accruedReward.toString(),
        rewardPerTokenAtCheckpoint: checkpoint.rewardPerTokenAtCheckpoint.toString(),
        optedOut: state.ledger.isOptedOut(accountId),
      };
      res.status(200).json(response);
    } catch (error) {
      handleRouteError(res, error, 'reading checkpoint');
    }
  });

  /**
   * POST /accounts/:accountId/refresh
   * Settle one account at the current accumulator (anyone may call)
   */
  router.post('/:accountId/refresh', async (req: Request, res: Response) => {
    const { accountId } = req.params;

    try {
      const optedOut = state.ledger.refreshCheckpoint(accountId);
      await persistState(state);
      const checkpoint = state.ledger.checkpointOf(accountId);
      res.status(200).json({
        success: true,
        accountId,
        optedOut,
        accruedReward: checkpoint.accruedReward.toString(),
        rewardPerTokenAtCheckpoint: checkpoint.rewardPerTokenAtCheckpoint.toString(),
      });
    } catch (error) {
      handleRouteError(res, error, 'refreshing checkpoint');
    }
  });

  return router;
}
