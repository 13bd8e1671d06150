import { Router, Request, Response } from 'express';
import { ApiState, ROLE_IDENTITIES, persistState } from '../state';
import { RewardsStatusResponse, ErrorCodes } from '../types';
import { requireRole } from '../middleware/roleAuth';
import { handleRouteError, parseAmount, readField, sendError } from '../validation';

/**
 * Create router for the global reward accumulator
 */
export function createRewardsRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /rewards
   * Accumulator and fee configuration
   */
  router.get('/', (_req: Request, res: Response) => {
    const accumulator = state.ledger.accumulator();
    const fees = state.ledger.feeSettings();

    const response: RewardsStatusResponse = {
      success: true,
      totalRewards: accumulator.totalRewards.toString(),
      rewardPerToken: accumulator.rewardPerToken.toString(),
      lastUpdateBlockNumber: accumulator.lastUpdateBlockNumber,
      version: accumulator.version,
      currentBlock: state.clock.currentBlock(),
      protocolFee: fees.protocolFee,
      protocolFeeRecipient: fees.protocolFeeRecipient,
    };
    res.status(200).json(response);
  });

  /**
   * GET /rewards/audit
   * Conservation check over all known accounts. Query: tolerance (optional)
   */
  router.get('/audit', (req: Request, res: Response) => {
    const rawTolerance = req.query.tolerance;
    let tolerance: bigint | undefined;
    if (rawTolerance !== undefined) {
      const parsed = parseAmount(rawTolerance);
      if (parsed === null) {
        sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'tolerance must be a non-negative integer');
        return;
      }
      tolerance = parsed;
    }

    try {
      const report = state.staking.audit(tolerance);
      res.status(200).json({
        success: true,
        valid: report.valid,
        totalRewards: report.totalRewards.toString(),
        settledTotal: report.settledTotal.toString(),
        shortfall: report.shortfall.toString(),
        tolerance: report.tolerance.toString(),
        accountCount: report.accountCount,
      });
    } catch (error) {
      handleRouteError(res, error, 'auditing rewards');
    }
  });

  /**
   * POST /rewards/report
   * Rewards oracle reports the new cumulative total. Body: { totalRewards }
   */
  router.post('/report', requireRole(state, 'rewardsOracle'), async (req: Request, res: Response) => {
    const totalRewards = parseAmount(readField(req.body, 'totalRewards'));
    if (totalRewards === null) {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'totalRewards must be a non-negative integer');
      return;
    }

    try {
      const update = state.ledger.reportTotalRewards(ROLE_IDENTITIES.rewardsOracle, totalRewards);
      await persistState(state);
      console.log(
        `Rewards: total ${update.totalRewards} (+${update.periodRewards}) at block ${state.clock.currentBlock()}`
      );

      res.status(200).json({
        success: true,
        periodRewards: update.periodRewards.toString(),
        totalRewards: update.totalRewards.toString(),
        rewardPerToken: update.rewardPerToken.toString(),
        distributorReward: update.distributorReward.toString(),
        protocolReward: update.protocolReward.toString(),
        blockNumber: state.clock.currentBlock(),
      });
    } catch (error) {
      handleRouteError(res, error, 'reporting rewards');
    }
  });

  return router;
}
