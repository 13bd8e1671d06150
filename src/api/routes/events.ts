import { Router, Request, Response } from 'express';
import { ApiState } from '../state';
import { ErrorCodes } from '../types';
import { handleRouteError, parseQueryInt, sendError } from '../validation';
import { LedgerEvent, isLedgerEventType } from '../../persistence/eventTypes';
import { BlockRange } from '../../persistence/interfaces';

const BLOCK_PATTERN = /^\d{1,15}$/;

/**
 * Block range from fromBlock / toBlock query params. Undefined when neither
 * is given, null when either is malformed or the range is empty.
 */
function parseBlockRange(fromBlock: unknown, toBlock: unknown): BlockRange | undefined | null {
  if (fromBlock === undefined && toBlock === undefined) return undefined;
  const bound = (raw: unknown, fallback: number): number | null => {
    if (raw === undefined) return fallback;
    return typeof raw === 'string' && BLOCK_PATTERN.test(raw) ? Number(raw) : null;
  };
  const from = bound(fromBlock, 0);
  const to = bound(toBlock, Number.MAX_SAFE_INTEGER);
  if (from === null || to === null || from > to) return null;
  return { from, to };
}

/**
 * Create router for the ledger's event log
 */
export function createEventsRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /events
   * Query params: from (sequence number, default 0), limit (default 50, max 500),
   * or type / actor to filter instead of paging. fromBlock / toBlock
   * (inclusive) narrow a type or actor filter.
   */
  router.get('/', async (req: Request, res: Response) => {
    const { type, actor } = req.query;
    const blockRange = parseBlockRange(req.query.fromBlock, req.query.toBlock);
    if (blockRange === null) {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'fromBlock and toBlock must be block numbers with fromBlock <= toBlock');
      return;
    }

    try {
      let events: LedgerEvent[];
      if (type !== undefined) {
        if (!isLedgerEventType(type)) {
          sendError(res, 400, ErrorCodes.INVALID_REQUEST, `Unknown event type: ${String(type)}`);
          return;
        }
        events = await state.stores.event.queryByType(type, blockRange);
      } else if (typeof actor === 'string' && actor !== '') {
        events = await state.stores.event.queryByActor(actor, blockRange);
      } else {
        const from = parseQueryInt(req.query.from, 0, 0, Number.MAX_SAFE_INTEGER);
        const limit = parseQueryInt(req.query.limit, 50, 1, 500);
        events = await state.stores.event.listFrom(from, limit);
      }

      res.status(200).json({ success: true, count: events.length, events });
    } catch (error) {
      handleRouteError(res, error, 'querying events');
    }
  });

  return router;
}
