import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiCaller, ApiState } from '../state';
import { LedgerRole, ROLE_LABELS } from '../../services/serviceTypes';
import { ErrorCodes } from '../types';

const API_KEY_HEADER = 'x-api-key';

/**
 * Look up the caller behind the X-Api-Key header. Sends a 401 and returns
 * null when the header is missing or unknown.
 */
export function resolveCaller(state: ApiState, req: Request, res: Response): ApiCaller | null {
  const providedKey = req.header(API_KEY_HEADER);

  if (!providedKey) {
    res.status(401).json({
      success: false,
      error: 'Missing X-Api-Key header',
      code: ErrorCodes.MISSING_API_KEY,
    });
    return null;
  }

  const caller = state.callers.get(providedKey);
  if (!caller) {
    res.status(401).json({
      success: false,
      error: 'Invalid API key',
      code: ErrorCodes.INVALID_API_KEY,
    });
    return null;
  }

  return caller;
}

/**
 * Middleware admitting only the holder of the given role's key
 */
export function requireRole(state: ApiState, role: LedgerRole): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const caller = resolveCaller(state, req, res);
    if (!caller) return;

    if (caller.kind !== 'role' || caller.role !== role) {
      res.status(403).json({
        success: false,
        error: `Only the ${ROLE_LABELS[role]} may call this endpoint`,
        code: ErrorCodes.UNAUTHORIZED,
      });
      return;
    }

    next();
  };
}
