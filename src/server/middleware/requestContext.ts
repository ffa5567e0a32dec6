import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { RequestContext as LoggerRequestContext, runWithContext } from '../utils/logger';

/**
 * Express.Request augmentation so that req.requestId is available
 * throughout the codebase without additional casting.
 */
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Per-request context middleware.
 *
 * - Derives requestId from X-Request-Id when present, else a UUID.
 * - Echoes X-Request-Id on the response.
 * - Establishes AsyncLocalStorage context for log correlation; the RPC router
 *   fills in the method and sender once the envelope is parsed.
 */
export const requestContext = (req: Request, res: Response, next: NextFunction): void => {
  const headerId = (req.header('x-request-id') ?? '').trim();
  const requestId = headerId.length > 0 ? headerId : randomUUID();

  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const context: LoggerRequestContext = {
    requestId,
    startTime: Date.now(),
  };

  runWithContext(context, () => {
    next();
  });
};
