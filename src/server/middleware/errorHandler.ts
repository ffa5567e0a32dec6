import { Request, Response, NextFunction } from 'express';
import { getHttpStatus, isLeagueError } from '../../shared/errors';
import { logger } from '../utils/logger';
import { RPC_ERROR, isClientRpcError, rpcFailure, toRpcError, JsonRpcErrorObject } from '../rpc/jsonRpc';

/**
 * Errors raised by express itself (body-parser) carry an HTTP status and a type.
 */
interface HttpLayerError {
  status?: number;
  type?: string;
}

function httpLayerDetails(error: unknown): HttpLayerError {
  if (typeof error !== 'object' || error === null) return {};
  return {
    status: 'status' in error && typeof error.status === 'number' ? error.status : undefined,
    type: 'type' in error && typeof error.type === 'string' ? error.type : undefined,
  };
}

/**
 * Last-resort error middleware. Every peer surface is JSON-RPC, so errors
 * that escape a route are answered as JSON-RPC failures with a null id.
 */
export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction) => {
  const details = httpLayerDetails(error);

  let statusCode: number;
  let rpcError: JsonRpcErrorObject;

  if (details.type === 'entity.parse.failed') {
    statusCode = 400;
    rpcError = { code: RPC_ERROR.PARSE_ERROR, message: 'Parse error' };
  } else if (details.status !== undefined && details.status >= 400 && details.status < 500) {
    statusCode = details.status;
    rpcError = { code: RPC_ERROR.INVALID_REQUEST, message: 'Invalid request' };
  } else {
    rpcError = toRpcError(error);
    if (isLeagueError(error)) {
      statusCode = getHttpStatus(error);
    } else {
      statusCode = isClientRpcError(rpcError) ? 400 : 500;
    }
  }

  const meta = {
    error: error instanceof Error ? error.message : String(error),
    url: req.url,
    method: req.method,
    statusCode,
  };

  if (statusCode >= 500) {
    logger.error('Server Error:', {
      ...meta,
      stack: error instanceof Error ? error.stack : undefined,
    });
  } else {
    logger.warn('Client Error:', meta);
  }

  res.status(statusCode).json(rpcFailure(null, rpcError));
};

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export const asyncHandler = (fn: AsyncRequestHandler) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    success: false,
    error: {
      message: `Route ${req.originalUrl} not found`,
      code: 'NOT_FOUND',
      timestamp: new Date().toISOString(),
    },
  });
};
