import { ZodError } from 'zod';
import { isLeagueError } from '../../shared/errors';

/**
 * JSON-RPC 2.0 error codes used on the wire.
 */
export const RPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  /** Domain error; `data.code` carries the LeagueErrorCode. */
  DOMAIN_ERROR: -32000,
} as const;

export type JsonRpcId = string | number | null;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params: Record<string, unknown>;
  id: JsonRpcId;
}

export interface JsonRpcSuccess<T = unknown> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: T;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse<T = unknown> = JsonRpcSuccess<T> | JsonRpcFailure;

export function rpcSuccess<T>(id: JsonRpcId, result: T): JsonRpcSuccess<T> {
  return { jsonrpc: '2.0', id, result };
}

export function rpcFailure(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcFailure {
  return { jsonrpc: '2.0', id, error };
}

/**
 * Map any thrown value onto a JSON-RPC error object.
 */
export function toRpcError(error: unknown): JsonRpcErrorObject {
  if (error instanceof ZodError) {
    return {
      code: RPC_ERROR.INVALID_PARAMS,
      message: error.issues[0]?.message ?? 'Invalid params',
      data: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    };
  }

  if (isLeagueError(error)) {
    return {
      code: RPC_ERROR.DOMAIN_ERROR,
      message: error.message,
      data: { code: error.code, context: error.context },
    };
  }

  return {
    code: RPC_ERROR.INTERNAL_ERROR,
    message: 'Internal error',
  };
}

/** Client errors are the caller's fault; everything else logs at error. */
export function isClientRpcError(error: JsonRpcErrorObject): boolean {
  return error.code === RPC_ERROR.INVALID_PARAMS || error.code === RPC_ERROR.DOMAIN_ERROR;
}
