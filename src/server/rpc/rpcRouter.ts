import { Router } from 'express';
import { PROTOCOL_VERSION } from '../../shared/types/protocol';
import { JsonRpcRequestSchema } from '../../shared/validation/protocolSchemas';
import { asyncHandler } from '../middleware/errorHandler';
import { getMetricsService } from '../services/MetricsService';
import { getRequestContext, logger } from '../utils/logger';
import {
  RPC_ERROR,
  isClientRpcError,
  rpcFailure,
  rpcSuccess,
  toRpcError,
} from './jsonRpc';

export type RpcParams = Record<string, unknown>;

export type RpcHandler = (params: RpcParams) => unknown | Promise<unknown>;

export interface RpcMethod {
  description: string;
  handler: RpcHandler;
}

/** Method name -> handler, one table per role. */
export type RpcMethodTable = Record<string, RpcMethod>;

export interface RpcRouterOptions {
  serverName: string;
  version: string;
}

function senderOf(params: RpcParams): string | undefined {
  return typeof params.sender === 'string' ? params.sender : undefined;
}

/**
 * POST /mcp JSON-RPC endpoint. `tools/list` and `initialize` are answered
 * from the table itself.
 */
export function createRpcRouter(methods: RpcMethodTable, options: RpcRouterOptions): Router {
  const router = Router();
  const metrics = getMetricsService();

  const builtins: RpcMethodTable = {
    initialize: {
      description: 'Protocol handshake',
      handler: () => ({
        protocolVersion: PROTOCOL_VERSION,
        serverInfo: { name: options.serverName, version: options.version },
        capabilities: { tools: {} },
      }),
    },
    'tools/list': {
      description: 'List available methods',
      handler: () => ({
        tools: Object.entries(methods).map(([name, method]) => ({
          name,
          description: method.description,
        })),
      }),
    },
  };

  router.post(
    '/mcp',
    asyncHandler(async (req, res) => {
      const envelope = JsonRpcRequestSchema.safeParse(req.body);
      if (!envelope.success) {
        logger.warn('Rejected malformed JSON-RPC request', {
          issues: envelope.error.issues.map((issue) => issue.message),
        });
        res.status(400).json(
          rpcFailure(null, { code: RPC_ERROR.INVALID_REQUEST, message: 'Invalid Request' })
        );
        return;
      }

      const { method: methodName, id = null } = envelope.data;
      const params = envelope.data.params ?? {};

      const context = getRequestContext();
      if (context) {
        context.rpcMethod = methodName;
        context.sender = senderOf(params);
      }

      const method = methods[methodName] ?? builtins[methodName];
      if (!method) {
        metrics.recordRpcRequest('unknown', 'error');
        res.json(
          rpcFailure(id, {
            code: RPC_ERROR.METHOD_NOT_FOUND,
            message: `Method not found: ${methodName}`,
          })
        );
        return;
      }

      try {
        const result = await method.handler(params);
        metrics.recordRpcRequest(methodName, 'ok');
        res.json(rpcSuccess(id, result));
      } catch (error) {
        const rpcError = toRpcError(error);
        metrics.recordRpcRequest(methodName, 'error');

        if (isClientRpcError(rpcError)) {
          logger.warn('RPC call rejected', { method: methodName, error: rpcError.message });
        } else {
          logger.error('RPC handler failed', { method: methodName, error });
        }
        res.json(rpcFailure(id, rpcError));
      }
    })
  );

  return router;
}
