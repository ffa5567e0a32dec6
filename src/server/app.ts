import express, { type Express } from 'express';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestContext } from './middleware/requestContext';
import { createRpcRouter, type RpcMethodTable } from './rpc/rpcRouter';
import { getMetricsService } from './services/MetricsService';

export interface AppOptions {
  role: string;
  agentId: () => string | null;
  version: string;
}

/**
 * Express application shared by every role: JSON-RPC on POST /mcp plus
 * /health and /metrics. Only the method table differs between roles.
 */
export function createApp(methods: RpcMethodTable, options: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestContext);
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      role: options.role,
      agent_id: options.agentId(),
      version: options.version,
      timestamp: new Date().toISOString(),
    });
  });

  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      const metrics = getMetricsService();
      res.set('Content-Type', metrics.getContentType());
      res.send(await metrics.getMetrics());
    })
  );

  app.use(createRpcRouter(methods, { serverName: `parity-league-${options.role}`, version: options.version }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
