import { createServer } from 'http';
import { createAgentRuntime } from './agents';
import { createApp } from './app';
import { config } from './config';
import { logger } from './utils/logger';

const SHUTDOWN_GRACE_MS = 10000;

let shuttingDown = false;

async function startServer(): Promise<void> {
  const active = await createAgentRuntime(config);

  const app = createApp(active.methods, {
    role: active.role,
    agentId: active.agentId,
    version: config.app.version,
  });
  const server = createServer(app);

  server.listen(config.server.port, config.server.host, () => {
    logger.info(`${active.role} listening on ${config.server.host}:${config.server.port}`, {
      endpoint: config.agent.endpoint,
      leagueId: config.league.id,
      environment: config.nodeEnv,
    });
    active.onListening().catch((error: unknown) => {
      logger.error('Start-up hook failed', { error });
    });
  });

  const gracefulShutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      active
        .onShutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown hook failed', { error });
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);
}

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason });
  process.exit(1);
});

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
