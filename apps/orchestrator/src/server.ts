import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';

function startServer(): void {
  const app = createApp();
  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info(`labfleet orchestrator listening on ${config.server.host}:${config.server.port}`, {
      environment: config.server.env,
      configPath: config.fleet.configPath,
      staticPlanPath: config.fleet.staticPlanPath,
      persistMode: config.provisioning.persistMode,
      strategies: config.provisioning.strategies,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down`);
    server.close((error) => {
      if (error) {
        logger.error('Error during shutdown', { error: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer();
