import { createApp } from '@/app.js';
import { createServices } from '@/bootstrap.js';
import { createAppConfig } from '@/config/app-config.js';
import { env } from '@/config/environment.js';
import logger from '@/config/logger.js';

async function startServer(): Promise<void> {
  try {
    const config = createAppConfig(env);
    const services = createServices(config);

    logger.info('Initializing database connection...');
    await services.connection.connect();
    logger.info('✓ SQLite connection established', {
      path: config.database.path,
      tools: services.registry.list().length,
    });

    // Start the server
    const app = createApp(services, config);
    const server = app.listen(config.server.port, () => {
      logger.info(`🚀 Server running on port ${config.server.port} in ${env.NODE_ENV} mode`);
    });

    // Graceful shutdown
    const gracefulShutdown = (signal: string): void => {
      logger.info(`Received ${signal}. Starting graceful shutdown...`);

      server.close(() => {
        logger.info('HTTP server closed');

        services.connection
          .disconnect()
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error('Error during shutdown:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
