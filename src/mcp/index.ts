#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServices } from '@/bootstrap.js';
import { createAppConfig } from '@/config/app-config.js';
import { env } from '@/config/environment.js';
import logger from '@/config/logger.js';
import { createMcpServer } from './server.js';

async function startMcpServer(): Promise<void> {
  try {
    const config = createAppConfig(env);
    const services = createServices(config);

    await services.connection.connect();

    const server = createMcpServer(services, config.server);
    await server.connect(new StdioServerTransport());
    logger.info('MCP server listening on stdio', {
      name: config.server.name,
      tools: services.registry.list().length,
    });

    const shutdown = (signal: string): void => {
      logger.info(`Received ${signal}. Closing MCP server...`);

      server
        .close()
        .then(() => services.connection.disconnect())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown:', error);
          process.exit(1);
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start MCP server:', error);
    process.exit(1);
  }
}

void startMcpServer();
