#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { server } from './server.js';
import { configManager } from './config-manager.js';
import { errorMessage } from './tools/docx/errors.js';
import { logger } from './utils/logger.js';

async function runServer() {
  try {
    await configManager.loadConfig();
    logger.debug(`Configuration loaded from ${configManager.path}`);

    process.on('uncaughtException', (error) => {
      logger.error(`Uncaught exception: ${errorMessage(error)}`);
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
      process.exit(1);
    });

    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info("Server connected");
  } catch (error) {
    logger.error(`Failed to start server: ${errorMessage(error)}`);
    process.exit(1);
  }
}

runServer().catch((error: unknown) => {
  logger.error(`Fatal error running server: ${errorMessage(error)}`);
  process.exit(1);
});
