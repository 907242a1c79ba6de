#!/usr/bin/env node
/**
 * @file src/index.ts
 * @description Process entry point: reads configuration from the environment and
 * starts the gateway.
 */

import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { startServer } from './server.js';

function main(): void {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  startServer(config).catch((error: unknown) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
  });
}

try {
  main();
} catch (error) {
  logger.error('Failed to start server:', error);
  process.exit(1);
}
