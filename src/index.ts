#!/usr/bin/env node
import 'dotenv/config';
import logger from './utils/logger.js';
import { main } from './cli.js';

// Global error handlers to prevent silent crashes
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.stack || error.message}`);
});
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${String(reason)}`);
});

main(process.argv.slice(2), process.env)
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.error(`Fatal: ${error instanceof Error ? error.stack || error.message : String(error)}`);
    process.exit(1);
  });
