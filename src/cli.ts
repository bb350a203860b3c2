#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './cli/index';
import { logger } from './utils/logger';

dotenv.config();

// Handle unhandled rejections
process.on('unhandledRejection', error => {
  logger.error('Unhandled rejection:', error);
  process.exit(1);
});

runCli(process.argv.slice(2)).then(code => process.exit(code));
