#!/usr/bin/env node
import { createCli } from './cli.js';
import { logger } from './utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch(err => {
    logger.error(`${err instanceof Error ? err.message : err}`);
    process.exit(1);
  });
