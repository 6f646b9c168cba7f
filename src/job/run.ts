#!/usr/bin/env node
import { logger } from '../core/logger.js';
import { runDriver } from './driver.js';

// CLI entry point
runDriver(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    logger.error('Sentiment job crashed:', error);
    process.exit(1);
  });
