#!/usr/bin/env node

import { createProgram } from './cli.js';
import { logger, errorMessage } from './utils/logger.js';

createProgram()
  .parseAsync()
  .catch(error => {
    logger.error(`Fatal error: ${errorMessage(error)}`);
    process.exit(1);
  });
