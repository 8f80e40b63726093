#!/usr/bin/env node

import { logger } from './lib/logger';
import { createProgram } from './interfaces/cli/registry';
import { formatErrorForLogging } from './shared/errors';

createProgram()
  .parseAsync(process.argv)
  .catch(error => {
    logger.error(formatErrorForLogging(error), 'Error executing command');
    process.exit(1);
  });
