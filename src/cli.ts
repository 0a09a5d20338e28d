#!/usr/bin/env node
// askweb CLI entry

// Load environment variables from .env file
import 'dotenv/config';

import { buildProgram } from './cli/program.js';
import { logger } from './logger.js';

buildProgram()
  .parseAsync(process.argv)
  .catch(err => {
    logger.fatal({ err }, 'askweb failed');
    process.exitCode = 1;
  });
