#!/usr/bin/env node
import { runCli } from './ui/cli.js';
import { formatErrorForLogging } from './utils/errorhandler.js';
import { logger } from './utils/logger.js';

runCli().catch((error) => {
  logger.error('Dungeon director stopped unexpectedly', formatErrorForLogging(error));
  process.exitCode = 1;
});
