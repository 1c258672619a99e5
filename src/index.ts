#!/usr/bin/env node

import { cli } from './cli.js';
import { loggers } from './lib/logger.js';

cli.parseAsync(process.argv).catch((error: unknown) => {
  loggers.cli.error('Command failed', error instanceof Error ? error : new Error(String(error)));
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
