#!/usr/bin/env node
import dotenv from 'dotenv';

import { setLogLevel } from './core/logger.js';
import { buildProgram } from './program.js';

async function main() {
  dotenv.config();
  // The logger is created before .env is read.
  if (process.env.LOG_LEVEL) {
    setLogLevel(process.env.LOG_LEVEL);
  }

  await buildProgram().parseAsync(process.argv);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.stack || err.message : String(err));
  process.exit(1);
});
