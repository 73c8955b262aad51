#!/usr/bin/env node
/**
 * @fileoverview Process entry point. Meant to be invoked by cron or a
 * similar scheduler, one run at a time.
 */

import { main } from './cli.js';
import { closeLogSinks } from './utils/observability/index.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  })
  .finally(closeLogSinks);
