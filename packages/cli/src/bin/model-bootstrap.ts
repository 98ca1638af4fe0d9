#!/usr/bin/env tsx

/**
 * model-bootstrap CLI Entry Point
 *
 * Loads .env, runs the single bootstrap command and exits with its status.
 */

import 'dotenv/config';
import { runCli } from '../commands/bootstrap.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
