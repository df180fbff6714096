#!/usr/bin/env node

/**
 * CLI entry point: confluence-md build | clean | status
 */

import { config as loadDotenv } from 'dotenv';
import { runCli } from './program.js';
import { errorMessage } from '../core/errors.js';

// Load .env file if it exists
loadDotenv();

runCli(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exitCode = 3;
  }
);
