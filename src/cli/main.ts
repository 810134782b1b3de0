#!/usr/bin/env node

/**
 * cargo-verify entry point.
 * Thin wrapper — reads argv once and hands the exit code back to Node.
 */

import { runCli } from './program.js';
import { EXIT_CODES } from '../config/index.js';
import * as log from '../utils/logger.js';

void runCli(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = EXIT_CODES.ERROR;
  });
