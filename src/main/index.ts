#!/usr/bin/env node
/**
 * tubetagger - Command Line Entry Point
 */

import { main } from './cli';
import { errorMessage } from './services/errors';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  },
);
