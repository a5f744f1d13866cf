#!/usr/bin/env node
/**
 * @fileoverview entity-resolver CLI entry point
 */

import { runCli } from './main.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
