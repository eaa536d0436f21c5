#!/usr/bin/env node

import { runCli } from './cli';
import { logError } from './logging';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logError('[loadtest] run failed', error);
    process.exitCode = 1;
  });
