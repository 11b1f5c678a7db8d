#!/usr/bin/env node
/**
 * kops-gce executable entry point
 */

import { run } from '../cli/cli';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 2;
  });
