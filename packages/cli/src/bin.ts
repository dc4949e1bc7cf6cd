#!/usr/bin/env node
import { run } from './cli.js';
import { error } from './output.js';

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  },
);
