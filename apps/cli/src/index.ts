#!/usr/bin/env node
// apps/cli/src/index.ts
//
// Process entry point: loads .env, runs the CLI on process.argv and hands
// the exit code back to Node.

import 'dotenv/config';

import { run } from './cli.js';

process.exitCode = run(process.argv.slice(2), {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
});
