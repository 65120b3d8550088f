// apps/cli/src/cli.ts
//
// Command-line front end. Parses options with commander, merges them with
// the environment defaults, validates the result against the protocol and
// prints the verdict.
//
// Exit codes:
//   • 0 → a verdict was printed, winning or not
//   • 1 → invalid options/environment, or the search hit its node limit

import { analysisReq, describeIssues, type VerdictRes } from '@connections/protocol';
import { isSolverError } from '@connections/solver-core';
import { Command, CommanderError } from 'commander';

import { analyze } from './analyze.js';
import { loadConfig, type Config } from './config.js';
import { formatStrategy, formatVerdict } from './format.js';
import { createLogger, type Logger } from './logger.js';

export const VERSION = '0.1.0';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

interface CliOptions {
  slots: number;
  tries: number;
  strategy?: boolean;
  json?: boolean;
  memo?: boolean;
  maxNodes?: number;
}

const toNumber = (v: string) => Number(v);

function buildProgram(io: CliIO): Command {
  return new Command()
    .name('connections-strategy')
    .description('Checks whether there is a winning strategy given a certain state of a game of "Connections"')
    .version(VERSION)
    .option('-s, --slots <n>', 'Number of slots on the board', toNumber, 8)
    .option('-t, --tries <n>', 'Number of mistakes the player may make', toNumber, 4)
    .option('--strategy', 'Print the winning strategy when there is one')
    .option('--json', 'Print the verdict as JSON')
    .option('--memo', 'Memoize repeated positions, overriding CONNECTIONS_MEMO')
    .option('--no-memo', 'Disable memoization of repeated positions')
    .option('--max-nodes <n>', 'Give up after visiting this many search nodes', toNumber)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.out(s.trimEnd()),
      writeErr: (s) => io.err(s.trimEnd()),
    });
}

/**
 * run executes the CLI against `argv` (user arguments only, no node/script
 * path) and returns the exit code instead of exiting.
 */
export function run(argv: readonly string[], io: CliIO, env: NodeJS.ProcessEnv = process.env, logger?: Logger): number {
  const program = buildProgram(io);
  try {
    program.parse([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  const opts = program.opts<CliOptions>();

  let config: Config;
  try {
    config = loadConfig(env);
  } catch (err) {
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  const log = logger ?? createLogger(config.logLevel);

  const req = analysisReq.safeParse({
    slots: opts.slots,
    tries: opts.tries,
    memoize: opts.memo ?? config.memoize,
    maxNodes: opts.maxNodes ?? config.maxNodes,
  });
  if (!req.success) {
    const message = describeIssues(req.error);
    log.error({ issues: req.error.issues }, 'invalid options');
    io.err(`Error: invalid options: ${message}`);
    return 1;
  }

  let verdict: VerdictRes;
  try {
    verdict = analyze(req.data, log, Boolean(opts.strategy));
  } catch (err) {
    if (!isSolverError(err)) throw err;
    log.error({ code: err.code, details: err.details }, err.message);
    io.err(`Error: ${err.message}`);
    return 1;
  }

  if (opts.json) {
    io.out(JSON.stringify(verdict, null, 2));
    return 0;
  }
  io.out(formatVerdict(verdict));
  if (verdict.strategy) {
    for (const line of formatStrategy(verdict.strategy)) io.out(line);
  }
  return 0;
}
