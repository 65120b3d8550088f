// apps/cli/src/analyze.ts
//
// Runs one analysis: builds the board, searches, and packs the outcome into
// a protocol verdict.

import { verdictRes, type AnalysisReq, type StrategyDoc, type VerdictRes } from '@connections/protocol';
import { BeliefState, createGameParams, findWinningStrategy, type Strategy } from '@connections/solver-core';

import type { Logger } from './logger.js';

export function toStrategyDoc(strategy: Strategy): StrategyDoc {
  if (strategy.kind === 'solved') return { kind: 'solved' };
  return {
    kind: 'guess',
    selection: [...strategy.selection],
    branches: strategy.branches.map((b) => ({ feedback: b.feedback, next: toStrategyDoc(b.next) })),
  };
}

/**
 * analyze evaluates an empty board of `req.slots` slots.
 * Throws the solver's InvalidConfigurationError / SearchExhaustedError as is.
 */
export function analyze(req: AnalysisReq, log: Logger, withStrategy = false): VerdictRes {
  const params = createGameParams(req.slots, req.groupSize);
  const state = BeliefState.initial(params);
  log.info({ slots: req.slots, tries: req.tries, groupSize: req.groupSize }, 'analysing board');

  const started = performance.now();
  const outcome = findWinningStrategy(state, req.tries, { memoize: req.memoize, maxNodes: req.maxNodes });
  const elapsedMs = performance.now() - started;
  log.info({ winning: outcome.winning, ...outcome.stats, elapsedMs }, 'search finished');

  return verdictRes.parse({
    winning: outcome.winning,
    slots: req.slots,
    tries: req.tries,
    groupSize: req.groupSize,
    stats: { ...outcome.stats, elapsedMs },
    strategy: withStrategy && outcome.strategy ? toStrategyDoc(outcome.strategy) : undefined,
  });
}
