// packages/solver-core/src/strategy.ts
//
// Strategy search: does the player have a guaranteed win?
//
// An AND/OR game tree. At every node the player picks a selection (OR), the
// adversary answers with any feedback still consistent with the history
// (AND). A selection wins when every reachable answer leads to a winning
// child; a node wins when one of its selections does.
//
// Budget rules:
//   • an "exact" answer is free,
//   • any other answer costs one mistake, and is fatal when no mistakes
//     are left,
//   • the game is won once every group has been answered "exact".
//
// Exports:
//   • findWinningStrategy → verdict + witnessing strategy tree + stats
//   • hasWinningStrategy  → verdict only
//   • strategyDepth, strategyMistakes → worst-case measures of a tree

import type { BeliefState } from './beliefState.js';
import { InvalidConfigurationError, SearchExhaustedError } from './errors.js';
import { isMistake, type Feedback } from './feedback.js';
import type { Selection } from './slots.js';

export type Strategy =
  | { kind: 'solved' }
  | { kind: 'guess'; selection: Selection; branches: StrategyBranch[] };

export interface StrategyBranch {
  feedback: Feedback;
  next: Strategy;
}

export interface SearchOptions {
  /** Cache verdicts by canonical state. Defaults to true. */
  memoize?: boolean;
  /** Maximum number of search nodes before giving up. */
  maxNodes?: number;
  /** Order in which the candidate selections of one node are tried. */
  reorder?: (candidates: readonly Selection[]) => readonly Selection[];
}

export interface SearchStats {
  nodes: number;
  memoHits: number;
}

export interface SearchOutcome {
  winning: boolean;
  strategy?: Strategy;
  stats: SearchStats;
}

const SOLVED: Strategy = { kind: 'solved' };

class StrategySearch {
  readonly stats: SearchStats = { nodes: 0, memoHits: 0 };
  private readonly memo = new Map<string, Strategy | null>();

  constructor(
    private readonly options: SearchOptions,
    private readonly maxDepth: number,
  ) {}

  solve(state: BeliefState, budget: number, depth: number): Strategy | null {
    this.visit(depth);
    if (state.isSolved()) return SOLVED;

    if (this.options.memoize === false) return this.explore(state, budget, depth);

    const key = `${state.history.canonicalKey()}#${budget}`;
    const cached = this.memo.get(key);
    if (cached !== undefined) {
      this.stats.memoHits++;
      return cached;
    }
    const found = this.explore(state, budget, depth);
    this.memo.set(key, found);
    return found;
  }

  private visit(depth: number): void {
    this.stats.nodes++;
    const { maxNodes } = this.options;
    if (maxNodes !== undefined && this.stats.nodes > maxNodes) {
      throw new SearchExhaustedError(`Search exceeded ${maxNodes} nodes`, { maxNodes });
    }
    if (depth > this.maxDepth) {
      throw new SearchExhaustedError(`Search exceeded depth ${this.maxDepth}`, { maxDepth: this.maxDepth });
    }
  }

  private candidates(state: BeliefState): Iterable<Selection> {
    const { reorder } = this.options;
    return reorder ? reorder([...state.possibleSelections()]) : state.possibleSelections();
  }

  private explore(state: BeliefState, budget: number, depth: number): Strategy | null {
    for (const selection of this.candidates(state)) {
      const branches = this.tryMove(state, selection, budget, depth);
      if (branches) return { kind: 'guess', selection, branches };
    }
    return null;
  }

  /** Branches for every answer to `selection`, or null if one of them loses. */
  private tryMove(state: BeliefState, selection: Selection, budget: number, depth: number): StrategyBranch[] | null {
    const branches: StrategyBranch[] = [];
    for (const feedback of state.possibleResults(selection)) {
      const mistake = isMistake(feedback);
      if (mistake && budget === 0) return null;

      const child = state.withMove({ selection, result: feedback });
      const next = this.solve(child, mistake ? budget - 1 : budget, depth + 1);
      if (!next) return null;
      branches.push({ feedback, next });
    }
    return branches;
  }
}

function checkOptions(errorBudget: number, options: SearchOptions): void {
  if (!Number.isInteger(errorBudget) || errorBudget < 0) {
    throw new InvalidConfigurationError(`Error budget must be a non-negative integer, got ${errorBudget}`, {
      errorBudget,
    });
  }
  const { maxNodes } = options;
  if (maxNodes !== undefined && (!Number.isInteger(maxNodes) || maxNodes <= 0)) {
    throw new InvalidConfigurationError(`Node limit must be a positive integer, got ${maxNodes}`, { maxNodes });
  }
}

/**
 * findWinningStrategy searches for a strategy that wins from `state` whatever
 * the hidden answer key, with at most `errorBudget` mistakes.
 *
 * Throws InvalidConfigurationError for a negative budget or a history that no
 * answer key agrees with, and SearchExhaustedError when `maxNodes` is hit.
 *
 * Example:
 *   findWinningStrategy(BeliefState.initial(createGameParams(4)), 0)
 *   → { winning: true, strategy: guess [0,1,2,3] → exact → solved, ... }
 */
export function findWinningStrategy(
  state: BeliefState,
  errorBudget: number,
  options: SearchOptions = {},
): SearchOutcome {
  checkOptions(errorBudget, options);
  if (state.solutions().length === 0) {
    throw new InvalidConfigurationError('The move history is not consistent with any answer key', {
      moves: state.moves.length,
    });
  }

  const search = new StrategySearch(options, errorBudget + state.groupCount);
  const strategy = search.solve(state, errorBudget, 0);
  return strategy
    ? { winning: true, strategy, stats: search.stats }
    : { winning: false, stats: search.stats };
}

export function hasWinningStrategy(state: BeliefState, errorBudget: number, options: SearchOptions = {}): boolean {
  return findWinningStrategy(state, errorBudget, options).winning;
}

/** Worst-case number of guesses the strategy needs. */
export function strategyDepth(strategy: Strategy): number {
  if (strategy.kind === 'solved') return 0;
  return 1 + Math.max(0, ...strategy.branches.map((b) => strategyDepth(b.next)));
}

/** Worst-case number of mistakes made while following the strategy. */
export function strategyMistakes(strategy: Strategy): number {
  if (strategy.kind === 'solved') return 0;
  return Math.max(0, ...strategy.branches.map((b) => (isMistake(b.feedback) ? 1 : 0) + strategyMistakes(b.next)));
}
