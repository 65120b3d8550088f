// packages/solver-core/src/__tests__/strategy.test.ts
//
// Unit tests for the strategy search.
//
// Goal: verify the verdicts at the edges of the error budget, that a returned
// strategy really wins against every answer key, and that neither candidate
// order nor memoization changes a verdict.

import {
  BeliefState,
  InvalidConfigurationError,
  SearchExhaustedError,
  createGameParams,
  findWinningStrategy,
  hasWinningStrategy,
  labeledBallsInUnlabeledBoxes,
  makeSelection,
  scoreSelection,
  strategyDepth,
  strategyMistakes,
  toSlot,
  type Partition,
  type Selection,
  type Strategy,
} from '../index.js';

const s = (...ids: number[]) => makeSelection(ids.map(toSlot));
const board = (slots: number, groupSize = 4) => BeliefState.initial(createGameParams(slots, groupSize));

/**
 * Follow `strategy` against a fixed answer key. Returns the mistakes made,
 * or throws if the strategy has no branch for an answer it can receive.
 */
function play(strategy: Strategy, key: Partition, groupSize: number): { mistakes: number; exact: number } {
  let node = strategy;
  let mistakes = 0;
  let exact = 0;
  while (node.kind === 'guess') {
    const feedback = scoreSelection(key, node.selection, groupSize);
    const branch = node.branches.find((b) => b.feedback === feedback);
    if (!branch) throw new Error(`no branch for ${feedback} after ${node.selection.join(',')}`);
    if (feedback === 'exact') exact++;
    else mistakes++;
    node = branch.next;
  }
  return { mistakes, exact };
}

function allKeys(slots: number, groupSize: number): Partition[] {
  const sizes = Array.from({ length: slots / groupSize }, () => groupSize);
  return [...labeledBallsInUnlabeledBoxes(slots, sizes)].map((p) => p.map((g) => s(...g)));
}

describe('hasWinningStrategy', () => {
  it('wins a single group of 4 with no mistakes allowed', () => {
    const outcome = findWinningStrategy(board(4), 0);
    expect(outcome.winning).toBe(true);
    expect(outcome.strategy).toEqual({
      kind: 'guess',
      selection: [0, 1, 2, 3],
      branches: [{ feedback: 'exact', next: { kind: 'solved' } }],
    });
    expect(outcome.stats.nodes).toBe(2);
  });

  it('loses 8 slots with no mistakes allowed', () => {
    const outcome = findWinningStrategy(board(8), 0);
    expect(outcome).toEqual({ winning: false, stats: { nodes: 1, memoHits: 0 } });
  });

  it.each([
    { slots: 8, groupSize: 4, budget: 1, winning: false },
    { slots: 8, groupSize: 4, budget: 4, winning: false },
    { slots: 8, groupSize: 4, budget: 5, winning: true },
    { slots: 4, groupSize: 2, budget: 0, winning: false },
    { slots: 4, groupSize: 2, budget: 1, winning: false },
    { slots: 4, groupSize: 2, budget: 2, winning: true },
    { slots: 3, groupSize: 1, budget: 0, winning: true },
  ])('$slots slots in groups of $groupSize with budget $budget → $winning', ({ slots, groupSize, budget, winning }) => {
    expect(hasWinningStrategy(board(slots, groupSize), budget)).toBe(winning);
  });

  it('is already won when the history has every group', () => {
    const state = board(8)
      .withMove({ selection: s(0, 1, 2, 3), result: 'exact' })
      .withMove({ selection: s(4, 5, 6, 7), result: 'exact' });
    expect(findWinningStrategy(state, 0)).toEqual({
      winning: true,
      strategy: { kind: 'solved' },
      stats: { nodes: 1, memoHits: 0 },
    });
  });

  it('finishes the last group for free once the first is known', () => {
    const state = board(8).withMove({ selection: s(0, 1, 2, 3), result: 'exact' });
    expect(findWinningStrategy(state, 0).strategy).toEqual({
      kind: 'guess',
      selection: [4, 5, 6, 7],
      branches: [{ feedback: 'exact', next: { kind: 'solved' } }],
    });
  });
});

describe('findWinningStrategy', () => {
  it('returns the first winning strategy in candidate order', () => {
    const outcome = findWinningStrategy(board(4, 2), 2, { memoize: false });
    const solved: Strategy = { kind: 'solved' };
    const finish = (a: number, b: number): Strategy => ({
      kind: 'guess',
      selection: s(a, b),
      branches: [{ feedback: 'exact', next: solved }],
    });

    expect(outcome.stats).toEqual({ nodes: 11, memoHits: 0 });
    expect(outcome.strategy).toEqual({
      kind: 'guess',
      selection: [0, 1],
      branches: [
        {
          feedback: 'near',
          next: {
            kind: 'guess',
            selection: [0, 2],
            branches: [
              {
                feedback: 'near',
                next: { kind: 'guess', selection: [1, 2], branches: [{ feedback: 'exact', next: finish(0, 3) }] },
              },
              {
                feedback: 'exact',
                next: { kind: 'guess', selection: [2, 3], branches: [{ feedback: 'near', next: finish(1, 3) }] },
              },
            ],
          },
        },
        { feedback: 'exact', next: finish(2, 3) },
      ],
    });
  });

  it('reports worst-case guesses and mistakes of a strategy', () => {
    const { strategy } = findWinningStrategy(board(4, 2), 2);
    if (!strategy) throw new Error('expected a strategy');
    expect(strategyDepth(strategy)).toBe(4);
    expect(strategyMistakes(strategy)).toBe(2);
    expect(strategyDepth({ kind: 'solved' })).toBe(0);
  });

  it('returns a strategy that wins against every answer key within budget', () => {
    const { winning, strategy } = findWinningStrategy(board(8), 5);
    expect(winning).toBe(true);
    if (!strategy) throw new Error('expected a strategy');

    const keys = allKeys(8, 4);
    expect(keys).toHaveLength(35);
    for (const key of keys) {
      const { mistakes, exact } = play(strategy, key, 4);
      expect(mistakes).toBeLessThanOrEqual(5);
      expect(exact).toBe(2);
    }
    expect(strategyMistakes(strategy)).toBeLessThanOrEqual(5);
  });
});

describe('search options', () => {
  const reverse = (candidates: readonly Selection[]) => [...candidates].reverse();

  it.each([
    { slots: 8, groupSize: 4, budget: 4 },
    { slots: 8, groupSize: 4, budget: 5 },
    { slots: 4, groupSize: 2, budget: 1 },
    { slots: 4, groupSize: 2, budget: 2 },
  ])('gives the same verdict in any candidate order ($slots/$groupSize, budget $budget)', ({ slots, groupSize, budget }) => {
    const forward = hasWinningStrategy(board(slots, groupSize), budget);
    expect(hasWinningStrategy(board(slots, groupSize), budget, { reorder: reverse })).toBe(forward);
    expect(hasWinningStrategy(board(slots, groupSize), budget, { memoize: false })).toBe(forward);
  });

  it('reuses cached verdicts for transposed move orders', () => {
    const memo = findWinningStrategy(board(8), 5);
    const plain = findWinningStrategy(board(8), 5, { memoize: false });
    expect(memo.winning).toBe(plain.winning);
    expect(memo.stats.memoHits).toBeGreaterThan(0);
    expect(memo.stats.nodes).toBeLessThan(plain.stats.nodes);
  });

  it('stops with SearchExhaustedError past the node limit', () => {
    expect(() => findWinningStrategy(board(8), 5, { maxNodes: 1 })).toThrow(SearchExhaustedError);
    expect(() => findWinningStrategy(board(8), 5, { maxNodes: 1 })).toThrow('Search exceeded 1 nodes');
  });

  it('rejects a negative budget and a bad node limit', () => {
    expect(() => hasWinningStrategy(board(8), -1)).toThrow(InvalidConfigurationError);
    expect(() => hasWinningStrategy(board(8), -1)).toThrow('Error budget must be a non-negative integer, got -1');
    expect(() => hasWinningStrategy(board(8), 1, { maxNodes: 0 })).toThrow(
      'Node limit must be a positive integer, got 0',
    );
  });

  it('rejects a history no answer key agrees with', () => {
    const state = board(8)
      .withMove({ selection: s(0, 1, 2, 3), result: 'exact' })
      .withMove({ selection: s(0, 1, 2, 4), result: 'exact' });
    expect(() => hasWinningStrategy(state, 3)).toThrow('The move history is not consistent with any answer key');
  });
});
