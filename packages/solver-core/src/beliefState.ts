// packages/solver-core/src/beliefState.ts
//
// Belief state: what the player knows after a sequence of moves.
//
// The state stores only the game parameters and the move history. Everything
// else is derived on demand:
//   • possibleSolutions → answer keys that agree with every recorded move
//   • possibleResults   → feedback a selection can still receive
//   • equivalenceClasses / possibleSelections → the candidate next moves
//
// States are immutable; withMove returns a new one. A child created from a
// parent whose consistent list is already known only replays the newest move
// against that list.

import { equivalenceClasses } from './equivalence.js';
import { compareFeedback, scoreSelection, type Feedback } from './feedback.js';
import { MoveHistory, type Move } from './history.js';
import { partitionItems, type Partition } from './partitions.js';
import { generateSelections } from './selections.js';
import { groupCount, validateGameParams, type GameParams, type Selection, type Slot } from './slots.js';

export class BeliefState {
  private cachedSolutions?: readonly Partition[];

  private constructor(
    readonly params: GameParams,
    readonly history: MoveHistory,
    private readonly inherited?: readonly Partition[],
  ) {}

  /** A state with no moves yet. Throws InvalidConfigurationError on bad params. */
  static initial(params: GameParams): BeliefState {
    validateGameParams(params);
    return new BeliefState(params, MoveHistory.empty);
  }

  static fromMoves(params: GameParams, moves: Iterable<Move>): BeliefState {
    validateGameParams(params);
    return new BeliefState(params, MoveHistory.of(moves));
  }

  get moves(): Move[] {
    return this.history.toArray();
  }

  get groupCount(): number {
    return groupCount(this.params);
  }

  /** Every group has been confirmed by an exact move. */
  isSolved(): boolean {
    return this.history.exactCount === this.groupCount;
  }

  withMove(move: Move): BeliefState {
    return new BeliefState(this.params, this.history.append(move), this.cachedSolutions);
  }

  private agreesWith(partition: Partition, move: Move): boolean {
    return scoreSelection(partition, move.selection, this.params.groupSize) === move.result;
  }

  /** Lazily yields every answer key that is still possible. */
  *possibleSolutions(): Generator<Partition> {
    if (this.cachedSolutions) {
      yield* this.cachedSolutions;
      return;
    }

    const latest = this.history.latest();
    if (this.inherited && latest) {
      for (const p of this.inherited) {
        if (this.agreesWith(p, latest)) yield p;
      }
      return;
    }

    const moves = this.history.toArray();
    const sizes = Array.from({ length: this.groupCount }, () => this.params.groupSize);
    for (const p of partitionItems(this.params.slots, sizes)) {
      if (moves.every((m) => this.agreesWith(p, m))) yield p;
    }
  }

  /** possibleSolutions, materialized once per state. */
  solutions(): readonly Partition[] {
    this.cachedSolutions ??= [...this.possibleSolutions()];
    return this.cachedSolutions;
  }

  /**
   * possibleResults lists the feedback values that at least one consistent
   * answer key would give `selection`, ordered far → near → exact.
   */
  possibleResults(selection: Selection): Feedback[] {
    const seen = new Set<Feedback>();
    for (const p of this.solutions()) {
      seen.add(scoreSelection(p, selection, this.params.groupSize));
      if (seen.size === 3) break;
    }
    return [...seen].sort(compareFeedback);
  }

  /** Classes of slots that no past selection has told apart. */
  equivalenceClasses(): Slot[][] {
    const previous = this.history.toArray().map((m) => m.selection);
    return equivalenceClasses([...previous, this.params.slots], this.params.slots);
  }

  /**
   * possibleSelections yields one representative per class of equivalent
   * group-size selections, skipping selections already played.
   */
  *possibleSelections(): Generator<Selection> {
    for (const selection of generateSelections(this.equivalenceClasses(), this.params.groupSize)) {
      if (!this.history.hasSelection(selection)) yield selection;
    }
  }
}
