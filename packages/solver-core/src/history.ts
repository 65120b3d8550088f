// packages/solver-core/src/history.ts
//
// Persistent move history.
//
// Each search frame extends its parent's history by one move. Storing the
// history as a cons list (newest move first) lets every child share its
// parent's moves instead of copying an array per frame.

import type { Feedback } from './feedback.js';
import { makeSelection, sameSelection, selectionKey, type Selection } from './slots.js';

/** One past query and the answer it got. */
export interface Move {
  readonly selection: Selection;
  readonly result: Feedback;
}

interface Cell {
  readonly move: Move;
  readonly prev: Cell | null;
}

export class MoveHistory implements Iterable<Move> {
  static readonly empty = new MoveHistory(null, 0, 0);

  private constructor(
    private readonly last: Cell | null,
    readonly length: number,
    /** Number of moves answered "exact". */
    readonly exactCount: number,
  ) {}

  static of(moves: Iterable<Move>): MoveHistory {
    let history = MoveHistory.empty;
    for (const move of moves) history = history.append(move);
    return history;
  }

  /** Records `move` with its selection normalized to sorted, distinct slots. */
  append(move: Move): MoveHistory {
    const normalized: Move = { selection: makeSelection(move.selection), result: move.result };
    return new MoveHistory(
      { move: normalized, prev: this.last },
      this.length + 1,
      this.exactCount + (move.result === 'exact' ? 1 : 0),
    );
  }

  /** The most recent move, if any. */
  latest(): Move | undefined {
    return this.last?.move;
  }

  hasSelection(selection: Selection): boolean {
    for (let cell = this.last; cell; cell = cell.prev) {
      if (sameSelection(cell.move.selection, selection)) return true;
    }
    return false;
  }

  /** Moves oldest first. */
  toArray(): Move[] {
    const out: Move[] = [];
    for (let cell = this.last; cell; cell = cell.prev) out.push(cell.move);
    return out.reverse();
  }

  [Symbol.iterator](): Iterator<Move> {
    return this.toArray()[Symbol.iterator]();
  }

  /**
   * Order-independent key: the consistent partitions and the equivalence
   * classes depend on the set of moves, not on the order they were played.
   */
  canonicalKey(): string {
    return this.toArray()
      .map((m) => `${selectionKey(m.selection)}=${m.result}`)
      .sort()
      .join(';');
  }
}
