// packages/solver-core/src/selections.ts
//
// Selection generator.
//
// Given equivalence classes, every distinct selection (up to swapping
// interchangeable slots) is fixed by how many slots it takes from each class.
// The generator distributes `size` units over the classes, 0..min(size, |class|)
// each, and always takes the *first* members of a class.

import { makeSelection, type Selection, type Slot } from './slots.js';

function* distribute(classes: readonly (readonly Slot[])[], index: number, size: number): Generator<Slot[]> {
  if (size === 0) {
    yield [];
    return;
  }
  if (index >= classes.length) return;

  const current = classes[index];
  const most = Math.min(size, current.length);
  for (let take = 0; take <= most; take++) {
    const head = current.slice(0, take);
    for (const tail of distribute(classes, index + 1, size - take)) {
      yield [...head, ...tail];
    }
  }
}

/**
 * generateSelections lazily yields every selection of exactly `size` slots
 * that picks a prefix from each class.
 *
 * Example:
 *   classes = [[0,1],[2,3],[4,5]], size = 3
 *   → 7 selections: six of the form 2+1 and one of the form 1+1+1
 */
export function* generateSelections(classes: readonly (readonly Slot[])[], size: number): Generator<Selection> {
  for (const picked of distribute(classes, 0, size)) {
    yield makeSelection(picked);
  }
}
