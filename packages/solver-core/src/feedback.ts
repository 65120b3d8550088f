// packages/solver-core/src/feedback.ts
//
// Feedback model: how the board answers one selection.
//
// Feedback legend:
//   - "exact": the selection is exactly one group of the answer key
//   - "near":  some group is missing exactly one of its members from the
//              selection ("one away")
//   - "far":   anything else
//
// The category depends only on the *largest* overlap between the selection
// and any single group, never on a sum over groups.

import type { Partition } from './partitions.js';
import type { Selection } from './slots.js';

export type Feedback = 'exact' | 'near' | 'far';

/** Display/ordering rank. The search treats feedback as unordered tags. */
export const FEEDBACK_RANK: Readonly<Record<Feedback, number>> = {
  far: 0,
  near: 1,
  exact: 3,
};

export function compareFeedback(a: Feedback, b: Feedback): number {
  return FEEDBACK_RANK[a] - FEEDBACK_RANK[b];
}

/** Anything but an exact match costs the player one mistake. */
export function isMistake(feedback: Feedback): boolean {
  return feedback !== 'exact';
}

/**
 * scoreSelection evaluates a selection against one candidate answer key.
 *
 * @param partition - candidate answer key, groups of `groupSize` slots
 * @param selection - the slots the player proposes
 * @param groupSize - size of every group in `partition`
 *
 * Example:
 *   partition = [[0,1,2,3],[4,5,6,7]], groupSize = 4
 *   selection [0,1,2,4] → "near"   (3 of the first group)
 *   selection [0,1,4,5] → "far"    (2 of each)
 *   selection [4,5,6,7] → "exact"
 */
export function scoreSelection(partition: Partition, selection: Selection, groupSize: number): Feedback {
  const chosen = new Set(selection);
  let best = 0;
  for (const group of partition) {
    let overlap = 0;
    for (const s of group) {
      if (chosen.has(s)) overlap++;
    }
    if (overlap > best) best = overlap;
  }

  if (best === groupSize) return 'exact';
  if (best === groupSize - 1) return 'near';
  return 'far';
}
