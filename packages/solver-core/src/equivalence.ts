// packages/solver-core/src/equivalence.ts
//
// Equivalence reducer.
//
// Two slots that have been in exactly the same past selections cannot be
// told apart by anything the player has seen, and the feedback rule is
// symmetric in slot identity, so they stay interchangeable for the rest of
// the game. Grouping slots by their "participation signature" lets the
// selection generator treat each class as a pool of identical tokens.

import { compareSlots, type Selection, type Slot } from './slots.js';

/**
 * equivalenceClasses returns the coarsest partition of `universe` in which
 * two slots share a class iff they belong to the same subset of `selections`.
 *
 * Classes come back ordered by their smallest member, members ascending.
 * Slots of a selection that are not in `universe` are ignored.
 *
 * Example:
 *   selections = [[0,1,2,3], [2,3,4,5]], universe = [0..7]
 *   → [[0,1], [2,3], [4,5], [6,7]]
 */
export function equivalenceClasses(selections: readonly Selection[], universe: readonly Slot[]): Slot[][] {
  const memberships = selections.map((sel) => new Set(sel));
  const bySignature = new Map<string, Slot[]>();

  for (const slot of [...universe].sort(compareSlots)) {
    const signature = memberships
      .map((members, i) => (members.has(slot) ? i : -1))
      .filter((i) => i >= 0)
      .join('|');
    const cls = bySignature.get(signature);
    if (cls) cls.push(slot);
    else bySignature.set(signature, [slot]);
  }

  // Map preserves insertion order and the universe was walked in ascending
  // order, so classes are already sorted by their smallest member.
  return [...bySignature.values()];
}
