// packages/solver-core/src/__tests__/equivalence.test.ts
//
// Unit tests for equivalenceClasses() and generateSelections().

import { createSlots, equivalenceClasses, generateSelections, makeSelection, toSlot, type Selection } from '../index.js';

const s = (...ids: number[]) => makeSelection(ids.map(toSlot));
const slots = createSlots(8);

describe('equivalenceClasses', () => {
  it('keeps every slot together when nothing has been selected', () => {
    expect(equivalenceClasses([slots], slots)).toEqual([[0, 1, 2, 3, 4, 5, 6, 7]]);
  });

  it('splits by participation signature', () => {
    expect(equivalenceClasses([s(0, 1, 2, 3), s(2, 3, 4, 5), slots], slots)).toEqual([
      [0, 1],
      [2, 3],
      [4, 5],
      [6, 7],
    ]);
  });

  it('returns disjoint, exhaustive classes with identical membership inside each class', () => {
    const selections: Selection[] = [s(0, 2, 4, 6), s(0, 1, 2, 3), s(5, 6), slots];
    const classes = equivalenceClasses(selections, slots);

    const flat = classes.flat().sort((a, b) => a - b);
    expect(flat).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);

    for (const cls of classes) {
      for (const sel of selections) {
        const inside = cls.map((slot) => sel.includes(slot));
        expect(new Set(inside).size).toBe(1);
      }
    }
    expect(classes).toEqual([[0, 2], [1, 3], [4], [5], [6], [7]]);
  });

  it('ignores slots outside the universe', () => {
    expect(equivalenceClasses([s(0, 9)], s(0, 1))).toEqual([[0], [1]]);
  });
});

describe('generateSelections', () => {
  const classes = [s(0, 1), s(2, 3), s(4, 5)];

  it('yields every prefix distribution of the requested size', () => {
    const selects = [...generateSelections(classes, 3)];
    expect(selects.every((sel) => sel.length === 3)).toBe(true);
    // two from one class and one from another, or one from each
    expect(selects).toHaveLength(3 * 2 + 1);
    expect(selects[0]).toEqual([2, 4, 5]);
    expect(selects).toContainEqual([0, 2, 4]);
  });

  it('yields one empty selection for size 0 and nothing past the last class', () => {
    expect([...generateSelections(classes, 0)]).toEqual([[]]);
    expect([...generateSelections([], 2)]).toEqual([]);
    expect([...generateSelections(classes, 7)]).toEqual([]);
  });
});
