// packages/solver-core/src/partitions.ts
//
// Partition enumerator: every candidate answer key for a board.
//
// Counts "labeled balls in unlabeled boxes": the items are distinguishable,
// the groups are not, so two partitions that differ only by the order of
// equal-size groups are the same partition and are emitted once.
//
// Exports:
//   • partitionItems               → lazy partitions of an item list
//   • labeledBallsInUnlabeledBoxes → the same over 0..n-1
//   • countPartitions              → closed-form count of the above
//   • combinations, binomial       → helpers

import { InvalidConfigurationError } from './errors.js';
import type { Slot } from './slots.js';

export type Group = readonly Slot[];

/** A candidate answer key: disjoint groups jointly covering every slot once. */
export type Partition = readonly Group[];

/** k-subsets of `0..n-1` as ascending index arrays, in lexicographic order. */
function* combinationIndices(n: number, k: number, start = 0): Generator<number[]> {
  if (k === 0) {
    yield [];
    return;
  }
  for (let i = start; i <= n - k; i++) {
    for (const rest of combinationIndices(n, k - 1, i + 1)) {
      yield [i, ...rest];
    }
  }
}

export function* combinations<T>(items: readonly T[], k: number): Generator<T[]> {
  if (k < 0 || k > items.length) return;
  for (const idx of combinationIndices(items.length, k)) {
    yield idx.map((i) => items[i]);
  }
}

export function binomial(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  const m = Math.min(k, n - k);
  let acc = 1;
  for (let i = 1; i <= m; i++) {
    acc = (acc * (n - m + i)) / i;
  }
  return Math.round(acc);
}

function assertGroupSizes(groupSizes: readonly number[]): void {
  for (const size of groupSizes) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new InvalidConfigurationError(`Group sizes must be positive integers, got ${size}`, {
        groupSizes: [...groupSizes],
      });
    }
  }
}

function* split<T>(items: readonly T[], sizes: readonly number[]): Generator<T[][]> {
  if (items.length === 0) {
    if (sizes.length === 0) yield [];
    return;
  }
  if (sizes.length === 0) return;

  // The group holding the first item is fixed before anything else, which
  // is what keeps group order out of the output.
  const [first, ...rest] = items;
  const tried = new Set<number>();
  for (let i = 0; i < sizes.length; i++) {
    const size = sizes[i];
    if (tried.has(size)) continue;
    tried.add(size);
    if (size - 1 > rest.length) continue;

    const others = [...sizes.slice(0, i), ...sizes.slice(i + 1)];
    for (const picked of combinationIndices(rest.length, size - 1)) {
      const taken = new Set(picked);
      const group = [first, ...picked.map((j) => rest[j])];
      const remaining = rest.filter((_, j) => !taken.has(j));
      for (const tail of split(remaining, others)) {
        yield [group, ...tail];
      }
    }
  }
}

/**
 * partitionItems lists every way to split `items` into groups of the given
 * sizes. The sequence is lazy and single-pass.
 *
 * Parameters are checked when this is called, not on first iteration. Sizes
 * that cannot be met by the items (too large, or not summing to the item
 * count) give an empty sequence.
 *
 * Example:
 *   partitionItems(['a','b','c','d'], [2, 2])
 *   → [['a','b'],['c','d']], [['a','c'],['b','d']], [['a','d'],['b','c']]
 */
export function partitionItems<T>(items: readonly T[], groupSizes: readonly number[]): Generator<T[][]> {
  assertGroupSizes(groupSizes);
  return split(items, groupSizes);
}

export function labeledBallsInUnlabeledBoxes(n: number, groupSizes: readonly number[]): Generator<number[][]> {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidConfigurationError(`Item count must be a non-negative integer, got ${n}`, { n });
  }
  return partitionItems(
    Array.from({ length: n }, (_, i) => i),
    groupSizes,
  );
}

/**
 * countPartitions = n! / (Π size! · Π multiplicity!), computed as a product of
 * binomials so intermediate values stay small.
 *
 * Example:
 *   countPartitions(8, [4, 4])     → 35
 *   countPartitions(12, [4, 4, 4]) → 5775
 */
export function countPartitions(n: number, groupSizes: readonly number[]): number {
  assertGroupSizes(groupSizes);
  const total = groupSizes.reduce((a, b) => a + b, 0);
  if (total !== n) return 0;

  let count = 1;
  let remaining = n;
  const multiplicity = new Map<number, number>();
  for (const size of groupSizes) {
    count *= binomial(remaining, size);
    remaining -= size;
    multiplicity.set(size, (multiplicity.get(size) ?? 0) + 1);
  }
  for (const m of multiplicity.values()) {
    for (let i = 2; i <= m; i++) count /= i;
  }
  return Math.round(count);
}
