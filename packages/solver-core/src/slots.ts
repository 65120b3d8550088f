// packages/solver-core/src/slots.ts
//
// Slots, selections and game parameters.
//
// A slot is one square on the board. It is a plain non-negative integer at
// runtime, branded at the type level so a slot id cannot be mixed up with a
// count or a group size.
//
// A selection is a set of slots kept as a sorted, duplicate-free array, so
// two equal selections always have the same canonical key.

import { InvalidConfigurationError } from './errors.js';

export type Slot = number & { readonly __brand: 'Slot' };
export type Selection = readonly Slot[];

/** Invariant properties of one puzzle. */
export interface GameParams {
  readonly slots: readonly Slot[];
  readonly groupSize: number;
}

export const DEFAULT_GROUP_SIZE = 4;

export function isSlot(value: number): value is Slot {
  return Number.isInteger(value) && value >= 0;
}

export function toSlot(value: number): Slot {
  if (!isSlot(value)) {
    throw new InvalidConfigurationError(`Invalid slot id: ${value}`, { value });
  }
  return value;
}

/** Slots `0..n-1`. */
export function createSlots(n: number): Slot[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidConfigurationError(`Slot count must be a non-negative integer, got ${n}`, { slotCount: n });
  }
  return Array.from({ length: n }, (_, i) => toSlot(i));
}

export function compareSlots(a: Slot, b: Slot): number {
  return a - b;
}

/**
 * makeSelection normalizes any collection of slots into a Selection.
 *
 * Example:
 *   makeSelection([3, 1, 3, 0]) → [0, 1, 3]
 */
export function makeSelection(slots: Iterable<Slot>): Selection {
  return [...new Set(slots)].sort(compareSlots);
}

export function selectionKey(selection: Selection): string {
  return selection.join(',');
}

export function sameSelection(a: Selection, b: Selection): boolean {
  return a.length === b.length && a.every((s, i) => s === b[i]);
}

/**
 * validateGameParams throws unless the slots are distinct and their count is
 * a positive multiple of a positive group size.
 */
export function validateGameParams(params: GameParams): void {
  const { slots, groupSize } = params;
  if (!Number.isInteger(groupSize) || groupSize <= 0) {
    throw new InvalidConfigurationError(`Group size must be a positive integer, got ${groupSize}`, { groupSize });
  }
  if (slots.length === 0 || slots.length % groupSize !== 0) {
    throw new InvalidConfigurationError(
      `Slot count must be a positive multiple of the group size ${groupSize}, got ${slots.length}`,
      { slotCount: slots.length, groupSize },
    );
  }
  if (new Set(slots).size !== slots.length) {
    throw new InvalidConfigurationError('Slots must be distinct', { slots: [...slots] });
  }
}

/**
 * createGameParams builds parameters over slots `0..slotCount-1`.
 *
 * Example:
 *   createGameParams(8) → { slots: [0..7], groupSize: 4 }
 */
export function createGameParams(slotCount: number, groupSize: number = DEFAULT_GROUP_SIZE): GameParams {
  if (!Number.isInteger(slotCount) || slotCount <= 0) {
    throw new InvalidConfigurationError(`Slot count must be a positive integer, got ${slotCount}`, { slotCount });
  }
  const params: GameParams = { slots: createSlots(slotCount), groupSize };
  validateGameParams(params);
  return params;
}

export function groupCount(params: GameParams): number {
  return params.slots.length / params.groupSize;
}
