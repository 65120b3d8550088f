// packages/solver-core/src/index.ts
//
// Entry point for the solver-core package.
// Re-exports the whole engine so consumers can import from one place.
//
// Includes:
//   • slots.ts       → Slot, Selection, GameParams and their constructors
//   • feedback.ts    → scoreSelection, Feedback
//   • partitions.ts  → answer-key enumeration
//   • equivalence.ts → interchangeable-slot classes
//   • selections.ts  → candidate selections over those classes
//   • history.ts     → persistent move history
//   • beliefState.ts → BeliefState
//   • strategy.ts    → hasWinningStrategy, findWinningStrategy
//   • errors.ts      → SolverError and subclasses
//
// Example usage:
//   import { BeliefState, createGameParams, hasWinningStrategy } from '@connections/solver-core';

export * from './slots.js';
export * from './feedback.js';
export * from './partitions.js';
export * from './equivalence.js';
export * from './selections.js';
export * from './history.js';
export * from './beliefState.js';
export * from './strategy.js';
export * from './errors.js';
