// packages/solver-core/src/errors.ts
//
// Error types raised by the solver core.
//
// The core has exactly two failure modes:
//   • INVALID_CONFIGURATION → malformed game parameters (slot count not a
//                             positive multiple of the group size, bad slot ids,
//                             non-positive group sizes).
//   • SEARCH_EXHAUSTED      → the strategy search ran past its node limit or
//                             its depth bound.
//
// Everything else in the core is total over valid parameters.

export type SolverErrorCode = 'INVALID_CONFIGURATION' | 'SEARCH_EXHAUSTED';

export interface SolverErrorInfo {
  code: SolverErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for all errors thrown by @connections/solver-core.
 * Callers can branch on `code` instead of `instanceof` when the error has
 * crossed a serialization boundary.
 */
export class SolverError extends Error {
  readonly code: SolverErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: SolverErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SolverError';
    this.code = code;
    this.details = details;
  }

  toJSON(): SolverErrorInfo {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class InvalidConfigurationError extends SolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CONFIGURATION', message, details);
    this.name = 'InvalidConfigurationError';
  }
}

export class SearchExhaustedError extends SolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SEARCH_EXHAUSTED', message, details);
    this.name = 'SearchExhaustedError';
  }
}

export function isSolverError(err: unknown): err is SolverError {
  return err instanceof SolverError;
}
