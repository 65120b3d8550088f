// packages/protocol/src/index.ts
//
// Shared protocol definitions for the strategy analyser.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Feedback:  answer to one selection ("exact", "near", "far").
//   - Analysis request: the board and budget to evaluate (CLI input).
//   - Verdict: the result document, including the witnessing strategy tree.
//
// The CLI validates its options against analysisReq and its JSON output
// against verdictRes, so both ends agree on one shape.

import { z } from 'zod';

/**
 * Feedback schema:
 *  - "exact" → the selection is one whole group
 *  - "near"  → one slot away from a group
 *  - "far"   → anything else
 */
export const feedbackSchema = z.enum(['exact', 'near', 'far']);
export type Feedback = z.infer<typeof feedbackSchema>;

/* -------------------------------------------------------------------------- */
/*                              Analysis request                              */
/* -------------------------------------------------------------------------- */

/**
 * Request to evaluate a board.
 *  - slots:     number of slots on the board, defaults to 8
 *  - tries:     mistakes the player may make, defaults to 4
 *  - groupSize: slots per group, defaults to 4; must divide `slots`
 *  - memoize:   cache verdicts of repeated positions, defaults to true
 *  - maxNodes:  optional search node limit
 */
export const analysisReq = z
  .object({
    slots: z.number().int().positive().default(8),
    tries: z.number().int().min(0).default(4),
    groupSize: z.number().int().positive().default(4),
    memoize: z.boolean().default(true),
    maxNodes: z.number().int().positive().optional(),
  })
  .superRefine((req, ctx) => {
    if (req.slots % req.groupSize !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slots'],
        message: `Must be a multiple of the group size ${req.groupSize}`,
      });
    }
  });
export type AnalysisReq = z.infer<typeof analysisReq>;
export type AnalysisReqInput = z.input<typeof analysisReq>;

/* -------------------------------------------------------------------------- */
/*                                   Verdict                                  */
/* -------------------------------------------------------------------------- */

export type StrategyDoc =
  | { kind: 'solved' }
  | { kind: 'guess'; selection: number[]; branches: { feedback: Feedback; next: StrategyDoc }[] };

/** Witnessing strategy: a guess, then one branch per possible answer. */
export const strategySchema: z.ZodType<StrategyDoc> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('solved') }),
    z.object({
      kind: z.literal('guess'),
      selection: z.array(z.number().int().min(0)).min(1),
      branches: z.array(z.object({ feedback: feedbackSchema, next: strategySchema })),
    }),
  ]),
);

/**
 * Verdict document:
 *  - winning:  whether a guaranteed win exists
 *  - slots, tries, groupSize: the evaluated request
 *  - stats:    search nodes, memo hits and wall time
 *  - strategy: present only when winning and requested
 */
export const verdictRes = z.object({
  winning: z.boolean(),
  slots: z.number().int().positive(),
  tries: z.number().int().min(0),
  groupSize: z.number().int().positive(),
  stats: z.object({
    nodes: z.number().int().min(0),
    memoHits: z.number().int().min(0),
    elapsedMs: z.number().min(0),
  }),
  strategy: strategySchema.optional(),
});
export type VerdictRes = z.infer<typeof verdictRes>;

/**
 * Flattens a ZodError into one line, one "path: message" per issue.
 *
 * Example:
 *   "slots: Must be a multiple of the group size 4; tries: Number must be greater than or equal to 0"
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ');
}
