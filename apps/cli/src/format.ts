// apps/cli/src/format.ts
//
// Human-readable output: the verdict sentence and an indented outline of
// the witnessing strategy.

import type { StrategyDoc, VerdictRes } from '@connections/protocol';

export const WINNING_MESSAGE = 'There is a winning strategy! 🥳';
export const LOSING_MESSAGE = 'There is no winning strategy. 🫤';

export function formatVerdict(verdict: Pick<VerdictRes, 'winning'>): string {
  return verdict.winning ? WINNING_MESSAGE : LOSING_MESSAGE;
}

/**
 * formatStrategy renders a strategy tree, one guess per line, each answer
 * indented under the guess it follows.
 *
 * Example:
 *   guess 0,1,2,3
 *     exact:
 *       solved
 */
export function formatStrategy(strategy: StrategyDoc, indent = 0): string[] {
  const pad = ' '.repeat(indent);
  if (strategy.kind === 'solved') return [`${pad}solved`];

  const lines = [`${pad}guess ${strategy.selection.join(',')}`];
  for (const branch of strategy.branches) {
    lines.push(`${pad}  ${branch.feedback}:`);
    lines.push(...formatStrategy(branch.next, indent + 4));
  }
  return lines;
}
