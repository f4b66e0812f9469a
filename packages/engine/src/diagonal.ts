/**
 * Standalone diagonal sessions over variables
 *
 * Quantifiers open and close their own sessions; these helpers are for
 * evaluating an unquantified formula with some variables zipped.
 */

import type { DiagonalSession, EvaluationContext } from '@logic-tensors/core';
import type { Variable } from './grounding';

function members(variables: readonly Variable[]) {
  return variables.map(v => ({ label: v.label, count: v.count }));
}

export function beginDiagonal(
  context: EvaluationContext,
  variables: readonly Variable[]
): DiagonalSession {
  return context.sessions.begin(members(variables));
}

export function endDiagonal(context: EvaluationContext, session: DiagonalSession): void {
  context.sessions.end(session);
}

export function withDiagonal<T>(
  context: EvaluationContext,
  variables: readonly Variable[],
  fn: () => T
): T {
  return context.sessions.withDiagonal(members(variables), () => fn());
}
