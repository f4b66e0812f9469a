/**
 * Connectives: pointwise truth functions lifted to groundings
 */

import {
  InvalidParameterError,
  Tensor,
  recordTrace,
  type EvaluationContext,
} from '@logic-tensors/core';
import type { TruthOperator } from '@logic-tensors/operators';
import { align } from './broadcast';
import { Grounding } from './grounding';

export class Connective {
  constructor(
    readonly operator: TruthOperator,
    private readonly context: EvaluationContext
  ) {}

  /**
   * Unary operators take exactly one operand. Binary operators take two or
   * more and fold from the left: And(a, b, c) = and(and(a, b), c).
   */
  call(...operands: Grounding[]): Grounding {
    const start = Date.now();
    const { operator } = this;

    if (operator.arity === 1 && operands.length !== 1) {
      throw new InvalidParameterError(
        `'${operator.name}' takes one operand, got ${operands.length}`
      );
    }
    if (operator.arity === 2 && operands.length < 2) {
      throw new InvalidParameterError(
        `'${operator.name}' takes at least two operands, got ${operands.length}`
      );
    }

    const alignment = align(operands, this.context.sessions.active());
    const tensor = Tensor.zip(alignment.tensors, (...values) => {
      if (operator.arity === 1) {
        return operator.apply(values[0]);
      }
      let acc = values[0];
      for (let i = 1; i < values.length; i++) {
        acc = operator.apply(acc, values[i]);
      }
      return acc;
    });

    const result = new Grounding(tensor, alignment.axes);
    recordTrace(this.context, `connective:${operator.name}`, result.labels, result.shape, Date.now() - start);
    return result;
  }
}
