/**
 * Predicates and functions
 *
 * Both align their argument groundings, flatten the combined variable axes
 * into one batch axis, call their model once and fold the rows back into a
 * grounding over the combined axes.
 */

import {
  ShapeMismatchError,
  formatShape,
  recordTrace,
  shapeSize,
  type EvaluationContext,
  type Tensor,
} from '@logic-tensors/core';
import { align } from './broadcast';
import { Grounding } from './grounding';
import type { TensorCallable } from './models';

function evaluate(
  context: EvaluationContext,
  name: string,
  model: TensorCallable,
  args: readonly Grounding[]
): { output: Tensor; axes: string[][]; shape: number[] } {
  const alignment = align(args, context.sessions.active());
  const batch = shapeSize(alignment.shape);

  const inputs = alignment.tensors.map(tensor =>
    tensor.reshape([batch, ...tensor.shape.slice(alignment.shape.length)])
  );
  const output = model.call(inputs);

  if (output.rank < 1 || output.shape[0] !== batch) {
    throw new ShapeMismatchError(
      `Model '${model.name}' of '${name}' returned ${formatShape(output.shape)} for a batch of ${batch}`
    );
  }

  return {
    output,
    axes: alignment.axes.map(axis => [...axis]),
    shape: alignment.shape,
  };
}

export class Predicate {
  constructor(
    readonly name: string,
    readonly model: TensorCallable,
    private readonly context: EvaluationContext
  ) {}

  call(...args: Grounding[]): Grounding {
    const start = Date.now();
    const { output, axes, shape } = evaluate(this.context, this.name, this.model, args);

    if (output.rank !== 1) {
      throw new ShapeMismatchError(
        `Predicate '${this.name}' must return one truth value per row, got ${formatShape(output.shape)}`
      );
    }

    const result = new Grounding(output.reshape(shape), axes);
    recordTrace(this.context, `predicate:${this.name}`, result.labels, result.shape, Date.now() - start);
    return result;
  }
}

/**
 * A function symbol: maps individuals to individuals, so its output keeps
 * the model's trailing feature axes.
 */
export class TermFunction {
  constructor(
    readonly name: string,
    readonly model: TensorCallable,
    private readonly context: EvaluationContext
  ) {}

  call(...args: Grounding[]): Grounding {
    const start = Date.now();
    const { output, axes, shape } = evaluate(this.context, this.name, this.model, args);

    const result = new Grounding(output.reshape([...shape, ...output.shape.slice(1)]), axes);
    recordTrace(this.context, `function:${this.name}`, result.labels, result.shape, Date.now() - start);
    return result;
  }
}
