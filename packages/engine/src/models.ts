/**
 * Models behind predicates and functions
 *
 * The engine only needs "tensor list in, tensor out". Each input holds
 * one row per tuple of individuals (`[batch, ...features]`); the output
 * must start with the same batch axis.
 */

import { InvalidParameterError, ShapeMismatchError, Tensor, shapeSize } from '@logic-tensors/core';

export interface TensorCallable {
  readonly name: string;
  call(inputs: readonly Tensor[]): Tensor;
}

/**
 * Closed-form model
 */
export class LambdaModel implements TensorCallable {
  constructor(
    private readonly fn: (...inputs: Tensor[]) => Tensor,
    readonly name: string = 'lambda'
  ) {}

  call(inputs: readonly Tensor[]): Tensor {
    return this.fn(...inputs);
  }
}

export interface LogisticModelParams {
  weights: readonly number[];
  bias?: number;
}

/**
 * sigmoid(w · x + b) over the concatenated features of all inputs.
 * Parameters are fixed; fitting them is the caller's business.
 */
export class LogisticModel implements TensorCallable {
  readonly name = 'logistic';
  private readonly weights: Float64Array;
  private readonly bias: number;

  constructor(params: LogisticModelParams) {
    if (params.weights.length === 0) {
      throw new InvalidParameterError('LogisticModel needs at least one weight');
    }
    this.weights = Float64Array.from(params.weights);
    this.bias = params.bias ?? 0;
  }

  call(inputs: readonly Tensor[]): Tensor {
    if (inputs.length === 0) {
      throw new InvalidParameterError('LogisticModel called without inputs');
    }

    const batch = inputs[0].shape[0];
    const widths = inputs.map(input => {
      if (input.rank < 1 || input.shape[0] !== batch) {
        throw new ShapeMismatchError('LogisticModel inputs must share their batch axis');
      }
      return shapeSize(input.shape.slice(1));
    });

    const total = widths.reduce((a, b) => a + b, 0);
    if (total !== this.weights.length) {
      throw new ShapeMismatchError(
        `LogisticModel has ${this.weights.length} weights but inputs carry ${total} features`
      );
    }

    const out = new Float64Array(batch);
    for (let row = 0; row < batch; row++) {
      let z = this.bias;
      let w = 0;
      inputs.forEach((input, k) => {
        const width = widths[k];
        for (let f = 0; f < width; f++) {
          z += this.weights[w++] * input.data[row * width + f];
        }
      });
      out[row] = 1 / (1 + Math.exp(-z));
    }

    return Tensor.fromFlat([batch], out);
  }
}

/**
 * Truth values stored per tuple of individual indices. Each input gives
 * the index of one argument in the first element of its row.
 */
export class LookupTable implements TensorCallable {
  readonly name = 'lookup';

  constructor(private readonly table: Tensor) {}

  call(inputs: readonly Tensor[]): Tensor {
    if (inputs.length !== this.table.rank) {
      throw new ShapeMismatchError(
        `LookupTable of rank ${this.table.rank} called with ${inputs.length} inputs`
      );
    }

    const batch = inputs.length === 0 ? 1 : inputs[0].shape[0];
    const out = new Float64Array(batch);

    for (let row = 0; row < batch; row++) {
      const index = inputs.map(input => {
        const width = input.size / input.shape[0];
        return input.data[row * width];
      });
      out[row] = this.table.get(...index);
    }

    return Tensor.fromFlat([batch], out);
  }
}
