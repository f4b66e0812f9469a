/**
 * Dense row-major tensor
 *
 * The numeric substrate for groundings: a shape plus a flat Float64Array.
 * Every operation returns a new tensor; nothing aliases its input buffer.
 */

import { ShapeMismatchError } from './errors';

export type Shape = readonly number[];

export type NestedValues = number | boolean | readonly NestedValues[];

export type NestedNumbers = number | NestedNumbers[];

// =============================================================================
// Shape helpers
// =============================================================================

export function shapeSize(shape: Shape): number {
  let size = 1;
  for (const dim of shape) {
    size *= dim;
  }
  return size;
}

export function stridesOf(shape: Shape): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

export function sameShape(a: Shape, b: Shape): boolean {
  return a.length === b.length && a.every((dim, i) => dim === b[i]);
}

export function formatShape(shape: Shape): string {
  return `(${shape.join(', ')})`;
}

/**
 * numpy broadcasting: shapes are aligned on their trailing axes and
 * each pair of sizes must be equal or contain a 1.
 */
export function broadcastShapes(...shapes: Shape[]): number[] {
  const rank = Math.max(0, ...shapes.map(s => s.length));
  const result = new Array<number>(rank).fill(1);

  for (const shape of shapes) {
    const offset = rank - shape.length;
    for (let i = 0; i < shape.length; i++) {
      const current = result[offset + i];
      const dim = shape[i];
      if (current === 1) {
        result[offset + i] = dim;
      } else if (dim !== 1 && dim !== current) {
        throw new ShapeMismatchError(
          `Cannot broadcast shapes ${shapes.map(formatShape).join(' and ')}`
        );
      }
    }
  }

  return result;
}

function validateShape(shape: Shape): void {
  for (const dim of shape) {
    if (!Number.isInteger(dim) || dim < 0) {
      throw new ShapeMismatchError(`Invalid dimension ${dim} in shape ${formatShape(shape)}`);
    }
  }
}

/**
 * Copy `source` into a fresh buffer of `outShape`, reading element
 * `sum(index[i] * strides[i])` for each output index. A stride of 0
 * repeats the source along that axis.
 */
function stridedCopy(source: Float64Array, outShape: Shape, strides: readonly number[]): Float64Array {
  const size = shapeSize(outShape);
  const out = new Float64Array(size);
  if (size === 0) {
    return out;
  }

  const rank = outShape.length;
  const index = new Array<number>(rank).fill(0);
  let offset = 0;

  for (let flat = 0; flat < size; flat++) {
    out[flat] = source[offset];

    for (let axis = rank - 1; axis >= 0; axis--) {
      index[axis]++;
      offset += strides[axis];
      if (index[axis] < outShape[axis]) {
        break;
      }
      offset -= strides[axis] * index[axis];
      index[axis] = 0;
    }
  }

  return out;
}

function inferShape(values: NestedValues): number[] {
  const shape: number[] = [];
  let level: NestedValues = values;
  while (Array.isArray(level)) {
    shape.push(level.length);
    if (level.length === 0) {
      break;
    }
    level = level[0];
  }
  return shape;
}

function flatten(values: NestedValues, shape: Shape, depth: number, out: number[]): void {
  if (depth === shape.length) {
    if (Array.isArray(values)) {
      throw new ShapeMismatchError(`Ragged nested array: expected a scalar at depth ${depth}`);
    }
    out.push(typeof values === 'boolean' ? (values ? 1 : 0) : Number(values));
    return;
  }

  if (!Array.isArray(values) || values.length !== shape[depth]) {
    throw new ShapeMismatchError(
      `Ragged nested array: expected ${shape[depth]} entries at depth ${depth}`
    );
  }

  for (const value of values) {
    flatten(value, shape, depth + 1, out);
  }
}

// =============================================================================
// Tensor
// =============================================================================

export class Tensor {
  readonly shape: Shape;
  readonly data: Float64Array;

  private constructor(shape: Shape, data: Float64Array) {
    this.shape = Object.freeze([...shape]);
    this.data = data;
  }

  static fromFlat(shape: Shape, data: ArrayLike<number>): Tensor {
    validateShape(shape);
    if (shapeSize(shape) !== data.length) {
      throw new ShapeMismatchError(
        `Shape ${formatShape(shape)} needs ${shapeSize(shape)} values, got ${data.length}`
      );
    }
    return new Tensor(shape, Float64Array.from(data));
  }

  static from(values: NestedValues): Tensor {
    const shape = inferShape(values);
    const flat: number[] = [];
    flatten(values, shape, 0, flat);
    return new Tensor(shape, Float64Array.from(flat));
  }

  static scalar(value: number): Tensor {
    return new Tensor([], Float64Array.of(value));
  }

  static full(shape: Shape, value: number): Tensor {
    validateShape(shape);
    return new Tensor(shape, new Float64Array(shapeSize(shape)).fill(value));
  }

  static zeros(shape: Shape): Tensor {
    return Tensor.full(shape, 0);
  }

  /** A mask element counts as true when it is non-zero and not NaN. */
  static truthy(value: number): boolean {
    return value !== 0 && !Number.isNaN(value);
  }

  /**
   * Elementwise combination with numpy broadcasting.
   */
  static zip(tensors: readonly Tensor[], fn: (...values: number[]) => number): Tensor {
    if (tensors.length === 0) {
      throw new ShapeMismatchError('Cannot zip an empty list of tensors');
    }

    const shape = broadcastShapes(...tensors.map(t => t.shape));
    const expanded = tensors.map(t => t.broadcastTo(shape));
    const size = shapeSize(shape);
    const out = new Float64Array(size);
    const args = new Array<number>(expanded.length);

    for (let i = 0; i < size; i++) {
      for (let k = 0; k < expanded.length; k++) {
        args[k] = expanded[k].data[i];
      }
      out[i] = fn(...args);
    }

    return new Tensor(shape, out);
  }

  get rank(): number {
    return this.shape.length;
  }

  get size(): number {
    return this.data.length;
  }

  get(...index: number[]): number {
    if (index.length !== this.rank) {
      throw new ShapeMismatchError(
        `Index of length ${index.length} for tensor of rank ${this.rank}`
      );
    }

    const strides = stridesOf(this.shape);
    let offset = 0;
    for (let i = 0; i < index.length; i++) {
      if (!Number.isInteger(index[i]) || index[i] < 0 || index[i] >= this.shape[i]) {
        throw new ShapeMismatchError(
          `Index ${index[i]} out of range for axis ${i} of size ${this.shape[i]}`
        );
      }
      offset += index[i] * strides[i];
    }
    return this.data[offset];
  }

  /** The single value of a tensor with exactly one element. */
  item(): number {
    if (this.size !== 1) {
      throw new ShapeMismatchError(`item() needs one element, tensor has shape ${formatShape(this.shape)}`);
    }
    return this.data[0];
  }

  toArray(): number[] {
    return Array.from(this.data);
  }

  toNested(): NestedNumbers {
    if (this.rank === 0) {
      return this.data[0];
    }

    const build = (depth: number, offset: number, strides: number[]): NestedNumbers[] => {
      const result: NestedNumbers[] = [];
      for (let i = 0; i < this.shape[depth]; i++) {
        const position = offset + i * strides[depth];
        result.push(depth === this.rank - 1 ? this.data[position] : build(depth + 1, position, strides));
      }
      return result;
    };

    return build(0, 0, stridesOf(this.shape));
  }

  map(fn: (value: number) => number): Tensor {
    const out = new Float64Array(this.size);
    for (let i = 0; i < this.size; i++) {
      out[i] = fn(this.data[i]);
    }
    return new Tensor(this.shape, out);
  }

  reshape(shape: Shape): Tensor {
    validateShape(shape);
    if (shapeSize(shape) !== this.size) {
      throw new ShapeMismatchError(
        `Cannot reshape ${formatShape(this.shape)} into ${formatShape(shape)}`
      );
    }
    return new Tensor(shape, Float64Array.from(this.data));
  }

  permute(axes: readonly number[]): Tensor {
    const seen = new Set(axes);
    if (axes.length !== this.rank || seen.size !== this.rank || axes.some(a => !(a >= 0 && a < this.rank))) {
      throw new ShapeMismatchError(
        `[${axes.join(', ')}] is not a permutation of the ${this.rank} axes of ${formatShape(this.shape)}`
      );
    }

    const strides = stridesOf(this.shape);
    const outShape = axes.map(a => this.shape[a]);
    return new Tensor(outShape, stridedCopy(this.data, outShape, axes.map(a => strides[a])));
  }

  expandDims(axis: number): Tensor {
    if (!Number.isInteger(axis) || axis < 0 || axis > this.rank) {
      throw new ShapeMismatchError(`Cannot insert axis ${axis} into tensor of rank ${this.rank}`);
    }
    const shape = [...this.shape];
    shape.splice(axis, 0, 1);
    return new Tensor(shape, Float64Array.from(this.data));
  }

  broadcastTo(shape: Shape): Tensor {
    validateShape(shape);
    if (shape.length < this.rank) {
      throw new ShapeMismatchError(
        `Cannot broadcast ${formatShape(this.shape)} to lower rank ${formatShape(shape)}`
      );
    }
    if (sameShape(shape, this.shape)) {
      return new Tensor(shape, Float64Array.from(this.data));
    }

    const ownStrides = stridesOf(this.shape);
    const offset = shape.length - this.rank;
    const strides = shape.map((dim, i) => {
      if (i < offset) {
        return 0;
      }
      const own = this.shape[i - offset];
      if (own === dim) {
        return ownStrides[i - offset];
      }
      if (own === 1) {
        return 0;
      }
      throw new ShapeMismatchError(
        `Cannot broadcast ${formatShape(this.shape)} to ${formatShape(shape)}`
      );
    });

    return new Tensor(shape, stridedCopy(this.data, shape, strides));
  }

  /**
   * Keep only the entries where the indices along `axisA` and `axisB`
   * coincide. The merged axis stays at the position of `axisA` and
   * `axisB` disappears.
   */
  diagonal(axisA: number, axisB: number): Tensor {
    if (axisA === axisB || [axisA, axisB].some(a => !(Number.isInteger(a) && a >= 0 && a < this.rank))) {
      throw new ShapeMismatchError(`Invalid diagonal axes ${axisA} and ${axisB} for rank ${this.rank}`);
    }
    if (this.shape[axisA] !== this.shape[axisB]) {
      throw new ShapeMismatchError(
        `Diagonal needs equal axis sizes, got ${this.shape[axisA]} and ${this.shape[axisB]}`
      );
    }

    const ownStrides = stridesOf(this.shape);
    const outShape: number[] = [];
    const strides: number[] = [];
    for (let i = 0; i < this.rank; i++) {
      if (i === axisB) {
        continue;
      }
      outShape.push(this.shape[i]);
      strides.push(i === axisA ? ownStrides[axisA] + ownStrides[axisB] : ownStrides[i]);
    }

    return new Tensor(outShape, stridedCopy(this.data, outShape, strides));
  }
}
