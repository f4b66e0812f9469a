import { describe, it, expect } from 'vitest';
import { Tensor, broadcastShapes, shapeSize, stridesOf } from '../tensor.js';
import { ShapeMismatchError } from '../errors.js';

describe('Tensor construction', () => {
  it('infers the shape of nested arrays', () => {
    const t = Tensor.from([[1, 2, 3], [4, 5, 6]]);
    expect(t.shape).toEqual([2, 3]);
    expect(t.toArray()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('stores booleans as 0 and 1', () => {
    expect(Tensor.from([true, false, true]).toArray()).toEqual([1, 0, 1]);
  });

  it('rejects ragged arrays', () => {
    expect(() => Tensor.from([[1, 2], [3]])).toThrow(ShapeMismatchError);
  });

  it('checks flat data against the shape', () => {
    expect(() => Tensor.fromFlat([2, 2], [1, 2, 3])).toThrow(ShapeMismatchError);
    expect(Tensor.fromFlat([2, 2], [1, 2, 3, 4]).get(1, 0)).toBe(3);
  });

  it('builds scalars and filled tensors', () => {
    expect(Tensor.scalar(0.5).item()).toBe(0.5);
    expect(Tensor.scalar(0.5).rank).toBe(0);
    expect(Tensor.full([2, 2], 7).toArray()).toEqual([7, 7, 7, 7]);
    expect(Tensor.zeros([3]).toArray()).toEqual([0, 0, 0]);
  });
});

describe('shape helpers', () => {
  it('computes sizes and strides', () => {
    expect(shapeSize([2, 3, 4])).toBe(24);
    expect(shapeSize([])).toBe(1);
    expect(stridesOf([2, 3, 4])).toEqual([12, 4, 1]);
  });

  it('broadcasts on trailing axes', () => {
    expect(broadcastShapes([2, 1], [3])).toEqual([2, 3]);
    expect(() => broadcastShapes([2], [3])).toThrow(ShapeMismatchError);
  });
});

describe('Tensor views', () => {
  const m = Tensor.from([[1, 2, 3], [4, 5, 6]]);

  it('permutes axes', () => {
    expect(m.permute([1, 0]).toNested()).toEqual([[1, 4], [2, 5], [3, 6]]);
  });

  it('rejects non-permutations', () => {
    expect(() => m.permute([0, 0])).toThrow(ShapeMismatchError);
  });

  it('reshapes when sizes agree', () => {
    expect(m.reshape([3, 2]).toNested()).toEqual([[1, 2], [3, 4], [5, 6]]);
    expect(() => m.reshape([4, 2])).toThrow(ShapeMismatchError);
  });

  it('inserts singleton axes', () => {
    expect(Tensor.from([1, 2]).expandDims(0).shape).toEqual([1, 2]);
    expect(Tensor.from([1, 2]).expandDims(1).shape).toEqual([2, 1]);
  });

  it('broadcasts to a larger shape', () => {
    expect(Tensor.from([1, 2]).broadcastTo([3, 2]).toNested()).toEqual([[1, 2], [1, 2], [1, 2]]);
    expect(Tensor.from([[1], [2]]).broadcastTo([2, 3]).toNested()).toEqual([[1, 1, 1], [2, 2, 2]]);
    expect(() => Tensor.from([1, 2, 3]).broadcastTo([2])).toThrow(ShapeMismatchError);
  });

  it('takes the diagonal of two axes', () => {
    expect(Tensor.from([[1, 2], [3, 4]]).diagonal(0, 1).toArray()).toEqual([1, 4]);

    const cube = Tensor.fromFlat([2, 3, 2], Array.from({ length: 12 }, (_, i) => i));
    // entry [i][j][i] = 6i + 2j + i
    expect(cube.diagonal(0, 2).toNested()).toEqual([[0, 2, 4], [7, 9, 11]]);
  });

  it('refuses diagonals of unequal axes', () => {
    expect(() => m.diagonal(0, 1)).toThrow(ShapeMismatchError);
  });

  it('does not share buffers with its source', () => {
    const copy = m.reshape([6]);
    copy.data[0] = 99;
    expect(m.get(0, 0)).toBe(1);
  });
});

describe('Tensor arithmetic', () => {
  it('maps values', () => {
    expect(Tensor.from([0, 0.25, 1]).map(v => 1 - v).toArray()).toEqual([1, 0.75, 0]);
  });

  it('zips with broadcasting', () => {
    const sum = Tensor.zip([Tensor.from([[1], [2]]), Tensor.from([10, 20, 30])], (a, b) => a + b);
    expect(sum.toNested()).toEqual([[11, 21, 31], [12, 22, 32]]);
  });

  it('treats non-zero, non-NaN values as true', () => {
    expect(Tensor.truthy(1)).toBe(true);
    expect(Tensor.truthy(0.2)).toBe(true);
    expect(Tensor.truthy(0)).toBe(false);
    expect(Tensor.truthy(NaN)).toBe(false);
  });

  it('reports out-of-range indices', () => {
    expect(() => Tensor.from([1, 2]).get(2)).toThrow(ShapeMismatchError);
    expect(() => Tensor.from([1, 2]).item()).toThrow(ShapeMismatchError);
  });
});
