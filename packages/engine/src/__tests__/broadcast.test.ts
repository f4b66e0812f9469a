import { describe, it, expect } from 'vitest';
import { ShapeMismatchError, Tensor, type DiagonalGroup } from '@logic-tensors/core';
import { align } from '../broadcast.js';
import { Grounding } from '../grounding.js';

function group(labels: string[], count: number): DiagonalGroup {
  return { id: 1, labels, count };
}

describe('align', () => {
  const gx = new Grounding(Tensor.from([1, 2]), [['x']]);
  const gy = new Grounding(Tensor.from([10, 20, 30]), [['y']]);

  it('takes the cross product of disjoint variables', () => {
    const { axes, shape, tensors } = align([gx, gy]);
    expect(axes).toEqual([['x'], ['y']]);
    expect(shape).toEqual([2, 3]);
    expect(tensors[0].toNested()).toEqual([[1, 1, 1], [2, 2, 2]]);
    expect(tensors[1].toNested()).toEqual([[10, 20, 30], [10, 20, 30]]);
  });

  it('orders axes by first appearance', () => {
    expect(align([gy, gx]).axes).toEqual([['y'], ['x']]);
  });

  it('permutes operands into the combined order', () => {
    const xy = new Grounding(Tensor.from([[1, 2, 3], [4, 5, 6]]), [['x'], ['y']]);
    const yx = new Grounding(Tensor.from([[10, 40], [20, 50], [30, 60]]), [['y'], ['x']]);
    const { tensors } = align([xy, yx]);
    expect(tensors[1].toNested()).toEqual([[10, 20, 30], [40, 50, 60]]);
  });

  it('expands constants over every axis and keeps their features', () => {
    const c = new Grounding(Tensor.from([0.5, 0.7]));
    const { shape, tensors } = align([gx, c]);
    expect(shape).toEqual([2]);
    expect(tensors[1].toNested()).toEqual([[0.5, 0.7], [0.5, 0.7]]);
  });

  it('keeps trailing feature axes of variables', () => {
    const points = new Grounding(Tensor.from([[0, 1], [2, 3]]), [['x']]);
    const { tensors } = align([points, gy]);
    expect(tensors[0].shape).toEqual([2, 3, 2]);
    expect(tensors[0].get(1, 2, 0)).toBe(2);
  });

  it('zips an active diagonal group onto one axis', () => {
    const xy = new Grounding(Tensor.from([[1, 2], [3, 4]]), [['x'], ['y']]);
    const { axes, shape, tensors } = align([xy], [group(['x', 'y'], 2)]);
    expect(axes).toEqual([['x', 'y']]);
    expect(shape).toEqual([2]);
    expect(tensors[0].toArray()).toEqual([1, 4]);
  });

  it('spreads single-variable operands along the zipped axis', () => {
    const py = new Grounding(Tensor.from([7, 8]), [['y']]);
    const px = new Grounding(Tensor.from([1, 2]), [['x']]);
    const { axes, tensors } = align([px, py], [group(['x', 'y'], 2)]);
    expect(axes).toEqual([['x', 'y']]);
    expect(tensors[0].toArray()).toEqual([1, 2]);
    expect(tensors[1].toArray()).toEqual([7, 8]);
  });

  it('leaves a lone member of a group on its own axis', () => {
    const { axes, shape, tensors } = align([gx], [group(['x', 'y'], 2)]);
    expect(axes).toEqual([['x']]);
    expect(shape).toEqual([2]);
    expect(tensors[0].toArray()).toEqual([1, 2]);
  });

  it('honours axes that are already zipped', () => {
    const zipped = new Grounding(Tensor.from([5, 6]), [['x', 'y']]);
    const { axes, tensors } = align([gx, zipped]);
    expect(axes).toEqual([['x', 'y']]);
    expect(tensors[0].toArray()).toEqual([1, 2]);
    expect(tensors[1].toArray()).toEqual([5, 6]);
  });

  it('rejects a variable seen with two sizes', () => {
    const other = new Grounding(Tensor.from([1, 2, 3]), [['x']]);
    expect(() => align([gx, other])).toThrow(ShapeMismatchError);
  });

  it('rejects zipping variables of unequal counts', () => {
    expect(() => align([gx, gy], [group(['x', 'y'], 2)])).toThrow(ShapeMismatchError);
  });
});
