import { Tensor } from '@logic-tensors/core';
import { LambdaModel } from '../models.js';

/** exp(-||a - b||) per row */
export const closeness = new LambdaModel((a: Tensor, b: Tensor) => {
  const rows = a.shape[0];
  const width = a.size / rows;
  const out = new Array<number>(rows);
  for (let r = 0; r < rows; r++) {
    let sum = 0;
    for (let f = 0; f < width; f++) {
      const d = a.data[r * width + f] - b.data[r * width + f];
      sum += d * d;
    }
    out[r] = Math.exp(-Math.sqrt(sum));
  }
  return Tensor.fromFlat([rows], out);
}, 'closeness');

/** First feature of each row */
export function firstColumn(t: Tensor): Tensor {
  const rows = t.shape[0];
  const width = t.size / rows;
  return Tensor.fromFlat([rows], Array.from({ length: rows }, (_, r) => t.data[r * width]));
}

export function points(count: number, offset: number = 0): number[][] {
  return Array.from({ length: count }, (_, i) => [i / count + offset, (count - i) / count]);
}
