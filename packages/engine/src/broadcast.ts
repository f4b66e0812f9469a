/**
 * Broadcaster
 *
 * Brings several groundings onto one combined set of variable axes so
 * they can be combined elementwise. Axes follow the first-seen order of
 * their labels. Labels zipped together, by an active diagonal group or
 * by an input that already carries a zipped axis, share one axis placed
 * where the first of them was seen; inputs holding two of them on
 * separate axes contribute only their diagonal.
 *
 * A group with fewer than two members among the operands leaves them on
 * their own axes. Subformulas such as P(x) inside a session over [x, y]
 * are ordinary, so this is not an error here; the quantifier rejects a
 * zipped variable its body never binds (UndefinedVariableError).
 */

import { ShapeMismatchError, type DiagonalGroup, type Tensor } from '@logic-tensors/core';
import type { Axis, Grounding } from './grounding';

export interface Alignment {
  /** Combined axes, in first-seen order */
  axes: Axis[];
  /** Size of each combined axis */
  shape: number[];
  /** One tensor per input, shaped `[...shape, ...featureShape of that input]` */
  tensors: Tensor[];
}

class LabelClasses {
  private parent = new Map<string, string>();

  add(label: string): void {
    if (!this.parent.has(label)) {
      this.parent.set(label, label);
    }
  }

  has(label: string): boolean {
    return this.parent.has(label);
  }

  find(label: string): string {
    let root = label;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }
    this.parent.set(label, root);
    return root;
  }

  union(a: string, b: string): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA !== rootB) {
      this.parent.set(rootB, rootA);
    }
  }
}

export function align(
  groundings: readonly Grounding[],
  diagonals: readonly DiagonalGroup[] = []
): Alignment {
  const classes = new LabelClasses();
  const order: string[] = [];
  const sizes = new Map<string, number>();

  for (const grounding of groundings) {
    grounding.axes.forEach((axis, i) => {
      const size = grounding.tensor.shape[i];
      for (const label of axis) {
        const known = sizes.get(label);
        if (known === undefined) {
          sizes.set(label, size);
          order.push(label);
          classes.add(label);
        } else if (known !== size) {
          throw new ShapeMismatchError(
            `Variable '${label}' has ${known} individuals in one operand and ${size} in another`
          );
        }
      }
      for (const label of axis.slice(1)) {
        classes.union(axis[0], label);
      }
    });
  }

  for (const group of diagonals) {
    const present = group.labels.filter(label => classes.has(label));
    for (const label of present.slice(1)) {
      classes.union(present[0], label);
    }
  }

  // Combined axes in first-seen order of each class
  const classIndex = new Map<string, number>();
  const axes: string[][] = [];
  const shape: number[] = [];

  for (const label of order) {
    const root = classes.find(label);
    const size = sizes.get(label) ?? 0;
    let index = classIndex.get(root);

    if (index === undefined) {
      index = axes.length;
      classIndex.set(root, index);
      axes.push([label]);
      shape.push(size);
      continue;
    }

    if (shape[index] !== size) {
      throw new ShapeMismatchError(
        `Cannot zip '${axes[index][0]}' (${shape[index]} individuals) ` +
        `with '${label}' (${size} individuals)`
      );
    }
    axes[index].push(label);
  }

  const axisOf = (label: string): number => classIndex.get(classes.find(label)) ?? -1;

  const tensors = groundings.map(grounding =>
    alignOne(grounding, grounding.axes.map(axis => axisOf(axis[0])), shape)
  );

  return { axes, shape, tensors };
}

function alignOne(grounding: Grounding, targets: number[], shape: readonly number[]): Tensor {
  let tensor = grounding.tensor;
  const owned = [...targets];

  // Two own axes landing on one combined axis: keep their diagonal
  for (let j = owned.length - 1; j > 0; j--) {
    const i = owned.indexOf(owned[j]);
    if (i < j) {
      tensor = tensor.diagonal(i, j);
      owned.splice(j, 1);
    }
  }

  const featureAxes = tensor.shape.slice(owned.length);
  const sorted = owned.map((target, position) => ({ target, position }))
    .sort((a, b) => a.target - b.target);
  const permutation = [
    ...sorted.map(entry => entry.position),
    ...featureAxes.map((_, k) => owned.length + k),
  ];
  tensor = tensor.permute(permutation);

  const present = new Set(owned);
  const withSingletons = [...shape.map((size, i) => (present.has(i) ? size : 1)), ...featureAxes];
  tensor = tensor.reshape(withSingletons);

  return tensor.broadcastTo([...shape, ...featureAxes]);
}
