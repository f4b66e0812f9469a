/**
 * Groundings: a tensor paired with the variables indexing its leading axes
 */

import {
  InvalidParameterError,
  ShapeMismatchError,
  Tensor,
  formatShape,
  type NestedValues,
} from '@logic-tensors/core';

/**
 * The labels addressed by one leading axis. A single label is an ordinary
 * variable axis; two or more mean the variables are zipped onto that axis.
 */
export type Axis = readonly string[];

export type GroundingKind = 'constant' | 'variable' | 'diagonal' | 'term';

export class Grounding {
  readonly tensor: Tensor;
  readonly axes: readonly Axis[];

  constructor(tensor: Tensor, axes: readonly Axis[] = []) {
    if (axes.length > tensor.rank) {
      throw new ShapeMismatchError(
        `${axes.length} variable axes declared for a tensor of shape ${formatShape(tensor.shape)}`
      );
    }

    const seen = new Set<string>();
    for (const axis of axes) {
      if (axis.length === 0) {
        throw new InvalidParameterError('A grounding axis needs at least one label');
      }
      for (const label of axis) {
        if (seen.has(label)) {
          throw new ShapeMismatchError(`Label '${label}' bound to more than one axis`);
        }
        seen.add(label);
      }
    }

    this.tensor = tensor;
    this.axes = Object.freeze(axes.map(axis => Object.freeze([...axis])));
  }

  get labels(): string[] {
    return this.axes.flat();
  }

  get kind(): GroundingKind {
    if (this.axes.length === 0) {
      return 'constant';
    }
    if (this.axes.some(axis => axis.length > 1)) {
      return 'diagonal';
    }
    return 'term';
  }

  /** Sizes of the variable axes */
  get shape(): number[] {
    return this.tensor.shape.slice(0, this.axes.length);
  }

  /** Sizes of the trailing axes the engine does not interpret */
  get featureShape(): number[] {
    return this.tensor.shape.slice(this.axes.length);
  }

  dependsOn(label: string): boolean {
    return this.axes.some(axis => axis.includes(label));
  }
}

/**
 * A named batch of individuals. The first axis of `values` enumerates
 * them; the remaining axes are the features of one individual.
 */
export class Variable extends Grounding {
  readonly label: string;
  readonly count: number;

  constructor(label: string, values: Tensor) {
    if (label.length === 0) {
      throw new InvalidParameterError('Variable label must not be empty');
    }
    if (values.rank < 1 || values.shape[0] < 1) {
      throw new ShapeMismatchError(
        `Variable '${label}' needs at least one individual, got shape ${formatShape(values.shape)}`
      );
    }

    super(values, [[label]]);
    this.label = label;
    this.count = values.shape[0];
  }

  override get kind(): GroundingKind {
    return 'variable';
  }
}

/**
 * A fixed individual, or a fixed tensor of truth values: no variable axes,
 * every axis is a feature axis.
 */
export class Constant extends Grounding {
  constructor(values: Tensor) {
    super(values, []);
  }

  override get kind(): GroundingKind {
    return 'constant';
  }
}

/**
 * Variables to be zipped when quantified together
 */
export interface DiagonalVariables {
  readonly kind: 'diagonal';
  readonly variables: readonly Variable[];
}

export function toTensor(values: Tensor | NestedValues): Tensor {
  return values instanceof Tensor ? values : Tensor.from(values);
}

export function variable(label: string, values: Tensor | NestedValues): Variable {
  return new Variable(label, toTensor(values));
}

export function constant(values: Tensor | NestedValues): Constant {
  return new Constant(toTensor(values));
}

export function diag(...variables: Variable[]): DiagonalVariables {
  if (variables.length < 2) {
    throw new InvalidParameterError(`diag() needs at least 2 variables, got ${variables.length}`);
  }
  return { kind: 'diagonal', variables };
}
