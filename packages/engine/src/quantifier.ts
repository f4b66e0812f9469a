/**
 * Quantifiers: reduce the axes of chosen variables with an aggregator
 *
 * Diagonal annotations open a session for the duration of one call.
 * A guard restricts each population to the tuples its mask marks true,
 * so populations may differ in size from one free index to the next.
 */

import {
  ShapeMismatchError,
  Tensor,
  UndefinedVariableError,
  formatShape,
  recordTrace,
  sameShape,
  shapeSize,
  type DiagonalSession,
  type EvaluationContext,
} from '@logic-tensors/core';
import { assertExponent, type Aggregator } from '@logic-tensors/operators';
import { align } from './broadcast';
import { Grounding, Variable, type Axis, type DiagonalVariables } from './grounding';

export type QuantifierKind = 'forall' | 'exists';

export type QuantifiedVariables =
  | Variable
  | DiagonalVariables
  | ReadonlyArray<Variable | DiagonalVariables>;

export type Formula = Grounding | (() => Grounding);

export interface Guard {
  variables: readonly Variable[];
  /** Receives the aligned values of `variables`; non-zero marks a tuple as kept */
  fn: (...values: Tensor[]) => Tensor;
}

export interface QuantifyOptions {
  p?: number;
  guard?: Guard;
}

function normalize(variables: QuantifiedVariables): Array<Variable | DiagonalVariables> {
  if (variables instanceof Variable) {
    return [variables];
  }
  if (isList(variables)) {
    return [...variables];
  }
  return [variables];
}

function isList(
  variables: DiagonalVariables | ReadonlyArray<Variable | DiagonalVariables>
): variables is ReadonlyArray<Variable | DiagonalVariables> {
  return Array.isArray(variables);
}

function isDiagonal(entry: Variable | DiagonalVariables): entry is DiagonalVariables {
  return !(entry instanceof Variable);
}

export class Quantifier {
  constructor(
    readonly kind: QuantifierKind,
    readonly aggregator: Aggregator,
    private readonly context: EvaluationContext
  ) {}

  call(variables: QuantifiedVariables, body: Formula, options: QuantifyOptions = {}): Grounding {
    const p = options.p ?? this.aggregator.defaultP;
    assertExponent(p);

    const entries = normalize(variables);
    const opened: DiagonalSession[] = [];
    let failed = false;

    try {
      for (const entry of entries) {
        if (isDiagonal(entry)) {
          opened.push(this.context.sessions.begin(
            entry.variables.map(v => ({ label: v.label, count: v.count }))
          ));
        }
      }

      const quantified = new Set<string>();
      for (const entry of entries) {
        if (isDiagonal(entry)) {
          entry.variables.forEach(v => quantified.add(v.label));
        } else {
          quantified.add(entry.label);
        }
      }

      const start = Date.now();
      const result = this.reduce(quantified, typeof body === 'function' ? body() : body, p, options.guard);
      recordTrace(this.context, `${this.kind}:${this.aggregator.name}`, result.labels, result.shape, Date.now() - start);
      return result;
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      this.context.sessions.settle(opened, failed);
    }
  }

  private reduce(quantified: Set<string>, body: Grounding, p: number, guard?: Guard): Grounding {
    if (body.featureShape.length > 0) {
      throw new ShapeMismatchError(
        `Quantifier body must hold one truth value per tuple, has trailing axes ${formatShape(body.featureShape)}`
      );
    }

    for (const label of quantified) {
      if (!body.dependsOn(label)) {
        throw new UndefinedVariableError(label);
      }
    }

    const active = this.context.sessions.active();
    const operands = [body];
    if (guard) {
      operands.push(this.evaluateGuard(guard, body));
    }

    const alignment = align(operands, active);

    const quantifiedAxes: number[] = [];
    const freeAxes: number[] = [];
    alignment.axes.forEach((axis, i) => {
      const bound = axis.filter(label => quantified.has(label));
      if (bound.length === 0) {
        freeAxes.push(i);
      } else if (bound.length === axis.length) {
        quantifiedAxes.push(i);
      } else {
        throw new ShapeMismatchError(
          `Axis zips [${axis.join(', ')}] but only [${bound.join(', ')}] are quantified`
        );
      }
    });

    const permutation = [...freeAxes, ...quantifiedAxes];
    const values = alignment.tensors[0].permute(permutation);
    const mask = guard ? alignment.tensors[1].permute(permutation) : undefined;

    const freeShape = freeAxes.map(i => alignment.shape[i]);
    const population = shapeSize(quantifiedAxes.map(i => alignment.shape[i]));
    const outputs = shapeSize(freeShape);
    const out = new Float64Array(outputs);
    const kept: number[] = [];

    for (let o = 0; o < outputs; o++) {
      const offset = o * population;
      if (mask) {
        kept.length = 0;
        for (let k = 0; k < population; k++) {
          if (Tensor.truthy(mask.data[offset + k])) {
            kept.push(values.data[offset + k]);
          }
        }
        out[o] = this.aggregator.aggregate(kept, p);
      } else {
        out[o] = this.aggregator.aggregate(values.data.subarray(offset, offset + population), p);
      }
    }

    const axes: Axis[] = freeAxes.map(i => alignment.axes[i]);
    return new Grounding(Tensor.fromFlat(freeShape, out), axes);
  }

  private evaluateGuard(guard: Guard, body: Grounding): Grounding {
    for (const v of guard.variables) {
      if (!body.dependsOn(v.label)) {
        throw new ShapeMismatchError(
          `Guard variable '${v.label}' does not appear in the quantified body`
        );
      }
    }

    const alignment = align(guard.variables, this.context.sessions.active());
    const mask = guard.fn(...alignment.tensors);

    if (!sameShape(mask.shape, alignment.shape)) {
      throw new ShapeMismatchError(
        `Guard returned ${formatShape(mask.shape)}, expected ${formatShape(alignment.shape)}`
      );
    }

    return new Grounding(mask, alignment.axes);
  }
}
