/**
 * Bundles the connectives, quantifiers and symbol constructors bound to
 * one evaluation context
 */

import { createEvaluationContext, type EvaluationContext } from '@logic-tensors/core';
import { operatorSet, type OperatorSet } from '@logic-tensors/operators';
import { Connective } from './connective';
import { Quantifier } from './quantifier';
import { Predicate, TermFunction } from './predicate';
import type { TensorCallable } from './models';

export interface Logic {
  context: EvaluationContext;
  operators: OperatorSet;
  Not: Connective;
  And: Connective;
  Or: Connective;
  Implies: Connective;
  Equiv: Connective;
  Forall: Quantifier;
  Exists: Quantifier;
  predicate(name: string, model: TensorCallable): Predicate;
  fn(name: string, model: TensorCallable): TermFunction;
}

export function operatorsFor(context: EvaluationContext): OperatorSet {
  const { semantics, existsP, forallP, stable, epsilon } = context.config;
  return operatorSet(semantics, { existsP, forallP, stable, epsilon });
}

export function createLogic(
  context: EvaluationContext = createEvaluationContext(),
  operators: OperatorSet = operatorsFor(context)
): Logic {
  return {
    context,
    operators,
    Not: new Connective(operators.not, context),
    And: new Connective(operators.and, context),
    Or: new Connective(operators.or, context),
    Implies: new Connective(operators.implies, context),
    Equiv: new Connective(operators.equiv, context),
    Forall: new Quantifier('forall', operators.forall, context),
    Exists: new Quantifier('exists', operators.exists, context),
    predicate: (name, model) => new Predicate(name, model, context),
    fn: (name, model) => new TermFunction(name, model, context),
  };
}
