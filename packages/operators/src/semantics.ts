import type { Semantics } from '@logic-tensors/core';
import {
  equivalence,
  godelImplies,
  lukasiewiczAnd,
  lukasiewiczImplies,
  lukasiewiczOr,
  maxOr,
  minAnd,
  probSumOr,
  productAnd,
  reichenbachImplies,
  standardNot,
  type BinaryOperator,
  type UnaryOperator,
} from './connectives';
import { createPMean, createPMeanError, type Aggregator } from './aggregators';

export interface OperatorSet {
  semantics: Semantics;
  not: UnaryOperator;
  and: BinaryOperator;
  or: BinaryOperator;
  implies: BinaryOperator;
  equiv: BinaryOperator;
  exists: Aggregator;
  forall: Aggregator;
}

export interface OperatorSetOptions {
  existsP?: number;
  forallP?: number;
  stable?: boolean;
  epsilon?: number;
}

/**
 * The connectives and aggregators of one fuzzy semantics
 *
 * product:     1 - a, a * b, a + b - ab, Reichenbach
 * godel:       1 - a, min, max, Gödel implication
 * lukasiewicz: 1 - a, max(a + b - 1, 0), min(a + b, 1), Łukasiewicz implication
 */
export function operatorSet(
  semantics: Semantics,
  options: OperatorSetOptions = {}
): OperatorSet {
  const stability = { stable: options.stable ?? false, epsilon: options.epsilon };
  const exists = createPMean({ p: options.existsP ?? 2, ...stability });
  const forall = createPMeanError({ p: options.forallP ?? 2, ...stability });

  let and: BinaryOperator;
  let or: BinaryOperator;
  let implies: BinaryOperator;

  switch (semantics) {
    case 'product':
      and = productAnd(stability);
      or = probSumOr(stability);
      implies = reichenbachImplies;
      break;
    case 'godel':
      and = minAnd;
      or = maxOr;
      implies = godelImplies;
      break;
    case 'lukasiewicz':
      and = lukasiewiczAnd;
      or = lukasiewiczOr;
      implies = lukasiewiczImplies;
      break;
  }

  return {
    semantics,
    not: standardNot,
    and,
    or,
    implies,
    equiv: equivalence(and, implies),
    exists,
    forall,
  };
}
