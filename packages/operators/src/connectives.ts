/**
 * Pointwise truth functions on [0, 1]
 *
 * Inputs outside [0, 1] are not rejected; the result is then whatever
 * the arithmetic gives.
 */

export interface UnaryOperator {
  readonly name: string;
  readonly arity: 1;
  apply(a: number): number;
}

export interface BinaryOperator {
  readonly name: string;
  readonly arity: 2;
  apply(a: number, b: number): number;
}

export type TruthOperator = UnaryOperator | BinaryOperator;

export interface StabilityOptions {
  stable?: boolean;
  epsilon?: number;
}

const DEFAULT_EPSILON = 1e-4;

function unary(name: string, apply: (a: number) => number): UnaryOperator {
  return { name, arity: 1, apply };
}

function binary(name: string, apply: (a: number, b: number) => number): BinaryOperator {
  return { name, arity: 2, apply };
}

// =============================================================================
// Negation
// =============================================================================

export const standardNot = unary('standard_not', a => 1 - a);

export const godelNot = unary('godel_not', a => (a === 0 ? 1 : 0));

// =============================================================================
// T-norms (And)
// =============================================================================

export const minAnd = binary('min_and', (a, b) => Math.min(a, b));

export function productAnd(options: StabilityOptions = {}): BinaryOperator {
  if (!options.stable) {
    return binary('product_and', (a, b) => a * b);
  }
  const eps = options.epsilon ?? DEFAULT_EPSILON;
  return binary('stable_product_and', (a, b) => ((1 - eps) * a + eps) * ((1 - eps) * b + eps));
}

export const lukasiewiczAnd = binary('lukasiewicz_and', (a, b) => Math.max(a + b - 1, 0));

// =============================================================================
// T-conorms (Or)
// =============================================================================

export const maxOr = binary('max_or', (a, b) => Math.max(a, b));

export function probSumOr(options: StabilityOptions = {}): BinaryOperator {
  if (!options.stable) {
    return binary('prob_sum_or', (a, b) => a + b - a * b);
  }
  const eps = options.epsilon ?? DEFAULT_EPSILON;
  return binary('stable_prob_sum_or', (a, b) => {
    const x = (1 - eps) * a;
    const y = (1 - eps) * b;
    return x + y - x * y;
  });
}

export const lukasiewiczOr = binary('lukasiewicz_or', (a, b) => Math.min(a + b, 1));

// =============================================================================
// Implications
// =============================================================================

export const kleeneDienesImplies = binary('kleene_dienes_implies', (a, b) => Math.max(1 - a, b));

export const godelImplies = binary('godel_implies', (a, b) => (a <= b ? 1 : b));

export const reichenbachImplies = binary('reichenbach_implies', (a, b) => 1 - a + a * b);

export const goguenImplies = binary('goguen_implies', (a, b) => (a <= b ? 1 : b / a));

export const lukasiewiczImplies = binary('lukasiewicz_implies', (a, b) => Math.min(1 - a + b, 1));

// =============================================================================
// Equivalence
// =============================================================================

export function equivalence(and: BinaryOperator, implies: BinaryOperator): BinaryOperator {
  return binary(`equiv(${and.name}, ${implies.name})`, (a, b) =>
    and.apply(implies.apply(a, b), implies.apply(b, a))
  );
}
