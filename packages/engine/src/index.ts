/**
 * @logic-tensors/engine - Grounding first-order formulas on tensors
 *
 * - Grounding / Variable / constant: tensors tagged with variable labels
 * - Broadcaster: aligns groundings over the union of their variables
 * - Connective / Quantifier: pointwise truth functions and aggregation
 * - Predicate / TermFunction: models lifted to groundings
 */

export * from './grounding';
export * from './broadcast';
export * from './models';
export * from './predicate';
export * from './connective';
export * from './quantifier';
export * from './diagonal';
export * from './logic';
