/**
 * @logic-tensors/operators - Fuzzy-operator library
 *
 * Negations, t-norms, t-conorms, implications and the generalized-mean
 * aggregators that ground quantifiers
 */

export * from './connectives';
export * from './aggregators';
export * from './semantics';
