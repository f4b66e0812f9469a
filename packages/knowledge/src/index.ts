/**
 * @logic-tensors/knowledge - Named symbols, axioms and satisfaction
 */

export * from './knowledge-base';
