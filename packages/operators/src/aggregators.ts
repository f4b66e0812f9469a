/**
 * Quantifier aggregators
 *
 * pMean(u; p)      = (mean(u_i^p))^(1/p)            soft max, grounds exists
 * pMeanError(u; p) = 1 - (mean((1 - u_i)^p))^(1/p)  soft min, grounds forall
 *
 * p = 1 gives the arithmetic mean; growing p approaches max (pMean)
 * or min (pMeanError). Values are expected in [0, 1].
 */

import { InvalidParameterError } from '@logic-tensors/core';
import type { StabilityOptions } from './connectives';

export interface Aggregator {
  readonly name: string;
  /** Exponent used when a call does not pass one */
  readonly defaultP: number;
  /** Result for a population with no elements */
  readonly emptyValue: number;
  aggregate(values: ArrayLike<number>, p?: number): number;
}

export interface PMeanOptions extends StabilityOptions {
  p?: number;
}

export function assertExponent(p: number): void {
  if (!(p >= 1) || !Number.isFinite(p)) {
    throw new InvalidParameterError(`Aggregator exponent p must be a finite number >= 1, got ${p}`);
  }
}

export function createPMean(options: PMeanOptions = {}): Aggregator {
  const defaultP = options.p ?? 2;
  assertExponent(defaultP);
  const eps = options.stable ? options.epsilon ?? 1e-4 : 0;

  return {
    name: options.stable ? 'stable_p_mean' : 'p_mean',
    defaultP,
    emptyValue: 0,
    aggregate(values, p = defaultP) {
      assertExponent(p);
      if (values.length === 0) {
        return this.emptyValue;
      }
      let sum = 0;
      for (let i = 0; i < values.length; i++) {
        sum += Math.pow((1 - eps) * values[i] + eps, p);
      }
      return Math.pow(sum / values.length, 1 / p);
    },
  };
}

export function createPMeanError(options: PMeanOptions = {}): Aggregator {
  const defaultP = options.p ?? 2;
  assertExponent(defaultP);
  const eps = options.stable ? options.epsilon ?? 1e-4 : 0;

  return {
    name: options.stable ? 'stable_p_mean_error' : 'p_mean_error',
    defaultP,
    emptyValue: 1,
    aggregate(values, p = defaultP) {
      assertExponent(p);
      if (values.length === 0) {
        return this.emptyValue;
      }
      let sum = 0;
      for (let i = 0; i < values.length; i++) {
        sum += Math.pow(1 - (1 - eps) * values[i], p);
      }
      return 1 - Math.pow(sum / values.length, 1 / p);
    },
  };
}

export const pMean = createPMean();

export const pMeanError = createPMeanError();

// The exponent is accepted for interface compatibility and ignored
export const minAggregator: Aggregator = {
  name: 'min',
  defaultP: 1,
  emptyValue: 1,
  aggregate(values) {
    if (values.length === 0) {
      return this.emptyValue;
    }
    let result = values[0];
    for (let i = 1; i < values.length; i++) {
      result = Math.min(result, values[i]);
    }
    return result;
  },
};

export const maxAggregator: Aggregator = {
  name: 'max',
  defaultP: 1,
  emptyValue: 0,
  aggregate(values) {
    if (values.length === 0) {
      return this.emptyValue;
    }
    let result = values[0];
    for (let i = 1; i < values.length; i++) {
      result = Math.max(result, values[i]);
    }
    return result;
  },
};

/**
 * Arithmetic mean. An empty population has no evidence either way and
 * counts as false, matching pMean at p = 1.
 */
export const meanAggregator: Aggregator = {
  name: 'mean',
  defaultP: 1,
  emptyValue: 0,
  aggregate(values) {
    if (values.length === 0) {
      return this.emptyValue;
    }
    let sum = 0;
    for (let i = 0; i < values.length; i++) {
      sum += values[i];
    }
    return sum / values.length;
  },
};
