/**
 * @logic-tensors/core - Numeric substrate and shared plumbing
 *
 * - Tensor: dense row-major arrays with broadcasting
 * - Errors: typed usage failures
 * - Config, logger and the per-evaluation context
 * - Diagonal sessions: scoped variable zipping
 */

export * from './errors';
export * from './tensor';
export * from './config';
export * from './logger';
export * from './sessions';
export * from './context';
