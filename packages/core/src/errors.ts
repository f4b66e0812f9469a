/**
 * Typed failures raised by the engine
 *
 * All of them are usage errors reported synchronously to the caller.
 * Numeric NaN/Inf are not errors and pass through untouched.
 */

export type LogicTensorErrorKind =
  | 'shape-mismatch'
  | 'undefined-variable'
  | 'invalid-parameter'
  | 'leaked-session'
  | 'diagonal-conflict'
  | 'unknown-symbol';

export class LogicTensorError extends Error {
  constructor(readonly kind: LogicTensorErrorKind, message: string) {
    super(message);
    this.name = 'LogicTensorError';
  }
}

export class ShapeMismatchError extends LogicTensorError {
  constructor(message: string) {
    super('shape-mismatch', message);
    this.name = 'ShapeMismatchError';
  }
}

export class UndefinedVariableError extends LogicTensorError {
  constructor(readonly label: string, message: string = `Variable '${label}' is not bound in the evaluated body`) {
    super('undefined-variable', message);
    this.name = 'UndefinedVariableError';
  }
}

export class InvalidParameterError extends LogicTensorError {
  constructor(message: string) {
    super('invalid-parameter', message);
    this.name = 'InvalidParameterError';
  }
}

export class LeakedSessionError extends LogicTensorError {
  constructor(message: string) {
    super('leaked-session', message);
    this.name = 'LeakedSessionError';
  }
}

export class DiagonalConflictError extends LogicTensorError {
  constructor(readonly label: string) {
    super('diagonal-conflict', `Variable '${label}' already belongs to an active diagonal group`);
    this.name = 'DiagonalConflictError';
  }
}

export class UnknownSymbolError extends LogicTensorError {
  constructor(readonly category: string, readonly symbol: string) {
    super('unknown-symbol', `Unknown ${category} '${symbol}'`);
    this.name = 'UnknownSymbolError';
  }
}

export function isLogicTensorError(
  value: unknown,
  kind?: LogicTensorErrorKind
): value is LogicTensorError {
  if (!(value instanceof LogicTensorError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
}
