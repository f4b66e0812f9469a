/**
 * Evaluation context
 *
 * Carries configuration, the diagonal-session registry and the trace
 * through one or more formula evaluations
 */

import { loadConfig, type EngineConfig, type EngineConfigInput } from './config';
import { createLogger, type Logger } from './logger';
import { DiagonalSessionRegistry } from './sessions';

export interface EvaluationContext {
  readonly config: EngineConfig;
  readonly logger: Logger;

  // Zipped variables, scoped to this context only
  readonly sessions: DiagonalSessionRegistry;

  // Filled only when config.trace is set
  readonly trace: TraceEntry[];
}

export interface TraceEntry {
  operation: string;
  labels: string[];
  shape: number[];
  durationMs: number;
  timestamp: number;
}

export function createEvaluationContext(
  overrides: EngineConfigInput = {}
): EvaluationContext {
  const config = loadConfig(overrides);
  const logger = createLogger('LogicTensors', config.logLevel);

  return {
    config,
    logger,
    sessions: new DiagonalSessionRegistry(logger),
    trace: [],
  };
}

export function recordTrace(
  context: EvaluationContext,
  operation: string,
  labels: readonly string[],
  shape: readonly number[],
  durationMs: number
): void {
  if (!context.config.trace) {
    return;
  }

  context.trace.push({
    operation,
    labels: [...labels],
    shape: [...shape],
    durationMs,
    timestamp: Date.now(),
  });
  context.logger.debug(`${operation} -> [${labels.join(', ')}] (${shape.join(', ')})`);
}
