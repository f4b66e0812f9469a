/**
 * Engine configuration
 */

import { z } from 'zod';
import { InvalidParameterError } from './errors';

export const SemanticsSchema = z.enum(['product', 'godel', 'lukasiewicz']);

export type Semantics = z.infer<typeof SemanticsSchema>;

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const EngineConfigSchema = z.object({
  /** Family of fuzzy connectives used by createLogic */
  semantics: SemanticsSchema.default('product'),
  /** Default exponent of the existential pMean aggregator */
  existsP: z.number().min(1).default(2),
  /** Default exponent of the universal pMeanError aggregator */
  forallP: z.number().min(1).default(2),
  /** Keep operator inputs away from 0 and 1 by `epsilon` */
  stable: z.boolean().default(true),
  epsilon: z.number().gt(0).lt(0.1).default(1e-4),
  /** Record a trace entry per connective, predicate and quantifier call */
  trace: z.boolean().default(false),
  logLevel: LogLevelSchema.default('warn'),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export function loadConfig(overrides: EngineConfigInput = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidParameterError(`Invalid engine config: ${issues}`);
  }
  return parsed.data;
}
