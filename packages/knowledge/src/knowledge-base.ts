/**
 * Knowledge base
 *
 * Registers predicates, functions, variables and constants by name and
 * keeps axioms as formula builders over them. Formulas are built with
 * plain calls; there is no formula syntax to parse.
 */

import {
  ShapeMismatchError,
  UnknownSymbolError,
  createEvaluationContext,
  createLogger,
  formatShape,
  type EngineConfigInput,
  type Logger,
  type NestedValues,
  type Tensor,
} from '@logic-tensors/core';
import type { Aggregator } from '@logic-tensors/operators';
import {
  constant,
  createLogic,
  variable,
  type Connective,
  type Constant,
  type Grounding,
  type Logic,
  type Predicate,
  type Quantifier,
  type TensorCallable,
  type TermFunction,
  type Variable,
} from '@logic-tensors/engine';

export interface FormulaScope {
  P(name: string): Predicate;
  F(name: string): TermFunction;
  v(name: string): Variable;
  c(name: string): Constant;
  Not: Connective;
  And: Connective;
  Or: Connective;
  Implies: Connective;
  Equiv: Connective;
  Forall: Quantifier;
  Exists: Quantifier;
}

export type FormulaBuilder = (scope: FormulaScope) => Grounding;

export interface SatisfactionOptions {
  /** Aggregates the per-axiom truth values, forall aggregator by default */
  aggregator?: Aggregator;
  p?: number;
}

export interface SatisfactionReport {
  level: number;
  axioms: Record<string, number>;
}

export interface SymbolTable {
  predicates: string[];
  functions: string[];
  variables: string[];
  constants: string[];
  axioms: string[];
}

function lookup<T>(table: Map<string, T>, category: string, name: string): T {
  const found = table.get(name);
  if (found === undefined) {
    throw new UnknownSymbolError(category, name);
  }
  return found;
}

export class KnowledgeBase {
  readonly logic: Logic;
  private readonly logger: Logger;

  private predicates = new Map<string, Predicate>();
  private functions = new Map<string, TermFunction>();
  private variables = new Map<string, Variable>();
  private constants = new Map<string, Constant>();
  private axioms = new Map<string, FormulaBuilder>();

  constructor(config: EngineConfigInput = {}) {
    const context = createEvaluationContext(config);
    this.logic = createLogic(context);
    this.logger = createLogger('KnowledgeBase', context.config.logLevel);
  }

  predicate(name: string, model: TensorCallable): Predicate {
    const p = this.logic.predicate(name, model);
    this.predicates.set(name, p);
    return p;
  }

  fn(name: string, model: TensorCallable): TermFunction {
    const f = this.logic.fn(name, model);
    this.functions.set(name, f);
    return f;
  }

  variable(name: string, values: Tensor | NestedValues): Variable {
    const v = variable(name, values);
    this.variables.set(name, v);
    return v;
  }

  constant(name: string, values: Tensor | NestedValues): Constant {
    const c = constant(values);
    this.constants.set(name, c);
    return c;
  }

  axiom(name: string, build: FormulaBuilder): void {
    if (this.axioms.has(name)) {
      this.logger.warn(`replacing axiom '${name}'`);
    }
    this.axioms.set(name, build);
  }

  removeAxiom(name: string): boolean {
    return this.axioms.delete(name);
  }

  symbols(): SymbolTable {
    return {
      predicates: [...this.predicates.keys()],
      functions: [...this.functions.keys()],
      variables: [...this.variables.keys()],
      constants: [...this.constants.keys()],
      axioms: [...this.axioms.keys()],
    };
  }

  ask(build: FormulaBuilder): Grounding {
    return build(this.scope());
  }

  /**
   * Truth of every axiom and their aggregate. Axioms left with free
   * variables are closed universally over all of them.
   */
  satisfaction(options: SatisfactionOptions = {}): SatisfactionReport {
    const forall = this.logic.operators.forall;
    const aggregator = options.aggregator ?? forall;
    const scope = this.scope();
    const axioms: Record<string, number> = {};

    for (const [name, build] of this.axioms) {
      const grounding = build(scope);
      if (grounding.featureShape.length > 0) {
        throw new ShapeMismatchError(
          `Axiom '${name}' must hold one truth value per tuple, has trailing axes ${formatShape(grounding.featureShape)}`
        );
      }
      axioms[name] = grounding.axes.length === 0
        ? grounding.tensor.item()
        : forall.aggregate(grounding.tensor.data);
    }

    this.logic.context.sessions.assertClosed();

    const level = aggregator.aggregate(Object.values(axioms), options.p);
    this.logger.info(`satisfaction ${level.toFixed(4)} over ${this.axioms.size} axiom(s)`);
    return { level, axioms };
  }

  private scope(): FormulaScope {
    const { Not, And, Or, Implies, Equiv, Forall, Exists } = this.logic;
    return {
      P: name => lookup(this.predicates, 'predicate', name),
      F: name => lookup(this.functions, 'function', name),
      v: name => lookup(this.variables, 'variable', name),
      c: name => lookup(this.constants, 'constant', name),
      Not,
      And,
      Or,
      Implies,
      Equiv,
      Forall,
      Exists,
    };
  }
}
