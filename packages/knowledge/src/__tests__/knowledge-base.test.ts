import { describe, it, expect } from 'vitest';
import { ShapeMismatchError, Tensor, UnknownSymbolError } from '@logic-tensors/core';
import { LambdaModel, diag } from '@logic-tensors/engine';
import { maxAggregator } from '@logic-tensors/operators';
import { KnowledgeBase } from '../knowledge-base.js';

const firstFeature = new LambdaModel(a => {
  const rows = a.shape[0];
  const width = a.size / rows;
  return Tensor.fromFlat([rows], Array.from({ length: rows }, (_, r) => a.data[r * width]));
});

function createKb(): KnowledgeBase {
  const kb = new KnowledgeBase({ stable: false, logLevel: 'silent' });
  kb.predicate('A', firstFeature);
  kb.variable('?data', [[0.2], [0.8]]);
  kb.constant('a', [0.9]);
  return kb;
}

describe('KnowledgeBase symbols', () => {
  it('lists declared names by category', () => {
    const kb = createKb();
    kb.fn('id', new LambdaModel(a => a));
    kb.axiom('a is A', ({ P, c }) => P('A').call(c('a')));

    expect(kb.symbols()).toEqual({
      predicates: ['A'],
      functions: ['id'],
      variables: ['?data'],
      constants: ['a'],
      axioms: ['a is A'],
    });
  });

  it('reports undeclared names', () => {
    const kb = createKb();
    expect(() => kb.ask(({ P, c }) => P('B').call(c('a')))).toThrow(UnknownSymbolError);
    expect(() => kb.ask(({ P, v }) => P('A').call(v('?missing')))).toThrow(UnknownSymbolError);
  });

  it('replaces and removes axioms by name', () => {
    const kb = createKb();
    kb.axiom('t', ({ P, c }) => P('A').call(c('a')));
    kb.axiom('t', ({ Not, P, c }) => Not.call(P('A').call(c('a'))));
    expect(kb.satisfaction().axioms['t']).toBeCloseTo(0.1);
    expect(kb.removeAxiom('t')).toBe(true);
    expect(kb.symbols().axioms).toEqual([]);
  });
});

describe('KnowledgeBase.ask', () => {
  it('evaluates a formula over constants', () => {
    const kb = createKb();
    expect(kb.ask(({ P, c }) => P('A').call(c('a'))).tensor.item()).toBeCloseTo(0.9);
  });

  it('returns groundings over free variables', () => {
    const kb = createKb();
    const result = kb.ask(({ P, v }) => P('A').call(v('?data')));
    expect(result.labels).toEqual(['?data']);
    expect(result.tensor.toArray()).toEqual([0.2, 0.8]);
  });
});

describe('KnowledgeBase.satisfaction', () => {
  it('aggregates the truth of every axiom', () => {
    const kb = createKb();
    kb.axiom('all data is A', ({ Forall, P, v }) => Forall.call(v('?data'), P('A').call(v('?data')), { p: 1 }));
    kb.axiom('a is A', ({ P, c }) => P('A').call(c('a')));

    const report = kb.satisfaction({ p: 1 });
    expect(report.axioms['all data is A']).toBeCloseTo(0.5);
    expect(report.axioms['a is A']).toBeCloseTo(0.9);
    expect(report.level).toBeCloseTo(0.7);
  });

  it('closes axioms with free variables universally', () => {
    const kb = createKb();
    kb.axiom('open', ({ P, v }) => P('A').call(v('?data')));
    // 1 - sqrt((0.8^2 + 0.2^2) / 2)
    expect(kb.satisfaction().axioms['open']).toBeCloseTo(0.416905, 5);
  });

  it('names the axiom that is not a truth value', () => {
    const kb = createKb();
    kb.constant('pair', [0.1, 0.2]);
    kb.axiom('bare pair', ({ c }) => c('pair'));
    expect(() => kb.satisfaction()).toThrow(ShapeMismatchError);
    expect(() => kb.satisfaction()).toThrow(
      "Axiom 'bare pair' must hold one truth value per tuple, has trailing axes (2)"
    );
  });

  it('accepts another aggregator for the level', () => {
    const kb = createKb();
    kb.axiom('a is A', ({ P, c }) => P('A').call(c('a')));
    kb.axiom('a is not A', ({ Not, P, c }) => Not.call(P('A').call(c('a'))));
    expect(kb.satisfaction({ aggregator: maxAggregator }).level).toBeCloseTo(0.9);
  });

  it('leaves no diagonal session open', () => {
    const kb = createKb();
    kb.predicate('Same', new LambdaModel((a, b) =>
      Tensor.fromFlat([a.shape[0]], a.toArray().map((v, i) => (v === b.data[i] ? 1 : 0)))
    ));
    kb.variable('x', [[0], [1], [2]]);
    kb.variable('l', [[0], [1], [2]]);
    kb.axiom('zipped', ({ Forall, P, v }) =>
      Forall.call(diag(v('x'), v('l')), P('Same').call(v('x'), v('l')))
    );

    expect(kb.satisfaction().axioms['zipped']).toBe(1);
    expect(kb.logic.context.sessions.size).toBe(0);
  });
});
