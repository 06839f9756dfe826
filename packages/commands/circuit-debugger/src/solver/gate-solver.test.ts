import { describe, expect, it } from 'vitest';

import { assertZero, expr, witnessMap } from '../../test/utils/program-builders.js';
import { DebuggerError, DebuggerErrorKind } from '../errors/debugger-error.js';
import { FIELD_MODULUS } from '../field/field-element.js';
import { ExpressionSolver, evaluateExpression } from './gate-solver.js';

function solveError(run: () => unknown): DebuggerError | undefined {
  try {
    run();
  } catch (error) {
    return error instanceof DebuggerError ? error : undefined;
  }
  return undefined;
}

describe('ExpressionSolver', () => {
  const solver = new ExpressionSolver();

  it('derives the single unknown of a linear gate', () => {
    const gate = assertZero({ linear: [[1, 1], [1, 2], [-1, 3]] });

    expect(solver.solve(gate, witnessMap({ 1: 4, 2: 5 }))).toEqual([{ witness: 3, value: 9n }]);
  });

  it('treats a product with one known factor as linear', () => {
    // 3 * _1 * _2 - 12 = 0 with _1 = 2
    const gate = assertZero({ mul: [[3, 1, 2]], constant: -12 });

    expect(solver.solve(gate, witnessMap({ 1: 2 }))).toEqual([{ witness: 2, value: 2n }]);
  });

  it('checks a fully assigned gate', () => {
    const gate = assertZero({ linear: [[1, 1], [-1, 2]] });

    expect(solver.solve(gate, witnessMap({ 1: 7, 2: 7 }))).toEqual([]);
    expect(solveError(() => solver.solve(gate, witnessMap({ 1: 7, 2: 8 })))?.kind).toBe(
      DebuggerErrorKind.UnsatisfiedConstraint,
    );
  });

  it('refuses gates with several unknowns', () => {
    const gate = assertZero({ linear: [[1, 1], [1, 2]] });

    expect(solveError(() => solver.solve(gate, witnessMap({})))?.kind).toBe(
      DebuggerErrorKind.MissingInput,
    );
  });

  it('refuses products of two unknowns', () => {
    const gate = assertZero({ mul: [[1, 1, 2]], constant: -1 });

    expect(solveError(() => solver.solve(gate, witnessMap({})))?.kind).toBe(
      DebuggerErrorKind.MissingInput,
    );
  });

  it('merges terms on the same witness before solving', () => {
    // 2 * _1 + 3 * _1 - 10 = 0
    const gate = assertZero({ linear: [[2, 1], [3, 1]], constant: -10 });

    expect(solver.solve(gate, witnessMap({}))).toEqual([{ witness: 1, value: 2n }]);
  });

  it('ignores terms whose coefficients cancel', () => {
    // _1 - _1 + _2 - 4 = 0
    const gate = assertZero({ linear: [[1, 1], [-1, 1], [1, 2]], constant: -4 });

    expect(solver.solve(gate, witnessMap({}))).toEqual([{ witness: 2, value: 4n }]);
  });
});

describe('evaluateExpression', () => {
  it('evaluates over the field', () => {
    const expression = expr({ mul: [[2, 1, 2]], linear: [[-1, 3]], constant: 1 });

    expect(evaluateExpression(expression, witnessMap({ 1: 3, 2: 4, 3: 30 }))).toBe(
      FIELD_MODULUS - 5n,
    );
  });

  it('reports the first unbound witness', () => {
    const error = solveError(() =>
      evaluateExpression(expr({ linear: [[1, 8]] }), witnessMap({})),
    );

    expect(error?.kind).toBe(DebuggerErrorKind.MissingInput);
    expect(error?.message).toBe('Witness _8 is not assigned');
  });
});
