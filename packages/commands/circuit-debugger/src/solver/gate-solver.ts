import { DebuggerError } from '../errors/debugger-error.js';
import type { FieldElement } from '../field/field-element.js';
import { fieldAdd, fieldDiv, fieldMul, fieldNeg, formatField } from '../field/field-element.js';
import type { Expression } from '../types/program/expression.js';
import type { GateOpcode } from '../types/program/outer-opcode.js';
import type { WitnessIndex } from '../types/program/witness-map.js';

export interface WitnessAssignment {
  witness: WitnessIndex;
  value: FieldElement;
}

/**
 * Solving primitive for gate opcodes.
 *
 * Implementations read the current partial assignment and return the newly
 * derived witnesses, or throw a {@link DebuggerError} of kind
 * `UnsatisfiedConstraint` or `MissingInput`. They never mutate `witness`.
 */
export interface GateSolver {
  solve(
    opcode: GateOpcode,
    witness: ReadonlyMap<WitnessIndex, FieldElement>,
  ): WitnessAssignment[];
}

/**
 * Evaluates an expression whose witnesses are all bound.
 * @throws DebuggerError `MissingInput` naming the first unbound witness
 */
export function evaluateExpression(
  expression: Expression,
  witness: ReadonlyMap<WitnessIndex, FieldElement>,
): FieldElement {
  const read = (index: WitnessIndex): FieldElement => {
    const value = witness.get(index);
    if (value === undefined) {
      throw DebuggerError.missingInput(`Witness _${index} is not assigned`);
    }
    return value;
  };

  let total = expression.constant;
  for (const term of expression.mulTerms) {
    const product = fieldMul(read(term.lhs), read(term.rhs));
    total = fieldAdd(total, fieldMul(term.coefficient, product));
  }
  for (const term of expression.linearTerms) {
    total = fieldAdd(total, fieldMul(term.coefficient, read(term.witness)));
  }
  return total;
}

/**
 * Default solver for `assert-zero` gates.
 *
 * Substitutes known witnesses, leaving a linear remainder. With no unknown the
 * remainder must be zero; with one unknown it is solved for; more unknowns, or
 * a product of two unknowns, cannot be solved.
 */
export class ExpressionSolver implements GateSolver {
  public solve(
    opcode: GateOpcode,
    witness: ReadonlyMap<WitnessIndex, FieldElement>,
  ): WitnessAssignment[] {
    const { expression } = opcode;
    let constant = expression.constant;
    const unknowns = new Map<WitnessIndex, FieldElement>();
    const addUnknown = (index: WitnessIndex, coefficient: FieldElement): void => {
      unknowns.set(index, fieldAdd(unknowns.get(index) ?? 0n, coefficient));
    };

    for (const term of expression.mulTerms) {
      if (term.coefficient === 0n) {
        continue;
      }
      const lhs = witness.get(term.lhs);
      const rhs = witness.get(term.rhs);
      if (lhs !== undefined && rhs !== undefined) {
        constant = fieldAdd(constant, fieldMul(term.coefficient, fieldMul(lhs, rhs)));
      } else if (lhs !== undefined) {
        addUnknown(term.rhs, fieldMul(term.coefficient, lhs));
      } else if (rhs !== undefined) {
        addUnknown(term.lhs, fieldMul(term.coefficient, rhs));
      } else {
        throw DebuggerError.missingInput(
          `Cannot solve product of unassigned witnesses _${term.lhs} and _${term.rhs}`,
        );
      }
    }

    for (const term of expression.linearTerms) {
      const value = witness.get(term.witness);
      if (value !== undefined) {
        constant = fieldAdd(constant, fieldMul(term.coefficient, value));
      } else {
        addUnknown(term.witness, term.coefficient);
      }
    }

    const remaining = Array.from(unknowns.entries()).filter(
      ([, coefficient]) => coefficient !== 0n,
    );

    if (remaining.length === 0) {
      if (constant !== 0n) {
        throw DebuggerError.unsatisfiedConstraint(
          `Constraint evaluates to ${formatField(constant)}, expected 0`,
        );
      }
      return [];
    }

    if (remaining.length > 1) {
      const names = remaining.map(([index]) => `_${index}`).join(', ');
      throw DebuggerError.missingInput(`Too many unassigned witnesses: ${names}`);
    }

    const [index, coefficient] = remaining[0];
    const value = fieldDiv(fieldNeg(constant), coefficient);
    if (value === undefined) {
      throw DebuggerError.unsatisfiedConstraint(`Witness _${index} has a zero coefficient`);
    }
    return [{ witness: index, value }];
  }
}
