import { DebuggerError } from '../errors/debugger-error.js';
import type { FieldElement } from '../field/field-element.js';
import { formatField } from '../field/field-element.js';
import type { BlockCallOpcode } from '../types/program/outer-opcode.js';
import type { WitnessIndex, WitnessMap } from '../types/program/witness-map.js';
import type { WitnessAssignment } from './gate-solver.js';
import { evaluateExpression } from './gate-solver.js';

/**
 * Calldata for a block call: every input expression evaluated.
 * @throws DebuggerError `MissingInput` when an input witness is unbound
 */
export function blockInputs(
  opcode: BlockCallOpcode,
  witness: ReadonlyMap<WitnessIndex, FieldElement>,
): FieldElement[] {
  return opcode.inputs.map((input) => evaluateExpression(input, witness));
}

/**
 * Pairs block return values with the opcode's output witnesses.
 *
 * An output witness that is already bound must receive the same value.
 * @throws DebuggerError `OutputCountMismatch` or `UnsatisfiedConstraint`
 */
export function blockOutputAssignments(
  opcode: BlockCallOpcode,
  outputs: readonly FieldElement[],
  witness: ReadonlyMap<WitnessIndex, FieldElement>,
): WitnessAssignment[] {
  if (outputs.length !== opcode.outputs.length) {
    throw DebuggerError.outputCountMismatch(opcode.outputs.length, outputs.length);
  }
  return opcode.outputs.map((index, position) => {
    const value = outputs[position];
    const existing = witness.get(index);
    if (existing !== undefined && existing !== value) {
      throw DebuggerError.unsatisfiedConstraint(
        `Block output ${formatField(value)} conflicts with _${index} = ${formatField(existing)}`,
      );
    }
    return { witness: index, value };
  });
}

export function applyAssignments(witness: WitnessMap, assignments: WitnessAssignment[]): void {
  for (const { witness: index, value } of assignments) {
    witness.set(index, value);
  }
}
