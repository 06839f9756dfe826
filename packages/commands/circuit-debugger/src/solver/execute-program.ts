import { outer } from '../address/opcode-address.js';
import { DebuggerError } from '../errors/debugger-error.js';
import type { DebugResult } from '../errors/result.js';
import { failure, success } from '../errors/result.js';
import type { FieldElement } from '../field/field-element.js';
import type { CircuitProgram } from '../types/program/circuit-program.js';
import type { WitnessIndex, WitnessMap } from '../types/program/witness-map.js';
import { InnerVmAdapter } from '../vm/inner-vm-adapter.js';
import { applyAssignments, blockInputs, blockOutputAssignments } from './block-outputs.js';
import type { GateSolver } from './gate-solver.js';
import { ExpressionSolver } from './gate-solver.js';

/**
 * Solves a program without pausing: every gate in order, every block run to
 * completion.
 * @returns the complete witness map, or the first failure
 */
export function executeProgram(
  program: CircuitProgram,
  initialWitness: ReadonlyMap<WitnessIndex, FieldElement>,
  solver: GateSolver = new ExpressionSolver(),
): DebugResult<WitnessMap> {
  const witness: WitnessMap = new Map(initialWitness);

  for (const [outerIndex, opcode] of program.opcodes.entries()) {
    try {
      if (opcode.type === 'assert-zero') {
        applyAssignments(witness, solver.solve(opcode, witness));
        continue;
      }
      const block = program.blocks[opcode.blockId];
      if (block === undefined) {
        throw DebuggerError.invalidArtifact(`Block ${opcode.blockId} does not exist`);
      }
      const outputs = InnerVmAdapter.enter(block, blockInputs(opcode, witness)).run();
      applyAssignments(witness, blockOutputAssignments(opcode, outputs, witness));
    } catch (error) {
      if (error instanceof DebuggerError) {
        return failure(error.at(outer(outerIndex)));
      }
      throw error;
    }
  }

  return success(witness);
}
