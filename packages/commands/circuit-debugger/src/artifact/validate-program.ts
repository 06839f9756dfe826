import { DebuggerError } from '../errors/debugger-error.js';
import type { CircuitProgram } from '../types/program/circuit-program.js';

/**
 * Structural checks the type system cannot express: block references in
 * range and non-negative sizes.
 * @returns the first problem found, `undefined` for a valid program
 */
export function validateProgram(program: CircuitProgram): DebuggerError | undefined {
  for (const [index, block] of program.blocks.entries()) {
    if (!Number.isInteger(block.registerCount) || block.registerCount < 0) {
      return DebuggerError.invalidArtifact(
        `blocks.${index}.registerCount must be a non-negative integer`,
      );
    }
    if (!Number.isInteger(block.memorySize) || block.memorySize < 0) {
      return DebuggerError.invalidArtifact(
        `blocks.${index}.memorySize must be a non-negative integer`,
      );
    }
  }
  for (const [index, opcode] of program.opcodes.entries()) {
    if (opcode.type === 'block-call' && program.blocks[opcode.blockId] === undefined) {
      return DebuggerError.invalidArtifact(
        `opcodes.${index}.blockId references missing block ${opcode.blockId}`,
      );
    }
  }
  return undefined;
}
