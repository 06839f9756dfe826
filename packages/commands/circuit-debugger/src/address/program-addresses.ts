import type { CircuitProgram } from '../types/program/circuit-program.js';
import type { UnconstrainedBlock } from '../types/program/block-instruction.js';
import type { OpcodeAddress } from './opcode-address.js';
import { inner, outer } from './opcode-address.js';

/**
 * Block invoked by the opcode at `outerIndex`, if that opcode is a block call.
 */
export function blockAt(
  program: CircuitProgram,
  outerIndex: number,
): UnconstrainedBlock | undefined {
  const opcode = program.opcodes[outerIndex];
  if (opcode?.type !== 'block-call') {
    return undefined;
  }
  return program.blocks[opcode.blockId];
}

/**
 * Every address of the program in address order. Each block-call opcode is
 * followed by the instructions of the block it invokes.
 */
export function listAddresses(program: CircuitProgram): OpcodeAddress[] {
  const addresses: OpcodeAddress[] = [];
  program.opcodes.forEach((_opcode, outerIndex) => {
    addresses.push(outer(outerIndex));
    const block = blockAt(program, outerIndex);
    block?.instructions.forEach((_instruction, innerIndex) => {
      addresses.push(inner(outerIndex, innerIndex));
    });
  });
  return addresses;
}

export function addressExists(program: CircuitProgram, address: OpcodeAddress): boolean {
  if (address.outerIndex < 0 || address.outerIndex >= program.opcodes.length) {
    return false;
  }
  if (address.kind === 'outer') {
    return true;
  }
  const block = blockAt(program, address.outerIndex);
  return (
    block !== undefined &&
    address.innerIndex >= 0 &&
    address.innerIndex < block.instructions.length
  );
}
