import type { OpcodeAddress } from '../address/opcode-address.js';
import { blockAt } from '../address/program-addresses.js';
import { formatField, formatSignedField } from '../field/field-element.js';
import type { BlockInstruction } from '../types/program/block-instruction.js';
import type { CircuitProgram } from '../types/program/circuit-program.js';
import type { Expression } from '../types/program/expression.js';
import type { OuterOpcode } from '../types/program/outer-opcode.js';

export function formatExpression(expression: Expression): string {
  const parts: string[] = [];
  for (const term of expression.mulTerms) {
    parts.push(`(${formatSignedField(term.coefficient)}, _${term.lhs}, _${term.rhs})`);
  }
  for (const term of expression.linearTerms) {
    parts.push(`(${formatSignedField(term.coefficient)}, _${term.witness})`);
  }
  parts.push(formatSignedField(expression.constant));
  return `EXPR [ ${parts.join(' ')} ]`;
}

export function formatOpcode(opcode: OuterOpcode, program?: CircuitProgram): string {
  if (opcode.type === 'assert-zero') {
    return formatExpression(opcode.expression);
  }
  const name = program?.blocks[opcode.blockId]?.name;
  const label = name ? `block ${opcode.blockId} (${name})` : `block ${opcode.blockId}`;
  const inputs = opcode.inputs.map(formatExpression).join(', ');
  const outputs = opcode.outputs.map((index) => `_${index}`).join(', ');
  return `CALL ${label}: inputs: [${inputs}], outputs: [${outputs}]`;
}

export function formatInstruction(instruction: BlockInstruction): string {
  switch (instruction.op) {
    case 'calldata-copy':
      return (
        `calldata-copy r${instruction.destination}, ` +
        `size ${instruction.size}, offset ${instruction.offset}`
      );
    case 'const':
      return `const r${instruction.destination}, ${formatField(instruction.value)}`;
    case 'mov':
      return `mov r${instruction.destination}, r${instruction.source}`;
    case 'binary':
      return (
        `${instruction.operation} r${instruction.destination}, ` +
        `r${instruction.lhs}, r${instruction.rhs}`
      );
    case 'load':
      return `load r${instruction.destination}, [r${instruction.pointer}]`;
    case 'store':
      return `store [r${instruction.pointer}], r${instruction.source}`;
    case 'jump':
    case 'call':
      return `${instruction.op} ${instruction.location}`;
    case 'jump-if':
    case 'jump-if-not':
      return `${instruction.op} r${instruction.condition}, ${instruction.location}`;
    case 'return':
      return 'return';
    case 'stop':
      return `stop offset ${instruction.returnOffset}, size ${instruction.returnSize}`;
    case 'trap':
      return instruction.message === undefined
        ? 'trap'
        : `trap ${JSON.stringify(instruction.message)}`;
  }
}

/**
 * Disassembly of the opcode or instruction at `address`, empty for addresses
 * outside the program.
 */
export function disassemble(program: CircuitProgram, address: OpcodeAddress): string {
  if (address.kind === 'outer') {
    const opcode = program.opcodes[address.outerIndex];
    return opcode ? formatOpcode(opcode, program) : '';
  }
  const instruction = blockAt(program, address.outerIndex)?.instructions[address.innerIndex];
  return instruction ? formatInstruction(instruction) : '';
}
