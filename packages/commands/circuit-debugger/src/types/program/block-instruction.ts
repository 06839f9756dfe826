import type { FieldElement } from '../../field/field-element.js';

export type BinaryFieldOperation =
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'equals'
  | 'less-than'
  | 'less-than-equals';

export interface CalldataCopyInstruction {
  op: 'calldata-copy';
  destination: number;
  size: number;
  offset: number;
}

export interface ConstInstruction {
  op: 'const';
  destination: number;
  value: FieldElement;
}

export interface MovInstruction {
  op: 'mov';
  destination: number;
  source: number;
}

export interface BinaryInstruction {
  op: 'binary';
  operation: BinaryFieldOperation;
  lhs: number;
  rhs: number;
  destination: number;
}

/** `registers[destination] = memory[registers[pointer]]` */
export interface LoadInstruction {
  op: 'load';
  destination: number;
  pointer: number;
}

/** `memory[registers[pointer]] = registers[source]` */
export interface StoreInstruction {
  op: 'store';
  pointer: number;
  source: number;
}

export interface JumpInstruction {
  op: 'jump';
  location: number;
}

export interface JumpIfInstruction {
  op: 'jump-if' | 'jump-if-not';
  condition: number;
  location: number;
}

export interface CallInstruction {
  op: 'call';
  location: number;
}

export interface ReturnInstruction {
  op: 'return';
}

/** Ends the block, returning `registers[returnOffset .. returnOffset + returnSize)`. */
export interface StopInstruction {
  op: 'stop';
  returnOffset: number;
  returnSize: number;
}

export interface TrapInstruction {
  op: 'trap';
  message?: string;
}

export type BlockInstruction =
  | CalldataCopyInstruction
  | ConstInstruction
  | MovInstruction
  | BinaryInstruction
  | LoadInstruction
  | StoreInstruction
  | JumpInstruction
  | JumpIfInstruction
  | CallInstruction
  | ReturnInstruction
  | StopInstruction
  | TrapInstruction;

/**
 * Register/memory bytecode executed outside the constraint system.
 */
export interface UnconstrainedBlock {
  name?: string;
  registerCount: number;
  memorySize: number;
  instructions: BlockInstruction[];
}
