export type {
  BinaryFieldOperation,
  BinaryInstruction,
  BlockInstruction,
  CalldataCopyInstruction,
  CallInstruction,
  ConstInstruction,
  JumpIfInstruction,
  JumpInstruction,
  LoadInstruction,
  MovInstruction,
  ReturnInstruction,
  StopInstruction,
  StoreInstruction,
  TrapInstruction,
  UnconstrainedBlock,
} from './block-instruction.js';
export type { CircuitProgram } from './circuit-program.js';
export type {
  DebugScope,
  DebugSymbols,
  IndexRange,
  VariableBinding,
  VariableSource,
} from './debug-symbols.js';
export type { Expression, LinearTerm, MulTerm } from './expression.js';
export type {
  AssertZeroOpcode,
  BlockCallOpcode,
  GateOpcode,
  OuterOpcode,
} from './outer-opcode.js';
export type { SourceFile, SourceLocation } from './source-location.js';
export type { WitnessIndex, WitnessMap } from './witness-map.js';
