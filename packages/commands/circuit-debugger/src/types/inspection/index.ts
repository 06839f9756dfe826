export type { CellEntry, CellRead } from './cell-read.js';
export type { OpcodeListingEntry, OpcodeMarker } from './opcode-listing-entry.js';
export type { StackFrame } from './stack-frame.js';
export type { VariableFrame, VariableValue } from './variable-frame.js';
