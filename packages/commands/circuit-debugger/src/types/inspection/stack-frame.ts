import type { OpcodeAddress } from '../../address/opcode-address.js';
import type { SourceLocation } from '../program/source-location.js';

/**
 * Frame of the combined outer/inner call stack, outermost first.
 */
export interface StackFrame {
  address: OpcodeAddress;
  /** Disassembly of the opcode or instruction at `address`. */
  text: string;
  locations: SourceLocation[];
}
