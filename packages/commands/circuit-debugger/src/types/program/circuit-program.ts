import type { UnconstrainedBlock } from './block-instruction.js';
import type { OuterOpcode } from './outer-opcode.js';

/**
 * Immutable program handed over by the compiler: the outer opcode list and the
 * blocks referenced by its block-call opcodes.
 */
export interface CircuitProgram {
  opcodes: OuterOpcode[];
  blocks: UnconstrainedBlock[];
}
