import type { Expression } from './expression.js';
import type { WitnessIndex } from './witness-map.js';

/**
 * Gate opcode: the expression must evaluate to zero. Solving derives at most
 * one unknown witness.
 */
export interface AssertZeroOpcode {
  type: 'assert-zero';
  expression: Expression;
}

/**
 * Hands control to an unconstrained block. Each input expression becomes one
 * calldata value; the block's return values are bound to `outputs` in order.
 */
export interface BlockCallOpcode {
  type: 'block-call';
  blockId: number;
  inputs: Expression[];
  outputs: WitnessIndex[];
}

export type GateOpcode = AssertZeroOpcode;

export type OuterOpcode = GateOpcode | BlockCallOpcode;
