import type { Tool } from '@circuit-debugger/commands-core';

import { DEBUGGER_ACTIONS, STATE_QUERY_KINDS, STATE_WRITE_TARGETS } from '../types/index.js';

const STRING = 'string';
const NUMBER = 'number';
const BOOLEAN = 'boolean';

const SESSION_ID = { type: STRING, description: 'Debugger session identifier.' };

const FIELD_VALUE = {
  type: STRING,
  description: 'Field element as decimal, 0x-prefixed hex or negative decimal.',
};

/**
 * Creates a breakpoint spec schema
 * @returns Breakpoint spec schema
 */
export function createBreakpointSpecSchema(): Tool['inputSchema'] {
  return {
    type: 'object',
    properties: {
      address: {
        type: STRING,
        description: 'Opcode address, e.g. "2" for an outer opcode or "1.3" inside a block.',
      },
      file: {
        type: STRING,
        description: 'File identifier from the debug symbols. Omit to match every file.',
      },
      line: {
        type: NUMBER,
        description: 'One-based source line; resolves to the first opcode on that line.',
      },
    },
  };
}

/**
 * Creates a breakpoint mutation schema
 * @param breakpointSpecSchema - Breakpoint spec schema for set operations
 * @returns Breakpoint mutation schema
 */
export function createBreakpointMutationSchema(
  breakpointSpecSchema: Tool['inputSchema'],
): Tool['inputSchema'] {
  return {
    type: 'object',
    properties: {
      set: {
        type: 'array',
        description: 'Breakpoints to set before executing the command.',
        items: breakpointSpecSchema,
      },
      remove: {
        type: 'array',
        description: 'Breakpoint identifiers to remove before executing the command.',
        items: { type: STRING },
      },
    },
  };
}

/**
 * Creates a start debug session schema
 * @param breakpointSpecSchema - Breakpoint spec schema for initial breakpoints
 * @returns Start debug session schema
 */
export function createStartSessionSchema(
  breakpointSpecSchema: Tool['inputSchema'],
): Tool['inputSchema'] {
  return {
    type: 'object',
    properties: {
      id: {
        type: STRING,
        description: 'Optional predefined session identifier.',
      },
      artifactPath: {
        type: STRING,
        description: 'Path of a JSON program artifact.',
      },
      artifact: {
        type: 'object',
        description:
          'Inline program artifact: { opcodes, blocks?, debugSymbols?, initialWitness? }.',
      },
      witness: {
        type: 'object',
        additionalProperties: FIELD_VALUE,
        description: 'Witness values keyed by index, merged over the artifact initial witness.',
      },
      breakpoints: {
        type: 'array',
        description: 'Breakpoints to register before execution starts.',
        items: breakpointSpecSchema,
      },
      resumeAfterConfigure: {
        type: BOOLEAN,
        description: 'If true, run to the first breakpoint. Defaults to pausing at entry.',
      },
      maxScanSteps: {
        type: NUMBER,
        description: 'Units a single next* or continue command may execute (default 1000000).',
      },
    },
  };
}

/**
 * Creates a debugger command schema
 * @param breakpointMutationSchema - Breakpoint mutation schema for breakpoint operations
 * @returns Debugger command schema
 */
export function createDebuggerCommandSchema(
  breakpointMutationSchema: Tool['inputSchema'],
): Tool['inputSchema'] {
  return {
    type: 'object',
    properties: {
      sessionId: SESSION_ID,
      action: {
        type: STRING,
        enum: [...DEBUGGER_ACTIONS],
        description: 'Execution control command to perform.',
      },
      breakpoints: breakpointMutationSchema,
    },
    required: ['sessionId', 'action'],
  };
}

export function createStateQuerySchema(): Tool['inputSchema'] {
  return {
    type: 'object',
    properties: {
      sessionId: SESSION_ID,
      query: {
        type: STRING,
        enum: [...STATE_QUERY_KINDS],
        description: 'Which part of the paused state to return.',
      },
      index: {
        type: NUMBER,
        description: 'Single witness, register or memory cell to read.',
      },
    },
    required: ['sessionId', 'query'],
  };
}

export function createStateWriteSchema(): Tool['inputSchema'] {
  return {
    type: 'object',
    properties: {
      sessionId: SESSION_ID,
      target: {
        type: STRING,
        enum: [...STATE_WRITE_TARGETS],
        description: 'Kind of cell to override. Registers and memory need an active block.',
      },
      index: { type: NUMBER, description: 'Witness, register or memory index.' },
      value: FIELD_VALUE,
    },
    required: ['sessionId', 'target', 'index', 'value'],
  };
}

export function createSessionIdSchema(): Tool['inputSchema'] {
  return {
    type: 'object',
    properties: { sessionId: SESSION_ID },
    required: ['sessionId'],
  };
}
