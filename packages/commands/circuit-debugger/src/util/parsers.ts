import type { FieldElement } from '../field/field-element.js';
import type {
  BreakpointMutation,
  BreakpointSpec,
  DebuggerCommand,
  StartSessionRequest,
  StateQuery,
  StateQueryKind,
  StateWrite,
  StateWriteTarget,
  WitnessMap,
} from '../types/index.js';
import { STATE_QUERY_KINDS, STATE_WRITE_TARGETS } from '../types/index.js';
import {
  expectArray,
  expectField,
  expectIndex,
  expectRecord,
  expectString,
  optionalBoolean,
  optionalIndex,
  optionalString,
  optionalStringArray,
} from './validation.js';

function isStateQueryKind(value: string): value is StateQueryKind {
  return STATE_QUERY_KINDS.some((kind) => kind === value);
}

function isStateWriteTarget(value: string): value is StateWriteTarget {
  return STATE_WRITE_TARGETS.some((target) => target === value);
}

/**
 * Parses a start session request from tool arguments
 * @param input - Raw input arguments
 * @throws Error if input is invalid
 */
export function parseStartSessionRequest(input: Record<string, unknown>): StartSessionRequest {
  const id = optionalString(input.id, 'id');
  const artifactPath = optionalString(input.artifactPath, 'artifactPath');

  let request: StartSessionRequest;
  if (artifactPath !== undefined && input.artifact !== undefined) {
    throw new Error('Provide either artifactPath or artifact, not both.');
  } else if (artifactPath !== undefined) {
    request = { artifact: { kind: 'file', path: expectString(artifactPath, 'artifactPath') } };
  } else if (input.artifact !== undefined) {
    request = { artifact: { kind: 'inline', document: expectRecord(input.artifact, 'artifact') } };
  } else {
    throw new Error('Either artifactPath or artifact is required.');
  }

  if (id !== undefined) {
    request.id = expectString(id, 'id');
  }
  if (input.witness !== undefined) {
    request.witness = parseWitnessRecord(input.witness, 'witness');
  }
  if (input.breakpoints !== undefined) {
    request.breakpoints = parseBreakpointArray(input.breakpoints, 'breakpoints');
  }
  const resumeAfterConfigure = optionalBoolean(
    input.resumeAfterConfigure,
    'resumeAfterConfigure',
  );
  if (resumeAfterConfigure !== undefined) {
    request.resumeAfterConfigure = resumeAfterConfigure;
  }
  const maxScanSteps = optionalIndex(input.maxScanSteps, 'maxScanSteps');
  if (maxScanSteps !== undefined) {
    request.maxScanSteps = maxScanSteps;
  }
  return request;
}

/**
 * Parses debugger command from input arguments
 * @param input - Raw input arguments
 * @throws Error if input is invalid
 */
export function parseDebuggerCommand(input: Record<string, unknown>): DebuggerCommand {
  const sessionId = expectString(input.sessionId, 'sessionId');
  const action = expectString(input.action, 'action');
  const breakpoints = parseBreakpointMutation(input.breakpoints);
  const base = breakpoints ? { sessionId, breakpoints } : { sessionId };

  switch (action) {
    case 'step':
      return { ...base, action: 'step' };
    case 'stepOverBlock':
      return { ...base, action: 'stepOverBlock' };
    case 'next':
      return { ...base, action: 'next' };
    case 'nextOver':
      return { ...base, action: 'nextOver' };
    case 'nextOut':
      return { ...base, action: 'nextOut' };
    case 'continue':
      return { ...base, action: 'continue' };
    case 'restart':
      return { ...base, action: 'restart' };
    default:
      throw new Error(`Unsupported debugger action: ${action}`);
  }
}

export function parseStateQuery(input: Record<string, unknown>): StateQuery {
  const sessionId = expectString(input.sessionId, 'sessionId');
  const kind = expectString(input.query, 'query');
  if (!isStateQueryKind(kind)) {
    throw new Error(`query must be one of ${STATE_QUERY_KINDS.join(', ')} (received ${kind}).`);
  }
  const query: StateQuery = { sessionId, kind };
  const index = optionalIndex(input.index, 'index');
  if (index !== undefined) {
    query.index = index;
  }
  return query;
}

export function parseStateWrite(input: Record<string, unknown>): StateWrite {
  const sessionId = expectString(input.sessionId, 'sessionId');
  const target = expectString(input.target, 'target');
  if (!isStateWriteTarget(target)) {
    throw new Error(
      `target must be one of ${STATE_WRITE_TARGETS.join(', ')} (received ${target}).`,
    );
  }
  return {
    sessionId,
    target,
    index: expectIndex(input.index, 'index'),
    value: expectField(input.value, 'value'),
  };
}

/**
 * Parses a `{ "<index>": "<value>" }` witness record.
 * @param value - Raw record
 * @param label - Field label for error messages
 * @throws Error if a key is not an index or a value is not a field element
 */
export function parseWitnessRecord(value: unknown, label: string): WitnessMap {
  const record = expectRecord(value, label);
  const witness: WitnessMap = new Map();
  for (const [key, entry] of Object.entries(record)) {
    if (!/^\d+$/.test(key)) {
      throw new Error(`${label} keys must be witness indices (received ${key}).`);
    }
    witness.set(Number(key), expectField(entry, `${label}.${key}`));
  }
  return witness;
}

/**
 * Parses a CLI witness assignment, `3=7` or `_3=0x2a`.
 * @throws Error if the text is malformed
 */
export function parseWitnessAssignment(text: string): [number, FieldElement] {
  const match = /^_?(\d+)=(.+)$/.exec(text.trim());
  if (!match) {
    throw new Error(`Witness assignment must look like <index>=<value> (received ${text}).`);
  }
  return [Number(match[1]), expectField(match[2], `witness ${match[1]}`)];
}

/**
 * Parses a CLI breakpoint, an address (`3`, `1.2`) or a source line
 * (`main:11`, or `:11` for any file).
 */
export function parseBreakpointText(text: string): BreakpointSpec {
  const separator = text.lastIndexOf(':');
  if (separator === -1) {
    return { address: expectString(text.trim(), 'breakpoint') };
  }
  const file = text.slice(0, separator);
  const lineText = text.slice(separator + 1);
  if (!/^\d+$/.test(lineText)) {
    throw new Error(`Breakpoint line must be a number (received ${text}).`);
  }
  const line = Number(lineText);
  return file.length > 0 ? { file, line } : { line };
}

/**
 * Parses breakpoint mutation from input
 * @param value - Raw breakpoint mutation input
 * @throws Error if input is invalid
 */
function parseBreakpointMutation(value: unknown): BreakpointMutation | undefined {
  if (value === undefined) {
    return undefined;
  }
  const record = expectRecord(value, 'breakpoints');
  const mutation: BreakpointMutation = {};

  if (record.set !== undefined) {
    mutation.set = parseBreakpointArray(record.set, 'breakpoints.set');
  }
  const remove = optionalStringArray(record.remove, 'breakpoints.remove');
  if (remove !== undefined) {
    mutation.remove = remove;
  }

  return mutation;
}

function parseBreakpointArray(value: unknown, label: string): BreakpointSpec[] {
  return expectArray(value, label).map((entry, index) =>
    parseBreakpointSpec(expectRecord(entry, `${label}[${index}]`), `${label}[${index}]`),
  );
}

/**
 * Parses a single breakpoint specification
 * @param value - Raw breakpoint spec input
 * @param label - Field label for error messages
 * @throws Error if input is invalid
 */
function parseBreakpointSpec(value: Record<string, unknown>, label: string): BreakpointSpec {
  if (value.address !== undefined) {
    return { address: expectString(value.address, `${label}.address`) };
  }
  if (value.line === undefined) {
    throw new Error(`${label} must include either address or line.`);
  }
  const line = expectIndex(value.line, `${label}.line`);
  const file = optionalString(value.file, `${label}.file`);
  return file === undefined ? { line } : { file, line };
}
