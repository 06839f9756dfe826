import type { FieldElement } from '../../field/field-element.js';
import type { WitnessMap } from '../program/witness-map.js';
import type { DebugSessionId } from '../session/debug-session-id.js';
import type { BreakpointSpec } from './breakpoint-spec.js';

/** Where a session's program artifact comes from. */
export type ArtifactSource =
  | { kind: 'file'; path: string }
  | { kind: 'inline'; document: unknown };

/**
 * Tool-call request for a new session. The artifact supplies program, symbols
 * and initial witness; `witness` entries override the artifact's.
 */
export interface StartSessionRequest {
  id?: DebugSessionId;
  artifact: ArtifactSource;
  witness?: WitnessMap;
  breakpoints?: BreakpointSpec[];
  resumeAfterConfigure?: boolean;
  maxScanSteps?: number;
}

export const STATE_QUERY_KINDS = [
  'session',
  'location',
  'witness',
  'registers',
  'memory',
  'opcodes',
  'variables',
  'stackTrace',
  'breakpoints',
] as const;

export type StateQueryKind = (typeof STATE_QUERY_KINDS)[number];

/**
 * Read-only inspection of a session. `index` narrows `witness`, `registers`
 * and `memory` to a single cell.
 */
export interface StateQuery {
  sessionId: DebugSessionId;
  kind: StateQueryKind;
  index?: number;
}

export const STATE_WRITE_TARGETS = ['witness', 'register', 'memory'] as const;

export type StateWriteTarget = (typeof STATE_WRITE_TARGETS)[number];

/** Override of one witness, register or memory cell at a pause point. */
export interface StateWrite {
  sessionId: DebugSessionId;
  target: StateWriteTarget;
  index: number;
  value: FieldElement;
}
