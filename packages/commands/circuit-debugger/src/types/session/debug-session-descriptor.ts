import type { DebugSessionId } from './debug-session-id.js';
import type { SessionState } from './session-state.js';

export interface ProgramSummary {
  opcodeCount: number;
  blockCount: number;
}

/**
 * Lightweight description of a debugger session suitable for tool responses.
 */
export interface DebugSessionDescriptor {
  id: DebugSessionId;
  program: ProgramSummary;
  state: SessionState;
  createdAt: number;
  updatedAt: number;
}
