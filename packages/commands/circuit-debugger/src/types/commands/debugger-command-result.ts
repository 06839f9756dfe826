import type { WitnessMap } from '../program/witness-map.js';
import type { DebugSessionDescriptor } from '../session/debug-session-descriptor.js';
import type { BreakpointSummary } from './breakpoint-summary.js';
import type { CommandAcknowledgment } from './command-acknowledgment.js';
import type { StopDetails } from './stop-details.js';

/**
 * Result returned from executing a debugger command. A command that hits a
 * fatal error returns the failure instead and leaves the session `failed`.
 */
export interface DebuggerCommandResult {
  /** Session descriptor reflecting the latest state. */
  session: DebugSessionDescriptor;
  commandAck: CommandAcknowledgment;
  /** Breakpoints added prior to executing the command. */
  setBreakpoints?: BreakpointSummary[];
  /** Identifiers of breakpoints removed as part of the command. */
  removedBreakpoints?: string[];
  /** Present when the command left the session paused. */
  stop?: StopDetails;
  /** Present when the command solved the circuit. */
  witness?: WitnessMap;
}
