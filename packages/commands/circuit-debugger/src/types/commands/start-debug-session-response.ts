import type { DebuggerFailure } from '../../errors/debugger-error.js';
import type { WitnessMap } from '../program/witness-map.js';
import type { DebugSessionDescriptor } from '../session/debug-session-descriptor.js';
import type { BreakpointSummary } from './breakpoint-summary.js';
import type { StopDetails } from './stop-details.js';

/**
 * Payload returned after creating a new debugger session.
 */
export interface StartDebugSessionResponse {
  session: DebugSessionDescriptor;
  /** Breakpoints registered during startup. */
  breakpoints?: BreakpointSummary[];
  /** First stop point, unless the program already finished or failed. */
  initialStop?: StopDetails;
  /** Present when the program solved during start. */
  witness?: WitnessMap;
  /** Present when start ran into a fatal error; the session stays registered. */
  failure?: DebuggerFailure;
}
