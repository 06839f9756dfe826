import type { DebuggerFailure } from '../errors/debugger-error.js';
import type { StopDetails } from '../types/commands/stop-details.js';
import type { WitnessMap } from '../types/program/witness-map.js';

/**
 * Events emitted by a debug session.
 */
export interface SessionEvents {
  stopped: StopDetails;
  finished: { witness: WitnessMap };
  failed: DebuggerFailure;
  restarted: undefined;
}
