import type { ValueOf } from 'type-fest';

import type { OpcodeAddress } from '../../address/opcode-address.js';
import type { DebuggerFailure } from '../../errors/debugger-error.js';
import type { WitnessMap } from '../program/witness-map.js';

export type SessionStateStatus = ValueOf<SessionState, 'status'>;

/**
 * Why a session paused without hitting a breakpoint.
 *
 * - `entry`: nothing executed yet since start or restart
 * - `step`: a stepping command completed normally
 * - `scan-limit`: a scanning command gave up after `maxScanSteps` units
 */
export type StepPauseReason = 'entry' | 'step' | 'scan-limit';

/**
 * Session state machine.
 *
 * `running` is only observable from inside a command; every command returns
 * with the session paused, finished or failed. `finished` and `failed` are
 * terminal for the current solve, `restart` leaves them.
 */
export type SessionState =
  | { status: 'not-started' }
  | { status: 'running' }
  | { status: 'paused-at-breakpoint'; address: OpcodeAddress }
  | { status: 'paused-after-step'; address: OpcodeAddress; reason: StepPauseReason }
  | { status: 'finished'; witness: WitnessMap }
  | { status: 'failed'; error: DebuggerFailure };

export type PausedSessionState = Extract<
  SessionState,
  { status: 'paused-at-breakpoint' | 'paused-after-step' }
>;

export function isPaused(state: SessionState): state is PausedSessionState {
  return state.status === 'paused-at-breakpoint' || state.status === 'paused-after-step';
}
