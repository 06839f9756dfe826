import type { GateSolver } from '../../solver/gate-solver.js';
import type { BreakpointSpec } from '../commands/breakpoint-spec.js';
import type { CircuitProgram } from '../program/circuit-program.js';
import type { DebugSymbols } from '../program/debug-symbols.js';
import type { WitnessMap } from '../program/witness-map.js';
import type { DebugSessionId } from './debug-session-id.js';

/**
 * Configuration payload used when creating a new debugger session.
 */
export interface DebugSessionConfig {
  /** Optional predefined identifier, otherwise generated by the manager. */
  id?: DebugSessionId;
  program: CircuitProgram;
  /** Debug information; without it every address maps to no source. */
  debugSymbols?: DebugSymbols;
  /** Initial partial assignment, typically the circuit inputs. */
  initialWitness?: WitnessMap;
  /** Breakpoints to register before execution starts. */
  breakpoints?: BreakpointSpec[];
  /**
   * Run to the first breakpoint (or the end) right after start and restart.
   * Defaults to false to keep the session paused on entry.
   */
  resumeAfterConfigure?: boolean;
  /**
   * Upper bound on the units a single `next*` or `continue` command executes.
   * Defaults to {@link DEFAULT_MAX_SCAN_STEPS}.
   */
  maxScanSteps?: number;
  /** Gate solving primitive. Defaults to the expression solver. */
  solver?: GateSolver;
}

export const DEFAULT_MAX_SCAN_STEPS = 1_000_000;
