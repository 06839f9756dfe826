import type { DebuggerAction } from './debugger-command.js';

/**
 * Acknowledgment that a debugger command ran to its stop point.
 */
export interface CommandAcknowledgment {
  command: DebuggerAction;
  /** Execution units performed by the command. */
  unitsExecuted: number;
}
