import type { BreakpointSpec } from './breakpoint-spec.js';

/**
 * Describes breakpoint adjustments applied atomically alongside a debugger command.
 */
export interface BreakpointMutation {
  /**
   * Breakpoints to register before the command executes. Their canonical
   * identifiers are returned in the command response.
   */
  set?: BreakpointSpec[];

  /**
   * Breakpoint identifiers (address text forms) to remove before the command
   * executes.
   */
  remove?: string[];
}
