import type { DebugSessionId } from '../session/debug-session-id.js';
import type { BreakpointMutation } from './breakpoint-mutation.js';

/**
 * Shared options present on every debugger command invocation.
 */
interface DebuggerCommandBase {
  /** Session identifier the command should be applied to. */
  sessionId: DebugSessionId;
  /**
   * Optional breakpoint adjustments performed right before the action runs.
   */
  breakpoints?: BreakpointMutation;
}

/** Execute exactly one unit: a gate, a block entry or one block instruction. */
export type StepCommand = DebuggerCommandBase & {
  action: 'step';
};

/** Run the block at the current block-call opcode to completion. */
export type StepOverBlockCommand = DebuggerCommandBase & {
  action: 'stepOverBlock';
};

/** Step until the source line changes. */
export type NextCommand = DebuggerCommandBase & {
  action: 'next';
};

/** Step until the source line changes without descending into nested calls. */
export type NextOverCommand = DebuggerCommandBase & {
  action: 'nextOver';
};

/** Step until execution returns to a shallower call depth. */
export type NextOutCommand = DebuggerCommandBase & {
  action: 'nextOut';
};

/** Resume until a breakpoint, the end of the program or a failure. */
export type ContinueCommand = DebuggerCommandBase & {
  action: 'continue';
};

/** Discard solving progress and start over, keeping breakpoints. */
export type RestartCommand = DebuggerCommandBase & {
  action: 'restart';
};

/**
 * Union of execution control commands understood by the debugger.
 */
export type DebuggerCommand =
  | StepCommand
  | StepOverBlockCommand
  | NextCommand
  | NextOverCommand
  | NextOutCommand
  | ContinueCommand
  | RestartCommand;

export type DebuggerAction = DebuggerCommand['action'];

export const DEBUGGER_ACTIONS: readonly DebuggerAction[] = [
  'step',
  'stepOverBlock',
  'next',
  'nextOver',
  'nextOut',
  'continue',
  'restart',
];
