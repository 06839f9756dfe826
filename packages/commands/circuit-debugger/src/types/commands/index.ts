export type { BreakpointMutation } from './breakpoint-mutation.js';
export type {
  AddressBreakpointSpec,
  BreakpointSpec,
  LineBreakpointSpec,
} from './breakpoint-spec.js';
export type { BreakpointSummary } from './breakpoint-summary.js';
export type { CommandAcknowledgment } from './command-acknowledgment.js';
export type { DebuggerCommandResult } from './debugger-command-result.js';
export { DEBUGGER_ACTIONS } from './debugger-command.js';
export type {
  ContinueCommand,
  DebuggerAction,
  DebuggerCommand,
  NextCommand,
  NextOutCommand,
  NextOverCommand,
  RestartCommand,
  StepCommand,
  StepOverBlockCommand,
} from './debugger-command.js';
export type { StartDebugSessionResponse } from './start-debug-session-response.js';
export type { StopDetails, StopReason } from './stop-details.js';
export { STATE_QUERY_KINDS, STATE_WRITE_TARGETS } from './tool-requests.js';
export type {
  ArtifactSource,
  StartSessionRequest,
  StateQuery,
  StateQueryKind,
  StateWrite,
  StateWriteTarget,
} from './tool-requests.js';
