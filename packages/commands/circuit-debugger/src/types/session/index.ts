export { DEFAULT_MAX_SCAN_STEPS } from './debug-session-config.js';
export type { DebugSessionConfig } from './debug-session-config.js';
export type { DebugSessionDescriptor, ProgramSummary } from './debug-session-descriptor.js';
export type { DebugSessionId } from './debug-session-id.js';
export { isPaused } from './session-state.js';
export type {
  PausedSessionState,
  SessionState,
  SessionStateStatus,
  StepPauseReason,
} from './session-state.js';
