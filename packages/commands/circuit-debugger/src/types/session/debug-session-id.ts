export type DebugSessionId = string;
