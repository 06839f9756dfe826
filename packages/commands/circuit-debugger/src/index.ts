import { CircuitDebuggerCommand } from './command.js';

export { CircuitDebuggerCommand, parseRunArguments } from './command.js';
export { DebuggerSession } from './debugger/session.js';
export { DebuggerSessionManager } from './debugger/session-manager.js';
export { SolveDriver } from './solver/solve-driver.js';
export type { ActiveBlock, DriverStepOutcome } from './solver/solve-driver.js';
export { executeProgram } from './solver/execute-program.js';
export { ExpressionSolver, evaluateExpression } from './solver/gate-solver.js';
export type { GateSolver, WitnessAssignment } from './solver/gate-solver.js';
export { InnerVmAdapter } from './vm/inner-vm-adapter.js';
export { LocationMap } from './source-map/location-map.js';
export { BreakpointRegistry } from './breakpoints/breakpoint-registry.js';
export { loadArtifact, parseArtifact } from './artifact/load-artifact.js';
export type { LoadedArtifact } from './artifact/load-artifact.js';
export { DebuggerError, DebuggerErrorKind } from './errors/debugger-error.js';
export type { DebuggerFailure } from './errors/debugger-error.js';
export type { DebugResult } from './errors/result.js';
export * from './address/opcode-address.js';
export * from './field/field-element.js';
export {
  disassemble,
  formatExpression,
  formatInstruction,
  formatOpcode,
} from './formatters/disassembler.js';
export { formatWitnessLines, toJson, witnessToRecord } from './formatters/serialize.js';
export * from './types/index.js';

export default new CircuitDebuggerCommand();
