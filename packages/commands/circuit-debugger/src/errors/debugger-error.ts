import type { OpcodeAddress } from '../address/opcode-address.js';
import { addressKey } from '../address/opcode-address.js';

/**
 * Failure kinds reported by the debugger.
 */
export enum DebuggerErrorKind {
  UnsatisfiedConstraint = 'UnsatisfiedConstraint',
  MissingInput = 'MissingInput',
  InvalidRegisterIndex = 'InvalidRegisterIndex',
  InvalidMemoryIndex = 'InvalidMemoryIndex',
  OutOfBoundsJump = 'OutOfBoundsJump',
  DivisionByZero = 'DivisionByZero',
  BlockTrapped = 'BlockTrapped',
  OutputCountMismatch = 'OutputCountMismatch',
  UnknownBreakpointAddress = 'UnknownBreakpointAddress',
  NotExecutingInnerVm = 'NotExecutingInnerVm',
  RegistersNotYetAvailable = 'RegistersNotYetAvailable',
  InvalidCommandForState = 'InvalidCommandForState',
  InvalidArtifact = 'InvalidArtifact',
  UnknownSession = 'UnknownSession',
  DuplicateSession = 'DuplicateSession',
}

/**
 * Serializable failure returned across the session boundary.
 */
export interface DebuggerFailure {
  kind: DebuggerErrorKind;
  message: string;
  /** Address text form where an execution failure occurred. */
  address?: string;
}

/**
 * Error carrying a {@link DebuggerErrorKind}. Execution faults are raised as
 * `DebuggerError` inside the solve driver and the inner VM, then converted to
 * {@link DebuggerFailure} by the session. Any fault raised while executing a
 * unit ends the current solve.
 */
export class DebuggerError extends Error {
  public readonly kind: DebuggerErrorKind;
  public readonly address?: OpcodeAddress;

  public constructor(kind: DebuggerErrorKind, message: string, address?: OpcodeAddress) {
    super(message);
    this.name = 'DebuggerError';
    this.kind = kind;
    this.address = address;

    Object.setPrototypeOf(this, DebuggerError.prototype);
  }

  /**
   * Copy of this error located at `address`, unless already located.
   */
  public at(address: OpcodeAddress): DebuggerError {
    return this.address ? this : new DebuggerError(this.kind, this.message, address);
  }

  public toFailure(): DebuggerFailure {
    const failure: DebuggerFailure = { kind: this.kind, message: this.message };
    if (this.address) {
      failure.address = addressKey(this.address);
    }
    return failure;
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      address: this.address ? addressKey(this.address) : undefined,
    };
  }

  public static unsatisfiedConstraint(message: string): DebuggerError {
    return new DebuggerError(DebuggerErrorKind.UnsatisfiedConstraint, message);
  }

  public static missingInput(message: string): DebuggerError {
    return new DebuggerError(DebuggerErrorKind.MissingInput, message);
  }

  public static invalidRegister(index: number, registerCount: number): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.InvalidRegisterIndex,
      `Register r${index} is outside the register file (${registerCount} registers)`,
    );
  }

  public static invalidMemory(index: bigint | number, memorySize: number): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.InvalidMemoryIndex,
      `Memory cell ${index} is outside block memory (${memorySize} cells)`,
    );
  }

  public static outOfBoundsJump(message: string): DebuggerError {
    return new DebuggerError(DebuggerErrorKind.OutOfBoundsJump, message);
  }

  public static divisionByZero(): DebuggerError {
    return new DebuggerError(DebuggerErrorKind.DivisionByZero, 'Field division by zero');
  }

  public static trapped(message?: string): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.BlockTrapped,
      message ? `Block trapped: ${message}` : 'Block trapped',
    );
  }

  public static outputCountMismatch(expected: number, actual: number): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.OutputCountMismatch,
      `Block returned ${actual} values, opcode expects ${expected}`,
    );
  }

  public static unknownBreakpoint(address: string): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.UnknownBreakpointAddress,
      `Address ${address} does not exist in the program`,
    );
  }

  public static noAddressAtLine(file: string | undefined, line: number): DebuggerError {
    const target = file === undefined ? `line ${line}` : `${file}:${line}`;
    return new DebuggerError(
      DebuggerErrorKind.UnknownBreakpointAddress,
      `No opcode is located at ${target}`,
    );
  }

  public static notExecutingInnerVm(): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.NotExecutingInnerVm,
      'Not executing an unconstrained block',
    );
  }

  public static registersNotYetAvailable(): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.RegistersNotYetAvailable,
      'Block state is not available before its first instruction executes',
    );
  }

  public static invalidCommandForState(command: string, status: string): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.InvalidCommandForState,
      `Command '${command}' is not accepted while the session is ${status}`,
    );
  }

  public static invalidArtifact(message: string): DebuggerError {
    return new DebuggerError(DebuggerErrorKind.InvalidArtifact, message);
  }

  public static unknownSession(sessionId: string): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.UnknownSession,
      `Debugger session ${sessionId} not found`,
    );
  }

  public static duplicateSession(sessionId: string): DebuggerError {
    return new DebuggerError(
      DebuggerErrorKind.DuplicateSession,
      `Session with id ${sessionId} already exists`,
    );
  }
}
