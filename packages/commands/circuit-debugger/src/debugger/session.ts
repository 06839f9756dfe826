import Emittery from 'emittery';
import { logError, logEvent } from '@circuit-debugger/core';

import type { OpcodeAddress } from '../address/opcode-address.js';
import { addressKey } from '../address/opcode-address.js';
import { BreakpointRegistry } from '../breakpoints/breakpoint-registry.js';
import type { DebuggerFailure } from '../errors/debugger-error.js';
import { DebuggerError } from '../errors/debugger-error.js';
import type { DebugResult } from '../errors/result.js';
import { capture, failure, success } from '../errors/result.js';
import type { FieldElement } from '../field/field-element.js';
import { SolveDriver } from '../solver/solve-driver.js';
import type { ActiveBlock } from '../solver/solve-driver.js';
import { LocationMap } from '../source-map/location-map.js';
import type {
  BreakpointSpec,
  BreakpointSummary,
  CellEntry,
  CellRead,
  DebuggerAction,
  DebuggerCommand,
  DebuggerCommandResult,
  DebugSessionConfig,
  DebugSessionDescriptor,
  DebugSessionId,
  OpcodeListingEntry,
  SessionState,
  SourceLocation,
  StackFrame,
  StartDebugSessionResponse,
  StopDetails,
  VariableFrame,
  WitnessIndex,
  WitnessMap,
} from '../types/index.js';
import { DEFAULT_MAX_SCAN_STEPS, isPaused } from '../types/index.js';
import { SessionBreakpoints } from './session-breakpoints.js';
import { SessionInspector } from './session-inspector.js';
import type { ScanEnd } from './session-stepping.js';
import { executeSteppingAction } from './session-stepping.js';
import type { SessionEvents } from './session-types.js';

/** Where execution came to rest after start, restart or a command. */
interface Settled {
  stop?: StopDetails;
  witness?: WitnessMap;
  failure?: DebuggerFailure;
}

interface Execution {
  unitsExecuted: number;
  settled: Settled;
}

type SettleTarget = ScanEnd | { kind: 'entry'; address: OpcodeAddress };

function cloneState(state: SessionState): SessionState {
  switch (state.status) {
    case 'finished':
      return { status: 'finished', witness: new Map(state.witness) };
    case 'failed':
      return { status: 'failed', error: { ...state.error } };
    case 'paused-at-breakpoint':
    case 'paused-after-step':
      return { ...state, address: { ...state.address } };
    default:
      return { ...state };
  }
}

/**
 * Interactive solve of one circuit instance.
 *
 * Owns the solve driver, the breakpoint registry and the session state
 * machine. Every public operation returns a {@link DebugResult}; fatal
 * execution errors move the session to `failed`, from which only `restart`
 * recovers.
 */
export class DebuggerSession {
  public readonly id: DebugSessionId;

  private readonly config: DebugSessionConfig;
  private readonly descriptor: DebugSessionDescriptor;
  private readonly events = new Emittery<SessionEvents>();
  private readonly locations: LocationMap;
  private readonly registry = new BreakpointRegistry();
  private readonly breakpoints: SessionBreakpoints;
  private readonly inspector: SessionInspector;
  private readonly driver: SolveDriver;
  private readonly maxScanSteps: number;
  private state: SessionState = { status: 'not-started' };

  public constructor(id: DebugSessionId, config: DebugSessionConfig) {
    this.id = id;
    this.config = config;
    this.maxScanSteps = config.maxScanSteps ?? DEFAULT_MAX_SCAN_STEPS;
    this.locations = LocationMap.build(config.program, config.debugSymbols);
    this.breakpoints = new SessionBreakpoints(config.program, this.locations, this.registry);
    this.inspector = new SessionInspector(
      config.program,
      config.debugSymbols,
      this.locations,
      this.registry,
    );
    this.driver = new SolveDriver(
      config.program,
      config.initialWitness ?? new Map(),
      config.solver,
    );

    const createdAt = Date.now();
    this.descriptor = {
      id,
      program: {
        opcodeCount: config.program.opcodes.length,
        blockCount: config.program.blocks.length,
      },
      state: this.state,
      createdAt,
      updatedAt: createdAt,
    };
  }

  public getDescriptor(): DebugSessionDescriptor {
    return {
      ...this.descriptor,
      program: { ...this.descriptor.program },
      state: cloneState(this.state),
    };
  }

  public getState(): SessionState {
    return cloneState(this.state);
  }

  /**
   * Registers the configured breakpoints and runs to the first stop point:
   * the entry address, or with `resumeAfterConfigure` the first breakpoint.
   */
  public async start(): Promise<DebugResult<StartDebugSessionResponse>> {
    if (this.state.status !== 'not-started') {
      return failure(DebuggerError.invalidCommandForState('start', this.state.status));
    }
    const registered = capture(() =>
      this.breakpoints.applyMutation({ set: this.config.breakpoints ?? [] }),
    );
    if (!registered.ok) {
      return registered;
    }

    logEvent('info', 'session:start', {
      sessionId: this.id,
      opcodes: this.descriptor.program.opcodeCount,
      blocks: this.descriptor.program.blockCount,
      breakpoints: registered.value.set.map((summary) => summary.id),
    });

    const settled = await this.enterProgram();
    const response: StartDebugSessionResponse = { session: this.getDescriptor() };
    if (registered.value.set.length > 0) response.breakpoints = registered.value.set;
    if (settled.stop) response.initialStop = settled.stop;
    if (settled.witness) response.witness = settled.witness;
    if (settled.failure) response.failure = settled.failure;
    return success(response);
  }

  public async runCommand(
    command: DebuggerCommand,
  ): Promise<DebugResult<DebuggerCommandResult>> {
    const rejection = this.rejectCommand(command.action);
    if (rejection) {
      return failure(rejection);
    }
    const mutation = capture(() => this.breakpoints.applyMutation(command.breakpoints));
    if (!mutation.ok) {
      return mutation;
    }

    const execution =
      command.action === 'restart'
        ? { unitsExecuted: 0, settled: await this.restartSolve() }
        : await this.execute(command.action);

    if (execution.settled.failure) {
      return { ok: false, error: execution.settled.failure };
    }

    const response: DebuggerCommandResult = {
      session: this.getDescriptor(),
      commandAck: { command: command.action, unitsExecuted: execution.unitsExecuted },
    };
    if (mutation.value.set.length > 0) response.setBreakpoints = mutation.value.set;
    if (mutation.value.removed.length > 0) response.removedBreakpoints = mutation.value.removed;
    if (execution.settled.stop) response.stop = execution.settled.stop;
    if (execution.settled.witness) response.witness = execution.settled.witness;
    return success(response);
  }

  public getCurrentAddress(): DebugResult<OpcodeAddress | undefined> {
    return success(this.driver.currentAddress());
  }

  /**
   * Source locations of `address`, by default the current address.
   */
  public getSourceLocations(address?: OpcodeAddress): DebugResult<SourceLocation[]> {
    const target = address ?? this.driver.currentAddress();
    return success(target ? this.locations.locationsFor(target) : []);
  }

  public formatLocation(location: SourceLocation): string {
    return this.locations.formatLocation(location);
  }

  public getWitnessMap(): DebugResult<WitnessMap> {
    return success(this.driver.witnessMap());
  }

  public readWitness(index: WitnessIndex): DebugResult<FieldElement | undefined> {
    return success(this.driver.readWitness(index));
  }

  /**
   * Overrides a witness at a pause point.
   * @returns the previous value, `undefined` when the witness was unbound
   */
  public writeWitness(
    index: WitnessIndex,
    value: FieldElement,
  ): DebugResult<FieldElement | undefined> {
    return capture(() => {
      this.requirePaused('writeWitness');
      const previous = this.driver.writeWitness(index, value);
      logEvent('debug', 'session:write-witness', { sessionId: this.id, index, value });
      return previous;
    });
  }

  public readRegister(index: number): DebugResult<CellRead> {
    return capture(() => this.requireActiveBlock().adapter.readRegister(index));
  }

  /**
   * @returns the register content before the write
   */
  public writeRegister(index: number, value: FieldElement): DebugResult<CellRead> {
    return capture(() => {
      this.requirePaused('writeRegister');
      const { adapter } = this.requireActiveBlock();
      const previous = adapter.readRegister(index);
      adapter.writeRegister(index, value);
      return previous;
    });
  }

  public readMemory(index: number): DebugResult<CellRead> {
    return capture(() => this.requireActiveBlock().adapter.readMemory(index));
  }

  /**
   * @returns the memory cell content before the write
   */
  public writeMemory(index: number, value: FieldElement): DebugResult<CellRead> {
    return capture(() => {
      this.requirePaused('writeMemory');
      const { adapter } = this.requireActiveBlock();
      const previous = adapter.readMemory(index);
      adapter.writeMemory(index, value);
      return previous;
    });
  }

  public getRegisters(): DebugResult<CellEntry[]> {
    return capture(() => this.requireActiveBlock().adapter.registers());
  }

  public getMemory(): DebugResult<CellEntry[]> {
    return capture(() => this.requireActiveBlock().adapter.memory());
  }

  public listOpcodes(): DebugResult<OpcodeListingEntry[]> {
    return success(this.inspector.listOpcodes(this.driver.currentAddress()));
  }

  public getVariables(): DebugResult<VariableFrame[]> {
    return success(this.inspector.variables(this.driver));
  }

  public getStackTrace(): DebugResult<StackFrame[]> {
    return success(this.inspector.stackTrace(this.driver));
  }

  public addBreakpoint(spec: BreakpointSpec): DebugResult<BreakpointSummary> {
    return capture(() => this.breakpoints.add(spec));
  }

  /**
   * @returns whether a breakpoint was registered at `id`
   */
  public removeBreakpoint(id: string): DebugResult<boolean> {
    return capture(() => this.breakpoints.remove(id));
  }

  public listBreakpoints(): DebugResult<BreakpointSummary[]> {
    return success(this.breakpoints.list());
  }

  /**
   * First address located on `line`, `undefined` when none is.
   */
  public findAddressAtLine(
    file: string | undefined,
    line: number,
  ): DebugResult<OpcodeAddress | undefined> {
    const [first] = this.locations.addressesAtLine(file, line);
    return success(first);
  }

  public isSolved(): DebugResult<boolean> {
    return success(this.state.status === 'finished');
  }

  public getFinalWitness(): DebugResult<WitnessMap> {
    if (this.state.status !== 'finished') {
      return failure(
        DebuggerError.invalidCommandForState('getFinalWitness', this.state.status),
      );
    }
    return success(new Map(this.state.witness));
  }

  public onStopped(handler: (stop: StopDetails) => void | Promise<void>): () => void {
    return this.events.on('stopped', handler);
  }

  public onFinished(
    handler: (payload: SessionEvents['finished']) => void | Promise<void>,
  ): () => void {
    return this.events.on('finished', handler);
  }

  public onFailed(handler: (error: DebuggerFailure) => void | Promise<void>): () => void {
    return this.events.on('failed', handler);
  }

  public onRestarted(handler: () => void | Promise<void>): () => void {
    return this.events.on('restarted', handler);
  }

  /** Drops every event listener; the session is unusable for events afterwards. */
  public dispose(): void {
    this.events.clearListeners();
  }

  private rejectCommand(action: DebuggerAction): DebuggerError | undefined {
    const accepted =
      action === 'restart' ? this.state.status !== 'not-started' : isPaused(this.state);
    if (accepted) {
      return undefined;
    }
    return DebuggerError.invalidCommandForState(action, this.state.status);
  }

  private requirePaused(operation: string): void {
    if (!isPaused(this.state)) {
      throw DebuggerError.invalidCommandForState(operation, this.state.status);
    }
  }

  private requireActiveBlock(): ActiveBlock {
    const active = this.driver.activeBlock();
    if (!active) {
      throw DebuggerError.notExecutingInnerVm();
    }
    return active;
  }

  private async execute(action: Exclude<DebuggerAction, 'restart'>): Promise<Execution> {
    const from = this.driver.currentAddress();
    if (from === undefined) {
      return { unitsExecuted: 0, settled: await this.settle({ kind: 'finished' }) };
    }
    this.updateState({ status: 'running' });
    const { unitsExecuted, end } = executeSteppingAction(action, from, {
      driver: this.driver,
      breakpoints: this.registry,
      locations: this.locations,
      maxScanSteps: this.maxScanSteps,
    });
    logEvent('debug', 'session:command', {
      sessionId: this.id,
      action,
      from: addressKey(from),
      unitsExecuted,
      end: end.kind,
    });
    return { unitsExecuted, settled: await this.settle(end) };
  }

  private async restartSolve(): Promise<Settled> {
    this.driver.restart();
    logEvent('info', 'session:restart', { sessionId: this.id });
    await this.events.emit('restarted').catch((error: unknown) => {
      this.listenerFailed('restarted', error);
    });
    return this.enterProgram();
  }

  /**
   * First stop point of a fresh solve. With `resumeAfterConfigure` execution
   * continues unless a breakpoint sits on the entry address itself.
   */
  private async enterProgram(): Promise<Settled> {
    const entry = this.driver.currentAddress();
    if (entry === undefined) {
      return this.settle({ kind: 'finished' });
    }
    if (!this.config.resumeAfterConfigure) {
      return this.settle({ kind: 'entry', address: entry });
    }
    if (this.registry.contains(entry)) {
      return this.settle({ kind: 'breakpoint', address: entry });
    }
    return (await this.execute('continue')).settled;
  }

  private async settle(target: SettleTarget): Promise<Settled> {
    switch (target.kind) {
      case 'finished': {
        const witness = this.driver.witnessMap();
        this.updateState({ status: 'finished', witness });
        logEvent('info', 'session:finished', { sessionId: this.id, witnesses: witness.size });
        await this.events
          .emit('finished', { witness: new Map(witness) })
          .catch((error: unknown) => {
            this.listenerFailed('finished', error);
          });
        return { witness: new Map(witness) };
      }
      case 'failed': {
        const error = target.error.toFailure();
        this.updateState({ status: 'failed', error });
        logError('session:failed', target.error, { sessionId: this.id, address: error.address });
        await this.events.emit('failed', { ...error }).catch((listenerError: unknown) => {
          this.listenerFailed('failed', listenerError);
        });
        return { failure: error };
      }
      case 'breakpoint': {
        this.updateState({ status: 'paused-at-breakpoint', address: target.address });
        return this.stopped({
          reason: 'breakpoint',
          address: target.address,
          hitBreakpoint: addressKey(target.address),
          locations: this.locations.locationsFor(target.address),
        });
      }
      case 'entry':
      case 'step':
      case 'scan-limit': {
        this.updateState({
          status: 'paused-after-step',
          address: target.address,
          reason: target.kind,
        });
        return this.stopped({
          reason: target.kind,
          address: target.address,
          locations: this.locations.locationsFor(target.address),
        });
      }
    }
  }

  private async stopped(stop: StopDetails): Promise<Settled> {
    logEvent('debug', 'session:stopped', {
      sessionId: this.id,
      reason: stop.reason,
      address: addressKey(stop.address),
    });
    await this.events.emit('stopped', { ...stop }).catch((error: unknown) => {
      this.listenerFailed('stopped', error);
    });
    return { stop };
  }

  /** Listener errors are logged and never reach the command result. */
  private listenerFailed(event: keyof SessionEvents, error: unknown): void {
    logError('session:listener-failed', error, { sessionId: this.id, event });
  }

  private updateState(state: SessionState): void {
    this.state = state;
    this.descriptor.state = state;
    this.descriptor.updatedAt = Date.now();
  }
}
