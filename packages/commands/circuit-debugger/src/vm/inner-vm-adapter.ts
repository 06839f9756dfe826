import { DebuggerError } from '../errors/debugger-error.js';
import type { FieldElement } from '../field/field-element.js';
import { fieldAdd, fieldDiv, fieldMul, fieldSub } from '../field/field-element.js';
import type {
  BinaryFieldOperation,
  BlockInstruction,
  UnconstrainedBlock,
} from '../types/program/block-instruction.js';
import type { CellEntry, CellRead } from '../types/inspection/cell-read.js';

/**
 * Outcome of a single instruction.
 */
export type InnerStepOutcome =
  | { kind: 'continuing' }
  | { kind: 'called-nested' }
  | { kind: 'returned-nested' }
  | { kind: 'block-returned'; outputs: FieldElement[] };

/**
 * Pending register/memory writes produced by one instruction. Applied only
 * after every check of the instruction passed, so a faulting step leaves the
 * state untouched.
 */
interface StepEffect {
  registers?: Array<[number, FieldElement]>;
  memory?: Array<[number, FieldElement]>;
  nextPc: number;
  push?: number;
  pop?: boolean;
  outcome: InnerStepOutcome;
}

const CONTINUING: InnerStepOutcome = { kind: 'continuing' };

function toCellRead(value: FieldElement | undefined): CellRead {
  return value === undefined ? { status: 'not-yet-available' } : { status: 'available', value };
}

function applyBinary(
  operation: BinaryFieldOperation,
  lhs: FieldElement,
  rhs: FieldElement,
): FieldElement {
  switch (operation) {
    case 'add':
      return fieldAdd(lhs, rhs);
    case 'sub':
      return fieldSub(lhs, rhs);
    case 'mul':
      return fieldMul(lhs, rhs);
    case 'div': {
      const quotient = fieldDiv(lhs, rhs);
      if (quotient === undefined) {
        throw DebuggerError.divisionByZero();
      }
      return quotient;
    }
    case 'equals':
      return lhs === rhs ? 1n : 0n;
    case 'less-than':
      return lhs < rhs ? 1n : 0n;
    case 'less-than-equals':
      return lhs <= rhs ? 1n : 0n;
  }
}

/**
 * Steppable interpreter for one invocation of an unconstrained block.
 *
 * Created by {@link InnerVmAdapter.enter} when the outer solver reaches a
 * block-call opcode and discarded once the block returns. Registers and memory
 * cells that were never written read as zero during execution, but inspection
 * reports them as not yet available.
 */
export class InnerVmAdapter {
  private readonly registerFile = new Map<number, FieldElement>();
  private readonly memoryCells = new Map<number, FieldElement>();
  private readonly callStack: number[] = [];
  private pc = 0;
  private started = false;
  private halted = false;

  private constructor(
    private readonly block: UnconstrainedBlock,
    private readonly calldata: readonly FieldElement[],
  ) {}

  public static enter(block: UnconstrainedBlock, inputs: FieldElement[]): InnerVmAdapter {
    return new InnerVmAdapter(block, [...inputs]);
  }

  public get programCounter(): number {
    return this.pc;
  }

  /** False between entry and the first executed instruction. */
  public get hasStarted(): boolean {
    return this.started;
  }

  public get isHalted(): boolean {
    return this.halted;
  }

  /** Return addresses of the active nested calls, outermost first. */
  public getCallStack(): number[] {
    return [...this.callStack];
  }

  public get instructionCount(): number {
    return this.block.instructions.length;
  }

  /**
   * Executes the instruction at the program counter.
   * @param acceptReturn - Called with the return values before a `stop` is
   *   committed; when it throws the block stays at the `stop` instruction
   * @throws DebuggerError on a fault; the adapter state is left unchanged
   */
  public stepOne(acceptReturn?: (outputs: FieldElement[]) => void): InnerStepOutcome {
    if (this.halted) {
      throw DebuggerError.notExecutingInnerVm();
    }
    const instruction = this.block.instructions[this.pc];
    if (instruction === undefined) {
      throw DebuggerError.outOfBoundsJump(
        `Program counter ${this.pc} is outside the block (${this.instructionCount} instructions)`,
      );
    }

    const effect = this.evaluate(instruction);
    if (effect.outcome.kind === 'block-returned') {
      acceptReturn?.(effect.outcome.outputs);
    }

    for (const [index, value] of effect.registers ?? []) {
      this.registerFile.set(index, value);
    }
    for (const [index, value] of effect.memory ?? []) {
      this.memoryCells.set(index, value);
    }
    if (effect.pop) {
      this.callStack.pop();
    }
    if (effect.push !== undefined) {
      this.callStack.push(effect.push);
    }
    this.pc = effect.nextPc;
    this.started = true;
    if (effect.outcome.kind === 'block-returned') {
      this.halted = true;
    }
    return effect.outcome;
  }

  /**
   * Steps until the block returns.
   * @returns the block's return values
   */
  public run(): FieldElement[] {
    for (;;) {
      const outcome = this.stepOne();
      if (outcome.kind === 'block-returned') {
        return outcome.outputs;
      }
    }
  }

  public readRegister(index: number): CellRead {
    this.checkRegister(index);
    const value = this.registerFile.get(index);
    return toCellRead(value);
  }

  public writeRegister(index: number, value: FieldElement): void {
    this.checkRegister(index);
    this.registerFile.set(index, value);
  }

  public readMemory(index: number): CellRead {
    this.checkMemory(index);
    const value = this.memoryCells.get(index);
    return toCellRead(value);
  }

  public writeMemory(index: number, value: FieldElement): void {
    this.checkMemory(index);
    this.memoryCells.set(index, value);
  }

  /**
   * Written registers in index order.
   * @throws DebuggerError `RegistersNotYetAvailable` before the first instruction
   *   when nothing was written
   */
  public registers(): CellEntry[] {
    return this.listCells(this.registerFile);
  }

  /**
   * Written memory cells in index order.
   * @throws DebuggerError `RegistersNotYetAvailable` before the first instruction
   *   when nothing was written
   */
  public memory(): CellEntry[] {
    return this.listCells(this.memoryCells);
  }

  private listCells(cells: Map<number, FieldElement>): CellEntry[] {
    if (!this.started && cells.size === 0) {
      throw DebuggerError.registersNotYetAvailable();
    }
    return Array.from(cells, ([index, value]) => ({ index, value })).sort(
      (a, b) => a.index - b.index,
    );
  }

  private evaluate(instruction: BlockInstruction): StepEffect {
    switch (instruction.op) {
      case 'calldata-copy': {
        const writes: Array<[number, FieldElement]> = [];
        for (let k = 0; k < instruction.size; k++) {
          const source = instruction.offset + k;
          const value = this.calldata[source];
          if (value === undefined) {
            throw DebuggerError.missingInput(
              `Calldata has ${this.calldata.length} values, cannot read index ${source}`,
            );
          }
          this.checkRegister(instruction.destination + k);
          writes.push([instruction.destination + k, value]);
        }
        return { registers: writes, nextPc: this.fallThrough(), outcome: CONTINUING };
      }
      case 'const':
        this.checkRegister(instruction.destination);
        return {
          registers: [[instruction.destination, instruction.value]],
          nextPc: this.fallThrough(),
          outcome: CONTINUING,
        };
      case 'mov':
        this.checkRegister(instruction.destination);
        return {
          registers: [[instruction.destination, this.load(instruction.source)]],
          nextPc: this.fallThrough(),
          outcome: CONTINUING,
        };
      case 'binary': {
        const lhs = this.load(instruction.lhs);
        const rhs = this.load(instruction.rhs);
        this.checkRegister(instruction.destination);
        const result = applyBinary(instruction.operation, lhs, rhs);
        return {
          registers: [[instruction.destination, result]],
          nextPc: this.fallThrough(),
          outcome: CONTINUING,
        };
      }
      case 'load': {
        const address = this.memoryAddress(this.load(instruction.pointer));
        this.checkRegister(instruction.destination);
        return {
          registers: [[instruction.destination, this.memoryCells.get(address) ?? 0n]],
          nextPc: this.fallThrough(),
          outcome: CONTINUING,
        };
      }
      case 'store': {
        const address = this.memoryAddress(this.load(instruction.pointer));
        return {
          memory: [[address, this.load(instruction.source)]],
          nextPc: this.fallThrough(),
          outcome: CONTINUING,
        };
      }
      case 'jump':
        return { nextPc: this.jumpTarget(instruction.location), outcome: CONTINUING };
      case 'jump-if':
      case 'jump-if-not': {
        const condition = this.load(instruction.condition) !== 0n;
        const taken = instruction.op === 'jump-if' ? condition : !condition;
        return {
          nextPc: taken ? this.jumpTarget(instruction.location) : this.fallThrough(),
          outcome: CONTINUING,
        };
      }
      case 'call':
        return {
          nextPc: this.jumpTarget(instruction.location),
          push: this.pc + 1,
          outcome: { kind: 'called-nested' },
        };
      case 'return': {
        const target = this.callStack[this.callStack.length - 1];
        if (target === undefined) {
          throw DebuggerError.outOfBoundsJump('Return with an empty call stack');
        }
        return {
          nextPc: this.jumpTarget(target),
          pop: true,
          outcome: { kind: 'returned-nested' },
        };
      }
      case 'stop': {
        const outputs: FieldElement[] = [];
        for (let k = 0; k < instruction.returnSize; k++) {
          outputs.push(this.load(instruction.returnOffset + k));
        }
        return { nextPc: this.pc, outcome: { kind: 'block-returned', outputs } };
      }
      case 'trap':
        throw DebuggerError.trapped(instruction.message);
    }
  }

  private fallThrough(): number {
    const next = this.pc + 1;
    if (next >= this.instructionCount) {
      throw DebuggerError.outOfBoundsJump(
        `Execution falls past the last instruction of the block at ${this.pc}`,
      );
    }
    return next;
  }

  private jumpTarget(location: number): number {
    if (!Number.isInteger(location) || location < 0 || location >= this.instructionCount) {
      throw DebuggerError.outOfBoundsJump(
        `Jump target ${location} is outside the block (${this.instructionCount} instructions)`,
      );
    }
    return location;
  }

  private load(index: number): FieldElement {
    this.checkRegister(index);
    return this.registerFile.get(index) ?? 0n;
  }

  private memoryAddress(pointer: FieldElement): number {
    if (pointer >= BigInt(this.block.memorySize)) {
      throw DebuggerError.invalidMemory(pointer, this.block.memorySize);
    }
    return Number(pointer);
  }

  private checkRegister(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.block.registerCount) {
      throw DebuggerError.invalidRegister(index, this.block.registerCount);
    }
  }

  private checkMemory(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.block.memorySize) {
      throw DebuggerError.invalidMemory(index, this.block.memorySize);
    }
  }
}
