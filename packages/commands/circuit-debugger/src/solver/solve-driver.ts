import type { OpcodeAddress } from '../address/opcode-address.js';
import { inner, outer } from '../address/opcode-address.js';
import { DebuggerError } from '../errors/debugger-error.js';
import type { FieldElement } from '../field/field-element.js';
import type { CircuitProgram } from '../types/program/circuit-program.js';
import type { UnconstrainedBlock } from '../types/program/block-instruction.js';
import type { BlockCallOpcode } from '../types/program/outer-opcode.js';
import type { WitnessIndex, WitnessMap } from '../types/program/witness-map.js';
import type { InnerStepOutcome } from '../vm/inner-vm-adapter.js';
import { InnerVmAdapter } from '../vm/inner-vm-adapter.js';
import { applyAssignments, blockInputs, blockOutputAssignments } from './block-outputs.js';
import type { GateSolver, WitnessAssignment } from './gate-solver.js';
import { ExpressionSolver } from './gate-solver.js';

/**
 * What a single execution unit did.
 */
export type DriverStepOutcome =
  | { kind: 'gate-solved'; assignments: WitnessAssignment[] }
  | { kind: 'block-entered'; blockId: number }
  | { kind: 'block-instruction'; outcome: InnerStepOutcome }
  | { kind: 'block-returned'; assignments: WitnessAssignment[] };

/**
 * The block currently being executed and the opcode that invoked it.
 */
export interface ActiveBlock {
  outerIndex: number;
  opcode: BlockCallOpcode;
  block: UnconstrainedBlock;
  adapter: InnerVmAdapter;
}

/**
 * Drives the outer solve one unit at a time.
 *
 * A unit is one gate opcode, the entry into a block, or one block instruction.
 * The driver is the only writer of the witness map; errors raised by a unit are
 * rethrown located at the address that was executing.
 */
export class SolveDriver {
  private witness: WitnessMap;
  private outerIndex = 0;
  private active?: ActiveBlock;

  public constructor(
    private readonly program: CircuitProgram,
    private readonly initialWitness: ReadonlyMap<WitnessIndex, FieldElement>,
    private readonly solver: GateSolver = new ExpressionSolver(),
  ) {
    this.witness = new Map(initialWitness);
  }

  /** Address of the next unit, `undefined` once every opcode is solved. */
  public currentAddress(): OpcodeAddress | undefined {
    if (this.active) {
      return inner(this.outerIndex, this.active.adapter.programCounter);
    }
    return this.isFinished() ? undefined : outer(this.outerIndex);
  }

  public isFinished(): boolean {
    return this.outerIndex >= this.program.opcodes.length;
  }

  /** 1 at the outer tier, 2 plus the nested call depth inside a block. */
  public callDepth(): number {
    return this.active ? 2 + this.active.adapter.getCallStack().length : 1;
  }

  public activeBlock(): ActiveBlock | undefined {
    return this.active;
  }

  /**
   * Executes one unit.
   * @throws DebuggerError located at the executing address
   */
  public stepOne(): DriverStepOutcome {
    const address = this.currentAddress();
    if (address === undefined) {
      throw DebuggerError.invalidCommandForState('step', 'finished');
    }
    try {
      return this.execute();
    } catch (error) {
      if (error instanceof DebuggerError) {
        throw error.at(address);
      }
      throw error;
    }
  }

  /**
   * Runs the block at the current block-call opcode to completion, entering it
   * first if needed. On a gate opcode this is a single {@link stepOne}.
   * @param onUnit - Called after each unit that completed, also when a later
   *   unit fails
   * @returns the number of units executed
   */
  public stepOverBlock(onUnit: () => void = () => undefined): number {
    const opcode = this.program.opcodes[this.outerIndex];
    if (opcode?.type !== 'block-call') {
      this.stepOne();
      onUnit();
      return 1;
    }
    let units = 0;
    for (;;) {
      const outcome = this.stepOne();
      units++;
      onUnit();
      if (outcome.kind === 'block-returned') {
        return units;
      }
    }
  }

  /** Discards progress: witness map back to the initial assignment, index 0. */
  public restart(): void {
    this.witness = new Map(this.initialWitness);
    this.outerIndex = 0;
    this.active = undefined;
  }

  public readWitness(index: WitnessIndex): FieldElement | undefined {
    return this.witness.get(index);
  }

  /**
   * Overrides a witness value.
   * @returns the previous value, `undefined` when the witness was unbound
   */
  public writeWitness(index: WitnessIndex, value: FieldElement): FieldElement | undefined {
    const previous = this.witness.get(index);
    this.witness.set(index, value);
    return previous;
  }

  /** Copy of the current partial assignment. */
  public witnessMap(): WitnessMap {
    return new Map(this.witness);
  }

  private execute(): DriverStepOutcome {
    if (this.active) {
      return this.stepBlock(this.active);
    }

    const opcode = this.program.opcodes[this.outerIndex];
    if (opcode.type === 'assert-zero') {
      const assignments = this.solver.solve(opcode, this.witness);
      applyAssignments(this.witness, assignments);
      this.outerIndex++;
      return { kind: 'gate-solved', assignments };
    }

    const block = this.program.blocks[opcode.blockId];
    if (block === undefined) {
      throw DebuggerError.invalidArtifact(`Block ${opcode.blockId} does not exist`);
    }
    const adapter = InnerVmAdapter.enter(block, blockInputs(opcode, this.witness));
    this.active = { outerIndex: this.outerIndex, opcode, block, adapter };
    return { kind: 'block-entered', blockId: opcode.blockId };
  }

  private stepBlock(active: ActiveBlock): DriverStepOutcome {
    let assignments: WitnessAssignment[] = [];
    const outcome = active.adapter.stepOne((outputs) => {
      assignments = blockOutputAssignments(active.opcode, outputs, this.witness);
    });
    if (outcome.kind !== 'block-returned') {
      return { kind: 'block-instruction', outcome };
    }
    applyAssignments(this.witness, assignments);
    this.active = undefined;
    this.outerIndex++;
    return { kind: 'block-returned', assignments };
  }
}
