import { describe, expect, it, vi } from 'vitest';

import {
  assertZero,
  blockCall,
  inverseProgram,
  inverseWitness,
  witnessMap,
} from '../../test/utils/program-builders.js';
import { addressKey } from '../address/opcode-address.js';
import { DebuggerError, DebuggerErrorKind } from '../errors/debugger-error.js';
import { FIELD_MODULUS } from '../field/field-element.js';
import type { CircuitProgram } from '../types/program/circuit-program.js';
import { executeProgram } from './execute-program.js';
import { SolveDriver } from './solve-driver.js';

function caught(run: () => unknown): DebuggerError | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof DebuggerError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

describe('SolveDriver', () => {
  it('walks every unit of the program in address order', () => {
    const driver = new SolveDriver(inverseProgram(), inverseWitness());
    const visited: string[] = [];

    for (let address = driver.currentAddress(); address; address = driver.currentAddress()) {
      visited.push(addressKey(address));
      driver.stepOne();
    }

    expect(visited).toEqual(['0', '1', '1.0', '1.1', '1.2', '1.3', '2']);
    expect(driver.isFinished()).toBe(true);
    expect(driver.readWitness(5)).toBe(FIELD_MODULUS - 1n);
  });

  it('reports the call depth of each tier', () => {
    const driver = new SolveDriver(inverseProgram(), inverseWitness());
    expect(driver.callDepth()).toBe(1);

    driver.stepOne();
    driver.stepOne();
    expect(driver.callDepth()).toBe(2);
    expect(driver.activeBlock()?.adapter.hasStarted).toBe(false);
  });

  it('runs a whole block in one step-over', () => {
    const driver = new SolveDriver(inverseProgram(), inverseWitness());
    driver.stepOne();

    expect(driver.stepOverBlock()).toBe(5);
    expect(driver.currentAddress()).toEqual({ kind: 'outer', outerIndex: 2 });
  });

  it('finishes an entered block on step-over', () => {
    const driver = new SolveDriver(inverseProgram(), inverseWitness());
    driver.stepOne();
    driver.stepOne();
    driver.stepOne();

    expect(driver.stepOverBlock()).toBe(3);
    expect(driver.readWitness(5)).toBe(FIELD_MODULUS - 1n);
  });

  it('steps a gate on step-over', () => {
    const driver = new SolveDriver(inverseProgram(), inverseWitness());

    expect(driver.stepOverBlock()).toBe(1);
    expect(driver.currentAddress()).toEqual({ kind: 'outer', outerIndex: 1 });
  });

  it('locates failures at the executing address', () => {
    const driver = new SolveDriver(inverseProgram(), witnessMap({ 1: 2, 2: 2, 3: 4, 4: 1 }));
    driver.stepOne();
    driver.stepOne();
    driver.stepOne();
    driver.stepOne();

    const error = caught(() => driver.stepOne());
    expect(error?.kind).toBe(DebuggerErrorKind.DivisionByZero);
    expect(error?.toFailure().address).toBe('1.2');
  });

  it('rejects block inputs that are not assigned', () => {
    const program: CircuitProgram = {
      opcodes: [blockCall(0, [{ linear: [[1, 9]] }], [1])],
      blocks: inverseProgram().blocks,
    };
    const driver = new SolveDriver(program, witnessMap({}));

    expect(caught(() => driver.stepOne())?.kind).toBe(DebuggerErrorKind.MissingInput);
    expect(driver.activeBlock()).toBeUndefined();
  });

  it('rejects block outputs of the wrong arity', () => {
    const program: CircuitProgram = {
      opcodes: [blockCall(0, [{ constant: 2 }], [1, 2])],
      blocks: inverseProgram().blocks,
    };

    const result = executeProgram(program, witnessMap({}));
    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.kind).toBe(DebuggerErrorKind.OutputCountMismatch);
  });

  it('rejects block outputs that conflict with bound witnesses', () => {
    const program: CircuitProgram = {
      opcodes: [blockCall(0, [{ constant: 1 }], [1])],
      blocks: inverseProgram().blocks,
    };

    const result = executeProgram(program, witnessMap({ 1: 2 }));
    expect(result.ok ? undefined : result.error.kind).toBe(
      DebuggerErrorKind.UnsatisfiedConstraint,
    );
    expect(executeProgram(program, witnessMap({ 1: 1 })).ok).toBe(true);
  });

  it('keeps the block at its stop instruction when the outputs are rejected', () => {
    const driver = new SolveDriver(
      inverseProgram(),
      witnessMap({ 1: 1, 2: 2, 3: 3, 4: 1, 5: 5 }),
    );
    for (let i = 0; i < 5; i++) {
      driver.stepOne();
    }

    const first = caught(() => driver.stepOne());
    const retry = caught(() => driver.stepOne());

    expect(first?.kind).toBe(DebuggerErrorKind.UnsatisfiedConstraint);
    expect(first?.toFailure().address).toBe('1.3');
    expect(driver.activeBlock()?.adapter.isHalted).toBe(false);
    expect(driver.activeBlock()?.adapter.programCounter).toBe(3);
    expect(driver.currentAddress()).toEqual({ kind: 'inner', outerIndex: 1, innerIndex: 3 });
    expect(driver.readWitness(5)).toBe(5n);
    expect(retry?.kind).toBe(DebuggerErrorKind.UnsatisfiedConstraint);
  });

  it('reports the units a failing step-over completed', () => {
    const driver = new SolveDriver(inverseProgram(), witnessMap({ 1: 1, 2: 1, 3: 2, 4: 1 }));
    driver.stepOne();
    const onUnit = vi.fn();

    const error = caught(() => driver.stepOverBlock(onUnit));

    expect(error?.kind).toBe(DebuggerErrorKind.DivisionByZero);
    expect(onUnit).toHaveBeenCalledTimes(3);
  });

  it('restarts from the initial assignment', () => {
    const driver = new SolveDriver(inverseProgram(), inverseWitness());
    driver.stepOne();
    driver.stepOne();
    driver.writeWitness(1, 10n);

    driver.restart();

    expect(driver.currentAddress()).toEqual({ kind: 'outer', outerIndex: 0 });
    expect(driver.readWitness(1)).toBe(1n);
    expect(driver.activeBlock()).toBeUndefined();
  });

  it('returns the previous value from a witness override', () => {
    const driver = new SolveDriver(inverseProgram(), inverseWitness());

    expect(driver.writeWitness(2, 5n)).toBe(2n);
    expect(driver.writeWitness(7, 1n)).toBeUndefined();
    expect(driver.witnessMap().get(2)).toBe(5n);
  });

  it('agrees with non-interactive execution', () => {
    const driver = new SolveDriver(inverseProgram(), inverseWitness());
    while (!driver.isFinished()) {
      driver.stepOne();
    }

    const reference = executeProgram(inverseProgram(), inverseWitness());
    expect(reference).toEqual({ ok: true, value: driver.witnessMap() });
  });

  it('finishes an empty program immediately', () => {
    const driver = new SolveDriver({ opcodes: [], blocks: [] }, witnessMap({ 1: 1 }));

    expect(driver.isFinished()).toBe(true);
    expect(driver.currentAddress()).toBeUndefined();
  });

  it('fails unsatisfied gates', () => {
    const program: CircuitProgram = {
      opcodes: [assertZero({ linear: [[1, 1]], constant: -3 })],
      blocks: [],
    };

    const result = executeProgram(program, witnessMap({ 1: 4 }));
    expect(result).toEqual({
      ok: false,
      error: {
        kind: DebuggerErrorKind.UnsatisfiedConstraint,
        message: 'Constraint evaluates to 1, expected 0',
        address: '0',
      },
    });
  });
});
