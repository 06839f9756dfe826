import { describe, expect, it, vi } from 'vitest';

import {
  inverseProgram,
  inverseSymbols,
  inverseWitness,
  witnessMap,
} from '../../test/utils/program-builders.js';
import { addressKey, inner, outer } from '../address/opcode-address.js';
import { DebuggerErrorKind } from '../errors/debugger-error.js';
import type { DebugResult } from '../errors/result.js';
import { FIELD_MODULUS } from '../field/field-element.js';
import { executeProgram } from '../solver/execute-program.js';
import type { DebuggerAction, DebugSessionConfig } from '../types/index.js';
import { DebuggerSession } from './session.js';

function unwrap<T>(result: DebugResult<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}

async function startSession(
  overrides: Partial<DebugSessionConfig> = {},
): Promise<DebuggerSession> {
  const session = new DebuggerSession('test-session', {
    program: inverseProgram(),
    debugSymbols: inverseSymbols(),
    initialWitness: inverseWitness(),
    ...overrides,
  });
  unwrap(await session.start());
  return session;
}

function run(session: DebuggerSession, action: DebuggerAction) {
  return session.runCommand({ sessionId: session.id, action });
}

describe('DebuggerSession', () => {
  it('pauses at the entry address after start', async () => {
    const session = await startSession();

    expect(session.getState()).toEqual({
      status: 'paused-after-step',
      address: outer(0),
      reason: 'entry',
    });
    expect(unwrap(session.getCurrentAddress())).toEqual(outer(0));
  });

  it('finishes an empty program during start', async () => {
    const session = new DebuggerSession('empty', {
      program: { opcodes: [], blocks: [] },
      initialWitness: witnessMap({ 1: 9 }),
    });

    const response = unwrap(await session.start());

    expect(response.witness).toEqual(witnessMap({ 1: 9 }));
    expect(response.initialStop).toBeUndefined();
    expect(unwrap(session.isSolved())).toBe(true);
  });

  it('solves the inverse scenario with plain steps', async () => {
    const session = await startSession();
    const addresses: string[] = [];

    for (let i = 0; i < 6; i++) {
      const result = unwrap(await run(session, 'step'));
      addresses.push(result.stop ? addressKey(result.stop.address) : 'none');
    }
    const last = unwrap(await run(session, 'step'));

    expect(addresses).toEqual(['1', '1.0', '1.1', '1.2', '1.3', '2']);
    expect(last.witness?.get(5)).toBe(FIELD_MODULUS - 1n);
    expect(unwrap(session.getFinalWitness()).size).toBe(5);
    expect(session.getState().status).toBe('finished');
  });

  it('produces the same witness as non-interactive execution', async () => {
    const session = await startSession();
    const result = unwrap(await run(session, 'continue'));

    expect(executeProgram(inverseProgram(), inverseWitness())).toEqual({
      ok: true,
      value: result.witness,
    });
  });

  it('reports block state as not yet available at the entry breakpoint', async () => {
    const session = await startSession({ breakpoints: [{ address: '1.0' }] });

    const result = unwrap(await run(session, 'continue'));

    expect(result.stop).toEqual({
      reason: 'breakpoint',
      address: inner(1, 0),
      hitBreakpoint: '1.0',
      locations: [{ file: 'main', line: 10, column: 5 }],
    });
    expect(unwrap(session.readRegister(0))).toEqual({ status: 'not-yet-available' });
    const registers = session.getRegisters();
    expect(registers.ok ? undefined : registers.error.kind).toBe(
      DebuggerErrorKind.RegistersNotYetAvailable,
    );

    unwrap(await run(session, 'step'));
    expect(unwrap(session.getRegisters())).toEqual([{ index: 0, value: FIELD_MODULUS - 1n }]);
  });

  it('lists a register written at the block entry', async () => {
    const session = await startSession({ breakpoints: [{ address: '1.0' }] });
    unwrap(await run(session, 'continue'));

    expect(unwrap(session.writeRegister(1, 7n))).toEqual({ status: 'not-yet-available' });

    expect(unwrap(session.readRegister(1))).toEqual({ status: 'available', value: 7n });
    expect(unwrap(session.getRegisters())).toEqual([{ index: 1, value: 7n }]);
  });

  it('lets breakpoints win over line stepping', async () => {
    const session = await startSession({ breakpoints: [{ address: '1.1' }] });
    unwrap(await run(session, 'step'));
    unwrap(await run(session, 'step'));

    // paused at 1.0 on line 10; 1.1 is on the same line but carries a breakpoint
    const result = unwrap(await run(session, 'next'));

    expect(result.stop?.reason).toBe('breakpoint');
    expect(result.stop?.address).toEqual(inner(1, 1));
  });

  it('resumes past the breakpoint it is paused at', async () => {
    const session = await startSession({ breakpoints: [{ address: '1' }] });
    const first = unwrap(await run(session, 'continue'));
    expect(first.stop?.address).toEqual(outer(1));

    const second = unwrap(await run(session, 'continue'));
    expect(second.witness?.get(5)).toBe(FIELD_MODULUS - 1n);
    expect(second.commandAck).toEqual({ command: 'continue', unitsExecuted: 6 });
  });

  it('stops next on the first address of a different line', async () => {
    const session = await startSession();

    const steps = [];
    for (let i = 0; i < 4; i++) {
      const result = unwrap(await run(session, 'next'));
      steps.push([result.stop?.address, result.commandAck.unitsExecuted]);
    }

    expect(steps).toEqual([
      [outer(1), 1],
      [inner(1, 0), 1],
      [inner(1, 2), 2],
      [inner(1, 3), 1],
    ]);
  });

  it('matches the address a sequence of steps reaches on a line change', async () => {
    const stepping = await startSession();
    const nexting = await startSession();
    unwrap(await run(stepping, 'step'));
    unwrap(await run(stepping, 'step'));
    unwrap(await run(nexting, 'step'));
    unwrap(await run(nexting, 'step'));

    const viaNext = unwrap(await run(nexting, 'next'));
    let viaStep = unwrap(await run(stepping, 'step'));
    while (viaStep.stop?.locations[0]?.line === 10) {
      viaStep = unwrap(await run(stepping, 'step'));
    }

    expect(viaNext.stop?.address).toEqual(viaStep.stop?.address);
    expect(unwrap(nexting.getWitnessMap())).toEqual(unwrap(stepping.getWitnessMap()));
  });

  it('leaves a block with nextOut', async () => {
    const session = await startSession();
    unwrap(await run(session, 'step'));
    unwrap(await run(session, 'step'));

    const result = unwrap(await run(session, 'nextOut'));

    expect(result.stop?.address).toEqual(outer(2));
    expect(result.commandAck.unitsExecuted).toBe(4);
  });

  it('runs nextOver from a block call through the whole block', async () => {
    const session = await startSession();
    unwrap(await run(session, 'step'));

    const result = unwrap(await run(session, 'nextOver'));

    expect(result.stop).toEqual({
      reason: 'step',
      address: outer(2),
      locations: [{ file: 'main', line: 4, column: 5 }],
    });
    expect(result.commandAck.unitsExecuted).toBe(5);
  });

  it('stops nextOver on a breakpoint inside the block', async () => {
    const session = await startSession({ breakpoints: [{ address: '1.2' }] });
    unwrap(await run(session, 'step'));

    const result = unwrap(await run(session, 'nextOver'));

    expect(result.stop?.reason).toBe('breakpoint');
    expect(result.stop?.address).toEqual(inner(1, 2));
    expect(result.commandAck.unitsExecuted).toBe(3);
  });

  it('steps over a whole block', async () => {
    const session = await startSession();
    unwrap(await run(session, 'step'));

    const result = unwrap(await run(session, 'stepOverBlock'));

    expect(result.stop?.address).toEqual(outer(2));
    expect(unwrap(session.readWitness(5))).toBe(FIELD_MODULUS - 1n);
  });

  it('stops a scan at the configured limit', async () => {
    const session = await startSession({ maxScanSteps: 3 });

    const result = unwrap(await run(session, 'continue'));

    expect(result.stop?.reason).toBe('scan-limit');
    expect(result.stop?.address).toEqual(inner(1, 1));
    expect(session.getState()).toEqual({
      status: 'paused-after-step',
      address: inner(1, 1),
      reason: 'scan-limit',
    });
  });

  it('fails on an unsatisfied constraint and recovers with restart', async () => {
    const session = await startSession({
      initialWitness: witnessMap({ 1: 1, 2: 2, 3: 2, 4: 1 }),
    });
    const failed = await run(session, 'continue');

    expect(failed).toEqual({
      ok: false,
      error: {
        kind: DebuggerErrorKind.UnsatisfiedConstraint,
        message: 'Constraint evaluates to 1, expected 0',
        address: '0',
      },
    });
    expect(session.getState().status).toBe('failed');

    const rejected = await run(session, 'step');
    expect(rejected.ok ? undefined : rejected.error.kind).toBe(
      DebuggerErrorKind.InvalidCommandForState,
    );

    const restarted = unwrap(await run(session, 'restart'));
    expect(restarted.stop?.reason).toBe('entry');
    unwrap(session.writeWitness(3, 3n));
    expect(unwrap(await run(session, 'continue')).witness?.get(5)).toBe(FIELD_MODULUS - 1n);
  });

  it('keeps breakpoints and discards overrides across restart', async () => {
    const session = await startSession({ breakpoints: [{ address: '2' }] });
    unwrap(await run(session, 'continue'));
    expect(unwrap(session.writeWitness(4, 2n))).toBe(1n);

    unwrap(await run(session, 'restart'));
    expect(unwrap(session.readWitness(4))).toBe(1n);
    expect(unwrap(session.readWitness(5))).toBeUndefined();

    const again = unwrap(await run(session, 'continue'));
    expect(again.stop?.hitBreakpoint).toBe('2');
  });

  it('applies an override made after restart', async () => {
    const session = await startSession();
    unwrap(await run(session, 'continue'));

    unwrap(await run(session, 'restart'));
    unwrap(session.writeWitness(2, 3n));
    unwrap(session.writeWitness(3, 4n));
    const result = unwrap(await run(session, 'continue'));

    // _5 = 1 / (1 - 3) = -1/2 and _4 = (1 - 3) * _5 = 1
    expect(result.witness?.get(2)).toBe(3n);
    expect(result.witness?.get(5)).toBe((FIELD_MODULUS - 1n) / 2n);
  });

  it('is idempotent across repeated restarts', async () => {
    const session = await startSession();
    unwrap(await run(session, 'step'));
    const first = unwrap(await run(session, 'restart'));
    const second = unwrap(await run(session, 'restart'));

    expect(second.stop).toEqual(first.stop);
    expect(unwrap(session.getWitnessMap())).toEqual(inverseWitness());
  });

  it('rejects block inspection at the outer tier', async () => {
    const session = await startSession();

    const read = session.readRegister(0);
    expect(read.ok ? undefined : read.error.kind).toBe(DebuggerErrorKind.NotExecutingInnerVm);
  });

  it('applies register writes to the running block', async () => {
    const session = await startSession();
    for (let i = 0; i < 3; i++) {
      unwrap(await run(session, 'step'));
    }

    expect(unwrap(session.writeRegister(0, 2n))).toEqual({
      status: 'available',
      value: FIELD_MODULUS - 1n,
    });
    const result = await run(session, 'continue');

    // the block now returns 1/2, which violates the last gate
    expect(result.ok ? undefined : result.error.kind).toBe(
      DebuggerErrorKind.UnsatisfiedConstraint,
    );
  });

  it('applies breakpoint mutations atomically', async () => {
    const session = await startSession();

    const rejected = await session.runCommand({
      sessionId: session.id,
      action: 'continue',
      breakpoints: { set: [{ address: '2' }, { address: '9' }] },
    });
    expect(rejected.ok ? undefined : rejected.error.kind).toBe(
      DebuggerErrorKind.UnknownBreakpointAddress,
    );
    expect(unwrap(session.listBreakpoints())).toEqual([]);
    expect(unwrap(session.getCurrentAddress())).toEqual(outer(0));

    const accepted = unwrap(
      await session.runCommand({
        sessionId: session.id,
        action: 'continue',
        breakpoints: { set: [{ file: 'main', line: 11 }] },
      }),
    );
    expect(accepted.setBreakpoints?.map((summary) => summary.id)).toEqual(['1.2']);
    expect(accepted.stop?.address).toEqual(inner(1, 2));
  });

  it('lists opcodes with current and breakpoint markers', async () => {
    const session = await startSession({ breakpoints: [{ address: '2' }] });

    const listing = unwrap(session.listOpcodes());

    expect(listing.map((entry) => [entry.key, entry.marker])).toEqual([
      ['0', 'current'],
      ['1', undefined],
      ['1.0', undefined],
      ['1.1', undefined],
      ['1.2', undefined],
      ['1.3', undefined],
      ['2', 'breakpoint'],
    ]);
    expect(listing[0]?.text).toBe('EXPR [ (1, _1) (1, _2) (-1, _3) 0 ]');
    expect(listing[4]?.text).toBe('div r2, r1, r0');
  });

  it('builds a stack trace through the active block', async () => {
    const session = await startSession();
    for (let i = 0; i < 4; i++) {
      unwrap(await run(session, 'step'));
    }

    const frames = unwrap(session.getStackTrace());

    expect(frames.map((frame) => frame.address)).toEqual([outer(1), inner(1, 2)]);
    expect(frames[0]?.text).toBe(
      'CALL block 0 (invert): inputs: [EXPR [ (1, _1) (-1, _2) 0 ]], outputs: [_5]',
    );
  });

  it('reports variables of the active scopes', async () => {
    const session = await startSession();
    for (let i = 0; i < 3; i++) {
      unwrap(await run(session, 'step'));
    }

    expect(unwrap(session.getVariables())).toEqual([
      {
        functionName: 'main',
        params: ['x', 'y'],
        variables: [
          { name: 'x', type: 'Field', value: 1n, source: { kind: 'witness', index: 1 } },
          { name: 'y', type: 'Field', value: 2n, source: { kind: 'witness', index: 2 } },
        ],
      },
      {
        functionName: 'invert',
        params: ['value'],
        variables: [
          {
            name: 'value',
            type: 'Field',
            value: FIELD_MODULUS - 1n,
            source: { kind: 'register', index: 0 },
          },
        ],
      },
    ]);
  });

  it('emits stop and finish events', async () => {
    const session = new DebuggerSession('events', {
      program: inverseProgram(),
      initialWitness: inverseWitness(),
    });
    const stopped = vi.fn();
    const finished = vi.fn();
    session.onStopped(stopped);
    session.onFinished(finished);

    unwrap(await session.start());
    unwrap(await run(session, 'continue'));

    expect(stopped).toHaveBeenCalledTimes(1);
    expect(stopped).toHaveBeenCalledWith({ reason: 'entry', address: outer(0), locations: [] });
    expect(finished).toHaveBeenCalledTimes(1);
  });

  it('keeps command results when a listener throws', async () => {
    const session = await startSession();
    const finished = vi.fn();
    session.onStopped(() => {
      throw new Error('listener failed');
    });
    session.onFinished(finished);

    const result = await run(session, 'step');

    expect(result.ok).toBe(true);
    expect(session.getState()).toEqual({
      status: 'paused-after-step',
      address: outer(1),
      reason: 'step',
    });
    expect(unwrap(await run(session, 'continue')).witness?.get(5)).toBe(FIELD_MODULUS - 1n);
    expect(finished).toHaveBeenCalledTimes(1);
  });

  it('runs to the first breakpoint when resuming after configure', async () => {
    const session = new DebuggerSession('resume', {
      program: inverseProgram(),
      initialWitness: inverseWitness(),
      breakpoints: [{ address: '2' }],
      resumeAfterConfigure: true,
    });

    const response = unwrap(await session.start());

    expect(response.initialStop?.reason).toBe('breakpoint');
    expect(response.initialStop?.address).toEqual(outer(2));
    expect(response.breakpoints?.map((summary) => summary.id)).toEqual(['2']);
  });

  it('rejects the final witness before the solve finished', async () => {
    const session = await startSession();

    const result = session.getFinalWitness();
    expect(result.ok ? undefined : result.error.kind).toBe(
      DebuggerErrorKind.InvalidCommandForState,
    );
  });
});
