import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import type { CallToolResult } from '@circuit-debugger/commands-core';

import { CircuitDebuggerCommand, parseRunArguments } from './command.js';
import { FIELD_MODULUS } from './field/field-element.js';

const artifactPath = fileURLToPath(new URL('../test/fixtures/inverse.json', import.meta.url));

const MINUS_ONE = (FIELD_MODULUS - 1n).toString();

function textOf(result: CallToolResult): string {
  for (const item of result.content) {
    if (item.type === 'text') {
      return item.text;
    }
  }
  throw new Error('Expected text content in CallToolResult');
}

function parseResult(result: CallToolResult): unknown {
  return JSON.parse(textOf(result));
}

describe('CircuitDebuggerCommand tools', () => {
  let command: CircuitDebuggerCommand;

  const call = (tool: string, args: Record<string, unknown>) =>
    command.executeToolViaMCP(`circuit-debugger_${tool}`, args);

  beforeEach(() => {
    command = new CircuitDebuggerCommand();
  });

  it('publishes prefixed tool definitions', () => {
    expect(command.getMCPDefinitions().map((tool) => tool.name)).toEqual([
      'circuit-debugger_startDebugSession',
      'circuit-debugger_debuggerCommand',
      'circuit-debugger_inspectState',
      'circuit-debugger_writeState',
      'circuit-debugger_closeSession',
    ]);
  });

  it('starts a session paused at entry', async () => {
    const result = await call('startDebugSession', { id: 'entry', artifactPath });

    expect(result.isError).toBeUndefined();
    expect(parseResult(result)).toMatchObject({
      session: {
        id: 'entry',
        program: { opcodeCount: 3, blockCount: 1 },
        state: { status: 'paused-after-step', reason: 'entry' },
      },
      initialStop: {
        reason: 'entry',
        address: { kind: 'outer', outerIndex: 0 },
        locations: [{ file: 'main', line: 2, column: 5 }],
      },
    });

    const location = await call('inspectState', { sessionId: 'entry', query: 'location' });
    expect(parseResult(location)).toEqual({
      address: '0',
      locations: [{ file: 'main', line: 2, column: 5 }],
      formatted: ['src/main.circuit:2:5'],
    });
  });

  it('inspects block registers once the entry instruction ran', async () => {
    await call('startDebugSession', {
      id: 'regs',
      artifactPath,
      breakpoints: [{ address: '1.0' }],
    });
    const stopped = await call('debuggerCommand', { sessionId: 'regs', action: 'continue' });
    expect(parseResult(stopped)).toMatchObject({
      commandAck: { command: 'continue', unitsExecuted: 2 },
      stop: { reason: 'breakpoint', hitBreakpoint: '1.0' },
    });

    const early = await call('inspectState', { sessionId: 'regs', query: 'registers' });
    expect(early.isError).toBe(true);
    expect(parseResult(early)).toMatchObject({ kind: 'RegistersNotYetAvailable' });

    await call('debuggerCommand', { sessionId: 'regs', action: 'step' });
    const registers = await call('inspectState', { sessionId: 'regs', query: 'registers' });
    expect(parseResult(registers)).toEqual([{ index: 0, value: MINUS_ONE }]);

    const single = await call('inspectState', {
      sessionId: 'regs',
      query: 'registers',
      index: 1,
    });
    expect(parseResult(single)).toEqual({ status: 'not-yet-available' });
  });

  it('merges witness overrides over the artifact witness', async () => {
    await call('startDebugSession', {
      id: 'override',
      artifactPath,
      witness: { '1': '3', '3': '5' },
    });

    const result = await call('debuggerCommand', { sessionId: 'override', action: 'continue' });

    expect(parseResult(result)).toMatchObject({
      witness: { '1': '3', '2': '2', '3': '5', '4': '1', '5': '1' },
    });
  });

  it('reports the witness written at a pause point', async () => {
    await call('startDebugSession', { id: 'write', artifactPath });

    const written = await call('writeState', {
      sessionId: 'write',
      target: 'witness',
      index: 4,
      value: '7',
    });
    expect(parseResult(written)).toEqual({
      target: 'witness',
      index: 4,
      value: '7',
      previous: '1',
    });

    const read = await call('inspectState', { sessionId: 'write', query: 'witness', index: 4 });
    expect(parseResult(read)).toEqual({ index: 4, value: '7' });
  });

  it('returns execution failures with their kind and address', async () => {
    await call('startDebugSession', { id: 'bad', artifactPath, witness: { '4': '2' } });

    const result = await call('debuggerCommand', { sessionId: 'bad', action: 'continue' });

    expect(result.isError).toBe(true);
    expect(parseResult(result)).toMatchObject({ kind: 'UnsatisfiedConstraint', address: '2' });
  });

  it('refuses register writes at the outer tier', async () => {
    await call('startDebugSession', { id: 'outer', artifactPath });

    const result = await call('writeState', {
      sessionId: 'outer',
      target: 'register',
      index: 0,
      value: '1',
    });

    expect(result.isError).toBe(true);
    expect(parseResult(result)).toMatchObject({ kind: 'NotExecutingInnerVm' });
  });

  it('starts from an inline artifact', async () => {
    const result = await call('startDebugSession', {
      artifact: {
        opcodes: [
          {
            type: 'assert-zero',
            expression: { linearTerms: [{ coefficient: '1', witness: 1 }], constant: '-4' },
          },
        ],
      },
      resumeAfterConfigure: true,
    });

    expect(parseResult(result)).toMatchObject({
      session: { state: { status: 'finished' } },
      witness: { '1': '4' },
    });
  });

  it('closes sessions once', async () => {
    await call('startDebugSession', { id: 'close', artifactPath });

    const closed = await call('closeSession', { sessionId: 'close' });
    const again = await call('closeSession', { sessionId: 'close' });

    expect(parseResult(closed)).toMatchObject({ id: 'close' });
    expect(parseResult(again)).toEqual({
      kind: 'UnknownSession',
      message: 'Debugger session close not found',
    });
  });

  it('turns invalid arguments and unknown tools into error results', async () => {
    const invalid = await call('debuggerCommand', { action: 'step' });
    const unknown = await call('nope', {});

    expect(invalid).toEqual({
      content: [{ type: 'text', text: 'sessionId must be a non-empty string.' }],
      isError: true,
    });
    expect(textOf(unknown)).toBe('Unknown tool: circuit-debugger_nope');
  });

  it('reports artifact validation failures', async () => {
    const result = await call('startDebugSession', {
      artifact: { opcodes: [{ type: 'block-call', blockId: 2, inputs: [], outputs: [] }] },
    });

    expect(parseResult(result)).toEqual({
      kind: 'InvalidArtifact',
      message: 'opcodes.0.blockId references missing block 2',
    });
  });
});

describe('CircuitDebuggerCommand CLI', () => {
  let info: MockInstance<typeof console.info>;
  let command: CircuitDebuggerCommand;

  const printed = (): string[] => info.mock.calls.map(([message]) => String(message));

  beforeEach(() => {
    info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    command = new CircuitDebuggerCommand();
  });

  afterEach(() => {
    info.mockRestore();
  });

  it('solves an artifact and prints each stop and the witness', async () => {
    await command.executeViaCLI(['run', artifactPath, '--break', '1.2']);

    const lines = printed();
    const stop = 'Stopped at 1.2 (breakpoint 1.2) src/main.circuit:11:5';
    expect(lines.some((line) => line.includes(stop))).toBe(true);
    expect(lines.slice(-5)).toEqual([
      '_1 = 1',
      '_2 = 2',
      '_3 = 3',
      '_4 = 1',
      '_5 = 0x30644e72e131a029b85045b68181585d2833e84879b9709143e1f593f0000000',
    ]);
  });

  it('fails with the error kind and address', async () => {
    await expect(command.executeViaCLI(['run', artifactPath, '-w', '4=2'])).rejects.toThrow(
      /^UnsatisfiedConstraint at 2: Constraint evaluates to /,
    );
  });

  it('prints the opcode listing with markers', async () => {
    await command.executeViaCLI(['opcodes', artifactPath, '-b', '1.2']);

    expect(printed()).toEqual([
      '> 0      EXPR [ (1, _1) (1, _2) (-1, _3) 0 ]',
      '  1      CALL block 0 (invert): inputs: [EXPR [ (1, _1) (-1, _2) 0 ]], outputs: [_5]',
      '    1.0    calldata-copy r0, size 1, offset 0',
      '    1.1    const r1, 1',
      '*   1.2    div r2, r1, r0',
      '    1.3    stop offset 2, size 1',
      '  2      EXPR [ (1, _1, _5) (-1, _2, _5) (-1, _4) 0 ]',
    ]);
  });

  it('rejects unknown subcommands', async () => {
    await expect(command.executeViaCLI(['trace'])).rejects.toThrow('Unknown subcommand: trace');
  });
});

describe('parseRunArguments', () => {
  it('collects the artifact, overrides and breakpoints', () => {
    const args = ['a.json', '--witness', '_2=9', '-v', '--break', 'main:4', '--max-steps', '10'];

    expect(parseRunArguments(args)).toEqual({
      artifactPath: 'a.json',
      witness: new Map([[2, 9n]]),
      breakpoints: [{ file: 'main', line: 4 }],
      maxScanSteps: 10,
    });
  });

  it('requires a value after each flag', () => {
    expect(() => parseRunArguments(['a.json', '--break'])).toThrow('--break requires a value');
  });
});
