import type { CallToolResult, ICommandOptions, Tool } from '@circuit-debugger/commands-core';
import { BaseCommand } from '@circuit-debugger/commands-core';
import { logError } from '@circuit-debugger/core';
import chalk from 'chalk';

import { addressKey } from './address/opcode-address.js';
import type { LoadedArtifact } from './artifact/load-artifact.js';
import { loadArtifact, parseArtifact } from './artifact/load-artifact.js';
import type { DebuggerSession } from './debugger/session.js';
import { DebuggerSessionManager } from './debugger/session-manager.js';
import type { DebuggerFailure } from './errors/debugger-error.js';
import { DebuggerError } from './errors/debugger-error.js';
import type { DebugResult } from './errors/result.js';
import { success } from './errors/result.js';
import { disassemble } from './formatters/disassembler.js';
import { formatWitnessLines, toJson } from './formatters/serialize.js';
import type {
  BreakpointSpec,
  OpcodeListingEntry,
  StartDebugSessionResponse,
  StartSessionRequest,
  StateQuery,
  StateWrite,
  StopDetails,
  WitnessMap,
} from './types/index.js';
import {
  parseBreakpointText,
  parseDebuggerCommand,
  parseStartSessionRequest,
  parseStateQuery,
  parseStateWrite,
  parseWitnessAssignment,
} from './util/parsers.js';
import {
  createBreakpointMutationSchema,
  createBreakpointSpecSchema,
  createDebuggerCommandSchema,
  createSessionIdSchema,
  createStartSessionSchema,
  createStateQuerySchema,
  createStateWriteSchema,
} from './util/schemas.js';
import { expectIndex } from './util/validation.js';

const TOOL_PREFIX = 'circuit-debugger_';

interface RunArguments {
  artifactPath?: string;
  witness: WitnessMap;
  breakpoints: BreakpointSpec[];
  maxScanSteps?: number;
}

function formatFailure(failure: DebuggerFailure): string {
  const where = failure.address === undefined ? '' : ` at ${failure.address}`;
  return `${failure.kind}${where}: ${failure.message}`;
}

function listingMarker(entry: OpcodeListingEntry): string {
  switch (entry.marker) {
    case 'current':
      return '>';
    case 'breakpoint':
      return '*';
    default:
      return ' ';
  }
}

/**
 * Circuit debugger command.
 *
 * Exposes debugger sessions as tool calls and offers a small CLI that solves
 * an artifact, reporting every breakpoint it stops at.
 */
export class CircuitDebuggerCommand extends BaseCommand {
  public readonly name = 'circuit-debugger';
  public readonly description =
    'Step through circuit solving opcode by opcode, including unconstrained blocks.';
  private readonly manager: DebuggerSessionManager;

  public constructor(manager: DebuggerSessionManager = new DebuggerSessionManager()) {
    super();
    this.manager = manager;
  }

  /**
   * Returns tool definitions with proper command prefixing
   * @returns Array of tool definitions
   */
  public getMCPDefinitions(): Tool[] {
    const breakpointSpecSchema = createBreakpointSpecSchema();
    const breakpointMutationSchema = createBreakpointMutationSchema(breakpointSpecSchema);

    return [
      {
        name: `${TOOL_PREFIX}startDebugSession`,
        description: 'Load a circuit artifact and open a debugger session paused at entry.',
        inputSchema: createStartSessionSchema(breakpointSpecSchema),
      },
      {
        name: `${TOOL_PREFIX}debuggerCommand`,
        description: 'Step, continue or restart an existing debugger session.',
        inputSchema: createDebuggerCommandSchema(breakpointMutationSchema),
      },
      {
        name: `${TOOL_PREFIX}inspectState`,
        description:
          'Read witnesses, registers, memory, the opcode listing, variables or the call stack.',
        inputSchema: createStateQuerySchema(),
      },
      {
        name: `${TOOL_PREFIX}writeState`,
        description: 'Override a witness, register or memory cell while paused.',
        inputSchema: createStateWriteSchema(),
      },
      {
        name: `${TOOL_PREFIX}closeSession`,
        description: 'Discard a debugger session.',
        inputSchema: createSessionIdSchema(),
      },
    ];
  }

  /**
   * Executes tool via MCP protocol with proper tool name mapping
   * @param toolName - Name of the tool to execute
   * @param args - Tool arguments
   */
  public async executeToolViaMCP(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult> {
    try {
      const internalToolName = toolName.replace(TOOL_PREFIX, '');

      switch (internalToolName) {
        case 'startDebugSession':
          return respond(await this.startFromRequest(parseStartSessionRequest(args)));
        case 'debuggerCommand':
          return respond(await this.manager.runCommand(parseDebuggerCommand(args)));
        case 'inspectState':
          return respond(this.inspect(parseStateQuery(args)));
        case 'writeState':
          return respond(this.write(parseStateWrite(args)));
        case 'closeSession':
          return respond(this.manager.closeSession(sessionIdOf(args)));
        default:
          return errorResponse(`Unknown tool: ${toolName}`);
      }
    } catch (error) {
      logError(`tool:${toolName}`, error);
      return errorResponse(error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Executes command via CLI interface with help system
   * @param args - Command line arguments
   */
  public async executeViaCLI(args: string[]): Promise<void> {
    const [subcommand, ...subArgs] = args;

    switch (subcommand) {
      case 'run':
        return this.runCLI(subArgs);
      case 'opcodes':
        return this.opcodesCLI(subArgs);
      case 'help':
      case '--help':
      case '-h':
        this.showHelp();
        break;
      default:
        if (!subcommand) {
          this.showHelp();
        } else {
          throw new Error(`Unknown subcommand: ${subcommand}`);
        }
    }
  }

  private showHelp(): void {
    this.log(chalk.blue.bold('\nCircuit Debugger'));
    this.log(`
Usage:
  ${this.name} <subcommand> [options]

Subcommands:
  run <artifact>        Solve the artifact, stopping at every breakpoint
  opcodes <artifact>    Print the opcode listing
  help                  Show this help message

Options:
  --witness, -w <i=v>   Override witness i with value v (repeatable)
  --break, -b <bp>      Breakpoint at an address (1.2) or a line (main:11) (repeatable)
  --max-steps <n>       Units a single continue may execute
  --verbose, -v         Print the disassembly at each stop
  --dry-run             Validate the artifact without solving
  --format json         Print the result as JSON

Tools:
  ${this.getMCPDefinitions()
    .map((tool) => tool.name)
    .join('\n  ')}
`);
  }

  private async runCLI(args: string[]): Promise<void> {
    const options = this.parseCommonOptions(args);
    const parsed = parseRunArguments(args);
    const artifact = await this.requireArtifact(parsed.artifactPath);
    if (options.dryRun) {
      const count = artifact.program.opcodes.length;
      this.log(chalk.green(`Artifact is valid: ${count} opcodes`), options);
      return;
    }

    const started = await this.manager.startSession({
      program: artifact.program,
      debugSymbols: artifact.debugSymbols,
      initialWitness: new Map([...artifact.initialWitness, ...parsed.witness]),
      breakpoints: parsed.breakpoints,
      resumeAfterConfigure: true,
      maxScanSteps: parsed.maxScanSteps,
    });
    if (!started.ok) {
      throw new Error(formatFailure(started.error));
    }

    const sessionId = started.value.session.id;
    const session = this.manager.getSession(sessionId);
    const stops: StopDetails[] = [];
    try {
      let stop = started.value.initialStop;
      let witness = started.value.witness;
      let failed = started.value.failure;
      while (stop && session) {
        stops.push(stop);
        this.reportStop(session, artifact, stop, options);
        if (stop.reason === 'scan-limit') {
          throw new Error(
            `Scan limit reached at ${addressKey(stop.address)} before a breakpoint or the end`,
          );
        }
        const next = await this.manager.runCommand({ sessionId, action: 'continue' });
        if (!next.ok) {
          failed = next.error;
          break;
        }
        stop = next.value.stop;
        witness = next.value.witness;
      }

      if (failed) {
        throw new Error(formatFailure(failed));
      }
      if (witness) {
        if (options.format === 'json') {
          console.info(toJson({ stops, witness }));
        }
        this.log(chalk.green('Solved'), options);
        for (const line of formatWitnessLines(witness)) {
          this.log(line, options);
        }
      }
    } finally {
      this.manager.closeSession(sessionId);
    }
  }

  private async opcodesCLI(args: string[]): Promise<void> {
    const options = this.parseCommonOptions(args);
    const parsed = parseRunArguments(args);
    const artifact = await this.requireArtifact(parsed.artifactPath);
    const started = await this.manager.startSession({
      program: artifact.program,
      debugSymbols: artifact.debugSymbols,
      initialWitness: artifact.initialWitness,
      breakpoints: parsed.breakpoints,
    });
    if (!started.ok) {
      throw new Error(formatFailure(started.error));
    }

    const sessionId = started.value.session.id;
    try {
      const listing = this.manager.getSession(sessionId)?.listOpcodes();
      if (!listing?.ok) {
        return;
      }
      if (options.format === 'json') {
        console.info(toJson(listing.value));
        return;
      }
      for (const entry of listing.value) {
        const indent = entry.address.kind === 'inner' ? '  ' : '';
        const line = `${listingMarker(entry)} ${indent}${entry.key.padEnd(6)} ${entry.text}`;
        this.log(line, options);
      }
    } finally {
      this.manager.closeSession(sessionId);
    }
  }

  private reportStop(
    session: DebuggerSession,
    artifact: LoadedArtifact,
    stop: StopDetails,
    options: ICommandOptions,
  ): void {
    const [primary] = stop.locations;
    const where = primary ? ` ${session.formatLocation(primary)}` : '';
    const label = stop.hitBreakpoint ? `breakpoint ${stop.hitBreakpoint}` : stop.reason;
    this.log(chalk.yellow(`Stopped at ${addressKey(stop.address)} (${label})${where}`), options);
    if (options.verbose) {
      this.log(`  ${disassemble(artifact.program, stop.address)}`, options);
    }
  }

  private async requireArtifact(artifactPath: string | undefined): Promise<LoadedArtifact> {
    if (!artifactPath) {
      throw new Error('Artifact path is required');
    }
    const loaded = await loadArtifact(artifactPath);
    if (!loaded.ok) {
      throw new Error(formatFailure(loaded.error));
    }
    return loaded.value;
  }

  private async startFromRequest(
    request: StartSessionRequest,
  ): Promise<DebugResult<StartDebugSessionResponse>> {
    const loaded =
      request.artifact.kind === 'file'
        ? await loadArtifact(request.artifact.path)
        : parseArtifact(request.artifact.document);
    if (!loaded.ok) {
      return loaded;
    }
    const { program, debugSymbols, initialWitness } = loaded.value;
    return this.manager.startSession({
      id: request.id,
      program,
      debugSymbols,
      initialWitness: new Map([...initialWitness, ...(request.witness ?? [])]),
      breakpoints: request.breakpoints,
      resumeAfterConfigure: request.resumeAfterConfigure,
      maxScanSteps: request.maxScanSteps,
    });
  }

  private inspect(query: StateQuery): DebugResult<unknown> {
    const session = this.manager.getSession(query.sessionId);
    if (!session) {
      return { ok: false, error: DebuggerError.unknownSession(query.sessionId).toFailure() };
    }
    const { index } = query;

    switch (query.kind) {
      case 'session':
        return success(session.getDescriptor());
      case 'location': {
        const address = session.getCurrentAddress();
        const locations = session.getSourceLocations();
        if (!address.ok || !locations.ok) {
          return address.ok ? locations : address;
        }
        return success({
          address: address.value === undefined ? undefined : addressKey(address.value),
          locations: locations.value,
          formatted: locations.value.map((location) => session.formatLocation(location)),
        });
      }
      case 'witness':
        if (index === undefined) {
          return session.getWitnessMap();
        }
        return mapResult(session.readWitness(index), (value) => ({ index, value }));
      case 'registers':
        return index === undefined ? session.getRegisters() : session.readRegister(index);
      case 'memory':
        return index === undefined ? session.getMemory() : session.readMemory(index);
      case 'opcodes':
        return session.listOpcodes();
      case 'variables':
        return session.getVariables();
      case 'stackTrace':
        return session.getStackTrace();
      case 'breakpoints':
        return session.listBreakpoints();
    }
  }

  private write(request: StateWrite): DebugResult<unknown> {
    const session = this.manager.getSession(request.sessionId);
    if (!session) {
      return { ok: false, error: DebuggerError.unknownSession(request.sessionId).toFailure() };
    }
    const { target, index, value } = request;
    const previous: DebugResult<unknown> =
      target === 'witness'
        ? session.writeWitness(index, value)
        : target === 'register'
          ? session.writeRegister(index, value)
          : session.writeMemory(index, value);
    return mapResult(previous, (before) => ({ target, index, value, previous: before }));
  }
}

function mapResult<T, U>(result: DebugResult<T>, map: (value: T) => U): DebugResult<U> {
  return result.ok ? success(map(result.value)) : result;
}

function sessionIdOf(args: Record<string, unknown>): string {
  const { sessionId } = args;
  if (typeof sessionId !== 'string' || sessionId.length === 0) {
    throw new Error('sessionId must be a non-empty string.');
  }
  return sessionId;
}

/**
 * Splits CLI arguments into the artifact path, witness overrides and
 * breakpoints. Flags handled by the common options are skipped.
 */
export function parseRunArguments(args: string[]): RunArguments {
  const parsed: RunArguments = { witness: new Map(), breakpoints: [] };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    switch (arg) {
      case '--witness':
      case '-w': {
        const [index, field] = parseWitnessAssignment(requireValue(arg, value));
        parsed.witness.set(index, field);
        i++;
        break;
      }
      case '--break':
      case '-b':
        parsed.breakpoints.push(parseBreakpointText(requireValue(arg, value)));
        i++;
        break;
      case '--max-steps':
        parsed.maxScanSteps = expectIndex(Number(requireValue(arg, value)), arg);
        i++;
        break;
      case '--format':
        i++;
        break;
      default:
        if (arg.startsWith('-')) {
          continue;
        }
        if (parsed.artifactPath !== undefined) {
          throw new Error(`Unexpected argument: ${arg}`);
        }
        parsed.artifactPath = arg;
    }
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

function respond<T>(result: DebugResult<T>): CallToolResult {
  return result.ok ? jsonResponse(result.value) : failureResponse(result.error);
}

/**
 * Creates a JSON response for successful operations
 * @param value - Response value to serialize
 */
function jsonResponse(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: toJson(value),
      },
    ],
  };
}

function failureResponse(failure: DebuggerFailure): CallToolResult {
  return {
    content: [{ type: 'text', text: toJson(failure) }],
    isError: true,
  };
}

/**
 * Creates an error response for failed operations
 * @param message - Error message
 */
function errorResponse(message: string): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: message,
      },
    ],
    isError: true,
  };
}
