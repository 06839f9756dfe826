import { readFile } from 'node:fs/promises';
import type { ZodError } from 'zod';

import { DebuggerError } from '../errors/debugger-error.js';
import type { DebugResult } from '../errors/result.js';
import { failure, success } from '../errors/result.js';
import type { CircuitProgram, DebugSymbols, WitnessMap } from '../types/program/index.js';
import { ProgramArtifactSchema } from './program-schema.js';
import { validateProgram } from './validate-program.js';

export interface LoadedArtifact {
  program: CircuitProgram;
  debugSymbols?: DebugSymbols;
  initialWitness: WitnessMap;
}

function describeIssue(error: ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return 'Invalid artifact';
  }
  const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${path}: ${issue.message}`;
}

/**
 * Validates an already parsed artifact document.
 */
export function parseArtifact(input: unknown): DebugResult<LoadedArtifact> {
  const parsed = ProgramArtifactSchema.safeParse(input);
  if (!parsed.success) {
    return failure(DebuggerError.invalidArtifact(describeIssue(parsed.error)));
  }
  const { opcodes, blocks, debugSymbols, initialWitness } = parsed.data;
  const program: CircuitProgram = { opcodes, blocks };
  const invalid = validateProgram(program);
  if (invalid) {
    return failure(invalid);
  }
  const artifact: LoadedArtifact = { program, initialWitness: initialWitness ?? new Map() };
  if (debugSymbols) {
    artifact.debugSymbols = debugSymbols;
  }
  return success(artifact);
}

/**
 * Reads and validates a JSON artifact file.
 */
export async function loadArtifact(filePath: string): Promise<DebugResult<LoadedArtifact>> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return failure(DebuggerError.invalidArtifact(`Cannot read ${filePath}: ${reason}`));
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return failure(DebuggerError.invalidArtifact(`${filePath} is not valid JSON: ${reason}`));
  }
  return parseArtifact(document);
}
