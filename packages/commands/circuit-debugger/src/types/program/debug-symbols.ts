import type { SourceFile, SourceLocation } from './source-location.js';

export type VariableSource =
  | { kind: 'witness'; index: number }
  | { kind: 'register'; index: number }
  | { kind: 'memory'; index: number };

export interface VariableBinding {
  name: string;
  /** Display label of the source-level type, e.g. `Field` or `u32`. */
  type?: string;
  source: VariableSource;
}

/** Half-open range `[start, end)`. */
export interface IndexRange {
  start: number;
  end: number;
}

/**
 * A source-level function scope and the variables visible in it.
 *
 * Scopes without `blockId` describe the outer tier and are active while the
 * outer index lies in `outerRange` (whole program when absent). Scopes with a
 * `blockId` are active while that block runs and the inner index lies in
 * `innerRange`.
 */
export interface DebugScope {
  functionName: string;
  params?: string[];
  outerRange?: IndexRange;
  blockId?: number;
  innerRange?: IndexRange;
  variables: VariableBinding[];
}

/**
 * Compiler-emitted debug information.
 */
export interface DebugSymbols {
  files?: Record<string, SourceFile>;
  /** Address text form (`"3"`, `"3.1"`) to locations, innermost first. */
  locations: Record<string, SourceLocation[]>;
  scopes?: DebugScope[];
}
