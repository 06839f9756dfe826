export interface SourceLocation {
  /** File identifier, resolved to a path through {@link DebugSymbols.files}. */
  file: string;
  line: number;
  column: number;
}

export interface SourceFile {
  path: string;
  source?: string;
}
