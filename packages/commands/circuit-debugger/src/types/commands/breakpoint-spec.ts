/**
 * User-facing breakpoint request.
 *
 * Either an explicit address in text form (`"3"`, `"3.1"`) or a source line,
 * which resolves to the first address whose primary location is on that line.
 */
export type BreakpointSpec = AddressBreakpointSpec | LineBreakpointSpec;

export interface AddressBreakpointSpec {
  address: string;
}

export interface LineBreakpointSpec {
  /** File identifier from the debug symbols. When omitted every file matches. */
  file?: string;
  /** One-based line number. */
  line: number;
}
