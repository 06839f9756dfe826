import type { OpcodeAddress } from '../address/opcode-address.js';
import { addressKey } from '../address/opcode-address.js';
import { listAddresses } from '../address/program-addresses.js';
import type { CircuitProgram } from '../types/program/circuit-program.js';
import type { DebugSymbols } from '../types/program/debug-symbols.js';
import type { SourceFile, SourceLocation } from '../types/program/source-location.js';

/**
 * Read-only mapping between program addresses and source locations.
 *
 * Built once per session. Every address of the program has an entry; addresses
 * without debug information map to an empty list. Symbol entries for addresses
 * outside the program are ignored.
 */
export class LocationMap {
  private readonly locations = new Map<string, SourceLocation[]>();
  private readonly addresses: OpcodeAddress[];
  private readonly files: Record<string, SourceFile>;

  private constructor(program: CircuitProgram, symbols: DebugSymbols | undefined) {
    this.addresses = listAddresses(program);
    this.files = symbols?.files ?? {};
    for (const address of this.addresses) {
      const key = addressKey(address);
      const entries = symbols?.locations[key] ?? [];
      this.locations.set(
        key,
        entries.map((location) => ({ ...location })),
      );
    }
  }

  public static build(program: CircuitProgram, symbols?: DebugSymbols): LocationMap {
    return new LocationMap(program, symbols);
  }

  /**
   * Locations of `address`, innermost first. Empty for unknown addresses.
   */
  public locationsFor(address: OpcodeAddress): SourceLocation[] {
    const entries = this.locations.get(addressKey(address)) ?? [];
    return entries.map((location) => ({ ...location }));
  }

  public primaryLocation(address: OpcodeAddress): SourceLocation | undefined {
    const first = this.locations.get(addressKey(address))?.[0];
    return first ? { ...first } : undefined;
  }

  /**
   * Addresses whose primary location lies on `line`, in address order.
   * @param file - File identifier; `undefined` matches every file
   */
  public addressesAtLine(file: string | undefined, line: number): OpcodeAddress[] {
    return this.addresses.filter((address) => {
      const primary = this.locations.get(addressKey(address))?.[0];
      return (
        primary !== undefined &&
        primary.line === line &&
        (file === undefined || primary.file === file)
      );
    });
  }

  /** Display path of a file identifier, the identifier itself when unknown. */
  public filePath(fileId: string): string {
    return this.files[fileId]?.path ?? fileId;
  }

  public sourceLine(location: SourceLocation): string | undefined {
    const source = this.files[location.file]?.source;
    return source?.split('\n')[location.line - 1];
  }

  public formatLocation(location: SourceLocation): string {
    return `${this.filePath(location.file)}:${location.line}:${location.column}`;
  }
}

/**
 * Whether two locations lie on the same source line.
 */
export function sameLine(
  a: SourceLocation | undefined,
  b: SourceLocation | undefined,
): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.file === b.file && a.line === b.line;
}
