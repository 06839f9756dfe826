import type { OpcodeAddress } from '../address/opcode-address.js';
import { addressKey, parseAddress } from '../address/opcode-address.js';
import { addressExists } from '../address/program-addresses.js';
import type { BreakpointRegistry } from '../breakpoints/breakpoint-registry.js';
import { DebuggerError } from '../errors/debugger-error.js';
import type { LocationMap } from '../source-map/location-map.js';
import type { BreakpointMutation } from '../types/commands/breakpoint-mutation.js';
import type { BreakpointSpec } from '../types/commands/breakpoint-spec.js';
import type { BreakpointSummary } from '../types/commands/breakpoint-summary.js';
import type { CircuitProgram } from '../types/program/circuit-program.js';

export interface BreakpointMutationResult {
  set: BreakpointSummary[];
  removed: string[];
}

/**
 * Session-level breakpoint bookkeeping: resolves requests against the program
 * and remembers the original request of each registered address.
 */
export class SessionBreakpoints {
  private readonly requests = new Map<string, BreakpointSpec>();

  public constructor(
    private readonly program: CircuitProgram,
    private readonly locations: LocationMap,
    private readonly registry: BreakpointRegistry,
  ) {}

  /**
   * @throws DebuggerError `UnknownBreakpointAddress` when the request matches
   * no address of the program
   */
  public resolve(spec: BreakpointSpec): OpcodeAddress {
    if ('address' in spec) {
      return this.resolveId(spec.address);
    }
    const [first] = this.locations.addressesAtLine(spec.file, spec.line);
    if (first === undefined) {
      throw DebuggerError.noAddressAtLine(spec.file, spec.line);
    }
    return first;
  }

  public add(spec: BreakpointSpec): BreakpointSummary {
    const address = this.resolve(spec);
    this.registry.add(address);
    this.requests.set(addressKey(address), spec);
    return this.summarize(address, spec);
  }

  /**
   * @returns whether a breakpoint was registered at `id`
   */
  public remove(id: string): boolean {
    const address = this.resolveId(id);
    this.requests.delete(addressKey(address));
    return this.registry.remove(address);
  }

  public list(): BreakpointSummary[] {
    return this.registry.all().map((address) => {
      const key = addressKey(address);
      return this.summarize(address, this.requests.get(key) ?? { address: key });
    });
  }

  /**
   * Validates every request of the mutation, then applies removals followed by
   * additions. Nothing is applied when any request is invalid.
   */
  public applyMutation(mutation: BreakpointMutation | undefined): BreakpointMutationResult {
    const removals = (mutation?.remove ?? []).map((id) => this.resolveId(id));
    const additions = (mutation?.set ?? []).map((spec) => ({
      spec,
      address: this.resolve(spec),
    }));

    const removed: string[] = [];
    for (const address of removals) {
      this.requests.delete(addressKey(address));
      if (this.registry.remove(address)) {
        removed.push(addressKey(address));
      }
    }

    const set = additions.map(({ spec, address }) => {
      this.registry.add(address);
      this.requests.set(addressKey(address), spec);
      return this.summarize(address, spec);
    });

    return { set, removed };
  }

  private resolveId(id: string): OpcodeAddress {
    const address = parseAddress(id);
    if (address === undefined || !addressExists(this.program, address)) {
      throw DebuggerError.unknownBreakpoint(id);
    }
    return address;
  }

  private summarize(address: OpcodeAddress, requested: BreakpointSpec): BreakpointSummary {
    return {
      id: addressKey(address),
      requested,
      address,
      locations: this.locations.locationsFor(address),
    };
  }
}
