import type { OpcodeAddress } from '../address/opcode-address.js';
import { addressKey, compareAddresses } from '../address/opcode-address.js';

/**
 * Set of breakpoint addresses keyed by their text form.
 *
 * Matching is exact: a breakpoint on `outer(5)` never stops at `inner(5, j)`.
 * Range checks against the program happen in the session before an address
 * reaches the registry.
 * @public
 * @see file:../debugger/session.ts - DebuggerSession usage
 */
export class BreakpointRegistry {
  private readonly breakpoints = new Map<string, OpcodeAddress>();

  /**
   * Registers a breakpoint.
   * @returns true when the address was not registered before
   */
  public add(address: OpcodeAddress): boolean {
    const key = addressKey(address);
    if (this.breakpoints.has(key)) {
      return false;
    }
    this.breakpoints.set(key, { ...address });
    return true;
  }

  /**
   * Removes a breakpoint.
   * @returns true when the address was registered
   */
  public remove(address: OpcodeAddress): boolean {
    return this.breakpoints.delete(addressKey(address));
  }

  public contains(address: OpcodeAddress): boolean {
    return this.breakpoints.has(addressKey(address));
  }

  /** Registered addresses in address order. */
  public all(): OpcodeAddress[] {
    return Array.from(this.breakpoints.values(), (address) => ({ ...address })).sort(
      compareAddresses,
    );
  }

  public get size(): number {
    return this.breakpoints.size;
  }

  public clear(): void {
    this.breakpoints.clear();
  }
}
