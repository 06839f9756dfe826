import type { OpcodeAddress } from '../address/opcode-address.js';
import { addressKey, addressesEqual, inner, outer } from '../address/opcode-address.js';
import { listAddresses } from '../address/program-addresses.js';
import type { BreakpointRegistry } from '../breakpoints/breakpoint-registry.js';
import type { FieldElement } from '../field/field-element.js';
import { disassemble } from '../formatters/disassembler.js';
import type { ActiveBlock, SolveDriver } from '../solver/solve-driver.js';
import type { LocationMap } from '../source-map/location-map.js';
import type { OpcodeListingEntry } from '../types/inspection/opcode-listing-entry.js';
import type { StackFrame } from '../types/inspection/stack-frame.js';
import type { VariableFrame, VariableValue } from '../types/inspection/variable-frame.js';
import type { CircuitProgram } from '../types/program/circuit-program.js';
import type {
  DebugScope,
  DebugSymbols,
  IndexRange,
  VariableSource,
} from '../types/program/debug-symbols.js';

function inRange(range: IndexRange | undefined, index: number): boolean {
  return range === undefined || (index >= range.start && index < range.end);
}

/**
 * Read-only views over a session: program listing, call stack and variables.
 */
export class SessionInspector {
  public constructor(
    private readonly program: CircuitProgram,
    private readonly symbols: DebugSymbols | undefined,
    private readonly locations: LocationMap,
    private readonly breakpoints: BreakpointRegistry,
  ) {}

  public listOpcodes(current: OpcodeAddress | undefined): OpcodeListingEntry[] {
    return listAddresses(this.program).map((address) => {
      const entry: OpcodeListingEntry = {
        address,
        key: addressKey(address),
        text: disassemble(this.program, address),
      };
      if (current && addressesEqual(address, current)) {
        entry.marker = 'current';
      } else if (this.breakpoints.contains(address)) {
        entry.marker = 'breakpoint';
      }
      return entry;
    });
  }

  /**
   * Outer opcode first, then one frame per nested call site, then the
   * executing instruction. Empty once the program finished.
   */
  public stackTrace(driver: SolveDriver): StackFrame[] {
    const current = driver.currentAddress();
    if (current === undefined) {
      return [];
    }
    const frames = [this.frame(outer(current.outerIndex))];
    const active = driver.activeBlock();
    if (active) {
      for (const returnAddress of active.adapter.getCallStack()) {
        frames.push(this.frame(inner(active.outerIndex, returnAddress - 1)));
      }
      frames.push(this.frame(current));
    }
    return frames;
  }

  /**
   * Frames of the scopes active at the current address, outer scopes first.
   */
  public variables(driver: SolveDriver): VariableFrame[] {
    const current = driver.currentAddress();
    if (current === undefined) {
      return [];
    }
    const active = driver.activeBlock();
    return (this.symbols?.scopes ?? [])
      .filter((scope) => this.isScopeActive(scope, current.outerIndex, active))
      .map((scope) => ({
        functionName: scope.functionName,
        params: [...(scope.params ?? [])],
        variables: scope.variables.flatMap((binding): VariableValue[] => {
          const value = this.readSource(binding.source, driver, active);
          if (value === undefined) {
            return [];
          }
          const variable: VariableValue = {
            name: binding.name,
            value,
            source: binding.source,
          };
          if (binding.type !== undefined) {
            variable.type = binding.type;
          }
          return [variable];
        }),
      }));
  }

  private isScopeActive(
    scope: DebugScope,
    outerIndex: number,
    active: ActiveBlock | undefined,
  ): boolean {
    if (scope.blockId === undefined) {
      return inRange(scope.outerRange, outerIndex);
    }
    return (
      active !== undefined &&
      active.opcode.blockId === scope.blockId &&
      inRange(scope.innerRange, active.adapter.programCounter)
    );
  }

  private readSource(
    source: VariableSource,
    driver: SolveDriver,
    active: ActiveBlock | undefined,
  ): FieldElement | undefined {
    switch (source.kind) {
      case 'witness':
        return driver.readWitness(source.index);
      case 'register': {
        if (!active || source.index < 0 || source.index >= active.block.registerCount) {
          return undefined;
        }
        const cell = active.adapter.readRegister(source.index);
        return cell.status === 'available' ? cell.value : undefined;
      }
      case 'memory': {
        if (!active || source.index < 0 || source.index >= active.block.memorySize) {
          return undefined;
        }
        const cell = active.adapter.readMemory(source.index);
        return cell.status === 'available' ? cell.value : undefined;
      }
    }
  }

  private frame(address: OpcodeAddress): StackFrame {
    return {
      address,
      text: disassemble(this.program, address),
      locations: this.locations.locationsFor(address),
    };
  }
}
