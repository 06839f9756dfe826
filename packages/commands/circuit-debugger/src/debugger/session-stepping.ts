import type { OpcodeAddress } from '../address/opcode-address.js';
import type { BreakpointRegistry } from '../breakpoints/breakpoint-registry.js';
import { DebuggerError } from '../errors/debugger-error.js';
import type { SolveDriver } from '../solver/solve-driver.js';
import type { LocationMap } from '../source-map/location-map.js';
import { sameLine } from '../source-map/location-map.js';
import type { DebuggerAction } from '../types/commands/debugger-command.js';

export interface SteppingContext {
  driver: SolveDriver;
  breakpoints: BreakpointRegistry;
  locations: LocationMap;
  maxScanSteps: number;
}

/**
 * Where a scan ended.
 */
export type ScanEnd =
  | { kind: 'breakpoint'; address: OpcodeAddress }
  | { kind: 'step'; address: OpcodeAddress }
  | { kind: 'scan-limit'; address: OpcodeAddress }
  | { kind: 'finished' }
  | { kind: 'failed'; error: DebuggerError };

export interface ScanResult {
  unitsExecuted: number;
  end: ScanEnd;
}

type StopPredicate = (address: OpcodeAddress) => boolean;

/**
 * Executes units until `shouldStop` accepts the next address.
 *
 * After every unit the registry is consulted first, so breakpoints win over
 * the stop predicate. The address the scan started from is never checked:
 * resuming from a breakpoint executes it.
 */
function scan(
  context: SteppingContext,
  shouldStop: StopPredicate,
  runUnit: (countUnit: () => void) => void = (countUnit) => {
    context.driver.stepOne();
    countUnit();
  },
): ScanResult {
  let unitsExecuted = 0;
  const countUnit = (): void => {
    unitsExecuted++;
  };
  for (;;) {
    try {
      runUnit(countUnit);
    } catch (error) {
      if (error instanceof DebuggerError) {
        return { unitsExecuted, end: { kind: 'failed', error } };
      }
      throw error;
    }

    const address = context.driver.currentAddress();
    if (address === undefined) {
      return { unitsExecuted, end: { kind: 'finished' } };
    }
    if (context.breakpoints.contains(address)) {
      return { unitsExecuted, end: { kind: 'breakpoint', address } };
    }
    if (shouldStop(address)) {
      return { unitsExecuted, end: { kind: 'step', address } };
    }
    if (unitsExecuted >= context.maxScanSteps) {
      return { unitsExecuted, end: { kind: 'scan-limit', address } };
    }
  }
}

/**
 * Stops once the primary source line differs from the line execution started
 * on. Addresses without any location never stop the scan.
 */
function lineChanged(context: SteppingContext, from: OpcodeAddress): StopPredicate {
  const startLine = context.locations.primaryLocation(from);
  return (address) => {
    const location = context.locations.primaryLocation(address);
    return location !== undefined && !sameLine(location, startLine);
  };
}

/**
 * Runs an execution action from the paused address `from`.
 * `restart` is handled by the session and never reaches this function.
 */
export function executeSteppingAction(
  action: Exclude<DebuggerAction, 'restart'>,
  from: OpcodeAddress,
  context: SteppingContext,
): ScanResult {
  const startDepth = context.driver.callDepth();

  switch (action) {
    case 'step':
      return scan(context, () => true);
    case 'stepOverBlock':
      return scan(
        context,
        () => true,
        (countUnit) => {
          context.driver.stepOverBlock(countUnit);
        },
      );
    case 'next':
      return scan(context, lineChanged(context, from));
    case 'nextOver': {
      const changed = lineChanged(context, from);
      return scan(
        context,
        (address) => context.driver.callDepth() <= startDepth && changed(address),
      );
    }
    case 'nextOut':
      return scan(
        context,
        (address) =>
          context.driver.callDepth() < startDepth &&
          context.locations.primaryLocation(address) !== undefined,
      );
    case 'continue':
      return scan(context, () => false);
  }
}
