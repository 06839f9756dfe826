import type { OpcodeAddress } from '../../address/opcode-address.js';
import type { SourceLocation } from '../program/source-location.js';
import type { BreakpointSpec } from './breakpoint-spec.js';

/**
 * Resolved breakpoint information returned to callers. A line request resolves
 * to the first address located on that line.
 */
export interface BreakpointSummary {
  /** Canonical identifier, the address text form. */
  id: string;
  /** Original breakpoint request submitted by the caller. */
  requested: BreakpointSpec;
  address: OpcodeAddress;
  /** Source locations of the address, innermost first. */
  locations: SourceLocation[];
}
