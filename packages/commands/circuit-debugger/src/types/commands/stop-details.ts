import type { OpcodeAddress } from '../../address/opcode-address.js';
import type { SourceLocation } from '../program/source-location.js';

export type StopReason = 'entry' | 'step' | 'breakpoint' | 'scan-limit';

/**
 * Information captured when a command leaves the session paused.
 */
export interface StopDetails {
  reason: StopReason;
  address: OpcodeAddress;
  /** Identifier of the breakpoint responsible for the stop. */
  hitBreakpoint?: string;
  /** Source locations of the stop address, innermost first. */
  locations: SourceLocation[];
}
