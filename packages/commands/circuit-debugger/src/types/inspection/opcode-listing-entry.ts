import type { OpcodeAddress } from '../../address/opcode-address.js';

export type OpcodeMarker = 'current' | 'breakpoint';

/**
 * One line of the program listing. Block instructions are listed under the
 * block-call opcode that invokes them.
 */
export interface OpcodeListingEntry {
  address: OpcodeAddress;
  /** Address text form. */
  key: string;
  text: string;
  /** `current` wins over `breakpoint` when both apply. */
  marker?: OpcodeMarker;
}
