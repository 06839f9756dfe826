/**
 * Position in the combined program.
 *
 * `outer` addresses point at an outer opcode (for a block-call opcode: about to
 * enter the block). `inner` addresses point at an instruction of the block
 * invoked by the opcode at `outerIndex`, and only exist while that block is
 * active.
 */
export type OpcodeAddress = OuterAddress | InnerAddress;

export interface OuterAddress {
  kind: 'outer';
  outerIndex: number;
}

export interface InnerAddress {
  kind: 'inner';
  outerIndex: number;
  innerIndex: number;
}

export function outer(outerIndex: number): OuterAddress {
  return { kind: 'outer', outerIndex };
}

export function inner(outerIndex: number, innerIndex: number): InnerAddress {
  return { kind: 'inner', outerIndex, innerIndex };
}

export function isInnerAddress(address: OpcodeAddress): address is InnerAddress {
  return address.kind === 'inner';
}

/**
 * Total order: by outer index, outer before inner, then by inner index.
 */
export function compareAddresses(a: OpcodeAddress, b: OpcodeAddress): number {
  if (a.outerIndex !== b.outerIndex) {
    return a.outerIndex - b.outerIndex;
  }
  if (a.kind === 'outer') {
    return b.kind === 'outer' ? 0 : -1;
  }
  if (b.kind === 'outer') {
    return 1;
  }
  return a.innerIndex - b.innerIndex;
}

export function addressesEqual(a: OpcodeAddress, b: OpcodeAddress): boolean {
  return compareAddresses(a, b) === 0;
}

/**
 * Canonical text form, `"3"` or `"3.1"`. Used as map key and breakpoint id.
 */
export function addressKey(address: OpcodeAddress): string {
  return address.kind === 'outer'
    ? `${address.outerIndex}`
    : `${address.outerIndex}.${address.innerIndex}`;
}

/**
 * Inverse of {@link addressKey}.
 * @returns the address, or `undefined` for malformed text
 */
export function parseAddress(text: string): OpcodeAddress | undefined {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const outerIndex = Number(match[1]);
  if (match[2] === undefined) {
    return outer(outerIndex);
  }
  return inner(outerIndex, Number(match[2]));
}
