import { describe, expect, it } from 'vitest';

import { addressKey, inner, outer } from '../address/opcode-address.js';
import { BreakpointRegistry } from './breakpoint-registry.js';

describe('BreakpointRegistry', () => {
  it('adds and removes idempotently', () => {
    const registry = new BreakpointRegistry();

    expect(registry.add(outer(2))).toBe(true);
    expect(registry.add(outer(2))).toBe(false);
    expect(registry.size).toBe(1);

    expect(registry.remove(outer(2))).toBe(true);
    expect(registry.remove(outer(2))).toBe(false);
    expect(registry.size).toBe(0);
  });

  it('matches addresses exactly', () => {
    const registry = new BreakpointRegistry();
    registry.add(outer(5));

    expect(registry.contains(outer(5))).toBe(true);
    expect(registry.contains(inner(5, 0))).toBe(false);
  });

  it('lists breakpoints in address order', () => {
    const registry = new BreakpointRegistry();
    registry.add(inner(1, 3));
    registry.add(outer(4));
    registry.add(outer(1));
    registry.add(inner(1, 0));

    expect(registry.all().map(addressKey)).toEqual(['1', '1.0', '1.3', '4']);
  });

  it('clears every breakpoint', () => {
    const registry = new BreakpointRegistry();
    registry.add(outer(0));
    registry.add(inner(0, 1));
    registry.clear();

    expect(registry.all()).toEqual([]);
  });
});
