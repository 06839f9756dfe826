import type { FieldElement } from '../field/field-element.js';
import { formatField } from '../field/field-element.js';
import type { WitnessMap } from '../types/program/witness-map.js';

/**
 * JSON replacer: field elements become decimal strings, maps become objects.
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, jsonReplacer, 2);
}

/**
 * Witness map as `{ "<index>": "<value>" }` in index order.
 */
export function witnessToRecord(
  witness: ReadonlyMap<number, FieldElement>,
): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [index, value] of Array.from(witness).sort(([a], [b]) => a - b)) {
    record[index] = value.toString();
  }
  return record;
}

/** One `_i = v` line per witness, in index order. */
export function formatWitnessLines(witness: WitnessMap): string[] {
  return Array.from(witness)
    .sort(([a], [b]) => a - b)
    .map(([index, value]) => `_${index} = ${formatField(value)}`);
}
