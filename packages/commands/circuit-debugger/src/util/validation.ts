import type { FieldElement } from '../field/field-element.js';
import { parseField, toField } from '../field/field-element.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a non-empty string
 * @param value - Value to validate
 * @param label - Field name for error messages
 * @throws Error if value is invalid
 */
export function expectString(value: unknown, label: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

/**
 * Validates optional string value
 * @param value - Value to validate
 * @param label - Field name for error messages
 * @throws Error if value is not a string
 */
export function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${label} must be a string.`);
  }
  return value;
}

/**
 * Validates that a value is a non-negative integer, as used for witness,
 * register and memory indices and for line numbers.
 * @param value - Value to validate
 * @param label - Field name for error messages
 * @throws Error if value is invalid
 */
export function expectIndex(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${label} must be a non-negative integer.`);
  }
  return value;
}

export function optionalIndex(value: unknown, label: string): number | undefined {
  return value === undefined ? undefined : expectIndex(value, label);
}

/**
 * Validates optional boolean value
 * @param value - Value to validate
 * @param label - Field name for error messages
 * @throws Error if value is not a boolean
 */
export function optionalBoolean(value: unknown, label: string): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`${label} must be a boolean.`);
  }
  return value;
}

/**
 * Validates that a value is a plain object
 * @param value - Value to validate
 * @param label - Field name for error messages
 * @throws Error if value is invalid
 */
export function expectRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${label} must be an object.`);
  }
  return value;
}

export function expectArray(value: unknown, label: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`${label} must be an array.`);
  }
  return value;
}

/**
 * Validates optional string array
 * @param value - Value to validate
 * @param label - Field name for error messages
 * @throws Error if value is invalid
 */
export function optionalStringArray(value: unknown, label: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return expectArray(value, label).map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new Error(`${label}[${index}] must be a string.`);
    }
    return entry;
  });
}

/**
 * Validates a field element given as a decimal, `0x` hex or negative decimal
 * string, or as a safe integer.
 * @param value - Value to validate
 * @param label - Field name for error messages
 * @throws Error if value is invalid
 */
export function expectField(value: unknown, label: string): FieldElement {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return toField(value);
  }
  if (typeof value === 'string') {
    const parsed = parseField(value);
    if (parsed !== undefined) {
      return parsed;
    }
  }
  throw new Error(`${label} must be a field element.`);
}
