/**
 * Elements of the BN254 scalar field, represented as `bigint` in `[0, p)`.
 */
export type FieldElement = bigint;

export const FIELD_MODULUS: FieldElement =
  21888242871839275222246405745257275088548364400416034343698204186575808495617n;

const HALF_MODULUS = (FIELD_MODULUS - 1n) / 2n;
const DECIMAL_DISPLAY_LIMIT = 1n << 64n;

export const FIELD_ZERO: FieldElement = 0n;
export const FIELD_ONE: FieldElement = 1n;

/**
 * Reduces an integer into the field.
 * @param value - Any integer, negative values included
 */
export function toField(value: bigint | number): FieldElement {
  const big = typeof value === 'number' ? BigInt(value) : value;
  const reduced = big % FIELD_MODULUS;
  return reduced < 0n ? reduced + FIELD_MODULUS : reduced;
}

/**
 * Parses a decimal (optionally negative) or `0x`-prefixed hexadecimal string.
 * @returns the reduced element, or `undefined` when the text is not a number
 */
export function parseField(text: string): FieldElement | undefined {
  const trimmed = text.trim();
  if (/^-?\d+$/.test(trimmed) || /^0x[0-9a-fA-F]+$/.test(trimmed)) {
    return toField(BigInt(trimmed));
  }
  return undefined;
}

export function fieldAdd(a: FieldElement, b: FieldElement): FieldElement {
  return toField(a + b);
}

export function fieldSub(a: FieldElement, b: FieldElement): FieldElement {
  return toField(a - b);
}

export function fieldMul(a: FieldElement, b: FieldElement): FieldElement {
  return toField(a * b);
}

export function fieldNeg(a: FieldElement): FieldElement {
  return toField(-a);
}

function modPow(base: FieldElement, exponent: bigint): FieldElement {
  let result = 1n;
  let b = base % FIELD_MODULUS;
  let e = exponent;
  while (e > 0n) {
    if (e & 1n) {
      result = (result * b) % FIELD_MODULUS;
    }
    b = (b * b) % FIELD_MODULUS;
    e >>= 1n;
  }
  return result;
}

/**
 * Multiplicative inverse, `undefined` for zero.
 */
export function fieldInverse(a: FieldElement): FieldElement | undefined {
  const reduced = toField(a);
  if (reduced === 0n) {
    return undefined;
  }
  return modPow(reduced, FIELD_MODULUS - 2n);
}

/**
 * `a / b`, `undefined` when `b` is zero.
 */
export function fieldDiv(a: FieldElement, b: FieldElement): FieldElement | undefined {
  const inverse = fieldInverse(b);
  return inverse === undefined ? undefined : fieldMul(a, inverse);
}

/**
 * Display form: decimal below 2^64, hexadecimal above.
 */
export function formatField(value: FieldElement): string {
  return value < DECIMAL_DISPLAY_LIMIT ? value.toString(10) : `0x${value.toString(16)}`;
}

/**
 * Display form for coefficients: elements in the upper half of the field are
 * shown as negative numbers.
 */
export function formatSignedField(value: FieldElement): string {
  if (value > HALF_MODULUS) {
    return `-${formatField(FIELD_MODULUS - value)}`;
  }
  return formatField(value);
}
