import type { FieldElement } from '../../field/field-element.js';

export type WitnessIndex = number;

/**
 * Partial assignment of witnesses. Owned by the solve driver while a session
 * runs; callers only ever receive copies.
 */
export type WitnessMap = Map<WitnessIndex, FieldElement>;
