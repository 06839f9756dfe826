import type { FieldElement } from '../../field/field-element.js';
import type { WitnessIndex } from './witness-map.js';

/** `coefficient * lhs * rhs` */
export interface MulTerm {
  coefficient: FieldElement;
  lhs: WitnessIndex;
  rhs: WitnessIndex;
}

/** `coefficient * witness` */
export interface LinearTerm {
  coefficient: FieldElement;
  witness: WitnessIndex;
}

/**
 * Degree-two polynomial over witnesses:
 * `Σ mulTerms + Σ linearTerms + constant`.
 */
export interface Expression {
  mulTerms: MulTerm[];
  linearTerms: LinearTerm[];
  constant: FieldElement;
}
