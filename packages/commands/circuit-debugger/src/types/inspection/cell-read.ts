import type { FieldElement } from '../../field/field-element.js';

/**
 * Result of reading a register or memory cell. Cells that were never written
 * are reported as not yet available, even though execution reads them as zero.
 */
export type CellRead =
  | { status: 'available'; value: FieldElement }
  | { status: 'not-yet-available' };

/** One written cell of a register or memory listing. */
export interface CellEntry {
  index: number;
  value: FieldElement;
}
