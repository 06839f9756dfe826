import type { FieldElement } from '../../field/field-element.js';
import type { VariableSource } from '../program/debug-symbols.js';

export interface VariableValue {
  name: string;
  type?: string;
  value: FieldElement;
  source: VariableSource;
}

/**
 * Variables of one active source-level scope. Bindings whose storage is not
 * resolvable at the current address are left out.
 */
export interface VariableFrame {
  functionName: string;
  params: string[];
  variables: VariableValue[];
}
