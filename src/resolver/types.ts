import { FieldType } from '../catalog/types.js';
import { ScalarValue } from '../filters/types.js';

export type FieldOperator =
  | 'eq'
  | 'in'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'contains'
  | 'startswith'
  | 'endswith';

export const FIELD_OPERATORS: readonly FieldOperator[] = [
  'eq',
  'in',
  'gt',
  'gte',
  'lt',
  'lte',
  'contains',
  'startswith',
  'endswith',
];

export type ResolvedValue = ScalarValue | ScalarValue[];

/** One user term settled on a single catalog field */
export interface ResolvedField {
  term: string;
  fieldPath: string;
  fieldType: FieldType;
  value: ResolvedValue;
  operator: FieldOperator;
  /** In [0, 1] */
  confidence: number;
}

export interface ConflictRecord {
  term: string;
  candidatePaths: string[];
  chosenPath: string;
  reason: string;
  confidence: number;
}

export interface ResolutionResult {
  resolvedFields: ResolvedField[];
  conflicts: ConflictRecord[];
  warnings: string[];
}
