import { logger } from '../utils/logger.js';

/**
 * A field in the query's selection set: a scalar name, or a related entity
 * with its own sub-selection.
 */
export type SelectionNode = string | { field: string; selections: SelectionNode[] };

export interface QueryConfig {
  rootEntity: string;
  accessibility: string;
  defaultLimit: number;
  selection: SelectionNode[];
  maxQueryLength: number;
  maxVariablesBytes: number;
  maxContainsConditions: number;
}

export const DEFAULT_SELECTION: SelectionNode[] = [
  'consortium',
  'subject_submitter_id',
  'sex',
  'race',
  'ethnicity',
  'age_at_censor_status',
  {
    field: 'tumor_assessments',
    selections: ['tumor_site', 'tumor_state', 'tumor_classification', 'age_at_tumor_assessment'],
  },
  { field: 'histologies', selections: ['histology', 'histology_grade'] },
  { field: 'disease_characteristics', selections: ['diagnosis', 'primary_site'] },
];

const positiveInt = (value: string | undefined, defaultValue: number): number => {
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
};

const GRAPHQL_NAME = /^[_A-Za-z][_0-9A-Za-z]*$/;

const graphqlName = (name: string, value: string | undefined, defaultValue: string): string => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return defaultValue;
  }
  if (!GRAPHQL_NAME.test(trimmed)) {
    logger.warn(`${name} is not a GraphQL name; using "${defaultValue}"`, { value: trimmed });
    return defaultValue;
  }
  return trimmed;
};

export function loadQueryConfig(): QueryConfig {
  const rootEntity = graphqlName('QUERY_ROOT_ENTITY', process.env.QUERY_ROOT_ENTITY, 'subject');
  const accessibility = graphqlName('QUERY_ACCESSIBILITY', process.env.QUERY_ACCESSIBILITY, 'accessible');

  return {
    rootEntity,
    accessibility,
    defaultLimit: positiveInt(process.env.QUERY_DEFAULT_LIMIT, 100),
    selection: DEFAULT_SELECTION,
    maxQueryLength: positiveInt(process.env.QUERY_MAX_LENGTH, 10_000),
    maxVariablesBytes: positiveInt(process.env.QUERY_MAX_VARIABLES_BYTES, 5_000),
    maxContainsConditions: positiveInt(process.env.QUERY_MAX_CONTAINS, 3),
  };
}
