import { describe, it, expect } from '@jest/globals';
import { QueryBuilder } from '../QueryBuilder.js';
import { QueryConfig } from '../../config/query.js';
import { QueryGenerationError } from '../../pipeline/PipelineError.js';
import { FilterNode } from '../../filters/types.js';

const CONFIG: QueryConfig = {
  rootEntity: 'subject',
  accessibility: 'accessible',
  defaultLimit: 100,
  selection: ['sex', { field: 'tumor_assessments', selections: ['tumor_site'] }],
  maxQueryLength: 10_000,
  maxVariablesBytes: 5_000,
  maxContainsConditions: 3,
};

const EXPECTED_QUERY = [
  'query ($filter: JSON) {',
  '  subject(',
  '    accessibility: accessible,',
  '    offset: 0,',
  '    first: 100,',
  '    filter: $filter',
  '  ) {',
  '    sex',
  '    tumor_assessments {',
  '      tumor_site',
  '    }',
  '  }',
  '}',
].join('\n');

describe('QueryBuilder', () => {
  const builder = new QueryBuilder(CONFIG);

  describe('build', () => {
    it('should emit the configured selection and empty variables for no filter', () => {
      const result = builder.build(null);

      expect(result.query).toBe(EXPECTED_QUERY);
      expect(result.variables).toEqual({});
      expect(result.description).toBe('Query for all cases (no filters applied)');
    });

    it('should keep the selection independent of the filtered fields', () => {
      const tree: FilterNode = { kind: 'condition', operator: 'IN', field: 'race', values: ['Asian'] };
      const result = builder.build(tree);

      expect(result.query).toBe(EXPECTED_QUERY);
      expect(result.variables).toEqual({ filter: { IN: { race: ['Asian'] } } });
      expect(result.description).toBe("Cases where Race equals 'Asian'");
    });

    it('should decorate CONTAINS patterns in the variables', () => {
      const tree: FilterNode = {
        kind: 'group',
        combinator: 'OR',
        children: [
          { kind: 'condition', operator: 'CONTAINS', field: 'subject_submitter_id', value: 'COG', match: 'prefix' },
          { kind: 'condition', operator: 'CONTAINS', field: 'histology', value: 'blast', match: 'contains' },
        ],
      };

      expect(builder.build(tree).variables).toEqual({
        filter: {
          OR: [
            { CONTAINS: { subject_submitter_id: 'COG%' } },
            { CONTAINS: { histology: '%blast%' } },
          ],
        },
      });
      expect(builder.build(tree).description).toBe(
        "Cases where Subject Submitter Id starts with 'COG' or Histology contains 'blast'"
      );
    });

    it('should use the limit override', () => {
      expect(builder.build(null, { limit: 5 }).query).toContain('    first: 5,\n');
    });

    it('should reject a non-positive limit', () => {
      expect(() => builder.build(null, { limit: 0 })).toThrow(QueryGenerationError);
    });
  });

  describe('describe', () => {
    it('should phrase ranges, lists and nested blocks', () => {
      const tree: FilterNode = {
        kind: 'group',
        combinator: 'AND',
        children: [
          { kind: 'condition', operator: 'IN', field: 'race', values: ['Asian', 'White'] },
          { kind: 'condition', operator: 'GTE', field: 'age_at_censor_status', value: 18 },
          {
            kind: 'nested',
            path: 'tumor_assessments',
            combinator: 'OR',
            children: [
              { kind: 'condition', operator: 'IN', field: 'tumor_site', values: ['Kidney'] },
              { kind: 'condition', operator: 'IN', field: 'tumor_state', values: ['A', 'B', 'C', 'D'] },
            ],
          },
        ],
      };

      expect(builder.describe(tree)).toBe(
        'Cases where Race is one of [Asian, White] and ' +
          "Age At Censor Status is greater than or equal to '18' and " +
          "(Tumor Site equals 'Kidney' or Tumor State is one of [A, B and 2 others])"
      );
    });
  });

  describe('validateQuery', () => {
    it('should return no warnings for a small query', () => {
      expect(builder.validateQuery(builder.build(null))).toEqual([]);
    });

    it('should flag many CONTAINS conditions including nested ones', () => {
      const contains = (field: string): FilterNode => ({
        kind: 'condition',
        operator: 'CONTAINS',
        field,
        value: 'x',
        match: 'contains',
      });
      const tree: FilterNode = {
        kind: 'group',
        combinator: 'AND',
        children: [
          contains('a'),
          contains('b'),
          {
            kind: 'nested',
            path: 'histologies',
            combinator: 'AND',
            children: [
              { kind: 'condition', operator: 'CONTAINS', field: 'c', value: 'x', match: 'contains' },
              { kind: 'condition', operator: 'CONTAINS', field: 'd', value: 'x', match: 'suffix' },
            ],
          },
        ],
      };

      expect(builder.validateQuery(builder.build(tree))).toEqual([
        'Query contains 4 text search operations which may be slow',
      ]);
    });

    it('should flag over-long text and large variables', () => {
      const small = new QueryBuilder({ ...CONFIG, maxQueryLength: 10, maxVariablesBytes: 10 });
      const tree: FilterNode = { kind: 'condition', operator: 'IN', field: 'race', values: ['Asian'] };
      const result = small.build(tree);

      expect(small.validateQuery(result)).toEqual([
        `Query is very long (${EXPECTED_QUERY.length} characters) and may impact performance`,
        'Query variables are very large (36 bytes)',
      ]);
    });
  });
});
