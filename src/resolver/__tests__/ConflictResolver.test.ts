import { describe, it, expect } from '@jest/globals';
import { ConflictResolver, defaultOperator, matchEnumValue } from '../ConflictResolver.js';
import { CatalogField, FieldCandidate, FieldType, MatchStrategy } from '../../catalog/types.js';

function field(
  path: string,
  fieldType: FieldType,
  extras: { enumValues?: string[]; description?: string } = {}
): CatalogField {
  return { path, fieldType, searchableTerms: [path], ...extras };
}

function candidate(
  term: string,
  target: CatalogField,
  matchScore: number,
  matchStrategy: MatchStrategy = 'exact'
): FieldCandidate {
  return { term, field: target, matchScore, matchStrategy, matchReason: 'test' };
}

const SEX = field('sex', 'enum', { enumValues: ['Male', 'Female'], description: 'Sex of the subject' });
const RACE = field('race', 'enum', { enumValues: ['Asian', 'White'] });
const ETHNICITY = field('ethnicity', 'enum', {
  enumValues: ['Hispanic or Latino'],
  description: 'Ethnicity, reported separately from race',
});
const SUBMITTER = field('subject_submitter_id', 'string');

describe('ConflictResolver', () => {
  const resolver = new ConflictResolver();

  describe('single candidate', () => {
    it('should accept the candidate with its match score as confidence', () => {
      const result = resolver.resolve([candidate('tumor', SUBMITTER, 0.4, 'partial')]);

      expect(result.resolvedFields).toEqual([
        {
          term: 'tumor',
          fieldPath: 'subject_submitter_id',
          fieldType: 'string',
          value: 'tumor',
          operator: 'contains',
          confidence: 0.4,
        },
      ]);
      expect(result.conflicts).toEqual([]);
    });

    it('should restore the catalog casing of a matching enum value', () => {
      const [resolved] = resolver.resolve([candidate('male', SEX, 1)]).resolvedFields;

      expect(resolved.value).toBe('Male');
      expect(resolved.operator).toBe('eq');
      expect(resolved.confidence).toBe(1);
    });

    it('should keep the term when no enum value matches', () => {
      const [resolved] = resolver.resolve([candidate('gender', SEX, 1)]).resolvedFields;

      expect(resolved.value).toBe('gender');
    });
  });

  describe('multiple candidates', () => {
    it('should pick the highest heuristic score and penalize confidence', () => {
      const result = resolver.resolve([
        candidate('female', SUBMITTER, 0.8, 'partial'),
        candidate('female', SEX, 0.6, 'fuzzy'),
      ]);

      const [resolved] = result.resolvedFields;
      expect(resolved.fieldPath).toBe('sex');
      expect(resolved.value).toBe('Female');
      expect(resolved.confidence).toBeCloseTo(0.82 * 0.9, 10);
      expect(result.conflicts).toEqual([
        {
          term: 'female',
          candidatePaths: ['subject_submitter_id', 'sex'],
          chosenPath: 'sex',
          reason: 'Highest score (0.820) using rule-based heuristics',
          confidence: resolved.confidence,
        },
      ]);
    });

    it('should keep the first candidate on a tie', () => {
      const other = field('vital_state', 'string');
      const result = resolver.resolve([
        candidate('status', SUBMITTER, 0.5),
        candidate('status', other, 0.5),
      ]);

      expect(result.resolvedFields[0].fieldPath).toBe('subject_submitter_id');
    });

    it('should fall back to the first enum value and warn when nothing matches', () => {
      const result = resolver.resolve([
        candidate('race', RACE, 1),
        candidate('race', ETHNICITY, 0.8, 'partial'),
      ]);

      const [resolved] = result.resolvedFields;
      expect(resolved.fieldPath).toBe('race');
      expect(resolved.value).toBe('Asian');
      expect(resolved.confidence).toBe(1);
      expect(result.warnings).toEqual(['No enum value of "race" matched "race"; using "Asian"']);
    });

    it('should emit one conflict record per ambiguous term', () => {
      const result = resolver.resolve([
        candidate('female', SUBMITTER, 0.8),
        candidate('female', SEX, 0.6),
        candidate('asian', RACE, 1),
        candidate('race', RACE, 1),
        candidate('race', ETHNICITY, 0.8),
      ]);

      expect(result.resolvedFields.map((f) => f.term)).toEqual(['female', 'asian', 'race']);
      expect(result.conflicts.map((c) => c.term)).toEqual(['female', 'race']);
    });
  });

  describe('scoreCandidate', () => {
    it('should add the path, enum, description and enum value bonuses', () => {
      const target = field('tumor_assessments.tumor_site', 'enum', {
        enumValues: ['Kidney'],
        description: 'Anatomic site',
      });

      // 0.5 + 0.10 path + 0.05 enum + 0.02 description
      expect(resolver.scoreCandidate('Site', candidate('Site', target, 0.5))).toBeCloseTo(0.67, 10);
      // 0.5 + 0.05 enum + 0.02 description + 0.15 enum value
      expect(resolver.scoreCandidate('kidney', candidate('kidney', target, 0.5))).toBeCloseTo(
        0.72,
        10
      );
    });
  });

  it('should turn unmatched terms into warnings', () => {
    const result = resolver.resolve([], ['xyz']);

    expect(result.resolvedFields).toEqual([]);
    expect(result.warnings).toEqual(['No catalog field matched "xyz"']);
  });
});

describe('matchEnumValue', () => {
  it('should prefer an exact match over a substring match', () => {
    expect(matchEnumValue('male', ['Female', 'Male'])).toBe('Male');
  });

  it('should match substrings in either direction', () => {
    expect(matchEnumValue('asian american', ['Asian', 'White'])).toBe('Asian');
    expect(matchEnumValue('kid', ['Kidney', 'Liver'])).toBe('Kidney');
  });

  it('should return undefined without a match', () => {
    expect(matchEnumValue('bone', ['Kidney', 'Liver'])).toBeUndefined();
  });
});

describe('defaultOperator', () => {
  it('should map field types to operators', () => {
    expect(defaultOperator(field('a', 'enum'))).toBe('eq');
    expect(defaultOperator(field('a', 'number'))).toBe('eq');
    expect(defaultOperator(field('a', 'date'))).toBe('eq');
    expect(defaultOperator(field('a', 'boolean'))).toBe('eq');
    expect(defaultOperator(field('a', 'string'))).toBe('contains');
  });
});
