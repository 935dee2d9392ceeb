import { describe, it, expect } from '@jest/globals';
import { RuleBasedTermExtractor } from '../RuleBasedTermExtractor.js';
import { QueryParsingError } from '../../pipeline/PipelineError.js';

describe('RuleBasedTermExtractor', () => {
  const extractor = new RuleBasedTermExtractor({ minTermLength: 2 });

  it('should normalize synonyms, drop stop words and detect OR', () => {
    expect(extractor.parse('Kids with leukemia or lymphoma')).toEqual({
      terms: [
        { original: 'kids', normalized: 'pediatric', position: 0, confidence: 0.8 },
        { original: 'leukemia', normalized: 'leukemia', position: 1, confidence: 0.9 },
        { original: 'lymphoma', normalized: 'lymphoma', position: 2, confidence: 0.9 },
      ],
      logic: 'OR',
      rawQuery: 'Kids with leukemia or lymphoma',
      confidence: 0.7,
    });
  });

  it('should give unnormalized words the base confidence', () => {
    const { terms, logic } = extractor.parse('tumor site in the kidney');

    expect(logic).toBe('AND');
    expect(terms).toEqual([
      { original: 'tumor', normalized: 'tumor', position: 0, confidence: 0.9 },
      { original: 'site', normalized: 'site', position: 1, confidence: 0.6 },
      { original: 'kidney', normalized: 'kidney', position: 2, confidence: 0.8 },
    ]);
  });

  it('should keep the first occurrence of a normalized term', () => {
    const { terms } = extractor.parse('boys and girls and men');

    expect(terms.map((t) => [t.original, t.normalized])).toEqual([
      ['boys', 'male'],
      ['girls', 'female'],
    ]);
  });

  it('should fall back to the longest word when every word is dropped', () => {
    expect(extractor.parse('show all of the').terms).toEqual([
      { original: 'show', normalized: 'show', position: 0, confidence: 0.5 },
    ]);
  });

  it('should honour the minimum term length', () => {
    const strict = new RuleBasedTermExtractor({ minTermLength: 5 });

    expect(strict.parse('race and sex of kids').terms.map((t) => t.normalized)).toEqual(['pediatric']);
  });

  it('should accept custom rules', () => {
    const custom = new RuleBasedTermExtractor({
      minTermLength: 2,
      rules: {
        normalizations: [{ replacement: 'sex', pattern: 'gender|genders' }],
        highConfidenceTerms: [],
        orWords: ['vs'],
        stopWords: [],
      },
    });

    expect(custom.parse('gender vs race')).toMatchObject({
      logic: 'OR',
      terms: [
        { original: 'gender', normalized: 'sex', confidence: 0.8 },
        { original: 'vs', normalized: 'vs', confidence: 0.6 },
        { original: 'race', normalized: 'race', confidence: 0.6 },
      ],
    });
  });

  it('should reject text without words', async () => {
    await expect(extractor.extract('  ?! ')).rejects.toThrow(QueryParsingError);
  });
});
