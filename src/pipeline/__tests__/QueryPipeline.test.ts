import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { QueryPipeline, PipelineServices } from '../QueryPipeline.js';
import {
  FieldMappingError,
  FilterCompositionError,
  PipelineStageError,
  QueryParsingError,
} from '../PipelineError.js';
import { CatalogIndex } from '../../catalog/CatalogIndex.js';
import { CatalogLoader } from '../../catalog/CatalogLoader.js';
import { FilterComposer } from '../../filters/FilterComposer.js';
import { RuleBasedTermExtractor } from '../../llm/RuleBasedTermExtractor.js';
import { TermExtractor } from '../../llm/TermExtractor.js';
import { QueryBuilder } from '../../query/QueryBuilder.js';
import { ConflictResolver } from '../../resolver/ConflictResolver.js';
import { FieldCandidate } from '../../catalog/types.js';
import { ResolutionResult } from '../../resolver/types.js';
import {
  SAMPLE_CATALOG,
  createTempDir,
  removeTempDir,
  writeCatalogFile,
} from '../../../tests/helpers/catalogFixture.js';

class MalformedResolver extends ConflictResolver {
  resolve(): ResolutionResult {
    return {
      resolvedFields: [
        { term: 'x', fieldPath: '', fieldType: 'enum', value: 'x', operator: 'eq', confidence: 1 },
      ],
      conflicts: [],
      warnings: [],
    };
  }
}

describe('QueryPipeline', () => {
  let dir: string;
  let services: PipelineServices;
  let pipeline: QueryPipeline;

  beforeAll(() => {
    dir = createTempDir('pipeline');
    const index = new CatalogIndex(new CatalogLoader(writeCatalogFile(dir, SAMPLE_CATALOG)), {
      keywordMatchThreshold: 0.8,
      maxCandidatesPerTerm: 5,
      minTermLength: 2,
    });
    services = {
      extractor: new RuleBasedTermExtractor({ minTermLength: 2 }),
      search: index,
      resolver: new ConflictResolver(),
      composer: new FilterComposer(),
      builder: new QueryBuilder({
        rootEntity: 'subject',
        accessibility: 'accessible',
        defaultLimit: 100,
        selection: ['sex'],
        maxQueryLength: 10_000,
        maxVariablesBytes: 5_000,
        maxContainsConditions: 3,
      }),
    };
    pipeline = new QueryPipeline(services);
  });

  afterAll(() => {
    removeTempDir(dir);
  });

  describe('processQuery', () => {
    it('should turn a sentence into filter variables', async () => {
      const result = await pipeline.processQuery('Asian girls');

      expect(result.parsedQuery.terms.map((t) => t.normalized)).toEqual(['asian', 'female']);
      expect(result.query.variables).toEqual({
        filter: { AND: [{ IN: { race: ['Asian'] } }, { IN: { sex: ['Female'] } }] },
      });
      expect(result.query.description).toBe("Cases where Race equals 'Asian' and Sex equals 'Female'");
      expect(result.warnings).toEqual([]);
    });

    it('should report a duration for every stage', async () => {
      const { timings } = await pipeline.processQuery('asian');

      expect(Object.keys(timings).sort()).toEqual(['build', 'compose', 'parse', 'resolve', 'search']);
      for (const duration of Object.values(timings)) {
        expect(duration).toBeGreaterThanOrEqual(0);
      }
    });

    it('should wrap an extractor failure as a parsing error', async () => {
      const failing: TermExtractor = {
        name: 'failing',
        extract: async () => {
          throw new Error('model offline');
        },
      };
      const broken = new QueryPipeline({ ...services, extractor: failing });

      const error = await broken.processQuery('asian').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(QueryParsingError);
      expect(error instanceof PipelineStageError ? error.stage : null).toBe('parse');
      expect(error instanceof Error ? error.message : '').toBe('Stage "parse" failed: model offline');
      expect(error instanceof Error && error.cause instanceof Error ? error.cause.message : '').toBe(
        'model offline'
      );
    });
  });

  describe('processTerms', () => {
    it('should group fields of one entity into a nested block', async () => {
      const result = await pipeline.processTerms(['female', 'kidney']);

      expect(result.query.variables).toEqual({
        filter: {
          AND: [
            { IN: { sex: ['Female'] } },
            { nested: { path: 'tumor_assessments', AND: [{ IN: { tumor_site: ['Kidney'] } }] } },
          ],
        },
      });
      expect(result.resolution.conflicts).toEqual([]);
    });

    it('should combine with OR when asked', async () => {
      const result = await pipeline.processTerms(['asian', 'white'], 'OR');

      expect(result.query.variables).toEqual({
        filter: { OR: [{ IN: { race: ['Asian'] } }, { IN: { race: ['White'] } }] },
      });
      expect(result.warnings).toEqual(["Multiple filters on field 'race' - may be conflicting"]);
    });

    it('should carry unmatched terms as warnings and emit an unfiltered query', async () => {
      const result = await pipeline.processTerms(['zzzz']);

      expect(result.query.variables).toEqual({});
      expect(result.warnings).toEqual([
        'No catalog field matched "zzzz"',
        'No filters generated - query may return all records',
      ]);
    });

    it('should reject an empty term list', async () => {
      await expect(pipeline.processTerms(['  '])).rejects.toThrow(QueryParsingError);
    });

    it('should wrap a search failure as a field mapping error', async () => {
      const broken = new QueryPipeline({
        ...services,
        search: {
          search: (): FieldCandidate[] => {
            throw new Error('index unavailable');
          },
        },
      });

      await expect(broken.processTerms(['sex'])).rejects.toThrow(FieldMappingError);
    });

    it('should pass a stage error through unchanged', async () => {
      const broken = new QueryPipeline({ ...services, resolver: new MalformedResolver() });

      await expect(broken.processTerms(['sex'])).rejects.toThrow(FilterCompositionError);
      await expect(broken.processTerms(['sex'])).rejects.toThrow(
        'Resolved field has an invalid field path'
      );
    });
  });
});
