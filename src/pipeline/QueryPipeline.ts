import { FieldCandidate } from '../catalog/types.js';
import { CompositionResult, FilterComposer } from '../filters/FilterComposer.js';
import { Combinator } from '../filters/types.js';
import { ParsedQuery, TermExtractor } from '../llm/TermExtractor.js';
import { BuildOptions, GraphQLQuery, QueryBuilder } from '../query/QueryBuilder.js';
import { ConflictResolver } from '../resolver/ConflictResolver.js';
import { ResolutionResult } from '../resolver/types.js';
import { errorMessage, logger } from '../utils/logger.js';
import {
  ConflictResolutionError,
  FieldMappingError,
  FilterCompositionError,
  PipelineStage,
  PipelineStageError,
  QueryGenerationError,
  QueryParsingError,
} from './PipelineError.js';

/** Anything that answers catalog searches: the index itself or a cache in front of it */
export interface CandidateSearch {
  search(term: string, maxCandidates?: number): FieldCandidate[];
}

export interface PipelineServices {
  extractor: TermExtractor;
  search: CandidateSearch;
  resolver: ConflictResolver;
  composer: FilterComposer;
  builder: QueryBuilder;
}

export type StageTimings = Partial<Record<PipelineStage, number>>;

export interface PipelineResult {
  parsedQuery: ParsedQuery;
  candidates: FieldCandidate[];
  resolution: ResolutionResult;
  composition: CompositionResult;
  query: GraphQLQuery;
  /** Advisory messages from every stage, in stage order */
  warnings: string[];
  /** Milliseconds spent per stage */
  timings: StageTimings;
}

type StageErrorFactory = (message: string, cause: unknown) => PipelineStageError;

/**
 * QueryPipeline
 * Natural-language query to GraphQL query: extract terms, search the catalog
 * for each, settle each term on one field, compose the filter tree and build
 * the query. A failing stage raises its own PipelineStageError subclass.
 */
export class QueryPipeline {
  private readonly services: PipelineServices;

  constructor(services: PipelineServices) {
    this.services = services;
  }

  async processQuery(text: string, options: BuildOptions = {}): Promise<PipelineResult> {
    const timings: StageTimings = {};
    const parsedQuery = await this.runStage(
      'parse',
      timings,
      () => this.services.extractor.extract(text),
      (message, cause) => new QueryParsingError(message, { query: text }, cause)
    );
    return this.processParsed(parsedQuery, timings, options);
  }

  /**
   * Run the pipeline on terms that are already extracted.
   */
  async processTerms(
    terms: string[],
    logic: Combinator = 'AND',
    options: BuildOptions = {}
  ): Promise<PipelineResult> {
    const cleaned = terms.map((term) => term.trim()).filter((term) => term.length > 0);
    if (cleaned.length === 0) {
      throw new QueryParsingError('No search terms given', { terms });
    }

    const parsedQuery: ParsedQuery = {
      terms: cleaned.map((term, position) => ({
        original: term,
        normalized: term,
        position,
        confidence: 1,
      })),
      logic,
      rawQuery: cleaned.join(logic === 'OR' ? ' or ' : ' and '),
      confidence: 1,
    };
    return this.processParsed(parsedQuery, {}, options);
  }

  private async processParsed(
    parsedQuery: ParsedQuery,
    timings: StageTimings,
    options: BuildOptions
  ): Promise<PipelineResult> {
    const { search, resolver, composer, builder } = this.services;

    const { candidates, unmatched } = await this.runStage(
      'search',
      timings,
      () => {
        const found: FieldCandidate[] = [];
        const missing: string[] = [];
        const seen = new Set<string>();
        for (const { normalized } of parsedQuery.terms) {
          if (seen.has(normalized)) {
            continue;
          }
          seen.add(normalized);
          const matches = search.search(normalized);
          if (matches.length === 0) {
            missing.push(normalized);
          }
          found.push(...matches);
        }
        return { candidates: found, unmatched: missing };
      },
      (message, cause) =>
        new FieldMappingError(message, { terms: parsedQuery.terms.map((t) => t.normalized) }, cause)
    );

    const resolution = await this.runStage(
      'resolve',
      timings,
      () => resolver.resolve(candidates, unmatched),
      (message, cause) => new ConflictResolutionError(message, { candidates: candidates.length }, cause)
    );

    const { composition, compositionWarnings } = await this.runStage(
      'compose',
      timings,
      () => {
        const result = composer.compose(resolution.resolvedFields, parsedQuery.logic);
        return { composition: result, compositionWarnings: composer.validateComposition(result) };
      },
      (message, cause) =>
        new FilterCompositionError(message, { fields: resolution.resolvedFields.length }, cause)
    );

    const { query, queryWarnings } = await this.runStage(
      'build',
      timings,
      () => {
        const built = builder.build(composition.tree, options);
        return { query: built, queryWarnings: builder.validateQuery(built) };
      },
      (message, cause) => new QueryGenerationError(message, {}, cause)
    );

    const warnings = [
      ...resolution.warnings,
      ...composition.warnings,
      ...compositionWarnings,
      ...queryWarnings,
    ];

    logger.info('Query processed', {
      terms: parsedQuery.terms.length,
      resolved: resolution.resolvedFields.length,
      conflicts: resolution.conflicts.length,
      warnings: warnings.length,
      timings,
    });

    return { parsedQuery, candidates, resolution, composition, query, warnings, timings };
  }

  private async runStage<T>(
    stage: PipelineStage,
    timings: StageTimings,
    fn: () => T | Promise<T>,
    wrap: StageErrorFactory
  ): Promise<T> {
    const start = performance.now();
    try {
      return await logger.withTimer(`pipeline.${stage}`, {}, fn);
    } catch (error) {
      if (error instanceof PipelineStageError) {
        throw error;
      }
      throw wrap(`Stage "${stage}" failed: ${errorMessage(error)}`, error);
    } finally {
      timings[stage] = Math.round((performance.now() - start) * 100) / 100;
    }
  }
}
