import { CatalogIndex } from '../catalog/CatalogIndex.js';
import { SearchCache } from '../catalog/SearchCache.js';
import { FieldCandidate } from '../catalog/types.js';
import { FilterCodec } from '../filters/FilterCodec.js';
import { CandidateSearch, PipelineResult, QueryPipeline } from '../pipeline/QueryPipeline.js';
import { ConflictResolver } from '../resolver/ConflictResolver.js';
import { FieldValidator, ValidationError } from '../validators/FieldValidator.js';
import {
  ToolArgs,
  optionalBoolean,
  optionalCombinator,
  optionalPositiveInt,
  optionalString,
  optionalStringArray,
  requirePresent,
  requireString,
} from './toolArgs.js';

/**
 * MCP content format for responses. A type alias so it stays assignable to the
 * SDK's open-ended result type.
 */
export type McpContent = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

export interface CatalogControllerDeps {
  index: CatalogIndex;
  /** Search used by tools and the pipeline; the index itself when there is no cache */
  search: CandidateSearch;
  cache?: SearchCache;
  validator: FieldValidator;
  resolver: ConflictResolver;
  codec: FilterCodec;
  pipeline: QueryPipeline;
}

function summarizeCandidate(candidate: FieldCandidate) {
  return {
    path: candidate.field.path,
    type: candidate.field.fieldType,
    score: Math.round(candidate.matchScore * 1000) / 1000,
    strategy: candidate.matchStrategy,
    reason: candidate.matchReason,
  };
}

function formatWarnings(warnings: string[]): string {
  return warnings.length > 0 ? `\nWarnings:\n${warnings.map((w) => `- ${w}`).join('\n')}` : '';
}

/**
 * CatalogController
 *
 * Bridges MCP tool calls to the catalog services: reads and checks tool
 * arguments, calls the service and formats the outcome as MCP content.
 * Handlers throw on bad input; the server turns the error into an
 * `Error: ...` result.
 */
export class CatalogController {
  private readonly deps: CatalogControllerDeps;

  constructor(deps: CatalogControllerDeps) {
    this.deps = deps;
  }

  private formatResponse(result: unknown, summary?: string, isError = false): McpContent {
    const text = summary
      ? `${summary}\n\n${JSON.stringify(result, null, 2)}`
      : JSON.stringify(result, null, 2);

    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
      isError,
    };
  }

  async handleSearchCatalogTool(args: ToolArgs): Promise<McpContent> {
    const term = requireString(args, 'term');
    const maxCandidates = optionalPositiveInt(args, 'maxCandidates');
    const candidates = this.deps.search.search(term, maxCandidates).map(summarizeCandidate);

    const summary =
      candidates.length === 0
        ? `No catalog fields matched "${term.trim()}".`
        : `Found ${candidates.length} candidate field(s) for "${term.trim()}".`;
    return this.formatResponse({ term: term.trim(), candidates }, summary);
  }

  /**
   * Search every term and settle each on one field, without composing a filter.
   */
  async handleResolveTermsTool(args: ToolArgs): Promise<McpContent> {
    const terms = (optionalStringArray(args, 'terms') ?? [])
      .map((term) => term.trim())
      .filter((term) => term.length > 0);
    if (terms.length === 0) {
      throw new ValidationError('"terms" must contain at least one non-empty term', 'terms', args.terms);
    }

    const candidates: FieldCandidate[] = [];
    const unmatched: string[] = [];
    for (const term of new Set(terms)) {
      const matches = this.deps.search.search(term);
      if (matches.length === 0) {
        unmatched.push(term);
      }
      candidates.push(...matches);
    }

    const resolution = this.deps.resolver.resolve(candidates, unmatched);
    const summary =
      `Resolved ${resolution.resolvedFields.length} of ${terms.length} term(s)` +
      (resolution.conflicts.length > 0 ? `, ${resolution.conflicts.length} conflict(s) settled` : '') +
      '.' +
      formatWarnings(resolution.warnings);
    return this.formatResponse(resolution, summary);
  }

  /**
   * Full pipeline from a sentence (`query`) or from ready-made terms.
   */
  async handleBuildQueryTool(args: ToolArgs): Promise<McpContent> {
    const query = optionalString(args, 'query');
    const terms = optionalStringArray(args, 'terms');
    const logic = optionalCombinator(args, 'logic');
    const limit = optionalPositiveInt(args, 'limit');

    let result: PipelineResult;
    if (query !== undefined && query.trim() !== '') {
      result = await this.deps.pipeline.processQuery(query, { limit });
    } else if (terms !== undefined) {
      result = await this.deps.pipeline.processTerms(terms, logic, { limit });
    } else {
      throw new ValidationError('Provide either "query" or "terms"', 'query');
    }

    const payload = {
      query: result.query.query,
      variables: result.query.variables,
      description: result.query.description,
      terms: result.parsedQuery.terms.map((t) => t.normalized),
      logic: result.parsedQuery.logic,
      resolvedFields: result.resolution.resolvedFields,
      conflicts: result.resolution.conflicts,
      warnings: result.warnings,
      timings: result.timings,
    };
    return this.formatResponse(payload, `${result.query.description}${formatWarnings(result.warnings)}`);
  }

  async handleEncodeFilterStateTool(args: ToolArgs): Promise<McpContent> {
    const state = this.deps.codec.parseState(requirePresent(args, 'state'), '$.state');
    const filter = this.deps.codec.encode(state);
    const summary = filter ? 'Encoded filter state.' : 'Filter state is empty; no filter applies.';
    return this.formatResponse({ filter }, summary);
  }

  async handleDecodeFilterTool(args: ToolArgs): Promise<McpContent> {
    const { state, warnings } = this.deps.codec.decodeDetailed(args.filter);
    const summary = state
      ? `Decoded ${Object.keys(state.values).length} filter value(s).${formatWarnings(warnings)}`
      : 'No filter given; the state is empty.';
    return this.formatResponse({ state, warnings }, summary);
  }

  async handleValidateFilterTool(args: ToolArgs): Promise<McpContent> {
    const violations = this.deps.validator.validateFilter(requirePresent(args, 'filter'));
    const valid = violations.length === 0;
    const summary = valid
      ? 'Filter is valid.'
      : `Filter has ${violations.length} problem(s):\n${violations.map((v) => `- ${v}`).join('\n')}`;
    return this.formatResponse({ valid, violations }, summary, !valid);
  }

  async handleSuggestValuesTool(args: ToolArgs): Promise<McpContent> {
    const field = requireString(args, 'field').trim();
    const partial = optionalString(args, 'partial') ?? '';
    const limit = optionalPositiveInt(args, 'limit') ?? 5;

    const info = this.deps.validator.getFieldInfo(field);
    if (!info) {
      throw new ValidationError(`Unknown field path: '${field}'`, 'field', field);
    }
    if (info.type !== 'enum') {
      throw new ValidationError(`Field '${field}' is not an enum field`, 'field', field);
    }

    const suggestions = partial.trim()
      ? this.deps.validator.suggestEnumerationValues(field, partial, limit)
      : this.deps.validator.getValidEnumerationValues(field).slice(0, limit);
    return this.formatResponse(
      { field, partial, suggestions },
      `${suggestions.length} suggestion(s) for '${field}'.`
    );
  }

  async handleCatalogStatsTool(): Promise<McpContent> {
    const { index, cache } = this.deps;
    if (!index.isLoaded()) {
      index.buildIndex();
    }
    const stats = {
      catalog: index.getLoader().getStats(),
      index: index.getStats(),
      cache: cache ? cache.getStats() : null,
    };
    return this.formatResponse(
      stats,
      `Catalog has ${stats.index.totalFields} field(s) and ${stats.index.indexedTerms} indexed term(s).`
    );
  }

  /**
   * Rebuild the index. With `ifChanged`, only when the catalog file changed.
   */
  async handleRebuildIndexTool(args: ToolArgs): Promise<McpContent> {
    const { index } = this.deps;
    let rebuilt = true;
    if (optionalBoolean(args, 'ifChanged')) {
      rebuilt = index.reloadIfChanged();
    } else {
      index.buildIndex(true);
    }

    const stats = index.getStats();
    const summary = rebuilt
      ? `Index rebuilt with ${stats.totalFields} field(s).`
      : 'Catalog file unchanged; index kept.';
    return this.formatResponse({ rebuilt, stats }, summary);
  }
}
