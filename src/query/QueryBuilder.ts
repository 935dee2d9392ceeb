import { QueryConfig, SelectionNode } from '../config/query.js';
import { QueryGenerationError } from '../pipeline/PipelineError.js';
import { Combinator, FilterCondition, FilterNode, ScalarValue, WireFilter } from '../filters/types.js';
import { assertNever, toWire } from '../filters/wire.js';
import { debugLog, logger } from '../utils/logger.js';

export interface QueryVariables {
  filter?: WireFilter;
}

export interface GraphQLQuery {
  query: string;
  variables: QueryVariables;
  /** Plain-language summary of the filter */
  description: string;
}

export interface BuildOptions {
  /** Overrides the configured default page size */
  limit?: number;
}

const INDENT = '  ';

const RANGE_PHRASES = {
  GT: 'is greater than',
  GTE: 'is greater than or equal to',
  LT: 'is less than',
  LTE: 'is less than or equal to',
} as const;

const CONTAINS_PHRASES = {
  contains: 'contains',
  prefix: 'starts with',
  suffix: 'ends with',
} as const;

function renderSelection(nodes: SelectionNode[], depth: number): string[] {
  const pad = INDENT.repeat(depth);
  return nodes.flatMap((node) =>
    typeof node === 'string'
      ? [`${pad}${node}`]
      : [`${pad}${node.field} {`, ...renderSelection(node.selections, depth + 1), `${pad}}`]
  );
}

function fieldLabel(field: string): string {
  const name = field.split('.').pop() ?? field;
  return name
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function describeValues(values: ScalarValue[]): string {
  if (values.length === 1) {
    return `'${values[0]}'`;
  }
  if (values.length <= 3) {
    return `[${values.join(', ')}]`;
  }
  return `[${values[0]}, ${values[1]} and ${values.length - 2} others]`;
}

function describeCondition(condition: FilterCondition): string {
  const label = fieldLabel(condition.field);
  switch (condition.operator) {
    case 'IN':
      return condition.values.length === 1
        ? `${label} equals ${describeValues(condition.values)}`
        : `${label} is one of ${describeValues(condition.values)}`;
    case 'GT':
    case 'GTE':
    case 'LT':
    case 'LTE':
      return `${label} ${RANGE_PHRASES[condition.operator]} '${condition.value}'`;
    case 'CONTAINS':
      return `${label} ${CONTAINS_PHRASES[condition.match]} '${condition.value}'`;
    default:
      return assertNever(condition, 'Unknown condition operator');
  }
}

// A child block is parenthesized only when its combinator differs from its parent's
function describeNode(node: FilterNode, parent: Combinator | null): string {
  if (node.kind === 'condition') {
    return describeCondition(node);
  }

  const word = node.combinator === 'AND' ? ' and ' : ' or ';
  const children: FilterNode[] = node.children;
  const text = children.map((child) => describeNode(child, node.combinator)).join(word);
  return parent !== null && parent !== node.combinator && children.length > 1 ? `(${text})` : text;
}

function countContains(filter: WireFilter): number {
  if ('AND' in filter) {
    return filter.AND.reduce((sum, child) => sum + countContains(child), 0);
  }
  if ('OR' in filter) {
    return filter.OR.reduce((sum, child) => sum + countContains(child), 0);
  }
  if ('nested' in filter) {
    const block = filter.nested;
    const children = 'AND' in block ? block.AND : block.OR;
    return children.reduce((sum, child) => sum + countContains(child), 0);
  }
  return 'CONTAINS' in filter ? 1 : 0;
}

/**
 * QueryBuilder
 * Emits a GraphQL query against the configured root entity with a single
 * `$filter` variable. The selection set is fixed by configuration and does
 * not depend on which fields are filtered.
 */
export class QueryBuilder {
  private readonly config: QueryConfig;

  constructor(config: QueryConfig) {
    this.config = config;
  }

  build(tree: FilterNode | null, options: BuildOptions = {}): GraphQLQuery {
    const limit = options.limit ?? this.config.defaultLimit;
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new QueryGenerationError('Query limit must be a positive integer', { limit });
    }

    try {
      const query = this.buildQueryText(limit);
      const variables: QueryVariables = tree ? { filter: toWire(tree, { decorateContains: true }) } : {};
      const description = this.describe(tree);

      debugLog('composer', 'Built query', { limit, hasFilter: tree !== null });
      return { query, variables, description };
    } catch (error) {
      logger.error('Query generation failed', error);
      throw new QueryGenerationError(
        `Failed to generate GraphQL query: ${error instanceof Error ? error.message : String(error)}`,
        {},
        error
      );
    }
  }

  describe(tree: FilterNode | null): string {
    if (!tree) {
      return 'Query for all cases (no filters applied)';
    }
    return `Cases where ${describeNode(tree, null)}`;
  }

  /**
   * Advisory checks. Never blocks emission.
   */
  validateQuery(query: GraphQLQuery): string[] {
    const warnings: string[] = [];

    if (query.query.length > this.config.maxQueryLength) {
      warnings.push(
        `Query is very long (${query.query.length} characters) and may impact performance`
      );
    }

    const containsCount = query.variables.filter ? countContains(query.variables.filter) : 0;
    if (containsCount > this.config.maxContainsConditions) {
      warnings.push(`Query contains ${containsCount} text search operations which may be slow`);
    }

    const variablesBytes = Buffer.byteLength(JSON.stringify(query.variables), 'utf8');
    if (variablesBytes > this.config.maxVariablesBytes) {
      warnings.push(`Query variables are very large (${variablesBytes} bytes)`);
    }

    return warnings;
  }

  private buildQueryText(limit: number): string {
    const { rootEntity, accessibility, selection } = this.config;
    return [
      'query ($filter: JSON) {',
      `${INDENT}${rootEntity}(`,
      `${INDENT.repeat(2)}accessibility: ${accessibility},`,
      `${INDENT.repeat(2)}offset: 0,`,
      `${INDENT.repeat(2)}first: ${limit},`,
      `${INDENT.repeat(2)}filter: $filter`,
      `${INDENT}) {`,
      ...renderSelection(selection, 2),
      `${INDENT}}`,
      '}',
    ].join('\n');
  }
}
