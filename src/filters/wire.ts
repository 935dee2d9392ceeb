import { FilterCodecError } from './FilterCodecError.js';
import {
  Combinator,
  ContainsMatch,
  FilterCondition,
  FilterNode,
  NestedChild,
  RangeOperator,
  ScalarValue,
  WireFilter,
} from './types.js';

export interface SerializeOptions {
  /** Wrap CONTAINS values in `%` wildcards according to their match mode */
  decorateContains?: boolean;
}

const GRAPHQL_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function assertNever(value: never, message: string): never {
  throw new Error(`${message}: ${JSON.stringify(value)}`);
}

export function decorateContains(value: string, match: ContainsMatch): string {
  switch (match) {
    case 'contains':
      return `%${value}%`;
    case 'prefix':
      return `${value}%`;
    case 'suffix':
      return `%${value}`;
    default:
      return assertNever(match, 'Unknown match mode');
  }
}

export function toWire(node: FilterNode, options: SerializeOptions = {}): WireFilter {
  switch (node.kind) {
    case 'condition':
      return conditionToWire(node, options);
    case 'group': {
      const children = node.children.map((child) => toWire(child, options));
      return node.combinator === 'AND' ? { AND: children } : { OR: children };
    }
    case 'nested': {
      const children = node.children.map((child) => toWire(child, options));
      return {
        nested:
          node.combinator === 'AND'
            ? { path: node.path, AND: children }
            : { path: node.path, OR: children },
      };
    }
    default:
      return assertNever(node, 'Unknown filter node');
  }
}

function conditionToWire(condition: FilterCondition, options: SerializeOptions): WireFilter {
  const { field } = condition;
  switch (condition.operator) {
    case 'IN':
      return { IN: { [field]: [...condition.values] } };
    case 'GT':
      return { GT: { [field]: condition.value } };
    case 'GTE':
      return { GTE: { [field]: condition.value } };
    case 'LT':
      return { LT: { [field]: condition.value } };
    case 'LTE':
      return { LTE: { [field]: condition.value } };
    case 'CONTAINS':
      return {
        CONTAINS: {
          [field]: options.decorateContains
            ? decorateContains(condition.value, condition.match)
            : condition.value,
        },
      };
    default:
      return assertNever(condition, 'Unknown condition operator');
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isScalar(value: unknown): value is ScalarValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function singleEntry(value: unknown, jsonPath: string, what: string): [string, unknown] {
  if (!isPlainObject(value)) {
    throw new FilterCodecError(`${what} must be an object`, jsonPath);
  }
  const entries = Object.entries(value);
  if (entries.length !== 1) {
    throw new FilterCodecError(
      `${what} must have exactly one key, found ${entries.length}`,
      jsonPath
    );
  }
  return entries[0];
}

function parseChildren(value: unknown, jsonPath: string): FilterNode[] {
  if (!Array.isArray(value)) {
    throw new FilterCodecError('Combinator value must be an array', jsonPath);
  }
  return value.map((child, i) => parseWire(child, `${jsonPath}[${i}]`));
}

const CONDITION_OPERATORS: readonly string[] = ['IN', 'GT', 'GTE', 'LT', 'LTE', 'CONTAINS'];

function fieldEntries(body: unknown, jsonPath: string, what: string): [string, unknown][] {
  if (!isPlainObject(body)) {
    throw new FilterCodecError(`${what} must be an object`, jsonPath);
  }
  const entries = Object.entries(body);
  if (entries.length === 0) {
    throw new FilterCodecError(`${what} must name at least one field`, jsonPath);
  }
  return entries;
}

function parseFieldCondition(
  operator: string,
  field: string,
  value: unknown,
  jsonPath: string
): FilterCondition {
  if (operator === 'IN') {
    if (!Array.isArray(value) || !value.every(isScalar)) {
      throw new FilterCodecError(`IN values for "${field}" must be an array of scalars`, jsonPath);
    }
    return { kind: 'condition', operator: 'IN', field, values: [...value] };
  }

  if (operator === 'CONTAINS') {
    if (typeof value !== 'string') {
      throw new FilterCodecError(`CONTAINS pattern for "${field}" must be a string`, jsonPath);
    }
    return { kind: 'condition', operator: 'CONTAINS', field, ...stripWildcards(value) };
  }

  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new FilterCodecError(`${operator} bound for "${field}" must be a string or number`, jsonPath);
  }
  return { kind: 'condition', operator: toRangeOperator(operator), field, value };
}

/**
 * An operator body may name several fields; each becomes its own condition
 * and the conditions combine with AND.
 */
function parseCondition(operator: string, body: unknown, jsonPath: string): FilterNode | null {
  if (!CONDITION_OPERATORS.includes(operator)) {
    return null;
  }

  const conditions = fieldEntries(body, jsonPath, `${operator} condition`).map(([field, value]) =>
    parseFieldCondition(operator, field, value, jsonPath)
  );
  return conditions.length === 1
    ? conditions[0]
    : { kind: 'group', combinator: 'AND', children: conditions };
}

function toRangeOperator(operator: string): RangeOperator {
  switch (operator) {
    case 'GT':
      return 'GT';
    case 'GTE':
      return 'GTE';
    case 'LT':
      return 'LT';
    default:
      return 'LTE';
  }
}

function stripWildcards(pattern: string): { value: string; match: ContainsMatch } {
  const leading = pattern.startsWith('%');
  const trailing = pattern.length > 1 && pattern.endsWith('%');
  if (leading && trailing) {
    return { value: pattern.slice(1, -1), match: 'contains' };
  }
  if (trailing) {
    return { value: pattern.slice(0, -1), match: 'prefix' };
  }
  if (leading) {
    return { value: pattern.slice(1), match: 'suffix' };
  }
  return { value: pattern, match: 'contains' };
}

function toNestedChild(node: FilterNode, jsonPath: string): NestedChild {
  switch (node.kind) {
    case 'condition':
      return node;
    case 'group':
      return {
        kind: 'group',
        combinator: node.combinator,
        children: node.children.map((child, i) => toNestedChild(child, `${jsonPath}[${i}]`)),
      };
    case 'nested':
      throw new FilterCodecError('Nested block cannot contain another nested block', jsonPath);
    default:
      return assertNever(node, 'Unknown filter node');
  }
}

function parseNested(body: unknown, jsonPath: string): FilterNode {
  if (!isPlainObject(body)) {
    throw new FilterCodecError('Nested block must be an object', jsonPath);
  }

  const { path, ...rest } = body;
  if (typeof path !== 'string' || !GRAPHQL_NAME.test(path)) {
    throw new FilterCodecError('Nested block needs a "path" naming an entity', jsonPath);
  }

  const [combinatorKey, childrenValue] = singleEntry(rest, jsonPath, 'Nested block combinator');
  if (combinatorKey !== 'AND' && combinatorKey !== 'OR') {
    throw new FilterCodecError(`Nested block combinator must be AND or OR, got "${combinatorKey}"`, jsonPath);
  }

  const childPath = `${jsonPath}.${combinatorKey}`;
  const combinator: Combinator = combinatorKey;
  return {
    kind: 'nested',
    path,
    combinator,
    children: parseChildren(childrenValue, childPath).map((child, i) =>
      toNestedChild(child, `${childPath}[${i}]`)
    ),
  };
}

/**
 * Parse and validate a wire filter. Every filter object must have exactly one
 * key, though an operator body may name several fields. Anything outside the
 * grammar raises FilterCodecError with its JSON path.
 */
export function parseWire(input: unknown, jsonPath = '$'): FilterNode {
  const [key, body] = singleEntry(input, jsonPath, 'Filter node');
  const bodyPath = `${jsonPath}.${key}`;

  if (key === 'AND' || key === 'OR') {
    return { kind: 'group', combinator: key, children: parseChildren(body, bodyPath) };
  }

  if (key === 'nested') {
    return parseNested(body, bodyPath);
  }

  const condition = parseCondition(key, body, bodyPath);
  if (!condition) {
    throw new FilterCodecError(`Unknown filter operator "${key}"`, jsonPath);
  }
  return condition;
}
