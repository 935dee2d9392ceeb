import { FilterCodecError, UnsupportedFilterError } from './FilterCodecError.js';
import {
  COMBINATORS,
  CombineMode,
  FilterNode,
  FilterState,
  FilterValue,
  GroupNode,
  NestedChild,
  NestedNode,
  RangeFilter,
  StandardFilterState,
  WireFilter,
} from './types.js';
import { assertNever, isPlainObject, isScalar, parseWire, toWire } from './wire.js';
import { debugLog, logger } from '../utils/logger.js';

export interface DecodeResult {
  state: StandardFilterState | null;
  /** Conditions present on the wire that the filter state cannot hold */
  warnings: string[];
}

function splitKey(key: string): { entity: string | null; field: string } {
  const separator = key.indexOf('.');
  return separator === -1
    ? { entity: null, field: key }
    : { entity: key.slice(0, separator), field: key.slice(separator + 1) };
}

function describeNode(node: FilterNode): string {
  switch (node.kind) {
    case 'condition':
      return `${node.operator} on "${node.field}"`;
    case 'group':
      return `${node.combinator} group`;
    case 'nested':
      return `nested block "${node.path}"`;
    default:
      return assertNever(node, 'Unknown filter node');
  }
}

function isRangePair(group: GroupNode): boolean {
  const [first] = group.children;
  return (
    first !== undefined &&
    first.kind === 'condition' &&
    group.children.length <= 2 &&
    group.children.every(
      (child) =>
        child.kind === 'condition' &&
        (child.operator === 'GTE' || child.operator === 'LTE') &&
        child.field === first.field
    )
  );
}

/**
 * FilterCodec
 * Converts between the UI filter state and the wire filter grammar.
 *
 * `decode(encode(s))` keeps the selected values and bounds of any state made
 * of options and ranges at one nesting level. Ranges inside nested blocks are
 * not decoded, and anchored filters or exclusion options cannot be encoded.
 */
export class FilterCodec {
  encode(state: FilterState | null | undefined): WireFilter | null {
    const tree = this.encodeTree(state);
    return tree ? toWire(tree) : null;
  }

  encodeTree(state: FilterState | null | undefined): FilterNode | null {
    if (!state) {
      return null;
    }

    if (state.kind === 'COMPOSED') {
      const children = state.values
        .map((child) => this.encodeTree(child))
        .filter((child): child is FilterNode => child !== null);
      return children.length > 0
        ? { kind: 'group', combinator: state.combineMode, children }
        : null;
    }

    const direct: FilterNode[] = [];
    const nested = new Map<string, NestedNode>();

    for (const [key, value] of Object.entries(state.values)) {
      const { entity, field } = splitKey(key);
      const node = this.encodeValue(key, field, value);
      if (!node) {
        continue;
      }
      if (entity === null) {
        direct.push(node);
        continue;
      }
      const block = nested.get(entity);
      if (block) {
        block.children.push(node);
      } else {
        nested.set(entity, {
          kind: 'nested',
          path: entity,
          combinator: state.combineMode,
          children: [node],
        });
      }
    }

    const nodes = [...direct, ...nested.values()];
    debugLog('codec', 'Encoded filter state', { keys: Object.keys(state.values), nodes: nodes.length });

    if (nodes.length === 0) {
      return null;
    }
    if (nodes.length === 1) {
      return nodes[0];
    }
    return { kind: 'group', combinator: state.combineMode, children: nodes };
  }

  decode(filter: unknown): StandardFilterState | null {
    return this.decodeDetailed(filter).state;
  }

  /**
   * Decode a wire filter. The top level must be a single-key object; a bare
   * condition or nested block is read as a one-child AND.
   */
  decodeDetailed(filter: unknown): DecodeResult {
    if (filter === null || filter === undefined) {
      return { state: null, warnings: [] };
    }

    const tree = parseWire(filter);
    const combineMode: CombineMode = tree.kind === 'group' ? tree.combinator : 'AND';
    const children = tree.kind === 'group' ? tree.children : [tree];
    if (children.length === 0) {
      return { state: null, warnings: [] };
    }

    const values: Record<string, FilterValue> = {};
    const warnings: string[] = [];
    for (const child of children) {
      this.decodeChild(child, combineMode, values, warnings);
    }

    for (const warning of warnings) {
      logger.warn('Filter condition not decoded', { warning });
    }

    return { state: { combineMode, kind: 'STANDARD', values }, warnings };
  }

  private encodeValue(key: string, field: string, value: FilterValue): NestedChild | null {
    switch (value.type) {
      case 'OPTION':
        if (value.isExclusion) {
          throw new UnsupportedFilterError(
            `Exclusion filters cannot be encoded (key "${key}")`,
            key,
            value.type
          );
        }
        return value.selectedValues.length > 0
          ? { kind: 'condition', operator: 'IN', field, values: [...value.selectedValues] }
          : null;
      case 'RANGE':
        return this.encodeRange(field, value);
      case 'ANCHORED':
        throw new UnsupportedFilterError(
          `Anchored filters are not supported (key "${key}")`,
          key,
          value.type
        );
      default:
        return assertNever(value, 'Unknown filter value');
    }
  }

  private encodeRange(field: string, range: RangeFilter): NestedChild | null {
    const { lowerBound, upperBound } = range;
    if (lowerBound !== undefined && upperBound !== undefined) {
      return {
        kind: 'group',
        combinator: 'AND',
        children: [
          { kind: 'condition', operator: 'GTE', field, value: lowerBound },
          { kind: 'condition', operator: 'LTE', field, value: upperBound },
        ],
      };
    }
    if (lowerBound !== undefined) {
      return { kind: 'condition', operator: 'GTE', field, value: lowerBound };
    }
    if (upperBound !== undefined) {
      return { kind: 'condition', operator: 'LTE', field, value: upperBound };
    }
    return null;
  }

  /**
   * `outer` is the combinator the node sits under. An AND group flattens into
   * the state only under AND, or when it is the GTE/LTE pair of one range.
   */
  private decodeChild(
    node: FilterNode,
    outer: CombineMode,
    values: Record<string, FilterValue>,
    warnings: string[]
  ): void {
    switch (node.kind) {
      case 'condition':
        switch (node.operator) {
          case 'IN':
            values[node.field] = {
              type: 'OPTION',
              selectedValues: [...node.values],
              isExclusion: false,
            };
            return;
          case 'GTE':
          case 'LTE': {
            const existing = values[node.field];
            const range: RangeFilter = existing?.type === 'RANGE' ? existing : { type: 'RANGE' };
            if (node.operator === 'GTE') {
              range.lowerBound = node.value;
            } else {
              range.upperBound = node.value;
            }
            values[node.field] = range;
            return;
          }
          default:
            warnings.push(`${describeNode(node)} has no filter state form`);
            return;
        }
      case 'group':
        if (node.combinator === 'AND' && (outer === 'AND' || isRangePair(node))) {
          for (const child of node.children) {
            this.decodeChild(child, 'AND', values, warnings);
          }
        } else {
          warnings.push(`${describeNode(node)} inside a filter cannot be flattened`);
        }
        return;
      case 'nested':
        this.decodeNested(node, values, warnings);
        return;
      default:
        assertNever(node, 'Unknown filter node');
    }
  }

  private decodeNested(node: NestedNode, values: Record<string, FilterValue>, warnings: string[]): void {
    const children = node.children.flatMap((child): NestedChild[] =>
      node.combinator === 'AND' && child.kind === 'group' && child.combinator === 'AND'
        ? child.children
        : [child]
    );
    for (const child of children) {
      if (child.kind === 'condition' && child.operator === 'IN') {
        values[`${node.path}.${child.field}`] = {
          type: 'OPTION',
          selectedValues: [...child.values],
          isExclusion: false,
        };
      } else {
        warnings.push(`${describeNode(child)} in nested block "${node.path}" is not decoded`);
      }
    }
  }

  /**
   * Validate an untyped filter state, e.g. a tool argument.
   */
  parseState(input: unknown, jsonPath = '$'): FilterState {
    if (!isPlainObject(input)) {
      throw new FilterCodecError('Filter state must be an object', jsonPath);
    }
    const record = input;

    const combineMode = COMBINATORS.find((mode) => mode === record.combineMode);
    if (!combineMode) {
      throw new FilterCodecError('combineMode must be AND or OR', `${jsonPath}.combineMode`);
    }

    if (record.kind === 'COMPOSED') {
      if (!Array.isArray(record.values)) {
        throw new FilterCodecError('Composed state values must be an array', `${jsonPath}.values`);
      }
      return {
        kind: 'COMPOSED',
        combineMode,
        values: record.values.map((child, i) => this.parseState(child, `${jsonPath}.values[${i}]`)),
      };
    }

    if (record.kind !== undefined && record.kind !== 'STANDARD') {
      throw new FilterCodecError('kind must be STANDARD or COMPOSED', `${jsonPath}.kind`);
    }
    const rawValues = record.values;
    if (!isPlainObject(rawValues)) {
      throw new FilterCodecError('Standard state values must be an object', `${jsonPath}.values`);
    }

    const values: Record<string, FilterValue> = {};
    for (const [key, raw] of Object.entries(rawValues)) {
      values[key] = parseFilterValue(raw, `${jsonPath}.values.${key}`);
    }
    return { kind: 'STANDARD', combineMode, values };
  }
}

function parseBound(value: unknown, jsonPath: string): string | number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  throw new FilterCodecError('Range bound must be a number or string', jsonPath);
}

function parseFilterValue(raw: unknown, jsonPath: string): FilterValue {
  if (!isPlainObject(raw)) {
    throw new FilterCodecError('Filter value must be an object', jsonPath);
  }
  const record = raw;

  switch (record.type) {
    case 'OPTION': {
      const selected = record.selectedValues ?? [];
      if (!Array.isArray(selected) || !selected.every(isScalar)) {
        throw new FilterCodecError(
          'selectedValues must be an array of scalars',
          `${jsonPath}.selectedValues`
        );
      }
      return {
        type: 'OPTION',
        selectedValues: [...selected],
        isExclusion: record.isExclusion === true,
      };
    }
    case 'RANGE': {
      const range: RangeFilter = { type: 'RANGE' };
      const lowerBound = parseBound(record.lowerBound, `${jsonPath}.lowerBound`);
      const upperBound = parseBound(record.upperBound, `${jsonPath}.upperBound`);
      if (lowerBound !== undefined) {
        range.lowerBound = lowerBound;
      }
      if (upperBound !== undefined) {
        range.upperBound = upperBound;
      }
      return range;
    }
    case 'ANCHORED':
      return { type: 'ANCHORED', value: record.value };
    default:
      throw new FilterCodecError('type must be OPTION, RANGE or ANCHORED', `${jsonPath}.type`);
  }
}
