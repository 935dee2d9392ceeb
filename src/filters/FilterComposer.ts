import { FIELD_TYPES, FieldType } from '../catalog/types.js';
import { FilterCompositionError } from '../pipeline/PipelineError.js';
import { FIELD_OPERATORS, FieldOperator, ResolvedField, ResolvedValue } from '../resolver/types.js';
import { debugLog, logger } from '../utils/logger.js';
import {
  Combinator,
  ContainsMatch,
  FilterCondition,
  FilterNode,
  NestedNode,
  RangeOperator,
  ScalarValue,
} from './types.js';

export const TRUTHY_STRINGS: ReadonlySet<string> = new Set(['true', 'yes', '1', 'y']);

const NUMERIC = /^-?\d+(\.\d+)?$/;
const MAX_CONTAINS_CONDITIONS = 3;

/** A condition together with the entity it is scoped to, if any */
export interface ComposedCondition {
  fieldPath: string;
  entity: string | null;
  condition: FilterCondition;
}

export interface CompositionResult {
  /** null when no usable condition remains: no filter, everything matches */
  tree: FilterNode | null;
  conditions: ComposedCondition[];
  combinator: Combinator;
  warnings: string[];
}

const RANGE_OPERATORS: Record<'gt' | 'gte' | 'lt' | 'lte', RangeOperator> = {
  gt: 'GT',
  gte: 'GTE',
  lt: 'LT',
  lte: 'LTE',
};

const CONTAINS_MATCH: Partial<Record<FieldOperator, ContainsMatch>> = {
  contains: 'contains',
  startswith: 'prefix',
  endswith: 'suffix',
};

function splitPath(path: string): { entity: string | null; field: string } {
  const separator = path.indexOf('.');
  if (separator === -1) {
    return { entity: null, field: path };
  }
  return { entity: path.slice(0, separator), field: path.slice(separator + 1) };
}

function coerceScalar(value: ScalarValue, fieldType: FieldType): ScalarValue {
  switch (fieldType) {
    case 'number':
      if (typeof value === 'number') {
        return value;
      }
      return typeof value === 'string' && NUMERIC.test(value.trim())
        ? Number(value.trim())
        : String(value).trim();
    case 'boolean':
      if (typeof value === 'boolean') {
        return value;
      }
      if (typeof value === 'number') {
        return value !== 0;
      }
      return TRUTHY_STRINGS.has(value.trim().toLowerCase());
    case 'enum':
    case 'string':
    case 'date':
      return String(value).trim();
  }
}

function isEmpty(value: ScalarValue | ScalarValue[]): boolean {
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return typeof value === 'string' && value === '';
}

/**
 * FilterComposer
 * Turns resolved fields into a filter tree. Fields on a related entity
 * (`entity.field`) are gathered into one nested block per entity whose
 * children always combine with AND.
 */
export class FilterComposer {
  compose(resolvedFields: ResolvedField[], combinator: Combinator = 'AND'): CompositionResult {
    const warnings: string[] = [];
    const conditions: ComposedCondition[] = [];

    for (const resolved of resolvedFields) {
      this.assertWellFormed(resolved);
      const condition = this.toCondition(resolved, warnings);
      if (condition) {
        conditions.push(condition);
      }
    }

    const tree = this.buildTree(conditions, combinator);
    debugLog('composer', 'Composed filter', {
      conditions: conditions.length,
      dropped: resolvedFields.length - conditions.length,
      combinator,
    });

    return { tree, conditions, combinator, warnings };
  }

  /**
   * Advisory checks on a composition. Never blocks.
   */
  validateComposition(result: CompositionResult): string[] {
    const warnings: string[] = [];
    if (result.conditions.length === 0) {
      warnings.push('No filters generated - query may return all records');
    }

    const containsCount = result.conditions.filter(
      (c) => c.condition.operator === 'CONTAINS'
    ).length;
    if (containsCount > MAX_CONTAINS_CONDITIONS) {
      warnings.push(`Many string containment filters (${containsCount}) may impact performance`);
    }

    const perField = new Map<string, number>();
    for (const { fieldPath } of result.conditions) {
      perField.set(fieldPath, (perField.get(fieldPath) ?? 0) + 1);
    }
    for (const [fieldPath, count] of perField) {
      if (count > 1) {
        warnings.push(`Multiple filters on field '${fieldPath}' - may be conflicting`);
      }
    }
    return warnings;
  }

  private assertWellFormed(resolved: ResolvedField): void {
    const path = typeof resolved.fieldPath === 'string' ? resolved.fieldPath.trim() : '';
    if (!path || path.split('.').some((segment) => segment === '')) {
      throw new FilterCompositionError('Resolved field has an invalid field path', {
        term: resolved.term,
        fieldPath: resolved.fieldPath,
      });
    }
    if (!FIELD_OPERATORS.includes(resolved.operator)) {
      throw new FilterCompositionError(`Unknown operator "${resolved.operator}"`, {
        fieldPath: path,
      });
    }
    if (!FIELD_TYPES.includes(resolved.fieldType)) {
      throw new FilterCompositionError(`Unknown field type "${resolved.fieldType}"`, {
        fieldPath: path,
      });
    }
  }

  private coerce(resolved: ResolvedField): ScalarValue | ScalarValue[] {
    const { value, fieldType } = resolved;
    if (Array.isArray(value)) {
      return value
        .map((item) => coerceScalar(item, fieldType))
        .filter((item) => !isEmpty(item));
    }
    return coerceScalar(value, fieldType);
  }

  private toCondition(resolved: ResolvedField, warnings: string[]): ComposedCondition | null {
    const fieldPath = resolved.fieldPath.trim();
    const { entity, field } = splitPath(fieldPath);
    const value: ResolvedValue = this.coerce(resolved);

    const skip = (reason: string): null => {
      warnings.push(`Skipped filter on '${fieldPath}': ${reason}`);
      logger.warn('Skipping resolved field', { fieldPath, term: resolved.term, reason });
      return null;
    };

    if (isEmpty(value)) {
      return skip('empty value');
    }

    const { operator } = resolved;
    switch (operator) {
      case 'eq':
      case 'in':
        return {
          fieldPath,
          entity,
          condition: {
            kind: 'condition',
            operator: 'IN',
            field,
            values: Array.isArray(value) ? value : [value],
          },
        };
      case 'gt':
      case 'gte':
      case 'lt':
      case 'lte':
        if (typeof value !== 'number' && typeof value !== 'string') {
          return skip(`${operator} needs a single number or date`);
        }
        return {
          fieldPath,
          entity,
          condition: {
            kind: 'condition',
            operator: RANGE_OPERATORS[operator],
            field,
            value,
          },
        };
      case 'contains':
      case 'startswith':
      case 'endswith': {
        if (Array.isArray(value)) {
          return skip(`${operator} needs a single value`);
        }
        return {
          fieldPath,
          entity,
          condition: {
            kind: 'condition',
            operator: 'CONTAINS',
            field,
            value: String(value),
            match: CONTAINS_MATCH[operator] ?? 'contains',
          },
        };
      }
    }
  }

  private buildTree(conditions: ComposedCondition[], combinator: Combinator): FilterNode | null {
    const direct: FilterNode[] = [];
    const nested = new Map<string, NestedNode>();

    for (const { entity, condition } of conditions) {
      if (entity === null) {
        direct.push(condition);
        continue;
      }
      const block = nested.get(entity);
      if (block) {
        block.children.push(condition);
      } else {
        nested.set(entity, { kind: 'nested', path: entity, combinator: 'AND', children: [condition] });
      }
    }

    const nodes = [...direct, ...nested.values()];
    if (nodes.length === 0) {
      return null;
    }
    if (nodes.length === 1) {
      return nodes[0];
    }
    return { kind: 'group', combinator, children: nodes };
  }
}
