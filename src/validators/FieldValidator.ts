import { CatalogIndex } from '../catalog/CatalogIndex.js';
import { CatalogField, FieldType } from '../catalog/types.js';
import { FilterCodecError } from '../filters/FilterCodecError.js';
import { FilterCondition, FilterNode } from '../filters/types.js';
import { assertNever, parseWire } from '../filters/wire.js';
import { similarityRatio } from '../utils/similarity.js';
import { debugLog } from '../utils/logger.js';

const PATH_SYNTAX = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;
const SUGGESTION_SIMILARITY = 0.6;

export const BOOLEAN_STRINGS: ReadonlySet<string> = new Set([
  'true',
  'false',
  'yes',
  'no',
  '1',
  '0',
]);

export type EnumMatch = { valid: true; value: string } | { valid: false };

export interface FieldInfo {
  path: string;
  type: FieldType;
  description: string | null;
  searchableTerms: string[];
  enumValues?: string[];
  enumCount?: number;
}

/**
 * Validates field paths, enumeration values and value types against the
 * catalog index.
 */
export class FieldValidator {
  private readonly index: CatalogIndex;

  constructor(index: CatalogIndex) {
    this.index = index;
  }

  validateFieldPath(path: string): boolean {
    return this.index.getFieldByPath(path) !== undefined;
  }

  /**
   * Case-insensitive enum membership. A match returns the catalog's casing.
   */
  validateEnumerationValue(path: string, value: string): EnumMatch {
    const field = this.index.getFieldByPath(path);
    if (!field || field.fieldType !== 'enum' || !field.enumValues) {
      return { valid: false };
    }

    const needle = value.trim().toLowerCase();
    const match = field.enumValues.find((candidate) => candidate.toLowerCase() === needle);
    if (match === undefined) {
      debugLog('validation', 'Enum value not found', { path, value });
      return { valid: false };
    }
    return { valid: true, value: match };
  }

  validateMultipleEnumerationValues(
    path: string,
    values: string[]
  ): { valid: string[]; invalid: string[] } {
    const valid: string[] = [];
    const invalid: string[] = [];
    for (const value of values) {
      const result = this.validateEnumerationValue(path, value);
      if (result.valid) {
        valid.push(result.value);
      } else {
        invalid.push(value);
      }
    }
    return { valid, invalid };
  }

  getValidEnumerationValues(path: string): string[] {
    const field = this.index.getFieldByPath(path);
    return field?.fieldType === 'enum' && field.enumValues ? [...field.enumValues] : [];
  }

  /**
   * Prefix matches first, then values at least 0.6 similar, up to `limit`.
   */
  suggestEnumerationValues(path: string, partial: string, limit = 5): string[] {
    const values = this.getValidEnumerationValues(path);
    const needle = partial.trim().toLowerCase();
    if (values.length === 0 || !needle || limit <= 0) {
      return [];
    }

    const suggestions = values.filter((value) => value.toLowerCase().startsWith(needle));
    for (const value of values) {
      if (suggestions.length >= limit) {
        break;
      }
      if (
        !suggestions.includes(value) &&
        similarityRatio(needle, value.toLowerCase()) >= SUGGESTION_SIMILARITY
      ) {
        suggestions.push(value);
      }
    }
    return suggestions.slice(0, limit);
  }

  validateFieldValueType(path: string, value: unknown): boolean {
    const field = this.index.getFieldByPath(path);
    if (!field) {
      return false;
    }
    return this.valueMatchesField(field, value);
  }

  validatePathSyntax(path: string): boolean {
    return PATH_SYNTAX.test(path.trim());
  }

  getFieldInfo(path: string): FieldInfo | null {
    const field = this.index.getFieldByPath(path);
    if (!field) {
      return null;
    }

    const info: FieldInfo = {
      path: field.path,
      type: field.fieldType,
      description: field.description ?? null,
      searchableTerms: [...field.searchableTerms],
    };
    if (field.fieldType === 'enum' && field.enumValues) {
      info.enumValues = [...field.enumValues];
      info.enumCount = field.enumValues.length;
    }
    return info;
  }

  /**
   * Check a wire filter against the catalog. Returns every violation found;
   * an empty list means the filter is valid. A structural problem stops the
   * walk and is reported as the only violation.
   */
  validateFilter(filter: unknown): string[] {
    let tree: FilterNode;
    try {
      tree = parseWire(filter);
    } catch (error) {
      if (error instanceof FilterCodecError) {
        return [error.message];
      }
      throw error;
    }

    const violations: string[] = [];
    this.collectViolations(tree, null, violations);
    debugLog('validation', 'Filter validated', { violations: violations.length });
    return violations;
  }

  private collectViolations(node: FilterNode, entity: string | null, violations: string[]): void {
    switch (node.kind) {
      case 'group':
        for (const child of node.children) {
          this.collectViolations(child, entity, violations);
        }
        return;
      case 'nested':
        for (const child of node.children) {
          this.collectViolations(child, node.path, violations);
        }
        return;
      case 'condition':
        this.checkCondition(node, entity ? `${entity}.${node.field}` : node.field, violations);
        return;
      default:
        assertNever(node, 'Unknown filter node');
    }
  }

  private checkCondition(condition: FilterCondition, path: string, violations: string[]): void {
    const field = this.index.getFieldByPath(path);
    if (!field) {
      violations.push(`Unknown field path: '${path}'`);
      return;
    }

    switch (condition.operator) {
      case 'IN':
        for (const value of condition.values) {
          if (!this.valueMatchesField(field, value)) {
            violations.push(`Invalid value for ${field.fieldType} field '${path}': ${JSON.stringify(value)}`);
          }
        }
        return;
      case 'GT':
      case 'GTE':
      case 'LT':
      case 'LTE':
        if (field.fieldType !== 'number' && field.fieldType !== 'date') {
          violations.push(`${condition.operator} is not valid for ${field.fieldType} field '${path}'`);
        } else if (!this.valueMatchesField(field, condition.value)) {
          violations.push(
            `Invalid bound for ${field.fieldType} field '${path}': ${JSON.stringify(condition.value)}`
          );
        }
        return;
      case 'CONTAINS':
        if (field.fieldType !== 'string' && field.fieldType !== 'enum') {
          violations.push(`CONTAINS is not valid for ${field.fieldType} field '${path}'`);
        }
        return;
      default:
        assertNever(condition, 'Unknown condition operator');
    }
  }

  private valueMatchesField(field: CatalogField, value: unknown): boolean {
    switch (field.fieldType) {
      case 'string':
        return typeof value === 'string';
      case 'number':
        return (
          (typeof value === 'number' && Number.isFinite(value)) ||
          (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value)))
        );
      case 'boolean':
        return (
          typeof value === 'boolean' ||
          (typeof value === 'string' && BOOLEAN_STRINGS.has(value.trim().toLowerCase()))
        );
      case 'enum':
        if (typeof value === 'string') {
          return this.validateEnumerationValue(field.path, value).valid;
        }
        return (
          Array.isArray(value) &&
          value.every(
            (item) => typeof item === 'string' && this.validateEnumerationValue(field.path, item).valid
          )
        );
      case 'date':
        return typeof value === 'string' && !Number.isNaN(Date.parse(value));
      default:
        return assertNever(field.fieldType, 'Unknown field type');
    }
  }
}

/**
 * A single field failed validation.
 */
export class ValidationError extends Error {
  public readonly field: string;
  public readonly value: unknown;

  constructor(message: string, field: string, value?: unknown) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
  }
}
