import { Combinator } from '../filters/types.js';
import { ValidationError } from '../validators/FieldValidator.js';

export type ToolArgs = Record<string, unknown>;

export function requireString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`"${key}" must be a non-empty string`, key, value);
  }
  return value;
}

export function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`"${key}" must be a string`, key, value);
  }
  return value;
}

export function optionalPositiveInt(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`"${key}" must be a positive integer`, key, value);
  }
  return value;
}

export function optionalBoolean(args: ToolArgs, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`"${key}" must be a boolean`, key, value);
  }
  return value;
}

export function optionalStringArray(args: ToolArgs, key: string): string[] | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`"${key}" must be an array of strings`, key, value);
  }
  return value;
}

export function optionalCombinator(args: ToolArgs, key: string): Combinator | undefined {
  const value = optionalString(args, key);
  if (value === undefined) {
    return undefined;
  }
  const upper = value.trim().toUpperCase();
  if (upper !== 'AND' && upper !== 'OR') {
    throw new ValidationError(`"${key}" must be AND or OR`, key, value);
  }
  return upper;
}

export function requirePresent(args: ToolArgs, key: string): unknown {
  if (!(key in args) || args[key] === undefined) {
    throw new ValidationError(`"${key}" is required`, key);
  }
  return args[key];
}
