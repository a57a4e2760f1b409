/**
 * Field Value Types and Accessors
 *
 * Values that flow through op templates: literals copied from the op
 * definition, and the outputs of value functions.
 * Public API for drivers.
 */

import { TypeMismatchError } from '../../types.js';

/** Any value an op field can hold */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/** Ordered key/value mapping of field values */
export type FieldMap = { [key: string]: FieldValue };

/** Kind names used by accessors, conversion and error messages */
export type ValueKind =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'list'
  | 'map'
  | 'absent';

/** Maps a kind name to the TypeScript type an accessor returns for it */
export interface ValueKindTypes {
  string: string;
  integer: number;
  float: number;
  boolean: boolean;
  list: FieldValue[];
  map: FieldMap;
  absent: null;
}

/** Infer the kind of a field value. Whole numbers are integers. */
export function inferKind(value: FieldValue | undefined): ValueKind {
  if (value === null || value === undefined) return 'absent';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  if (typeof value === 'boolean') return 'boolean';
  if (Array.isArray(value)) return 'list';
  return 'map';
}

/** Type guard for map-shaped values (not null, not a list) */
export function isFieldMap(value: FieldValue | undefined): value is FieldMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check that an unknown value (e.g. parsed YAML) is a FieldValue tree.
 * Rejects undefined, functions, symbols, bigints, non-finite numbers
 * and non-plain objects such as Date.
 */
export function isFieldValue(value: unknown): value is FieldValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isFieldValue);
      if (Object.getPrototypeOf(value) !== Object.prototype) return false;
      return Object.values(value).every(isFieldValue);
    default:
      return false;
  }
}

// ============================================================
// FALLIBLE ACCESSORS
// ============================================================

/** Return the value as a string, or throw TypeMismatchError */
export function asString(value: FieldValue | undefined, field?: string): string {
  if (typeof value === 'string') return value;
  throw new TypeMismatchError('string', inferKind(value), field);
}

/** Return the value as an integer, or throw TypeMismatchError */
export function asInteger(
  value: FieldValue | undefined,
  field?: string
): number {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  throw new TypeMismatchError('integer', inferKind(value), field);
}

/** Return the value as a number (integers are floats too) */
export function asFloat(value: FieldValue | undefined, field?: string): number {
  if (typeof value === 'number') return value;
  throw new TypeMismatchError('float', inferKind(value), field);
}

/** Return the value as a boolean, or throw TypeMismatchError */
export function asBoolean(
  value: FieldValue | undefined,
  field?: string
): boolean {
  if (typeof value === 'boolean') return value;
  throw new TypeMismatchError('boolean', inferKind(value), field);
}

/** Return the value as a list, or throw TypeMismatchError */
export function asList(
  value: FieldValue | undefined,
  field?: string
): FieldValue[] {
  if (Array.isArray(value)) return value;
  throw new TypeMismatchError('list', inferKind(value), field);
}

/** Return the value as a map, or throw TypeMismatchError */
export function asMap(value: FieldValue | undefined, field?: string): FieldMap {
  if (isFieldMap(value)) return value;
  throw new TypeMismatchError('map', inferKind(value), field);
}

// ============================================================
// FORMATTING
// ============================================================

/**
 * Format a value for string concatenation.
 * Absent values render as empty string; lists and maps as JSON.
 */
export function formatValue(value: FieldValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}
