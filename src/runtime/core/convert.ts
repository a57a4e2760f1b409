/**
 * Type Conversion
 *
 * Best-effort coercion of raw field, param and activity values to the
 * kind a caller asks for. `convert` is strict and throws; `convertOr`
 * falls back to the caller's default.
 */

import { TypeMismatchError } from '../../types.js';
import {
  inferKind,
  isFieldMap,
  type FieldMap,
  type FieldValue,
  type ValueKind,
} from './values.js';

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function toNumber(value: FieldValue | undefined): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && NUMERIC.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function toBoolean(value: FieldValue | undefined): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
  }
  return undefined;
}

function toText(value: FieldValue | undefined): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/**
 * Convert a value to the requested kind.
 *
 * - string: strings as-is, numbers and booleans via String()
 * - integer: whole numbers, numeric strings with a whole value
 * - float: numbers, numeric strings
 * - boolean: booleans, "true"/"false" in any case
 * - list/map: only values already of that shape
 *
 * @throws {TypeMismatchError} when the value cannot be converted
 */
export function convert(
  value: FieldValue | undefined,
  kind: 'string',
  field?: string
): string;
export function convert(
  value: FieldValue | undefined,
  kind: 'integer' | 'float',
  field?: string
): number;
export function convert(
  value: FieldValue | undefined,
  kind: 'boolean',
  field?: string
): boolean;
export function convert(
  value: FieldValue | undefined,
  kind: 'list',
  field?: string
): FieldValue[];
export function convert(
  value: FieldValue | undefined,
  kind: 'map',
  field?: string
): FieldMap;
export function convert(
  value: FieldValue | undefined,
  kind: ValueKind,
  field?: string
): FieldValue;
export function convert(
  value: FieldValue | undefined,
  kind: ValueKind,
  field?: string
): FieldValue {
  switch (kind) {
    case 'string': {
      const text = toText(value);
      if (text !== undefined) return text;
      break;
    }
    case 'integer': {
      const num = toNumber(value);
      if (num !== undefined && Number.isInteger(num)) return num;
      break;
    }
    case 'float': {
      const num = toNumber(value);
      if (num !== undefined) return num;
      break;
    }
    case 'boolean': {
      const bool = toBoolean(value);
      if (bool !== undefined) return bool;
      break;
    }
    case 'list':
      if (Array.isArray(value)) return value;
      break;
    case 'map':
      if (isFieldMap(value)) return value;
      break;
    case 'absent':
      if (value === null || value === undefined) return null;
      break;
  }
  throw new TypeMismatchError(kind, inferKind(value), field);
}

/** Kind a default value asks `convertOr` to coerce to */
function targetKind(defaultValue: FieldValue): ValueKind {
  const kind = inferKind(defaultValue);
  // A float default accepts whole numbers too
  return kind === 'integer' ? 'float' : kind;
}

/**
 * Convert a value to the kind of `defaultValue`, or return the default.
 *
 * An absent value or a failed conversion yields `defaultValue`.
 * A null default accepts any present value unconverted.
 */
export function convertOr(
  value: FieldValue | undefined,
  defaultValue: string
): string;
export function convertOr(
  value: FieldValue | undefined,
  defaultValue: number
): number;
export function convertOr(
  value: FieldValue | undefined,
  defaultValue: boolean
): boolean;
export function convertOr(
  value: FieldValue | undefined,
  defaultValue: FieldValue
): FieldValue;
export function convertOr(
  value: FieldValue | undefined,
  defaultValue: FieldValue
): FieldValue {
  if (value === null || value === undefined) return defaultValue;
  if (defaultValue === null) return value;
  try {
    return convert(value, targetKind(defaultValue));
  } catch (err) {
    if (err instanceof TypeMismatchError) return defaultValue;
    throw err;
  }
}
