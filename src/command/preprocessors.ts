/**
 * Field Preprocessors
 *
 * Transforms run once, in order, on an op's raw fields before they are
 * compiled. Each returns a new map; inputs are never modified.
 */

import { ConstructionError } from '../types.js';
import { isFieldMap, type FieldValue } from '../runtime/core/values.js';
import type { FieldPreprocessor } from './types.js';

/** Run preprocessors left to right */
export function applyPreprocessors(
  fields: ReadonlyMap<string, FieldValue>,
  preprocessors: readonly FieldPreprocessor[]
): ReadonlyMap<string, FieldValue> {
  let current = fields;
  for (const preprocess of preprocessors) {
    current = preprocess(current);
  }
  return current;
}

/** Fold several preprocessors into one */
export function composePreprocessors(
  ...preprocessors: FieldPreprocessor[]
): FieldPreprocessor {
  return (fields) => new Map(applyPreprocessors(fields, preprocessors));
}

/**
 * Rename fields in place, keeping their position.
 *
 * @example
 * aliasFields({ statement: 'stmt' })
 * // { statement: 'select 1', cl: 'ONE' } -> { stmt: 'select 1', cl: 'ONE' }
 */
export function aliasFields(
  aliases: Readonly<Record<string, string>>
): FieldPreprocessor {
  return (fields) => {
    const result = new Map<string, FieldValue>();
    for (const [key, value] of fields) {
      const target = aliases[key] ?? key;
      if (result.has(target) || (target !== key && fields.has(target))) {
        throw new ConstructionError(
          `Field alias "${key}" -> "${target}" collides with an existing field`,
          { field: key, target }
        );
      }
      result.set(target, value);
    }
    return result;
  };
}

/**
 * Replace a map-valued field by its entries, at the same position.
 * Absent fields pass through. Entries colliding with other fields fail.
 */
export function flattenField(name: string): FieldPreprocessor {
  return (fields) => {
    const nested = fields.get(name);
    if (nested === undefined) return new Map(fields);
    if (!isFieldMap(nested)) {
      throw new ConstructionError(`Field "${name}" is not a mapping`, {
        field: name,
      });
    }

    const result = new Map<string, FieldValue>();
    for (const [key, value] of fields) {
      if (key !== name) {
        result.set(key, value);
        continue;
      }
      for (const [innerKey, innerValue] of Object.entries(nested)) {
        if (innerKey !== name && fields.has(innerKey)) {
          throw new ConstructionError(
            `Flattened field "${name}" collides with field "${innerKey}"`,
            { field: name, target: innerKey }
          );
        }
        result.set(innerKey, innerValue);
      }
    }
    return result;
  };
}
