/**
 * Structural Binders
 *
 * Resolve a fixed list of fields per cycle into a list, a fixed-size
 * array or an ordered map, for positional consumption by drivers.
 * Field lookups are resolved to functions once, at construction.
 */

import type { ValueFunction } from '../runtime/core/functions.js';
import type { FieldValue } from '../runtime/core/values.js';

/** Anything producing a value per cycle */
export interface CycleBinder<T> {
  apply(cycle: number): T;
}

/**
 * Minimal view of a compiled command needed by binders.
 * Unknown names resolve to functions returning `defaultValue`.
 */
export interface FieldSource {
  getAsFunctionOr(name: string, defaultValue: FieldValue): ValueFunction;
}

function resolveAll(
  source: FieldSource,
  fields: readonly string[]
): ValueFunction[] {
  return fields.map((name) => source.getAsFunctionOr(name, null));
}

/** Ordered, growable list of field values per cycle */
export class ListBinder implements CycleBinder<FieldValue[]> {
  private readonly resolvers: readonly ValueFunction[];

  constructor(source: FieldSource, fields: readonly string[]) {
    this.resolvers = resolveAll(source, fields);
  }

  apply(cycle: number): FieldValue[] {
    return this.resolvers.map((resolve) => resolve(cycle));
  }
}

/**
 * Fixed-length array of field values per cycle.
 * The returned array is sealed: elements can be replaced, not added or removed.
 */
export class ArrayBinder implements CycleBinder<FieldValue[]> {
  private readonly resolvers: readonly ValueFunction[];

  constructor(resolvers: readonly ValueFunction[]) {
    this.resolvers = [...resolvers];
  }

  /** Binder over named fields of a compiled command */
  static fromFields(source: FieldSource, fields: readonly string[]): ArrayBinder {
    return new ArrayBinder(resolveAll(source, fields));
  }

  get length(): number {
    return this.resolvers.length;
  }

  apply(cycle: number): FieldValue[] {
    const values = new Array<FieldValue>(this.resolvers.length);
    for (let i = 0; i < this.resolvers.length; i++) {
      const resolve = this.resolvers[i];
      values[i] = resolve ? resolve(cycle) : null;
    }
    return Object.seal(values);
  }
}

/** Field name to value per cycle, in request order */
export class OrderedMapBinder implements CycleBinder<Map<string, FieldValue>> {
  private readonly entries: readonly (readonly [string, ValueFunction])[];

  constructor(source: FieldSource, fields: readonly string[]) {
    this.entries = fields.map(
      (name) => [name, source.getAsFunctionOr(name, null)] as const
    );
  }

  apply(cycle: number): Map<string, FieldValue> {
    const map = new Map<string, FieldValue>();
    for (const [name, resolve] of this.entries) {
      map.set(name, resolve(cycle));
    }
    return map;
  }
}
