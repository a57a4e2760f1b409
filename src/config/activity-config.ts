/**
 * Activity Configuration
 *
 * Outermost tier of config lookup: parameters set for a whole activity.
 * Immutable after creation.
 */

import { convert, convertOr } from '../runtime/core/convert.js';
import type {
  FieldValue,
  ValueKind,
  ValueKindTypes,
} from '../runtime/core/values.js';

export interface ActivityConfig {
  /** Insertion-ordered copy of every parameter; fresh map per call */
  asMap(): Map<string, FieldValue>;
  has(key: string): boolean;
  /** Raw value, or undefined when unset */
  get(key: string): FieldValue | undefined;
  /** Value coerced to the kind of `defaultValue`, or the default */
  getOr(key: string, defaultValue: string): string;
  getOr(key: string, defaultValue: number): number;
  getOr(key: string, defaultValue: boolean): boolean;
  getOr(key: string, defaultValue: FieldValue): FieldValue;
  /**
   * Value converted to `kind`, or undefined when unset.
   * @throws {TypeMismatchError} when set but not convertible
   */
  getAs<K extends ValueKind>(key: string, kind: K): ValueKindTypes[K] | undefined;
}

class ActivityConfigImpl implements ActivityConfig {
  private readonly params: ReadonlyMap<string, FieldValue>;

  constructor(params: Iterable<[string, FieldValue]>) {
    this.params = new Map(params);
  }

  asMap(): Map<string, FieldValue> {
    return new Map(this.params);
  }

  has(key: string): boolean {
    return this.params.has(key);
  }

  get(key: string): FieldValue | undefined {
    return this.params.get(key);
  }

  getOr(key: string, defaultValue: string): string;
  getOr(key: string, defaultValue: number): number;
  getOr(key: string, defaultValue: boolean): boolean;
  getOr(key: string, defaultValue: FieldValue): FieldValue;
  getOr(key: string, defaultValue: FieldValue): FieldValue {
    return convertOr(this.params.get(key), defaultValue);
  }

  getAs<K extends ValueKind>(
    key: string,
    kind: K
  ): ValueKindTypes[K] | undefined {
    if (!this.params.has(key)) return undefined;
    return convertKind(this.params.get(key), kind, key);
  }
}

/**
 * Convert to a kind chosen by a generic parameter.
 * Dispatches per kind so each branch returns the precise type.
 */
export function convertKind<K extends ValueKind>(
  value: FieldValue | undefined,
  kind: K,
  field?: string
): ValueKindTypes[K] {
  const converters: { [P in ValueKind]: () => ValueKindTypes[P] } = {
    string: () => convert(value, 'string', field),
    integer: () => convert(value, 'integer', field),
    float: () => convert(value, 'float', field),
    boolean: () => convert(value, 'boolean', field),
    list: () => convert(value, 'list', field),
    map: () => convert(value, 'map', field),
    absent: () => {
      convert(value, 'absent', field);
      return null;
    },
  };
  return converters[kind]();
}

function isReadonlyMap(
  params: Readonly<Record<string, FieldValue>> | ReadonlyMap<string, FieldValue>
): params is ReadonlyMap<string, FieldValue> {
  return params instanceof Map;
}

/**
 * Create an activity config from a record or map of parameters.
 *
 * @example
 * ```typescript
 * const acfg = createActivityConfig({ cl: 'LOCAL_QUORUM', threads: 8 });
 * acfg.getOr('threads', 1); // 8
 * ```
 */
export function createActivityConfig(
  params:
    | Readonly<Record<string, FieldValue>>
    | ReadonlyMap<string, FieldValue> = {}
): ActivityConfig {
  return new ActivityConfigImpl(
    isReadonlyMap(params) ? params.entries() : Object.entries(params)
  );
}
