/**
 * Compiled Command
 *
 * Immutable, compiled form of one op template. Built once at workload
 * setup and shared by every worker; per-cycle calls only read it.
 *
 * Config lookups resolve across three tiers, closest first:
 *   op fields -> op params -> activity config
 */

import {
  createActivityConfig,
  convertKind,
  type ActivityConfig,
} from '../config/activity-config.js';
import type { OpTemplate } from '../config/op-template.js';
import {
  ConstructionError,
  MissingStaticFieldsError,
  StrictDynamicFieldError,
} from '../types.js';
import { convertOr } from '../runtime/core/convert.js';
import type { ValueFunction } from '../runtime/core/functions.js';
import type { FunctionRegistry } from '../runtime/core/registry.js';
import type {
  FieldValue,
  ValueKind,
  ValueKindTypes,
} from '../runtime/core/values.js';
import { defaultRegistry } from '../runtime/index.js';
import type { BindPoint, CapturePoint, Classification } from '../template/types.js';
import {
  ArrayBinder,
  ListBinder,
  OrderedMapBinder,
  type FieldSource,
} from './binders.js';
import { compileFields, resolveBindPoint } from './field-compiler.js';
import { applyPreprocessors } from './preprocessors.js';
import type { CompileOptions, Field } from './types.js';

/** Parts produced by compilation, handed to the CompiledCommand constructor */
export interface CompiledParts {
  readonly template: OpTemplate;
  readonly fields: ReadonlyMap<string, Field>;
  readonly captures: readonly (readonly CapturePoint[])[];
  readonly activity: ActivityConfig;
  readonly registry: FunctionRegistry;
}

export class CompiledCommand implements FieldSource {
  readonly name: string;
  readonly captures: readonly (readonly CapturePoint[])[];
  readonly size: number;

  private readonly fieldMap: ReadonlyMap<string, Field>;
  private readonly staticMap: ReadonlyMap<string, FieldValue>;
  private readonly dynamicMap: ReadonlyMap<string, ValueFunction>;
  private readonly skeletonMap: ReadonlyMap<string, FieldValue>;
  private readonly template: OpTemplate;
  private readonly activity: ActivityConfig;
  private readonly registry: FunctionRegistry;
  private readonly dynamicEntries: readonly (readonly [string, ValueFunction])[];

  constructor(parts: CompiledParts) {
    const statics = new Map<string, FieldValue>();
    const dynamics = new Map<string, ValueFunction>();
    const skeleton = new Map<string, FieldValue>();

    for (const [name, field] of parts.fields) {
      if (field.kind === 'static') {
        statics.set(name, field.value);
        skeleton.set(name, field.value);
      } else {
        dynamics.set(name, field.fn);
        skeleton.set(name, null);
      }
    }

    this.name = parts.template.name;
    this.template = parts.template;
    this.fieldMap = new Map(parts.fields);
    this.staticMap = statics;
    this.dynamicMap = dynamics;
    this.skeletonMap = skeleton;
    this.captures = parts.captures;
    this.size = statics.size + dynamics.size;
    this.activity = parts.activity;
    this.registry = parts.registry;
    this.dynamicEntries = [...dynamics.entries()];
    Object.freeze(this);
  }

  // Views below are fresh copies; mutating one never reaches the command.

  /** Every field in op order, each wholly static or wholly dynamic */
  get fields(): Map<string, Field> {
    return new Map(this.fieldMap);
  }

  get statics(): Map<string, FieldValue> {
    return new Map(this.staticMap);
  }

  get dynamics(): Map<string, ValueFunction> {
    return new Map(this.dynamicMap);
  }

  /** Op-ordered prototype of apply()'s result; dynamic entries hold null */
  get skeleton(): Map<string, FieldValue> {
    return new Map(this.skeletonMap);
  }

  /** Pre-parsed statement form of the op, if the source had one */
  get parsedTemplate(): Classification | undefined {
    return this.template.parsed;
  }

  // ============================================================
  // CYCLE BINDING
  // ============================================================

  /** Fully realized fields for a cycle, in op order. Fresh map per call. */
  apply(cycle: number): Map<string, FieldValue> {
    const map = new Map(this.skeletonMap);
    for (const [name, fn] of this.dynamicEntries) {
      map.set(name, fn(cycle));
    }
    return map;
  }

  /** Alias of apply() */
  getMap(cycle: number): Map<string, FieldValue> {
    return this.apply(cycle);
  }

  /** One field's value for a cycle; null when the field is undefined */
  get(name: string, cycle: number): FieldValue {
    const field = this.fieldMap.get(name);
    if (!field) return null;
    return field.kind === 'static' ? field.value : field.fn(cycle);
  }

  /** The value function of a dynamic field */
  getMapper(name: string): ValueFunction | undefined {
    return this.dynamicMap.get(name);
  }

  /** A function of the cycle for any field, falling back to a constant */
  getAsFunctionOr(name: string, defaultValue: FieldValue): ValueFunction {
    const field = this.fieldMap.get(name);
    if (!field) return () => defaultValue;
    if (field.kind === 'dynamic') return field.fn;
    const { value } = field;
    return () => value;
  }

  // ============================================================
  // DEFINITION CHECKS
  // ============================================================

  isDefined(name: string): boolean {
    return this.fieldMap.has(name);
  }

  isUndefined(name: string): boolean {
    return !this.fieldMap.has(name);
  }

  isDefinedStatic(name: string): boolean {
    return this.staticMap.has(name);
  }

  isDefinedDynamic(name: string): boolean {
    return this.dynamicMap.has(name);
  }

  /** True iff every name is a static or dynamic field */
  isDefinedAll(...names: string[]): boolean {
    return names.every((name) => this.fieldMap.has(name));
  }

  /** True iff every name is a static field */
  isDefinedStaticAll(...names: string[]): boolean {
    return names.every((name) => this.staticMap.has(name));
  }

  /** Field names in op order */
  definedNames(): Set<string> {
    return new Set(this.fieldMap.keys());
  }

  /**
   * Require static values for every name.
   * @throws {MissingStaticFieldsError} listing every missing name, in request order
   */
  requireStaticFields(...names: string[]): void {
    const missing = [...new Set(names)].filter((name) => !this.staticMap.has(name));
    if (missing.length > 0) {
      throw new MissingStaticFieldsError(this.name, missing);
    }
  }

  // ============================================================
  // STATIC VALUES
  // ============================================================

  getStaticValue(name: string): FieldValue | undefined {
    return this.staticMap.get(name);
  }

  /**
   * Static value converted to `kind`; undefined when not static.
   * @throws {TypeMismatchError} when the value cannot be converted
   */
  getStaticValueAs<K extends ValueKind>(
    name: string,
    kind: K
  ): ValueKindTypes[K] | undefined {
    if (!this.staticMap.has(name)) return undefined;
    return convertKind(this.staticMap.get(name), kind, name);
  }

  /**
   * Static value, or `defaultValue` when the field is undefined.
   * @throws {StrictDynamicFieldError} when the field is dynamic
   */
  getStaticValueOr(name: string, defaultValue: FieldValue): FieldValue {
    const field = this.fieldMap.get(name);
    if (!field) return defaultValue;
    if (field.kind === 'dynamic') {
      throw new StrictDynamicFieldError(this.name, name);
    }
    return field.value;
  }

  // ============================================================
  // CONFIG RESOLUTION
  // ============================================================

  /**
   * Statically configured value: op field, then op param, then
   * activity config, coerced to the kind of `defaultValue`.
   * @throws {StrictDynamicFieldError} when the name is only a dynamic field
   */
  getStaticConfigOr(name: string, defaultValue: string): string;
  getStaticConfigOr(name: string, defaultValue: number): number;
  getStaticConfigOr(name: string, defaultValue: boolean): boolean;
  getStaticConfigOr(name: string, defaultValue: FieldValue): FieldValue;
  getStaticConfigOr(name: string, defaultValue: FieldValue): FieldValue {
    const raw = this.staticConfig(name);
    return raw.found ? convertOr(raw.value, defaultValue) : defaultValue;
  }

  /**
   * Like getStaticConfigOr, converting strictly to `kind`; undefined when
   * the name is set at no tier.
   * @throws {StrictDynamicFieldError} when the name is only a dynamic field
   * @throws {TypeMismatchError} when the value cannot be converted
   */
  getOptionalStaticConfig<K extends ValueKind>(
    name: string,
    kind: K
  ): ValueKindTypes[K] | undefined {
    const raw = this.staticConfig(name);
    return raw.found ? convertKind(raw.value, kind, name) : undefined;
  }

  /**
   * Cycle-aware config value: op field (dynamic fields evaluated at
   * `cycle`), then op param, then activity config, else `defaultValue`.
   * Never throws for dynamic fields.
   */
  getConfigOr(name: string, defaultValue: string, cycle: number): string;
  getConfigOr(name: string, defaultValue: number, cycle: number): number;
  getConfigOr(name: string, defaultValue: boolean, cycle: number): boolean;
  getConfigOr(name: string, defaultValue: FieldValue, cycle: number): FieldValue;
  getConfigOr(name: string, defaultValue: FieldValue, cycle: number): FieldValue {
    const field = this.fieldMap.get(name);
    if (field) {
      const value = field.kind === 'static' ? field.value : field.fn(cycle);
      return convertOr(value, defaultValue);
    }
    if (this.template.params.has(name)) {
      return convertOr(this.template.params.get(name), defaultValue);
    }
    if (this.activity.has(name)) {
      return convertOr(this.activity.get(name), defaultValue);
    }
    return defaultValue;
  }

  private staticConfig(
    name: string
  ): { found: true; value: FieldValue | undefined } | { found: false } {
    if (this.staticMap.has(name)) {
      return { found: true, value: this.staticMap.get(name) };
    }
    if (this.template.params.has(name)) {
      return { found: true, value: this.template.params.get(name) };
    }
    if (this.activity.has(name)) {
      return { found: true, value: this.activity.get(name) };
    }
    if (this.dynamicMap.has(name)) {
      throw new StrictDynamicFieldError(this.name, name);
    }
    return { found: false };
  }

  // ============================================================
  // STRUCTURAL BINDERS
  // ============================================================

  newListBinder(...fields: string[]): ListBinder {
    return new ListBinder(this, fields);
  }

  newArrayBinder(...fields: string[]): ArrayBinder {
    return ArrayBinder.fromFields(this, fields);
  }

  /**
   * Array binder over explicit bind points, resolved through this
   * command's registry.
   * @throws {UnresolvedBindingError} when a spec has no function
   */
  newArrayBinderFromBindPoints(bindPoints: readonly BindPoint[]): ArrayBinder {
    return new ArrayBinder(
      bindPoints.map((bindPoint) =>
        resolveBindPoint(bindPoint, this.registry, this.name, bindPoint.name)
      )
    );
  }

  newOrderedMapBinder(...fields: string[]): OrderedMapBinder {
    return new OrderedMapBinder(this, fields);
  }
}

// ============================================================
// COMPILATION
// ============================================================

let builtinRegistry: FunctionRegistry | undefined;

function sharedRegistry(): FunctionRegistry {
  builtinRegistry ??= defaultRegistry();
  return builtinRegistry;
}

/**
 * Compile an op template.
 *
 * Preprocessors run first, in order, on the op fields. Every field is
 * then classified once; all bind points are resolved here, so apply()
 * never fails for configuration reasons.
 *
 * @throws {ConstructionError} when the template has no op fields
 * @throws {UnresolvedBindingError} when a bind point resolves to no function
 * @throws {TemplateSyntaxError} for malformed template strings or specs
 *
 * @example
 * ```typescript
 * const cmd = compileCommand(
 *   createOpTemplate({
 *     name: 'read',
 *     op: { ks: 'baselines', id: '{myid}' },
 *     bindings: { myid: 'AlphaNumeric(8)' },
 *   })
 * );
 * cmd.apply(42); // Map { 'ks' => 'baselines', 'id' => '...' }
 * ```
 */
export function compileCommand(
  template: OpTemplate,
  activity: ActivityConfig = createActivityConfig(),
  options: CompileOptions = {}
): CompiledCommand {
  const callbacks = options.callbacks ?? {};
  const registry = options.registry ?? sharedRegistry();
  const startTime = Date.now();

  try {
    if (!template.op) {
      throw ConstructionError.missingOp(template.name);
    }

    const raw = applyPreprocessors(template.op, options.preprocessors ?? []);
    const { fields, captures } = compileFields(raw, {
      command: template.name,
      bindings: template.bindings,
      registry,
      callbacks,
    });

    const command = new CompiledCommand({
      template,
      fields,
      captures,
      activity,
      registry,
    });

    callbacks.onCompiled?.({
      command: command.name,
      statics: command.statics.size,
      dynamics: command.dynamics.size,
      captures,
      durationMs: Date.now() - startTime,
    });
    return command;
  } catch (error) {
    if (error instanceof Error) {
      callbacks.onError?.({ command: template.name, error });
    }
    throw error;
  }
}
