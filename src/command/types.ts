/**
 * Command Types
 *
 * Public types for compiling op templates and observing compilation.
 */

import type { FunctionRegistry } from '../runtime/core/registry.js';
import type { ValueFunction } from '../runtime/core/functions.js';
import type { FieldValue } from '../runtime/core/values.js';
import type { CapturePoint } from '../template/types.js';

/** A field fixed at compile time */
export interface StaticField {
  readonly kind: 'static';
  readonly value: FieldValue;
}

/** A field computed per cycle */
export interface DynamicField {
  readonly kind: 'dynamic';
  readonly fn: ValueFunction;
  /** Template form the function was built from */
  readonly source: 'bindref' | 'concat';
}

/** Each op field is wholly static or wholly dynamic */
export type Field = StaticField | DynamicField;

/** How the compiler classified a field */
export type FieldKind = 'static' | 'literal' | 'bindref' | 'concat';

/** Map-to-map transform applied to the raw op fields before compiling */
export type FieldPreprocessor = (
  fields: ReadonlyMap<string, FieldValue>
) => Map<string, FieldValue>;

/** Event emitted after each field is classified */
export interface FieldCompiledEvent {
  /** Op template name */
  command: string;
  field: string;
  kind: FieldKind;
}

/** Event emitted once a command is fully compiled */
export interface CommandCompiledEvent {
  command: string;
  statics: number;
  dynamics: number;
  captures: readonly (readonly CapturePoint[])[];
  /** Compile time in milliseconds */
  durationMs: number;
}

/** Event emitted before a construction error propagates */
export interface CompileErrorEvent {
  command: string;
  error: Error;
}

/** Observability callbacks for monitoring compilation */
export interface CompileCallbacks {
  onFieldCompiled?: (event: FieldCompiledEvent) => void;
  onCompiled?: (event: CommandCompiledEvent) => void;
  onError?: (event: CompileErrorEvent) => void;
}

/** Options for compileCommand */
export interface CompileOptions {
  /** Function registry for binding specs (defaults to the built-in library) */
  registry?: FunctionRegistry;
  /** Applied in order to the op fields before compiling */
  preprocessors?: readonly FieldPreprocessor[];
  callbacks?: CompileCallbacks;
}
