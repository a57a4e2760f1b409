/**
 * Value Runtime
 *
 * Field values, type conversion and the value-function registry.
 *
 * Module Structure:
 * - core/: Values and function plumbing
 *   - values.ts: FieldValue, kinds and fallible accessors
 *   - convert.ts: convert / convertOr coercion
 *   - functions.ts: ValueFunction and definition types
 *   - spec-parser.ts: Binding spec parsing
 *   - registry.ts: Function registry
 * - ext/: Built-in function library
 *   - builtins.ts: Built-in definitions
 *   - hashing.ts: Deterministic hashing
 *   - sampler.ts: Weighted sampling and bundled data
 */

import { createFunctionRegistry, type FunctionRegistry } from './core/registry.js';
import { BUILTIN_FUNCTIONS } from './ext/builtins.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  FieldMap,
  FieldValue,
  ValueKind,
  ValueKindTypes,
} from './core/values.js';
export type {
  FunctionCategory,
  FunctionParam,
  OutputRule,
  ParamKind,
  StepKind,
  ValueFunction,
  ValueFunctionDefinition,
  ValueStep,
} from './core/functions.js';
export type { FunctionRegistry } from './core/registry.js';
export type { SpecCall } from './core/spec-parser.js';
export type { WeightedEntry, WeightedTable } from './ext/sampler.js';

// ============================================================
// VALUES AND CONVERSION
// ============================================================

export {
  asBoolean,
  asFloat,
  asInteger,
  asList,
  asMap,
  asString,
  formatValue,
  inferKind,
  isFieldMap,
  isFieldValue,
} from './core/values.js';
export { convert, convertOr } from './core/convert.js';

// ============================================================
// FUNCTIONS AND REGISTRY
// ============================================================

export {
  composeSteps,
  stepAccepts,
  stepKindOf,
  stepOutput,
  validateFunctionArgs,
} from './core/functions.js';
export { parseBindingSpec } from './core/spec-parser.js';
export { createFunctionRegistry } from './core/registry.js';
export { BUILTIN_FUNCTIONS } from './ext/builtins.js';
export { hashCycle } from './ext/hashing.js';
export { createWeightedTable, pickWeighted } from './ext/sampler.js';

/** Fresh registry pre-populated with the built-in library */
export function defaultRegistry(): FunctionRegistry {
  return createFunctionRegistry(BUILTIN_FUNCTIONS);
}
