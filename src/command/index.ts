/**
 * Command Module
 * Compiles op templates and binds their fields per cycle.
 */

export {
  CompiledCommand,
  compileCommand,
  type CompiledParts,
} from './compiled-command.js';
export {
  compileFields,
  resolveBindPoint,
  type CompiledFields,
  type FieldCompilerContext,
} from './field-compiler.js';
export {
  ArrayBinder,
  ListBinder,
  OrderedMapBinder,
  type CycleBinder,
  type FieldSource,
} from './binders.js';
export {
  aliasFields,
  applyPreprocessors,
  composePreprocessors,
  flattenField,
} from './preprocessors.js';
export type {
  CommandCompiledEvent,
  CompileCallbacks,
  CompileErrorEvent,
  CompileOptions,
  DynamicField,
  Field,
  FieldCompiledEvent,
  FieldKind,
  FieldPreprocessor,
  StaticField,
} from './types.js';
