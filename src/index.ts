/**
 * cyclebind
 * Compiles op templates once and binds their fields per cycle.
 */

export * from './command/index.js';
export * from './config/index.js';
export * from './runtime/index.js';
export * from './template/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  BindError,
  ConstructionError,
  createError,
  FunctionArgumentError,
  MissingStaticFieldsError,
  StrictDynamicFieldError,
  TemplateSyntaxError,
  TypeMismatchError,
  UnresolvedBindingError,
  type BindErrorData,
  type SourceLocation,
} from './types.js';
export {
  CATEGORY_PREFIX,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
