/**
 * Shared Types and Error Classes
 *
 * Every error thrown by this package is a BindError carrying a registry ID.
 * Construction-time kinds (template, compile) abort compiling an op;
 * config and value kinds are raised synchronously by strict lookups.
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

export {
  CATEGORY_PREFIX,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';

// ============================================================
// SOURCE LOCATIONS
// ============================================================

/** Position inside a single template string */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

// ============================================================
// ERROR CLASSES
// ============================================================

/** Structured error data for host applications */
export interface BindErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all cyclebind errors.
 * Provides structured data for host applications to format as needed.
 */
export class BindError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: BindErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'BindError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): BindErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: BindErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `[${this.errorId}] ${this.message}`;
  }
}

/**
 * Render the registry message for an ID, after checking that the ID
 * exists and belongs to the expected category.
 */
function renderFor(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

/** Malformed template strings and binding specifications */
export class TemplateSyntaxError extends BindError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'template', context),
      location,
      context,
    });
    this.name = 'TemplateSyntaxError';
  }
}

/** The op template cannot be compiled at all (e.g. it has no op body) */
export class ConstructionError extends BindError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ errorId: 'BIND-C001', message, context });
    this.name = 'ConstructionError';
  }

  /** The standard "no op field mapping" error for a named command */
  static missingOp(command: string): ConstructionError {
    const context = { command };
    return new ConstructionError(
      renderFor('BIND-C001', 'compile', context),
      context
    );
  }
}

/** A bind point could not be resolved to a value function */
export class UnresolvedBindingError extends BindError {
  constructor(
    errorId: 'BIND-C002' | 'BIND-C003',
    context: Record<string, unknown>
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'compile', context),
      context,
    });
    this.name = 'UnresolvedBindingError';
  }
}

/** requireStaticFields found names absent from the static fields */
export class MissingStaticFieldsError extends BindError {
  readonly missing: readonly string[];

  constructor(command: string, missing: readonly string[]) {
    const context = { command, missing: [...missing] };
    super({
      errorId: 'BIND-F001',
      message: renderFor('BIND-F001', 'config', context),
      context,
    });
    this.name = 'MissingStaticFieldsError';
    this.missing = missing;
  }
}

/** A strict-static lookup targeted a field that only has a value function */
export class StrictDynamicFieldError extends BindError {
  readonly field: string;

  constructor(command: string, field: string) {
    const context = { command, field };
    super({
      errorId: 'BIND-F002',
      message: renderFor('BIND-F002', 'config', context),
      context,
    });
    this.name = 'StrictDynamicFieldError';
    this.field = field;
  }
}

/** A value cannot be coerced to the kind its caller requires */
export class TypeMismatchError extends BindError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string, field?: string) {
    const context = {
      expected,
      actual,
      field,
      where: field === undefined ? '' : ` for field "${field}"`,
    };
    super({
      errorId: 'BIND-V001',
      message: renderFor('BIND-V001', 'value', context),
      context,
    });
    this.name = 'TypeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** A value function definition rejected the arguments of a spec step */
export class FunctionArgumentError extends BindError {
  constructor(functionName: string, reason: string) {
    const context = { functionName, reason };
    super({
      errorId: 'BIND-V002',
      message: renderFor('BIND-V002', 'value', context),
      context,
    });
    this.name = 'FunctionArgumentError';
  }
}

/**
 * Create a base error from a registry ID, rendering its message template.
 *
 * @throws {TypeError} for an unknown error ID
 *
 * @example
 * createError('BIND-F002', { field: 'consistency', command: 'read' })
 * // BindError: Static config field "consistency" of "read" was defined dynamically
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): BindError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new BindError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}
