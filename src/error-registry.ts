/**
 * Error Registry
 * Central error definition registry with message template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'template' | 'compile' | 'config' | 'value';

/** Single-letter ID prefix per category */
export const CATEGORY_PREFIX: Readonly<Record<ErrorCategory, string>> = {
  template: 'T',
  compile: 'C',
  config: 'F',
  value: 'V',
};

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Template, spec or op snippet demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: BIND-{prefix}{3-digit} (e.g., BIND-C002) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
  byCategory(category: ErrorCategory): ErrorDefinition[];
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }

  byCategory(category: ErrorCategory): ErrorDefinition[] {
    return [...this.byId.values()].filter((def) => def.category === category);
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Template Errors (BIND-T0xx)
  {
    errorId: 'BIND-T001',
    category: 'template',
    description: 'Unterminated bind point',
    messageTemplate: 'Unterminated bind point starting at offset {offset}',
    cause: 'A bind point was opened with { or {{ but never closed.',
    resolution:
      'Close the bind point with } (or }} for inline specs), or escape a literal brace as \\{.',
    examples: [
      { description: 'Missing closing brace', code: 'select * from t where id={id' },
      { description: 'Inline spec closed once', code: '{{Hash(); Mod(10)}' },
    ],
  },
  {
    errorId: 'BIND-T002',
    category: 'template',
    description: 'Empty bind point',
    messageTemplate: 'Empty bind point at offset {offset}',
    cause: 'A bind point contains no binding name or specification.',
    resolution: 'Name a declared binding inside the braces, or escape them.',
    examples: [{ description: 'Empty braces', code: 'value={}' }],
  },
  {
    errorId: 'BIND-T003',
    category: 'template',
    description: 'Malformed binding specification',
    messageTemplate: 'Malformed binding specification "{spec}": {reason}',
    cause:
      'A binding specification is not a ;-separated chain of Name(args) calls.',
    resolution:
      'Write each step as FunctionName(arg, ...). Quote string arguments.',
    examples: [
      { description: 'Unclosed argument list', code: 'Mod(100' },
      { description: 'Missing separator', code: 'Hash() Mod(10)' },
    ],
  },

  // Compile Errors (BIND-C0xx)
  {
    errorId: 'BIND-C001',
    category: 'compile',
    description: 'Op template has no field mapping',
    messageTemplate: 'Op template "{command}" has no op field mapping',
    cause: 'The op template was built without an op body.',
    resolution: 'Give the op a field mapping (or a statement string).',
  },
  {
    errorId: 'BIND-C002',
    category: 'compile',
    description: 'Unresolved binding specification',
    messageTemplate:
      'Field "{field}" of "{command}" binds to "{spec}", which resolves to no registered value function',
    cause:
      'The binding specification names a function that is not registered, passes it invalid arguments, or feeds a step a kind it does not accept.',
    resolution:
      'Register the function, fix its name or arguments, or make the field a literal.',
    examples: [
      { description: 'Typo in function name', code: 'id: Hsah(); Mod(10)' },
      { description: 'String fed to arithmetic', code: "n: Prefix('u'); Add(1)" },
    ],
  },
  {
    errorId: 'BIND-C003',
    category: 'compile',
    description: 'Undeclared binding reference',
    messageTemplate: 'Bind point {{name}} refers to no declared binding',
    cause: 'A {name} bind point names a binding absent from the bindings map.',
    resolution: 'Declare the binding, or use an inline {{Spec()}} bind point.',
  },

  // Config Errors (BIND-F0xx)
  {
    errorId: 'BIND-F001',
    category: 'config',
    description: 'Required static fields missing',
    messageTemplate:
      'Fields [{missing}] are required to be defined with static values for "{command}"',
    cause: 'The op type needs these fields fixed at compile time.',
    resolution: 'Provide literal values for every listed field.',
  },
  {
    errorId: 'BIND-F002',
    category: 'config',
    description: 'Static config field defined dynamically',
    messageTemplate:
      'Static config field "{field}" of "{command}" was defined dynamically',
    cause:
      'A field read as static configuration is bound to a value function.',
    resolution:
      'Give the field a literal value, or read it with a cycle-aware lookup.',
  },

  // Value Errors (BIND-V0xx)
  {
    errorId: 'BIND-V001',
    category: 'value',
    description: 'Type mismatch',
    messageTemplate: 'Expected {expected}, got {actual}{where}',
    cause: 'A value cannot be converted to the type its caller requires.',
    resolution: 'Change the value, or read it as its actual type.',
  },
  {
    errorId: 'BIND-V002',
    category: 'value',
    description: 'Invalid value function arguments',
    messageTemplate: 'Function {functionName}: {reason}',
    cause: 'A value function was given too many, too few or mistyped arguments.',
    resolution: 'Match the function parameter list.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}. A doubled placeholder ({{varName}})
 * renders the value inside literal braces. Missing context values render
 * as empty string; arrays are joined with ", ". Invalid templates
 * (unclosed braces) return unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "integer", actual: "string"})
 * // Returns: "Expected integer, got string"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{') {
      if (template[i + 1] === '{') {
        // {{name}} renders as {value}
        const close = template.indexOf('}}', i + 2);
        if (close === -1) return template;
        result += `{${formatContextValue(context[template.slice(i + 2, close)])}}`;
        i = close + 2;
        continue;
      }

      const close = template.indexOf('}', i + 1);
      if (close === -1) return template;

      result += formatContextValue(context[template.slice(i + 1, close)]);
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}

function formatContextValue(value: unknown): string {
  if (value === undefined) return '';
  if (Array.isArray(value)) return value.map(String).join(', ');
  return String(value);
}
