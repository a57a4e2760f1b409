/**
 * Value Function Registry
 *
 * Name-indexed store of ValueFunctionDefinitions, populated at startup.
 * Resolves binding specs to composed ValueFunctions.
 */

import { FunctionArgumentError } from '../../types.js';
import {
  composeSteps,
  stepAccepts,
  stepOutput,
  validateFunctionArgs,
  type FunctionCategory,
  type StepKind,
  type ValueFunction,
  type ValueFunctionDefinition,
  type ValueStep,
} from './functions.js';
import { parseBindingSpec } from './spec-parser.js';

/** Function registry consulted by the field compiler */
export interface FunctionRegistry {
  /** Add a definition; names are unique */
  register(definition: ValueFunctionDefinition): void;
  has(name: string): boolean;
  get(name: string): ValueFunctionDefinition | undefined;
  /** Definitions sorted by name, optionally filtered by category */
  list(category?: FunctionCategory): ValueFunctionDefinition[];
  /**
   * Resolve a binding spec.
   * Returns undefined when a step names an unknown function, its
   * arguments do not fit the definition, or it cannot accept the kind
   * the previous step produces.
   * @throws {TemplateSyntaxError} for malformed spec text
   */
  lookup(spec: string): ValueFunction | undefined;
}

class FunctionRegistryImpl implements FunctionRegistry {
  private readonly byName = new Map<string, ValueFunctionDefinition>();
  /** Resolved specs whose steps are all thread-safe */
  private readonly shared = new Map<string, ValueFunction>();

  register(definition: ValueFunctionDefinition): void {
    if (this.byName.has(definition.name)) {
      throw new Error(`Value function already registered: ${definition.name}`);
    }
    this.byName.set(definition.name, definition);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): ValueFunctionDefinition | undefined {
    return this.byName.get(name);
  }

  list(category?: FunctionCategory): ValueFunctionDefinition[] {
    return [...this.byName.values()]
      .filter((def) => category === undefined || def.category === category)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  lookup(spec: string): ValueFunction | undefined {
    const key = spec.trim();
    const cached = this.shared.get(key);
    if (cached) return cached;

    const steps: ValueStep[] = [];
    let threadSafe = true;
    // The first step receives the cycle number
    let kind: StepKind = 'number';

    for (const call of parseBindingSpec(key)) {
      const definition = this.byName.get(call.name);
      if (!definition || !stepAccepts(definition.input, kind)) return undefined;

      try {
        const args = validateFunctionArgs(call.args, definition);
        steps.push(definition.create(args));
        kind = stepOutput(definition, args, kind);
      } catch (err) {
        if (err instanceof FunctionArgumentError) return undefined;
        throw err;
      }
      threadSafe &&= definition.threadSafe;
    }

    const fn = composeSteps(steps);
    if (threadSafe) this.shared.set(key, fn);
    return fn;
  }
}

/**
 * Create a registry holding the given definitions.
 *
 * @example
 * ```typescript
 * const registry = createFunctionRegistry(BUILTIN_FUNCTIONS);
 * registry.lookup('Hash(); Mod(10)')?.(42);
 * ```
 */
export function createFunctionRegistry(
  definitions: readonly ValueFunctionDefinition[] = []
): FunctionRegistry {
  const registry = new FunctionRegistryImpl();
  for (const definition of definitions) {
    registry.register(definition);
  }
  return registry;
}
