/**
 * Value Function Types
 *
 * A value function maps a cycle number to a field value. Binding specs are
 * chains of steps; each step is produced by a ValueFunctionDefinition
 * registered under a name.
 *
 * Public API for function library authors.
 */

import { FunctionArgumentError } from '../../types.js';
import { inferKind, type FieldValue, type ValueKind } from './values.js';

/**
 * Cycle-to-value function.
 * Must be reentrant: drivers call one instance from many workers at once.
 */
export type ValueFunction = (cycle: number) => FieldValue;

/** One link of a binding chain: receives the previous step's output */
export type ValueStep = (input: FieldValue) => FieldValue;

/** Grouping used by function listings */
export type FunctionCategory =
  | 'general'
  | 'arithmetic'
  | 'conversion'
  | 'distribution'
  | 'premade';

/**
 * Value kind flowing between chain steps. A chain starts with 'number'
 * (the cycle); 'any' as an input accepts every kind, as an output it
 * fits only inputs that accept 'any'.
 */
export type StepKind = 'number' | 'string' | 'boolean' | 'any';

/** Output kind computed from a step's arguments and the kind it receives */
export type OutputRule = (args: readonly FieldValue[], input: StepKind) => StepKind;

/** Parameter kind accepted by a function definition ('number' takes both numeric kinds) */
export type ParamKind = 'string' | 'number' | 'integer' | 'boolean' | 'any';

/**
 * Parameter metadata for a value function.
 *
 * Parameters without defaultValue are required.
 */
export interface FunctionParam {
  readonly name: string;
  readonly type: ParamKind;
  readonly defaultValue?: FieldValue;
  readonly description?: string;
}

/**
 * Registry entry for a value function.
 * Thread-safety and category are plain data, read by listings and by
 * the registry when sharing instances across workers.
 */
export interface ValueFunctionDefinition {
  readonly name: string;
  readonly params: readonly FunctionParam[];
  readonly category: FunctionCategory;
  /** True when one instance can serve concurrent callers */
  readonly threadSafe: boolean;
  readonly description?: string;
  /** Example specs, e.g. "Mod(100)" */
  readonly examples?: readonly string[];
  /** Kind the step accepts from the cycle or the previous step */
  readonly input: StepKind;
  /** Kind the step produces */
  readonly output: StepKind | OutputRule;
  /** Build a step from validated arguments */
  create(args: readonly FieldValue[]): ValueStep;
}

function matchesParam(arg: FieldValue, type: ParamKind): boolean {
  const kind: ValueKind = inferKind(arg);
  switch (type) {
    case 'any':
      return true;
    case 'number':
      return kind === 'integer' || kind === 'float';
    default:
      return kind === type;
  }
}

/**
 * Validate spec arguments against a definition's parameters.
 * Returns a new argument array with defaults applied.
 *
 * @throws {FunctionArgumentError} on excess, missing or mistyped arguments
 */
export function validateFunctionArgs(
  args: readonly FieldValue[],
  definition: ValueFunctionDefinition
): FieldValue[] {
  const { name, params } = definition;

  if (args.length > params.length) {
    throw new FunctionArgumentError(
      name,
      `expects ${params.length} arguments, got ${args.length}`
    );
  }

  const resolved: FieldValue[] = [];
  for (let i = 0; i < params.length; i++) {
    const param = params[i];
    if (param === undefined) continue;

    let arg = args[i];
    if (arg === undefined) {
      if (param.defaultValue === undefined) {
        throw new FunctionArgumentError(
          name,
          `missing required argument '${param.name}'`
        );
      }
      arg = param.defaultValue;
    }

    if (!matchesParam(arg, param.type)) {
      throw new FunctionArgumentError(
        name,
        `parameter '${param.name}' expects ${param.type}, got ${inferKind(arg)}`
      );
    }
    resolved.push(arg);
  }

  return resolved;
}

/** Whether a step taking `input` can follow a step producing `output` */
export function stepAccepts(input: StepKind, output: StepKind): boolean {
  return input === 'any' || input === output;
}

/** Output kind of a step, given its validated arguments */
export function stepOutput(
  definition: ValueFunctionDefinition,
  args: readonly FieldValue[],
  input: StepKind
): StepKind {
  const { output } = definition;
  return typeof output === 'function' ? output(args, input) : output;
}

/** Step kind of a constant */
export function stepKindOf(value: FieldValue): StepKind {
  switch (inferKind(value)) {
    case 'integer':
    case 'float':
      return 'number';
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    default:
      return 'any';
  }
}

/** Compose a chain of steps into a value function fed by the cycle */
export function composeSteps(steps: readonly ValueStep[]): ValueFunction {
  if (steps.length === 1) {
    const [only] = steps;
    if (only !== undefined) return (cycle) => only(cycle);
  }
  return (cycle) => {
    let value: FieldValue = cycle;
    for (const step of steps) {
      value = step(value);
    }
    return value;
  };
}
