/**
 * Built-in Value Functions
 *
 * Minimal function library registered by defaultRegistry(). Hosts add
 * domain-specific functions with registry.register().
 */

import { FunctionArgumentError } from '../../types.js';
import { stepKindOf, type ValueFunctionDefinition } from '../core/functions.js';
import { asFloat, asInteger, asString, formatValue } from '../core/values.js';
import { hashCycle, toUnitInterval, xorshift32 } from './hashing.js';
import { pickWeighted, stateDensityTable } from './sampler.js';

const ALPHANUMERIC =
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

function nonZero(fn: string, divisor: number): number {
  if (divisor === 0) {
    throw new FunctionArgumentError(fn, 'divisor must not be 0');
  }
  return divisor;
}

// ============================================================
// BUILT-IN FUNCTIONS
// ============================================================

export const BUILTIN_FUNCTIONS: readonly ValueFunctionDefinition[] = [
  {
    name: 'Identity',
    input: 'any',
    output: (_args, input) => input,
    params: [],
    category: 'general',
    threadSafe: true,
    description: 'Return the input unchanged',
    examples: ['Identity()'],
    create: () => (input) => input,
  },
  {
    name: 'FixedValue',
    input: 'any',
    output: ([value = null]) => stepKindOf(value),
    params: [{ name: 'value', type: 'any' }],
    category: 'general',
    threadSafe: true,
    description: 'Ignore the input and return a constant',
    examples: ['FixedValue(42)', "FixedValue('n/a')"],
    create:
      ([value = null]) =>
      () =>
        value,
  },
  {
    name: 'Add',
    input: 'number',
    output: 'number',
    params: [{ name: 'addend', type: 'number' }],
    category: 'arithmetic',
    threadSafe: true,
    examples: ['Add(1000)'],
    create: ([addend]) => {
      const n = asFloat(addend ?? null);
      return (input) => asFloat(input) + n;
    },
  },
  {
    name: 'Mul',
    input: 'number',
    output: 'number',
    params: [{ name: 'factor', type: 'number' }],
    category: 'arithmetic',
    threadSafe: true,
    examples: ['Mul(3)'],
    create: ([factor]) => {
      const n = asFloat(factor ?? null);
      return (input) => asFloat(input) * n;
    },
  },
  {
    name: 'Div',
    input: 'number',
    output: 'number',
    params: [{ name: 'divisor', type: 'integer' }],
    category: 'arithmetic',
    threadSafe: true,
    description: 'Integer division, rounding toward negative infinity',
    examples: ['Div(10)'],
    create: ([divisor]) => {
      const n = nonZero('Div', asInteger(divisor ?? null));
      return (input) => Math.floor(asFloat(input) / n);
    },
  },
  {
    name: 'Mod',
    input: 'number',
    output: 'number',
    params: [{ name: 'modulus', type: 'integer' }],
    category: 'arithmetic',
    threadSafe: true,
    description: 'Non-negative remainder',
    examples: ['Mod(100)'],
    create: ([modulus]) => {
      const n = Math.abs(nonZero('Mod', asInteger(modulus ?? null)));
      return (input) => {
        const x = Math.trunc(asFloat(input));
        return ((x % n) + n) % n;
      };
    },
  },
  {
    name: 'Hash',
    input: 'number',
    output: 'number',
    params: [],
    category: 'general',
    threadSafe: true,
    description: 'Hash the input to an unsigned 32-bit integer',
    examples: ['Hash()'],
    create: () => (input) => hashCycle(asFloat(input)),
  },
  {
    name: 'HashRange',
    input: 'number',
    output: 'number',
    params: [
      { name: 'min', type: 'integer' },
      { name: 'max', type: 'integer' },
    ],
    category: 'distribution',
    threadSafe: true,
    description: 'Hash the input into [min, max], both inclusive',
    examples: ['HashRange(1, 100)'],
    create: ([min, max]) => {
      const lo = asInteger(min ?? null);
      const hi = asInteger(max ?? null);
      if (hi < lo) {
        throw new FunctionArgumentError('HashRange', 'max must be >= min');
      }
      const span = hi - lo + 1;
      return (input) => lo + (hashCycle(asFloat(input)) % span);
    },
  },
  {
    name: 'ToString',
    input: 'any',
    output: 'string',
    params: [],
    category: 'conversion',
    threadSafe: true,
    examples: ['Mod(10); ToString()'],
    create: () => (input) => formatValue(input),
  },
  {
    name: 'Prefix',
    input: 'any',
    output: 'string',
    params: [{ name: 'prefix', type: 'string' }],
    category: 'conversion',
    threadSafe: true,
    examples: ["Mod(10); Prefix('user-')"],
    create: ([prefix]) => {
      const text = asString(prefix ?? null);
      return (input) => text + formatValue(input);
    },
  },
  {
    name: 'Suffix',
    input: 'any',
    output: 'string',
    params: [{ name: 'suffix', type: 'string' }],
    category: 'conversion',
    threadSafe: true,
    examples: ["Mod(10); Suffix('@example.com')"],
    create: ([suffix]) => {
      const text = asString(suffix ?? null);
      return (input) => formatValue(input) + text;
    },
  },
  {
    name: 'AlphaNumeric',
    input: 'number',
    output: 'string',
    params: [{ name: 'length', type: 'integer' }],
    category: 'general',
    threadSafe: true,
    description:
      'Fixed-length string of [0-9A-Za-z], deterministic for each input',
    examples: ['AlphaNumeric(8)'],
    create: ([length]) => {
      const size = asInteger(length ?? null);
      if (size < 0) {
        throw new FunctionArgumentError('AlphaNumeric', 'length must be >= 0');
      }
      return (input) => {
        const next = xorshift32(hashCycle(asFloat(input)));
        let out = '';
        for (let i = 0; i < size; i++) {
          out += ALPHANUMERIC.charAt(next() % ALPHANUMERIC.length);
        }
        return out;
      };
    },
  },
  {
    name: 'StateCodesByDensity',
    input: 'number',
    output: 'string',
    params: [],
    category: 'premade',
    threadSafe: true,
    description: 'US state code, weighted by population density',
    examples: ['StateCodesByDensity()'],
    create: () => {
      const table = stateDensityTable();
      return (input) =>
        pickWeighted(
          table,
          toUnitInterval(hashCycle(asFloat(input)))
        );
    },
  },
];
