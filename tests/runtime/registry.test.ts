/**
 * Function Registry Tests
 */

import { describe, expect, it } from 'vitest';

import {
  BUILTIN_FUNCTIONS,
  createFunctionRegistry,
  defaultRegistry,
  FunctionArgumentError,
  stepAccepts,
  stepKindOf,
  TemplateSyntaxError,
  TypeMismatchError,
  validateFunctionArgs,
  type ValueFunctionDefinition,
} from '../../src/index.js';

function counterDefinition(threadSafe: boolean): ValueFunctionDefinition {
  return {
    name: 'Counter',
    params: [],
    category: 'general',
    threadSafe,
    input: 'any',
    output: 'number',
    create: () => {
      let calls = 0;
      return () => ++calls;
    },
  };
}

describe('Function Registry', () => {
  describe('Registration', () => {
    it('registers the built-in library', () => {
      const registry = defaultRegistry();
      expect(registry.has('Mod')).toBe(true);
      expect(registry.get('Hash')?.category).toBe('general');
      expect(registry.list()).toHaveLength(BUILTIN_FUNCTIONS.length);
    });

    it('rejects duplicate names', () => {
      const registry = defaultRegistry();
      const mod = registry.get('Mod');
      expect(mod).toBeDefined();
      if (mod) {
        expect(() => registry.register(mod)).toThrow(
          'Value function already registered: Mod'
        );
      }
    });

    it('lists by category in name order', () => {
      const registry = defaultRegistry();
      expect(registry.list('arithmetic').map((def) => def.name)).toEqual([
        'Add',
        'Div',
        'Mod',
        'Mul',
      ]);
      expect(registry.list('conversion').map((def) => def.name)).toEqual([
        'Prefix',
        'Suffix',
        'ToString',
      ]);
    });

    it('starts empty without definitions', () => {
      expect(createFunctionRegistry().list()).toEqual([]);
    });
  });

  describe('Lookup', () => {
    it('resolves a single call', () => {
      const fn = defaultRegistry().lookup('Mod(10)');
      expect(fn?.(42)).toBe(2);
    });

    it('feeds each step the previous output', () => {
      const fn = defaultRegistry().lookup("Mod(10); Prefix('user-')");
      expect(fn?.(42)).toBe('user-2');
    });

    it('returns undefined for unknown functions', () => {
      expect(defaultRegistry().lookup('Hash(); Nope()')).toBeUndefined();
    });

    it.each(['Mod()', "Mod('x')", 'Mod(1, 2)', 'Div(0)', 'HashRange(5, 1)'])(
      'returns undefined when arguments do not fit: %s',
      (spec) => {
        expect(defaultRegistry().lookup(spec)).toBeUndefined();
      }
    );

    it('propagates malformed spec text', () => {
      expect(() => defaultRegistry().lookup('Hash(')).toThrow(
        TemplateSyntaxError
      );
    });

    it('shares resolved functions when every step is thread-safe', () => {
      const registry = defaultRegistry();
      expect(registry.lookup('Hash()')).toBe(registry.lookup(' Hash() '));
    });

    it.each([
      "Prefix('u'); Add(1)",
      'ToString(); Mod(10)',
      "FixedValue('x'); Hash()",
      'FixedValue(true); Add(1)',
      'AlphaNumeric(4); HashRange(1, 6)',
    ])(
      'returns undefined when a step cannot take the previous output: %s',
      (spec) => {
        expect(defaultRegistry().lookup(spec)).toBeUndefined();
      }
    );

    it('passes the input kind through Identity', () => {
      const registry = defaultRegistry();
      expect(registry.lookup('Identity(); Add(1)')?.(41)).toBe(42);
      expect(
        registry.lookup('Identity(); ToString(); Identity(); Add(1)')
      ).toBeUndefined();
    });

    it('takes the output kind of FixedValue from its argument', () => {
      expect(defaultRegistry().lookup('FixedValue(7); Mod(5)')?.(0)).toBe(2);
    });

    it('builds fresh instances for non-thread-safe steps', () => {
      const registry = createFunctionRegistry([counterDefinition(false)]);
      const first = registry.lookup('Counter()');
      const second = registry.lookup('Counter()');
      expect(first).not.toBe(second);
      expect(first?.(0)).toBe(1);
      expect(first?.(0)).toBe(2);
      expect(second?.(0)).toBe(1);
    });
  });

  describe('Step Kinds', () => {
    it('accepts any kind for an any input', () => {
      expect(stepAccepts('any', 'string')).toBe(true);
      expect(stepAccepts('any', 'any')).toBe(true);
    });

    it('accepts only the same kind otherwise', () => {
      expect(stepAccepts('number', 'number')).toBe(true);
      expect(stepAccepts('number', 'string')).toBe(false);
      expect(stepAccepts('number', 'any')).toBe(false);
    });

    it('maps constants to step kinds', () => {
      expect(stepKindOf(2.5)).toBe('number');
      expect(stepKindOf('x')).toBe('string');
      expect(stepKindOf(true)).toBe('boolean');
      expect(stepKindOf([1])).toBe('any');
    });

    it('reports values of the wrong kind without naming a field', () => {
      const mislabeled: ValueFunctionDefinition = {
        name: 'Mislabeled',
        params: [],
        category: 'general',
        threadSafe: true,
        input: 'number',
        output: 'number',
        create: () => () => 'not a number',
      };
      const registry = createFunctionRegistry([
        ...BUILTIN_FUNCTIONS,
        mislabeled,
      ]);
      const fn = registry.lookup('Mislabeled(); Add(1)');
      expect(() => fn?.(1)).toThrow(TypeMismatchError);
      expect(() => fn?.(1)).toThrow(/^Expected float, got string$/);
    });
  });

  describe('Argument Validation', () => {
    const prefixed: ValueFunctionDefinition = {
      name: 'Padded',
      params: [
        { name: 'width', type: 'integer' },
        { name: 'fill', type: 'string', defaultValue: '0' },
      ],
      category: 'conversion',
      threadSafe: true,
      input: 'any',
      output: 'string',
      create: () => (input) => input,
    };

    it('applies defaults for omitted arguments', () => {
      expect(validateFunctionArgs([8], prefixed)).toEqual([8, '0']);
    });

    it('rejects excess arguments', () => {
      expect(() => validateFunctionArgs([8, 'x', true], prefixed)).toThrow(
        'Function Padded: expects 2 arguments, got 3'
      );
    });

    it('rejects missing required arguments', () => {
      expect(() => validateFunctionArgs([], prefixed)).toThrow(
        "Function Padded: missing required argument 'width'"
      );
    });

    it('rejects mistyped arguments', () => {
      try {
        validateFunctionArgs([1.5], prefixed);
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(FunctionArgumentError);
        if (err instanceof FunctionArgumentError) {
          expect(err.errorId).toBe('BIND-V002');
          expect(err.context).toEqual({
            functionName: 'Padded',
            reason: "parameter 'width' expects integer, got float",
          });
        }
      }
    });

    it('accepts integers for number parameters', () => {
      const add = BUILTIN_FUNCTIONS.find((def) => def.name === 'Add');
      expect(add && validateFunctionArgs([3], add)).toEqual([3]);
    });
  });
});
