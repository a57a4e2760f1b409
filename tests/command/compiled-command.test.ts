/**
 * Compiled Command Tests
 * Field partitioning, per-cycle binding and field queries
 */

import { describe, expect, it } from 'vitest';

import {
  BUILTIN_FUNCTIONS,
  classifyTemplate,
  compileCommand,
  ConstructionError,
  createFunctionRegistry,
  createOpTemplate,
  MissingStaticFieldsError,
  StrictDynamicFieldError,
  TemplateSyntaxError,
  UnresolvedBindingError,
  type ValueFunctionDefinition,
} from '../../src/index.js';
import { compile, toRecord } from '../helpers/command.js';

const MYID = { myid: 'AlphaNumeric(8)' };

describe('Compiled Command', () => {
  describe('Compilation', () => {
    it('partitions literal and bound fields', () => {
      const cmd = compile({
        op: { ks: 'baselines', id: '{myid}' },
        bindings: MYID,
      });

      expect(toRecord(cmd.statics)).toEqual({ ks: 'baselines' });
      expect([...cmd.dynamics.keys()]).toEqual(['id']);
      expect(toRecord(cmd.skeleton)).toEqual({ ks: 'baselines', id: null });
      expect(cmd.size).toBe(2);
      expect(cmd.fields.get('id')).toMatchObject({
        kind: 'dynamic',
        source: 'bindref',
      });
    });

    it('binds every field for a cycle', () => {
      const cmd = compile({
        op: { ks: 'baselines', id: '{myid}' },
        bindings: MYID,
      });
      expect(toRecord(cmd.apply(42))).toEqual({
        ks: 'baselines',
        id: '81QkRrah',
      });
    });

    it('returns a fresh map with equal content for the same cycle', () => {
      const cmd = compile({ op: { id: '{myid}' }, bindings: MYID });
      const first = cmd.apply(7);
      const second = cmd.getMap(7);
      expect(first).not.toBe(second);
      expect(first).toEqual(second);
    });

    it('hands out copies of its field views', () => {
      const cmd = compile({
        op: { ks: 'baselines', id: '{myid}' },
        bindings: MYID,
      });
      cmd.statics.set('ks', 'other');
      cmd.skeleton.set('ks', 'other');
      cmd.skeleton.set('extra', 1);
      cmd.dynamics.delete('id');
      cmd.fields.clear();

      expect(cmd.statics).not.toBe(cmd.statics);
      expect(toRecord(cmd.apply(42))).toEqual({
        ks: 'baselines',
        id: '81QkRrah',
      });
      expect(cmd.getStaticValue('ks')).toBe('baselines');
      expect(cmd.isDefinedDynamic('id')).toBe(true);
      expect(cmd.isDefined('ks')).toBe(true);
    });

    it('copies non-string values as statics', () => {
      const cmd = compile({
        op: { limit: 10, tags: ['a', 'b'], nested: { x: 1 }, off: false },
      });
      expect(cmd.dynamics.size).toBe(0);
      expect(toRecord(cmd.statics)).toEqual({
        limit: 10,
        tags: ['a', 'b'],
        nested: { x: 1 },
        off: false,
      });
    });

    it('renders concatenations', () => {
      const cmd = compile({
        op: { stmt: "select * from t where id='{myid}' and n={n}" },
        bindings: { ...MYID, n: 'Mod(10)' },
      });
      expect(cmd.fields.get('stmt')).toMatchObject({ source: 'concat' });
      expect(cmd.get('stmt', 42)).toBe(
        "select * from t where id='81QkRrah' and n=2"
      );
    });

    it('resolves inline specs', () => {
      const cmd = compile({ op: { bucket: '{{Hash(); Mod(10)}}' } });
      expect(cmd.get('bucket', 0)).toBe(5);
      expect(cmd.get('bucket', 1)).toBe(2);
    });

    it('keeps op field order', () => {
      const cmd = compile({
        op: { a: '{n}', b: 'lit', c: 3, d: 'x{n}' },
        bindings: { n: 'Mod(10)' },
      });
      expect([...cmd.apply(3).keys()]).toEqual(['a', 'b', 'c', 'd']);
      expect([...cmd.definedNames()]).toEqual(['a', 'b', 'c', 'd']);
    });

    it('uses a custom registry', () => {
      const twice: ValueFunctionDefinition = {
        name: 'Twice',
        params: [],
        category: 'arithmetic',
        threadSafe: true,
        input: 'number',
        output: 'number',
        create: () => (input) => (typeof input === 'number' ? input * 2 : null),
      };
      const registry = createFunctionRegistry([...BUILTIN_FUNCTIONS, twice]);
      const cmd = compile(
        { op: { n: '{{Twice(); Add(1)}}' } },
        { registry }
      );
      expect(cmd.get('n', 20)).toBe(41);
    });

    it('exposes the pre-parsed statement form', () => {
      const cmd = compileCommand(
        createOpTemplate({
          name: 'stmt-op',
          op: 'select 1',
          parsed: classifyTemplate('select 1'),
        })
      );
      expect(cmd.parsedTemplate?.kind).toBe('literal');
      expect(compile({ op: { a: 'b' } }).parsedTemplate).toBeUndefined();
    });

    it('is frozen', () => {
      expect(Object.isFrozen(compile({ op: { a: 'b' } }))).toBe(true);
    });
  });

  describe('Compilation Errors', () => {
    it('rejects templates without an op', () => {
      try {
        compileCommand(createOpTemplate({ name: 'empty' }));
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(ConstructionError);
        if (err instanceof ConstructionError) {
          expect(err.errorId).toBe('BIND-C001');
          expect(err.message).toBe('Op template "empty" has no op field mapping');
        }
      }
    });

    it('rejects bindings with no registered function', () => {
      try {
        compile({ op: { id: '{myid}' }, bindings: { myid: 'Nope()' } });
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(UnresolvedBindingError);
        if (err instanceof UnresolvedBindingError) {
          expect(err.errorId).toBe('BIND-C002');
          expect(err.context).toEqual({
            command: 'test-op',
            field: 'id',
            binding: 'myid',
            spec: 'Nope()',
          });
          expect(err.message).toBe(
            'Field "id" of "test-op" binds to "Nope()", which resolves to no registered value function'
          );
        }
      }
    });

    it('rejects chains whose steps do not fit together', () => {
      try {
        compile({ op: { n: "{{Prefix('u'); Add(1)}}" } });
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(UnresolvedBindingError);
        if (err instanceof UnresolvedBindingError) {
          expect(err.errorId).toBe('BIND-C002');
          expect(err.context).toEqual({
            command: 'test-op',
            field: 'n',
            binding: "Prefix('u'); Add(1)",
            spec: "Prefix('u'); Add(1)",
          });
        }
      }
    });

    it('rejects bind points with no declared binding', () => {
      expect(() => compile({ op: { id: 'x={myid}' } })).toThrow(
        'Bind point {myid} refers to no declared binding'
      );
    });

    it('rejects malformed specs', () => {
      expect(() =>
        compile({ op: { id: '{myid}' }, bindings: { myid: 'Mod(10' } })
      ).toThrow(TemplateSyntaxError);
    });
  });

  describe('Field Queries', () => {
    const cmd = compile({
      op: { ks: 'baselines', id: '{myid}', limit: 10 },
      bindings: MYID,
    });

    it('get returns statics, evaluates dynamics and nulls the rest', () => {
      expect(cmd.get('ks', 1)).toBe('baselines');
      expect(cmd.get('id', 42)).toBe('81QkRrah');
      expect(cmd.get('nope', 1)).toBeNull();
    });

    it('getMapper returns only dynamic functions', () => {
      expect(cmd.getMapper('id')?.(42)).toBe('81QkRrah');
      expect(cmd.getMapper('ks')).toBeUndefined();
    });

    it('getAsFunctionOr wraps statics and defaults', () => {
      expect(cmd.getAsFunctionOr('ks', 'd')(5)).toBe('baselines');
      expect(cmd.getAsFunctionOr('nope', 'd')(5)).toBe('d');
      expect(cmd.getAsFunctionOr('id', 'd')(42)).toBe('81QkRrah');
    });

    it('reports definitions', () => {
      expect(cmd.isDefined('id')).toBe(true);
      expect(cmd.isUndefined('nope')).toBe(true);
      expect(cmd.isDefinedStatic('ks')).toBe(true);
      expect(cmd.isDefinedStatic('id')).toBe(false);
      expect(cmd.isDefinedDynamic('id')).toBe(true);
      expect(cmd.isDefinedAll('ks', 'id')).toBe(true);
      expect(cmd.isDefinedAll('ks', 'nope')).toBe(false);
      expect(cmd.isDefinedStaticAll('ks', 'limit')).toBe(true);
      expect(cmd.isDefinedStaticAll('ks', 'id')).toBe(false);
    });

    it('requireStaticFields lists missing names once, in order', () => {
      expect(() => cmd.requireStaticFields('ks', 'limit')).not.toThrow();
      try {
        cmd.requireStaticFields('ks', 'b', 'id', 'b');
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(MissingStaticFieldsError);
        if (err instanceof MissingStaticFieldsError) {
          expect(err.missing).toEqual(['b', 'id']);
          expect(err.message).toBe(
            'Fields [b, id] are required to be defined with static values for "test-op"'
          );
        }
      }
    });

    it('requireStaticFields reports a single missing name', () => {
      expect(() => cmd.requireStaticFields('ks', 'b')).toThrow(
        'Fields [b] are required to be defined with static values for "test-op"'
      );
    });

    it('reads static values', () => {
      expect(cmd.getStaticValue('ks')).toBe('baselines');
      expect(cmd.getStaticValue('id')).toBeUndefined();
      expect(cmd.getStaticValueAs('limit', 'string')).toBe('10');
      expect(cmd.getStaticValueAs('id', 'string')).toBeUndefined();
      expect(cmd.getStaticValueOr('nope', 'd')).toBe('d');
      expect(cmd.getStaticValueOr('limit', 0)).toBe(10);
    });

    it('getStaticValueOr rejects dynamic fields', () => {
      expect(() => cmd.getStaticValueOr('id', 'd')).toThrow(
        StrictDynamicFieldError
      );
    });
  });
});
