/**
 * Activity Config and Op Template Tests
 */

import { describe, expect, it } from 'vitest';

import {
  createActivityConfig,
  createOpTemplate,
  TypeMismatchError,
} from '../../src/index.js';

describe('Activity Config', () => {
  const acfg = createActivityConfig({
    cl: 'ONE',
    threads: 8,
    ratio: '0.5',
    flag: 'true',
  });

  it('reads raw values', () => {
    expect(acfg.has('cl')).toBe(true);
    expect(acfg.get('cl')).toBe('ONE');
    expect(acfg.get('missing')).toBeUndefined();
  });

  it('getOr converts to the kind of the default', () => {
    expect(acfg.getOr('threads', 1)).toBe(8);
    expect(acfg.getOr('ratio', 1)).toBe(0.5);
    expect(acfg.getOr('flag', false)).toBe(true);
    expect(acfg.getOr('missing', 'x')).toBe('x');
  });

  it('getOr falls back when conversion fails', () => {
    expect(acfg.getOr('cl', 5)).toBe(5);
  });

  it('getAs converts or reports unset keys', () => {
    expect(acfg.getAs('threads', 'string')).toBe('8');
    expect(acfg.getAs('flag', 'boolean')).toBe(true);
    expect(acfg.getAs('missing', 'integer')).toBeUndefined();
  });

  it('getAs throws for values that cannot convert', () => {
    expect(() => acfg.getAs('cl', 'integer')).toThrow(TypeMismatchError);
    expect(() => acfg.getAs('cl', 'integer')).toThrow(
      'Expected integer, got string for field "cl"'
    );
  });

  it('keeps map insertion order', () => {
    const ordered = createActivityConfig(
      new Map([
        ['b', 1],
        ['a', 2],
      ])
    );
    expect([...ordered.asMap().keys()]).toEqual(['b', 'a']);
  });

  it('copies its input', () => {
    const params = new Map([['threads', 4]]);
    const copy = createActivityConfig(params);
    params.set('threads', 16);
    expect(copy.get('threads')).toBe(4);
  });

  it('asMap returns a copy', () => {
    const local = createActivityConfig({ cl: 'ONE' });
    const map = local.asMap();
    map.set('cl', 'ALL');
    map.delete('cl');
    expect(local.asMap()).not.toBe(map);
    expect(local.get('cl')).toBe('ONE');
    expect(local.getOr('cl', 'x')).toBe('ONE');
  });

  it('defaults to empty', () => {
    expect(createActivityConfig().asMap().size).toBe(0);
  });
});

describe('Op Templates', () => {
  it('turns a string op into a stmt field', () => {
    const ot = createOpTemplate({ name: 'read', op: 'select 1' });
    expect(ot.op && [...ot.op]).toEqual([['stmt', 'select 1']]);
  });

  it('keeps field order from maps and records', () => {
    const ot = createOpTemplate({
      name: 'write',
      op: new Map([
        ['2', 'b'],
        ['1', 'a'],
      ]),
      params: { cl: 'ONE' },
    });
    expect(ot.op && [...ot.op.keys()]).toEqual(['2', '1']);
    expect(ot.params.get('cl')).toBe('ONE');
  });

  it('allows a missing op body', () => {
    const ot = createOpTemplate({ name: 'empty' });
    expect(ot.op).toBeUndefined();
    expect(ot.params.size).toBe(0);
    expect(ot.bindings).toEqual({});
  });

  it('freezes the template and its bindings', () => {
    const ot = createOpTemplate({
      name: 'read',
      op: { id: '{myid}' },
      bindings: { myid: 'AlphaNumeric(8)' },
    });
    expect(Object.isFrozen(ot)).toBe(true);
    expect(Object.isFrozen(ot.bindings)).toBe(true);
  });
});
