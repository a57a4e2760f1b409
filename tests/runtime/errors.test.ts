/**
 * Error Taxonomy Tests
 * Registry contents, message rendering and error classes
 */

import { describe, expect, it } from 'vitest';

import {
  BindError,
  CATEGORY_PREFIX,
  ConstructionError,
  createError,
  ERROR_REGISTRY,
  FunctionArgumentError,
  MissingStaticFieldsError,
  renderMessage,
  StrictDynamicFieldError,
  TemplateSyntaxError,
} from '../../src/index.js';

describe('Error Taxonomy', () => {
  describe('Registry', () => {
    it('holds every definition under a well-formed ID', () => {
      expect(ERROR_REGISTRY.size).toBe(10);
      for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
        expect(errorId).toMatch(/^BIND-[TCFV]\d{3}$/);
        expect(errorId.charAt(5)).toBe(CATEGORY_PREFIX[definition.category]);
      }
    });

    it('filters by category', () => {
      expect(
        ERROR_REGISTRY.byCategory('compile').map((def) => def.errorId)
      ).toEqual(['BIND-C001', 'BIND-C002', 'BIND-C003']);
    });

    it('reports unknown IDs as absent', () => {
      expect(ERROR_REGISTRY.has('BIND-X999')).toBe(false);
      expect(ERROR_REGISTRY.get('BIND-X999')).toBeUndefined();
    });
  });

  describe('renderMessage', () => {
    it('substitutes placeholders', () => {
      expect(
        renderMessage('Expected {expected}, got {actual}', {
          expected: 'integer',
          actual: 'string',
        })
      ).toBe('Expected integer, got string');
    });

    it('joins arrays', () => {
      expect(renderMessage('Fields [{missing}]', { missing: ['a', 'b'] })).toBe(
        'Fields [a, b]'
      );
    });

    it('wraps doubled placeholders in braces', () => {
      expect(renderMessage('{{name}} is unknown', { name: 'id' })).toBe(
        '{id} is unknown'
      );
    });

    it('renders missing values as empty', () => {
      expect(renderMessage('a{b}c', {})).toBe('ac');
    });

    it('returns unclosed templates unchanged', () => {
      expect(renderMessage('oops {x', { x: 1 })).toBe('oops {x');
    });
  });

  describe('Error Classes', () => {
    it('createError renders the registry template', () => {
      const err = createError('BIND-F002', {
        field: 'consistency',
        command: 'read',
      });
      expect(err).toBeInstanceOf(BindError);
      expect(err.message).toBe(
        'Static config field "consistency" of "read" was defined dynamically'
      );
    });

    it('createError rejects unknown IDs', () => {
      expect(() => createError('BIND-X999', {})).toThrow(
        'Unknown error ID: BIND-X999'
      );
    });

    it('rejects IDs from another category', () => {
      expect(() => new TemplateSyntaxError('BIND-C001', {})).toThrow(
        'Expected template error ID, got: BIND-C001'
      );
    });

    it('toData strips the location suffix', () => {
      const location = { line: 1, column: 3, offset: 2 };
      const err = new TemplateSyntaxError('BIND-T002', { offset: 2 }, location);
      expect(err.message).toBe('Empty bind point at offset 2 at 1:3');
      expect(err.toData()).toEqual({
        errorId: 'BIND-T002',
        message: 'Empty bind point at offset 2',
        location,
        context: { offset: 2 },
      });
    });

    it('format prefixes the ID or defers to a formatter', () => {
      const err = new FunctionArgumentError('Mod', 'divisor must not be 0');
      expect(err.format()).toBe(
        '[BIND-V002] Function Mod: divisor must not be 0'
      );
      expect(err.format((data) => data.errorId)).toBe('BIND-V002');
    });

    it('ConstructionError.missingOp names the command', () => {
      const err = ConstructionError.missingOp('write-user');
      expect(err.errorId).toBe('BIND-C001');
      expect(err.message).toBe('Op template "write-user" has no op field mapping');
    });

    it('MissingStaticFieldsError lists every missing name', () => {
      const err = new MissingStaticFieldsError('read', ['a', 'b']);
      expect(err.missing).toEqual(['a', 'b']);
      expect(err.message).toBe(
        'Fields [a, b] are required to be defined with static values for "read"'
      );
    });

    it('StrictDynamicFieldError names the field', () => {
      const err = new StrictDynamicFieldError('read', 'consistency');
      expect(err.errorId).toBe('BIND-F002');
      expect(err.field).toBe('consistency');
      expect(err.name).toBe('StrictDynamicFieldError');
    });
  });
});
