/**
 * Field Compiler
 *
 * Classifies every op field exactly once and partitions the op into a
 * single ordered Static | Dynamic field map plus capture groups.
 */

import { UnresolvedBindingError } from '../types.js';
import type { ValueFunction } from '../runtime/core/functions.js';
import type { FunctionRegistry } from '../runtime/core/registry.js';
import { formatValue, type FieldValue } from '../runtime/core/values.js';
import { classifyTemplate } from '../template/classifier.js';
import type {
  Bindings,
  BindPoint,
  CapturePoint,
  Classification,
  TemplateSegment,
} from '../template/types.js';
import type { CompileCallbacks, Field } from './types.js';

export interface CompiledFields {
  /** Every field, in op order */
  readonly fields: ReadonlyMap<string, Field>;
  /** One capture group per string-valued field, in op order */
  readonly captures: readonly (readonly CapturePoint[])[];
}

export interface FieldCompilerContext {
  readonly command: string;
  readonly bindings: Bindings;
  readonly registry: FunctionRegistry;
  readonly callbacks: CompileCallbacks;
}

/**
 * Resolve a bind point's spec to a registered value function.
 * @throws {UnresolvedBindingError} BIND-C002 when nothing is registered
 */
export function resolveBindPoint(
  bindPoint: BindPoint,
  registry: FunctionRegistry,
  command: string,
  field: string
): ValueFunction {
  const fn = registry.lookup(bindPoint.spec);
  if (!fn) {
    throw new UnresolvedBindingError('BIND-C002', {
      command,
      field,
      binding: bindPoint.name,
      spec: bindPoint.spec,
    });
  }
  return fn;
}

/**
 * Build the per-cycle function for a concatenation template.
 * Text parts are fixed; bind point functions are resolved up front.
 */
function concatFunction(
  segments: readonly TemplateSegment[],
  ctx: FieldCompilerContext,
  field: string
): ValueFunction {
  const parts: (string | ValueFunction)[] = segments.map((segment) =>
    segment.kind === 'text'
      ? segment.text
      : resolveBindPoint(segment.bindPoint, ctx.registry, ctx.command, field)
  );

  return (cycle) => {
    let out = '';
    for (const part of parts) {
      out += typeof part === 'string' ? part : formatValue(part(cycle));
    }
    return out;
  };
}

function buildField(
  ctx: FieldCompilerContext,
  name: string,
  template: Classification
): Field {
  switch (template.kind) {
    case 'literal':
      return { kind: 'static', value: template.text };
    case 'bindref':
      return {
        kind: 'dynamic',
        source: 'bindref',
        fn: resolveBindPoint(template.bindPoint, ctx.registry, ctx.command, name),
      };
    case 'concat':
      return {
        kind: 'dynamic',
        source: 'concat',
        fn: concatFunction(template.segments, ctx, name),
      };
  }
}

function compileString(
  ctx: FieldCompilerContext,
  name: string,
  raw: string,
  captures: (readonly CapturePoint[])[]
): Field {
  const template = classifyTemplate(raw, ctx.bindings);
  captures.push(template.captures);

  const field = buildField(ctx, name, template);
  ctx.callbacks.onFieldCompiled?.({
    command: ctx.command,
    field: name,
    kind: template.kind,
  });
  return field;
}

/**
 * Compile raw op fields.
 *
 * Non-string values are copied verbatim as static fields. Strings are
 * classified: literals become static; binding references and
 * concatenations become dynamic fields backed by value functions.
 *
 * @throws {UnresolvedBindingError} for bind points with no function
 * @throws {TemplateSyntaxError} for malformed template strings
 */
export function compileFields(
  raw: ReadonlyMap<string, FieldValue>,
  ctx: FieldCompilerContext
): CompiledFields {
  const fields = new Map<string, Field>();
  const captures: (readonly CapturePoint[])[] = [];

  for (const [name, value] of raw) {
    if (typeof value === 'string') {
      fields.set(name, compileString(ctx, name, value, captures));
      continue;
    }

    fields.set(name, { kind: 'static', value });
    ctx.callbacks.onFieldCompiled?.({
      command: ctx.command,
      field: name,
      kind: 'static',
    });
  }

  return { fields, captures };
}
