/**
 * Workload Loader
 *
 * Reads op templates from a YAML workload document:
 *
 * ```yaml
 * bindings:
 *   myid: AlphaNumeric(8)
 * params:
 *   cl: LOCAL_QUORUM
 * ops:
 *   read: "select * from baselines.kv where id='{myid}'"
 *   write:
 *     op:
 *       ks: baselines
 *       id: "{myid}"
 *     params:
 *       cl: ONE
 *   count:
 *     op: "select count(*) from baselines.kv"
 *     limit: 10
 * ```
 *
 * In a structured op, keys other than `op`, `bindings` and `params` are
 * params of that op.
 *
 * Op field order follows the document, including integer-like keys.
 */

import {
  isMap,
  isNode,
  isScalar,
  parseDocument,
  type Document,
} from 'yaml';
import { ConstructionError } from '../types.js';
import { isFieldValue, type FieldValue } from '../runtime/core/values.js';
import { classifyTemplate } from '../template/classifier.js';
import type { Bindings } from '../template/types.js';
import { createOpTemplate, type OpTemplate } from './op-template.js';

export interface Workload {
  readonly bindings: Bindings;
  readonly params: ReadonlyMap<string, FieldValue>;
  readonly ops: readonly OpTemplate[];
}

/** Keys that mark an op entry as structured rather than a bare field map */
const STRUCTURED_KEYS = ['op', 'bindings', 'params'];

interface LoadState {
  readonly doc: Document.Parsed;
}

function mapEntries(
  state: LoadState,
  node: unknown,
  where: string
): [string, unknown][] {
  if (!isMap(node)) {
    throw new ConstructionError(`Workload ${where} must be a mapping`, {
      where,
    });
  }
  return node.items.map((pair): [string, unknown] => {
    if (!isScalar(pair.key)) {
      throw new ConstructionError(`Workload ${where} has a non-scalar key`, {
        where,
      });
    }
    return [String(pair.key.value), pair.value];
  });
}

function toFieldValue(state: LoadState, node: unknown, where: string): FieldValue {
  const value: unknown = isNode(node) ? node.toJS(state.doc) : node;
  if (!isFieldValue(value)) {
    throw new ConstructionError(`Workload ${where} holds an unsupported value`, {
      where,
    });
  }
  return value;
}

function readFields(
  state: LoadState,
  node: unknown,
  where: string
): Map<string, FieldValue> {
  const fields = new Map<string, FieldValue>();
  for (const [key, value] of mapEntries(state, node, where)) {
    fields.set(key, toFieldValue(state, value, `${where}.${key}`));
  }
  return fields;
}

function readBindings(
  state: LoadState,
  node: unknown,
  where: string
): Record<string, string> {
  const bindings: Record<string, string> = {};
  for (const [key, value] of mapEntries(state, node, where)) {
    const spec = toFieldValue(state, value, `${where}.${key}`);
    if (typeof spec !== 'string') {
      throw new ConstructionError(
        `Binding "${key}" in ${where} must be a string spec`,
        { where, binding: key }
      );
    }
    bindings[key] = spec;
  }
  return bindings;
}

function readOp(
  state: LoadState,
  name: string,
  node: unknown,
  workload: Omit<Workload, 'ops'>
): OpTemplate {
  const where = `ops.${name}`;

  const statement = (
    stmt: FieldValue,
    bindings: Bindings,
    params: ReadonlyMap<string, FieldValue>
  ): OpTemplate => {
    if (typeof stmt !== 'string') {
      throw new ConstructionError(`Op ${where} must be a string or mapping`, {
        where,
      });
    }
    return createOpTemplate({
      name,
      op: stmt,
      bindings,
      params,
      parsed: classifyTemplate(stmt, bindings),
    });
  };

  if (!isMap(node)) {
    return statement(
      toFieldValue(state, node, where),
      workload.bindings,
      workload.params
    );
  }

  const entries = new Map(mapEntries(state, node, where));
  if (!STRUCTURED_KEYS.some((key) => entries.has(key))) {
    return createOpTemplate({
      name,
      op: readFields(state, node, where),
      bindings: workload.bindings,
      params: workload.params,
    });
  }

  const bindings = entries.has('bindings')
    ? {
        ...workload.bindings,
        ...readBindings(state, entries.get('bindings'), `${where}.bindings`),
      }
    : workload.bindings;
  // Loose keys are params; an explicit params block overrides them
  const params = new Map(workload.params);
  for (const [key, value] of entries) {
    if (STRUCTURED_KEYS.includes(key)) continue;
    params.set(key, toFieldValue(state, value, `${where}.${key}`));
  }
  if (entries.has('params')) {
    for (const [key, value] of readFields(
      state,
      entries.get('params'),
      `${where}.params`
    )) {
      params.set(key, value);
    }
  }

  const body = entries.get('op');
  if (!isMap(body)) {
    const stmt =
      body === undefined ? null : toFieldValue(state, body, `${where}.op`);
    // An op without a body is kept; compiling it fails
    if (stmt === null) return createOpTemplate({ name, bindings, params });
    return statement(stmt, bindings, params);
  }
  return createOpTemplate({
    name,
    op: readFields(state, body, `${where}.op`),
    bindings,
    params,
  });
}

/**
 * Parse a YAML workload document into op templates, in document order.
 *
 * @throws {ConstructionError} for invalid YAML or an unexpected shape
 */
export function loadWorkload(text: string): Workload {
  const doc = parseDocument(text);
  const [firstError] = doc.errors;
  if (firstError) {
    throw new ConstructionError(`Invalid workload YAML: ${firstError.message}`);
  }

  const state: LoadState = { doc };
  if (doc.contents === null) {
    return { bindings: {}, params: new Map(), ops: [] };
  }

  const root = new Map(mapEntries(state, doc.contents, 'document'));
  const bindings = root.has('bindings')
    ? readBindings(state, root.get('bindings'), 'bindings')
    : {};
  const params = root.has('params')
    ? readFields(state, root.get('params'), 'params')
    : new Map<string, FieldValue>();

  const ops: OpTemplate[] = [];
  if (root.has('ops')) {
    for (const [name, node] of mapEntries(state, root.get('ops'), 'ops')) {
      ops.push(readOp(state, name, node, { bindings, params }));
    }
  }

  return { bindings, params, ops };
}
