/**
 * Op Templates
 *
 * The user-authored definition of one operation: its field mapping,
 * the bindings its template strings refer to, and op-level params.
 */

import type { FieldValue } from '../runtime/core/values.js';
import type { Bindings, Classification } from '../template/types.js';

/** Field mapping input accepted from hosts (records or ordered maps) */
export type FieldMapInput =
  | Readonly<Record<string, FieldValue>>
  | ReadonlyMap<string, FieldValue>;

export interface OpTemplate {
  readonly name: string;
  /** Ordered field mapping; undefined when the op has no body */
  readonly op: ReadonlyMap<string, FieldValue> | undefined;
  readonly bindings: Bindings;
  readonly params: ReadonlyMap<string, FieldValue>;
  /** Pre-parsed form of a statement-style op, when the source had one */
  readonly parsed?: Classification | undefined;
}

export interface OpTemplateInit {
  readonly name: string;
  /** A string op becomes the single field `stmt` */
  readonly op?: FieldMapInput | string | undefined;
  readonly bindings?: Bindings | undefined;
  readonly params?: FieldMapInput | undefined;
  readonly parsed?: Classification | undefined;
}

/** Field holding a statement-style op body */
export const STMT_FIELD = 'stmt';

function isOrderedMap(
  input: FieldMapInput
): input is ReadonlyMap<string, FieldValue> {
  return input instanceof Map;
}

/** Copy a record or map into a fresh ordered map */
export function toFieldMap(input: FieldMapInput): Map<string, FieldValue> {
  return new Map(isOrderedMap(input) ? input : Object.entries(input));
}

/**
 * Build an op template. Inputs are copied; the result is frozen.
 *
 * @example
 * ```typescript
 * const ot = createOpTemplate({
 *   name: 'read',
 *   op: { ks: 'baselines', id: '{myid}' },
 *   bindings: { myid: 'AlphaNumeric(8)' },
 * });
 * ```
 */
export function createOpTemplate(init: OpTemplateInit): OpTemplate {
  let op: Map<string, FieldValue> | undefined;
  if (typeof init.op === 'string') {
    op = new Map([[STMT_FIELD, init.op]]);
  } else if (init.op !== undefined) {
    op = toFieldMap(init.op);
  }

  return Object.freeze({
    name: init.name,
    op,
    bindings: Object.freeze({ ...init.bindings }),
    params: toFieldMap(init.params ?? {}),
    parsed: init.parsed,
  });
}
