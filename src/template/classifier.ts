/**
 * Template Classifier
 *
 * Single pass over a template string:
 * - `{name}`        bind point referencing a declared binding
 * - `{{Spec()}}`    inline binding spec
 * - `[name]`, `[name as alias]`  capture point, replaced in the text by `name`
 * - `\{ \} \[ \] \\` escapes; any other backslash is kept as-is
 *
 * Braces and brackets that do not enclose an identifier are plain text,
 * so JSON or collection literals in a template stay literal.
 */

import { TemplateSyntaxError, UnresolvedBindingError } from '../types.js';
import {
  advance,
  advanceBy,
  createScannerState,
  currentLocation,
  isAtEnd,
  peek,
  rest,
  type ScannerState,
} from './state.js';
import type {
  Bindings,
  BindPoint,
  CapturePoint,
  Classification,
  TemplateSegment,
} from './types.js';

const BIND_POINT = /^\{\s*([A-Za-z_][\w.-]*)\s*\}/;
const EMPTY_BIND_POINT = /^\{\s*\}/;
const OPEN_BIND_POINT = /^\{\s*[A-Za-z_][\w.-]*\s*$/;
const CAPTURE_POINT = /^\[\s*([A-Za-z_]\w*)(?:\s+as\s+([A-Za-z_]\w*))?\s*\]/;
const ESCAPABLE = new Set(['{', '}', '[', ']', '\\']);

interface ScanResult {
  readonly segments: TemplateSegment[];
  readonly captures: CapturePoint[];
}

function readInlineSpec(state: ScannerState): BindPoint {
  const start = currentLocation(state);
  const close = state.source.indexOf('}}', state.pos + 2);
  if (close === -1) {
    throw new TemplateSyntaxError('BIND-T001', { offset: start.offset }, start);
  }

  const spec = state.source.slice(state.pos + 2, close).trim();
  if (spec === '') {
    throw new TemplateSyntaxError('BIND-T002', { offset: start.offset }, start);
  }

  advanceBy(state, close + 2 - state.pos);
  return { name: spec, spec };
}

/** Returns undefined when the brace is plain text */
function readBindPoint(
  state: ScannerState,
  bindings: Bindings
): BindPoint | undefined {
  const start = currentLocation(state);
  const tail = rest(state);

  const match = BIND_POINT.exec(tail);
  if (match) {
    const name = match[1] ?? '';
    if (!Object.hasOwn(bindings, name)) {
      throw new UnresolvedBindingError('BIND-C003', { name });
    }
    advanceBy(state, match[0].length);
    return { name, spec: bindings[name] ?? '' };
  }

  if (EMPTY_BIND_POINT.test(tail)) {
    throw new TemplateSyntaxError('BIND-T002', { offset: start.offset }, start);
  }
  if (OPEN_BIND_POINT.test(tail)) {
    throw new TemplateSyntaxError('BIND-T001', { offset: start.offset }, start);
  }
  return undefined;
}

function isTextSegment(
  segment: TemplateSegment
): segment is Extract<TemplateSegment, { kind: 'text' }> {
  return segment.kind === 'text';
}

function scan(raw: string, bindings: Bindings): ScanResult {
  const state = createScannerState(raw);
  const segments: TemplateSegment[] = [];
  const captures: CapturePoint[] = [];
  let text = '';

  const flush = (): void => {
    if (text !== '') {
      segments.push({ kind: 'text', text });
      text = '';
    }
  };

  while (!isAtEnd(state)) {
    const ch = peek(state);

    if (ch === '\\' && ESCAPABLE.has(peek(state, 1))) {
      advance(state); // consume backslash
      text += advance(state);
      continue;
    }

    if (ch === '{') {
      const bindPoint =
        peek(state, 1) === '{'
          ? readInlineSpec(state)
          : readBindPoint(state, bindings);
      if (bindPoint) {
        flush();
        segments.push({ kind: 'bind', bindPoint });
        continue;
      }
    }

    if (ch === '[') {
      const match = CAPTURE_POINT.exec(rest(state));
      if (match) {
        const name = match[1] ?? '';
        captures.push({ name, alias: match[2] });
        text += name;
        advanceBy(state, match[0].length);
        continue;
      }
    }

    text += advance(state);
  }

  flush();
  return { segments, captures };
}

/**
 * Classify a template string against the declared bindings.
 *
 * @throws {TemplateSyntaxError} for unterminated or empty bind points
 * @throws {UnresolvedBindingError} BIND-C003 for undeclared binding names
 *
 * @example
 * classifyTemplate('{myid}', { myid: 'AlphaNumeric(8)' })
 * // { kind: 'bindref', bindPoint: { name: 'myid', spec: 'AlphaNumeric(8)' }, ... }
 */
export function classifyTemplate(
  raw: string,
  bindings: Bindings = {}
): Classification {
  const { segments, captures } = scan(raw, bindings);

  const [first] = segments;
  if (segments.length === 1 && first?.kind === 'bind') {
    return { kind: 'bindref', raw, captures, bindPoint: first.bindPoint };
  }

  if (segments.every(isTextSegment)) {
    const text = segments.map((segment) => segment.text).join('');
    return { kind: 'literal', raw, captures, text };
  }

  return { kind: 'concat', raw, captures, segments };
}
