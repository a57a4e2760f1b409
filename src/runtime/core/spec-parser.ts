/**
 * Binding Spec Parser
 *
 * Parses binding specifications of the form
 *   Hash(); Mod(100); Prefix('user-')
 * into an ordered list of calls. A bare name (`Identity`) is a call with
 * no arguments. Arguments are numbers, quoted strings, or true/false.
 */

import { TemplateSyntaxError } from '../../types.js';
import type { FieldValue } from './values.js';

/** One step of a parsed binding spec */
export interface SpecCall {
  readonly name: string;
  readonly args: readonly FieldValue[];
}

interface SpecState {
  readonly spec: string;
  pos: number;
}

function fail(state: SpecState, reason: string): never {
  throw new TemplateSyntaxError('BIND-T003', { spec: state.spec, reason });
}

function skipSpace(state: SpecState): void {
  while (/\s/.test(state.spec[state.pos] ?? '')) state.pos++;
}

function readName(state: SpecState): string {
  const match = /^[A-Za-z_][\w.]*/.exec(state.spec.slice(state.pos));
  if (!match) fail(state, `expected function name at offset ${state.pos}`);
  state.pos += match[0].length;
  return match[0];
}

function readQuoted(state: SpecState): string {
  const quote = state.spec[state.pos];
  state.pos++; // consume opening quote
  let value = '';
  while (state.pos < state.spec.length) {
    const ch = state.spec[state.pos] ?? '';
    if (ch === '\\') {
      value += state.spec[state.pos + 1] ?? '';
      state.pos += 2;
      continue;
    }
    if (ch === quote) {
      state.pos++;
      return value;
    }
    value += ch;
    state.pos++;
  }
  return fail(state, 'unterminated string argument');
}

function readArg(state: SpecState): FieldValue {
  skipSpace(state);
  const ch = state.spec[state.pos];
  if (ch === '"' || ch === "'") return readQuoted(state);

  const rest = state.spec.slice(state.pos);
  const number = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?[lL]?/.exec(rest);
  if (number) {
    state.pos += number[0].length;
    return Number(number[0].replace(/[lL]$/, ''));
  }
  const bool = /^(true|false)\b/.exec(rest);
  if (bool) {
    state.pos += bool[0].length;
    return bool[0] === 'true';
  }
  return fail(state, `unexpected argument at offset ${state.pos}`);
}

function readCall(state: SpecState): SpecCall {
  skipSpace(state);
  const name = readName(state);
  skipSpace(state);

  const args: FieldValue[] = [];
  if (state.spec[state.pos] !== '(') return { name, args };
  state.pos++; // consume (

  skipSpace(state);
  if (state.spec[state.pos] === ')') {
    state.pos++;
    return { name, args };
  }

  while (state.pos < state.spec.length) {
    args.push(readArg(state));
    skipSpace(state);
    const ch = state.spec[state.pos];
    state.pos++;
    if (ch === ')') return { name, args };
    if (ch !== ',') break;
  }
  return fail(state, `unclosed argument list for ${name}`);
}

/**
 * Parse a binding spec into its calls.
 *
 * @throws {TemplateSyntaxError} BIND-T003 for malformed text
 */
export function parseBindingSpec(spec: string): SpecCall[] {
  const state: SpecState = { spec, pos: 0 };
  const calls: SpecCall[] = [];

  skipSpace(state);
  if (state.pos >= spec.length) fail(state, 'empty specification');

  while (state.pos < spec.length) {
    calls.push(readCall(state));
    skipSpace(state);
    if (state.pos >= spec.length) break;
    if (spec[state.pos] !== ';') {
      fail(state, `expected ';' at offset ${state.pos}`);
    }
    state.pos++; // consume ;
    skipSpace(state);
  }

  return calls;
}
