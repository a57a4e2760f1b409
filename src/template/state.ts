/**
 * Scanner State
 * Tracks position in a template string during classification
 */

import type { SourceLocation } from '../types.js';

export interface ScannerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createScannerState(source: string): ScannerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: ScannerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: ScannerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function rest(state: ScannerState): string {
  return state.source.slice(state.pos);
}

export function advance(state: ScannerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Advance over `count` characters, returning them */
export function advanceBy(state: ScannerState, count: number): string {
  let out = '';
  for (let i = 0; i < count && !isAtEnd(state); i++) {
    out += advance(state);
  }
  return out;
}

export function isAtEnd(state: ScannerState): boolean {
  return state.pos >= state.source.length;
}
