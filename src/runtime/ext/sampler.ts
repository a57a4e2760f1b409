/**
 * Weighted Sampler
 *
 * Inverse-CDF sampling over a weighted table, plus the bundled
 * state-density table used by StateCodesByDensity.
 */

import { readFileSync } from 'node:fs';

/** One row of a weighted table */
export interface WeightedEntry {
  readonly value: string;
  readonly weight: number;
}

/** Precomputed cumulative table */
export interface WeightedTable {
  readonly values: readonly string[];
  readonly cumulative: readonly number[];
  readonly total: number;
}

/**
 * Build a cumulative table. Rows with non-positive weight are dropped.
 * @throws {Error} when no row has positive weight
 */
export function createWeightedTable(
  entries: readonly WeightedEntry[]
): WeightedTable {
  const values: string[] = [];
  const cumulative: number[] = [];
  let total = 0;

  for (const entry of entries) {
    if (!(entry.weight > 0)) continue;
    total += entry.weight;
    values.push(entry.value);
    cumulative.push(total);
  }

  if (values.length === 0) {
    throw new Error('Weighted table needs at least one positive weight');
  }
  return { values, cumulative, total };
}

/**
 * Pick the entry whose cumulative range contains `unit * total`.
 * `unit` is expected in [0, 1); values outside are clamped.
 */
export function pickWeighted(table: WeightedTable, unit: number): string {
  const target = Math.min(Math.max(unit, 0), 1) * table.total;

  // First index whose cumulative weight exceeds the target
  let lo = 0;
  let hi = table.cumulative.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((table.cumulative[mid] ?? 0) > target) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return table.values[lo] ?? '';
}

// ============================================================
// BUNDLED DATA
// ============================================================

interface StateDensityRow {
  readonly state_id: string;
  readonly density: number;
}

function isStateDensityRow(row: unknown): row is StateDensityRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'state_id' in row &&
    typeof row.state_id === 'string' &&
    'density' in row &&
    typeof row.density === 'number'
  );
}

let stateTable: WeightedTable | undefined;

/** Lazily load data/state-density.json into a weighted table */
export function stateDensityTable(): WeightedTable {
  if (stateTable) return stateTable;

  // Same relative path from src/runtime/ext and dist/runtime/ext
  const url = new URL('../../../data/state-density.json', import.meta.url);
  const rows: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  if (!Array.isArray(rows) || !rows.every(isStateDensityRow)) {
    throw new Error(`Malformed state density data: ${url.pathname}`);
  }

  stateTable = createWeightedTable(
    rows.map((row) => ({ value: row.state_id, weight: row.density }))
  );
  return stateTable;
}
