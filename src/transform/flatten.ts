import type { RawRecord } from '../extract/raw-payload.js';

/**
 * A flattened cell. Arrays are carried opaquely and never exploded into rows.
 * A column missing from a row is simply absent from the map.
 */
export type FlatScalar = string | number | boolean | null;
export type FlatValue = FlatScalar | readonly unknown[];

export type FlatRow = Map<string, FlatValue>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFlatValue(value: unknown): FlatValue {
  if (value === null || value === undefined) return null;
  if (Array.isArray(value)) return value;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    default:
      return String(value);
  }
}

function flattenInto(source: Record<string, unknown>, prefix: string, out: FlatRow): void {
  for (const [key, value] of Object.entries(source)) {
    const column = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      // empty objects contribute no column
      flattenInto(value, column, out);
    } else {
      out.set(column, toFlatValue(value));
    }
  }
}

/**
 * Flatten nested objects into dotted column names at any depth:
 * `{ rating: { rate: 4 } }` becomes `rating.rate → 4`.
 */
export function flattenRecord(record: RawRecord): FlatRow {
  const row: FlatRow = new Map();
  flattenInto(record, '', row);
  return row;
}

/**
 * Trim, lowercase, and turn each space and each dot into one underscore.
 */
export function canonicalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/[ .]/g, '_');
}

/**
 * Canonicalize every column of a flat row. When two source columns collapse
 * to the same name the first one in the row is kept.
 */
export function canonicalizeRow(row: FlatRow): FlatRow {
  const out: FlatRow = new Map();
  for (const [column, value] of row) {
    const name = canonicalizeColumnName(column);
    if (!out.has(name)) {
      out.set(name, value);
    }
  }
  return out;
}

/**
 * Union of column names in order of first appearance across rows.
 */
export function collectColumns(rows: readonly FlatRow[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const column of row.keys()) {
      seen.add(column);
    }
  }
  return [...seen];
}
