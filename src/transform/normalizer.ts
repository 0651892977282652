import { readFile } from 'node:fs/promises';
import { MalformedSnapshotError, errorMessage } from '../lib/errors.js';
import { decodePayload, type RawPayload } from '../extract/raw-payload.js';
import {
  canonicalizeRow,
  collectColumns,
  flattenRecord,
  type FlatRow,
  type FlatScalar,
  type FlatValue,
} from './flatten.js';

export const REQUIRED_COLUMNS = ['id', 'title', 'price', 'category', 'rating_rate', 'rating_count'] as const;
export const DERIVED_COLUMN = 'price_with_vat';

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

// Price including 20% VAT
const VAT_MULTIPLIER = 1.2;

/**
 * Source identifier, kept as received. `1` and `"1"` are different ids.
 */
export type ProductId = FlatScalar;

/**
 * One curated row. Numeric base columns are coerced; every other flattened
 * source column is carried in `extras` exactly as flattened.
 */
export interface ProductRecord {
  id: ProductId;
  title: string | null;
  price: number | null;
  category: string | null;
  rating_rate: number | null;
  rating_count: number | null;
  price_with_vat: number | null;
  extras: ReadonlyMap<string, FlatValue>;
}

export interface CuratedTable {
  columns: readonly string[];
  rows: readonly ProductRecord[];
}

const BASE_COLUMNS = new Set<string>([...REQUIRED_COLUMNS, DERIVED_COLUMN]);

// ─── Coercion ────────────────────────────────────────────────────────────────

const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a cell as a finite number. Anything else becomes null.
 */
export function toNumber(value: FlatValue | undefined): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!NUMERIC_PATTERN.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Arrays cannot serve as a dedupe key, so they are keyed by their JSON text.
 */
export function toProductId(value: FlatValue | undefined): ProductId {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return JSON.stringify(value);
}

export function toText(value: FlatValue | undefined): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Round half to even on the scaled value.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  let rounded: number;
  if (fraction > 0.5) {
    rounded = floor + 1;
  } else if (fraction < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }
  // avoid -0 in output
  return rounded / factor + 0;
}

export function priceWithVat(price: number | null): number | null {
  return price === null ? null : roundTo(price * VAT_MULTIPLIER, 2);
}

// ─── Table Building ──────────────────────────────────────────────────────────

function toProductRecord(row: FlatRow): ProductRecord {
  const price = toNumber(row.get('price'));
  const extras = new Map<string, FlatValue>();
  for (const [column, value] of row) {
    if (!BASE_COLUMNS.has(column)) {
      extras.set(column, value);
    }
  }

  return {
    id: toProductId(row.get('id')),
    title: toText(row.get('title')),
    price,
    category: toText(row.get('category')),
    rating_rate: toNumber(row.get('rating_rate')),
    rating_count: toNumber(row.get('rating_count')),
    price_with_vat: priceWithVat(price),
    extras,
  };
}

/**
 * Source columns in order of first appearance, then any missing required
 * column, then the derived column unless the source already had one.
 */
function buildColumnOrder(rows: readonly FlatRow[]): string[] {
  const columns = collectColumns(rows);
  for (const required of REQUIRED_COLUMNS) {
    if (!columns.includes(required)) {
      columns.push(required);
    }
  }
  if (!columns.includes(DERIVED_COLUMN)) {
    columns.push(DERIVED_COLUMN);
  }
  return columns;
}

/**
 * Keep the first row for each id, in original order. Ids compare by value
 * and type; rows without an id share the null key.
 */
export function dedupeById(records: readonly ProductRecord[]): ProductRecord[] {
  const seen = new Set<ProductId>();
  const kept: ProductRecord[] = [];
  for (const record of records) {
    if (seen.has(record.id)) continue;
    seen.add(record.id);
    kept.push(record);
  }
  return kept;
}

/**
 * Flatten, canonicalize, coerce, derive and dedupe an in-memory payload.
 */
export function normalizeRecords(payload: RawPayload): CuratedTable {
  const flatRows = payload.map((record) => canonicalizeRow(flattenRecord(record)));
  const columns = buildColumnOrder(flatRows);
  const rows = dedupeById(flatRows.map(toProductRecord));
  return { columns, rows };
}

/**
 * Read a snapshot back as a RawPayload.
 */
export async function readSnapshot(location: string): Promise<RawPayload> {
  let text: string;
  try {
    text = await readFile(location, 'utf8');
  } catch (err) {
    throw new MalformedSnapshotError(`Snapshot ${location} could not be read: ${errorMessage(err)}`, location, {
      cause: err,
    });
  }

  const decoded = decodePayload(text);
  if (!decoded.ok) {
    throw new MalformedSnapshotError(`Snapshot ${location} is malformed: ${decoded.reason}`, location);
  }
  return decoded.payload;
}

export async function normalizeSnapshot(location: string): Promise<CuratedTable> {
  return normalizeRecords(await readSnapshot(location));
}

/**
 * Value of one output column for a row. Columns a row never had are null.
 */
export function getCell(record: ProductRecord, column: string): FlatValue {
  switch (column) {
    case 'id':
      return record.id;
    case 'title':
      return record.title;
    case 'price':
      return record.price;
    case 'category':
      return record.category;
    case 'rating_rate':
      return record.rating_rate;
    case 'rating_count':
      return record.rating_count;
    case DERIVED_COLUMN:
      return record.price_with_vat;
    default:
      return record.extras.get(column) ?? null;
  }
}
