import { getCell, type CuratedTable } from '../transform/normalizer.js';
import type { FlatValue } from '../transform/flatten.js';

function escapeCell(value: string): string {
  if (value.includes(',') || value.includes('\n') || value.includes('\r') || value.includes('"')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCell(value: FlatValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Header row plus one line per record, nulls as empty cells.
 */
export function toCsv(table: CuratedTable): string {
  const header = table.columns.map(escapeCell).join(',');
  const body = table.rows.map((row) =>
    table.columns.map((column) => escapeCell(formatCell(getCell(row, column)))).join(','),
  );
  return [header, ...body].join('\n') + '\n';
}

/**
 * One JSON object per line, keys in column order.
 */
export function toNdjson(table: CuratedTable): string {
  return table.rows
    .map((row) => JSON.stringify(Object.fromEntries(table.columns.map((column) => [column, getCell(row, column)]))))
    .map((line) => `${line}\n`)
    .join('');
}
