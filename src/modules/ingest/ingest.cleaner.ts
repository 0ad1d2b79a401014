/**
 * INGEST — Row cleaning
 *
 * Turns raw spreadsheet rows into one RowResult each. Column names are
 * matched case-insensitively; extra columns are ignored.
 */

import { MissingColumnsError } from '../../common/errors.js';
import { parseTimestamp, roundPrice } from '../price-bars/price-bars.mapper.js';
import { PRICE_FIELDS, type PriceBar, type PriceField } from '../price-bars/price-bars.types.js';
import { REQUIRED_COLUMNS, type RawTable, type RequiredColumn, type RowResult } from './ingest.types.js';

const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase();
}

export function parseNumericCell(cell: string): number | null {
  const text = cell.trim();
  if (!NUMERIC.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Column index for every required column.
 * Throws MissingColumnsError when any is absent.
 */
export function resolveColumns(columns: readonly string[]): Record<RequiredColumn, number> {
  const normalized = columns.map(normalizeColumnName);
  const missing = REQUIRED_COLUMNS.filter((c) => !normalized.includes(c));
  if (missing.length > 0) {
    throw new MissingColumnsError(REQUIRED_COLUMNS, normalized);
  }

  return {
    datetime: normalized.indexOf('datetime'),
    open: normalized.indexOf('open'),
    high: normalized.indexOf('high'),
    low: normalized.indexOf('low'),
    close: normalized.indexOf('close'),
    volume: normalized.indexOf('volume'),
  };
}

function isHeaderLike(cells: readonly string[], columns: readonly string[]): boolean {
  return cells.some((cell, i) => i < columns.length && cell.trim().toLowerCase() === columns[i]);
}

export function cleanRow(
  cells: readonly string[],
  rowNumber: number,
  index: Record<RequiredColumn, number>,
  columns: readonly string[]
): RowResult {
  const fail = (reason: string): RowResult => ({ ok: false, row: rowNumber, reason });

  if (isHeaderLike(cells, columns)) {
    return fail('repeated header row');
  }

  const rawTs = cells[index.datetime] ?? '';
  const ts = parseTimestamp(rawTs);
  if (ts === null) {
    return fail(`invalid datetime: ${rawTs || '(empty)'}`);
  }

  const prices: Partial<Record<PriceField, number>> = {};
  for (const field of PRICE_FIELDS) {
    const raw = cells[index[field]] ?? '';
    const value = parseNumericCell(raw);
    if (value === null) {
      return fail(`invalid ${field}: ${raw || '(empty)'}`);
    }
    prices[field] = roundPrice(value);
  }

  const rawVolume = cells[index.volume] ?? '';
  const volume = parseNumericCell(rawVolume);
  if (volume === null) {
    return fail(`invalid volume: ${rawVolume || '(empty)'}`);
  }
  if (volume < 0) {
    return fail(`negative volume: ${rawVolume}`);
  }
  if (volume > Number.MAX_SAFE_INTEGER) {
    return fail(`invalid volume: ${rawVolume}`);
  }

  const { open, high, low, close } = prices;
  if (open === undefined || high === undefined || low === undefined || close === undefined) {
    return fail('incomplete prices');
  }

  const bar: PriceBar = { ts, open, high, low, close, volume: Math.trunc(volume) };
  return { ok: true, row: rowNumber, bar };
}

/**
 * Clean every data row of the table. Row numbers count the header as row 1.
 */
export function cleanRows(table: RawTable): RowResult[] {
  const index = resolveColumns(table.columns);
  const columns = table.columns.map(normalizeColumnName);

  return table.rows.map((cells, i) => cleanRow(cells, i + 2, index, columns));
}
