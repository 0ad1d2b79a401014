/**
 * INGEST — Types
 */

import type { PriceBar, PriceBarWire } from '../price-bars/price-bars.types.js';

export const REQUIRED_COLUMNS = ['datetime', 'open', 'high', 'low', 'close', 'volume'] as const;
export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/** Spreadsheet contents as read: header names and raw cell text. */
export interface RawTable {
  columns: string[];
  rows: string[][];
}

/**
 * Outcome for a single source row. `row` is the spreadsheet row number,
 * counting the header as row 1.
 */
export type RowResult =
  | { ok: true; row: number; bar: PriceBar }
  | { ok: false; row: number; reason: string };

export interface RowFailure {
  row: number;
  reason: string;
}

export interface IngestReport {
  runId: string;
  rowsRead: number;
  rowsInserted: number;
  rowsSkipped: number;
  sample: PriceBar[];
  failures: RowFailure[];
  durationMs: number;
}

export interface IngestReportWire {
  status: 'success';
  run_id: string;
  rows_read: number;
  rows_inserted: number;
  rows_skipped: number;
  sample_data: PriceBarWire[];
  failures: RowFailure[];
}

export interface IngestLogger {
  info(msg: string): void;
  warn(msg: string): void;
}
