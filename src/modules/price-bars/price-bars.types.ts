/**
 * PRICE BARS — Types
 */

/** One OHLCV observation. Prices carry two fractional digits. */
export interface PriceBar {
  ts: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** PriceBar as it travels over HTTP. */
export interface PriceBarWire {
  datetime: string;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: number;
}

export const PRICE_FIELDS = ['open', 'high', 'low', 'close'] as const;
export type PriceField = (typeof PRICE_FIELDS)[number];

/**
 * Series store. Bars are keyed by timestamp and never updated or deleted.
 */
export interface PriceBarStore {
  /** Inserts the bar unless one with the same timestamp exists. */
  appendIfAbsent(bar: PriceBar): Promise<boolean>;
  /** All bars, oldest first. */
  scanAscending(): Promise<PriceBar[]>;
  count(): Promise<number>;
}

export interface AddPriceBarResult {
  message: string;
  inserted: boolean;
}
