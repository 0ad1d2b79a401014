/**
 * PRICE BARS — Mappers
 *
 * Conversions between stored bars, wire bars and raw documents.
 */

import type { PriceBar, PriceBarWire } from './price-bars.types.js';

export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatPrice(value: number): string {
  return value.toFixed(2);
}

/**
 * Accepted timestamp layouts. Anything else is rejected.
 * - ISO-8601: 2024-01-05, 2024-01-05T09:30[:15[.250]][Z|+05:30]
 * - year first: 2024/01/05[ 9:30[:15]]
 * - US month first: 1/5/2024[ 9:30[:15]]
 */
const ISO_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const YEAR_FIRST = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?: (\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const MONTH_FIRST = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: (\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

interface TimestampParts {
  year: string;
  month: string;
  day: string;
  hour?: string;
  minute?: string;
  second?: string;
  fraction?: string;
  offset?: string;
}

function offsetMinutes(offset: string | undefined): number | null {
  if (offset === undefined || offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

function fromParts(p: TimestampParts): Date | null {
  const year = Number(p.year);
  const month = Number(p.month);
  const day = Number(p.day);
  const hour = Number(p.hour ?? 0);
  const minute = Number(p.minute ?? 0);
  const second = Number(p.second ?? 0);
  const millis = Number((p.fraction ?? '').padEnd(3, '0').slice(0, 3));
  const offset = offsetMinutes(p.offset);

  if (offset === null || year < 1000 || month < 1 || month > 12) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const ms = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(ms);
  // Date.UTC rolls 2024-02-30 over into March
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return null;

  return new Date(ms - offset * 60_000);
}

/**
 * Parse a timestamp string. Values without an offset are read as UTC,
 * so the result does not depend on the server's time zone.
 */
export function parseTimestamp(value: string): Date | null {
  const trimmed = value.trim();

  const iso = ISO_DATETIME.exec(trimmed);
  if (iso) {
    const [, year, month, day, hour, minute, second, fraction, offset] = iso;
    return fromParts({ year, month, day, hour, minute, second, fraction, offset });
  }

  const ymd = YEAR_FIRST.exec(trimmed);
  if (ymd) {
    const [, year, month, day, hour, minute, second] = ymd;
    return fromParts({ year, month, day, hour, minute, second });
  }

  const mdy = MONTH_FIRST.exec(trimmed);
  if (mdy) {
    const [, month, day, year, hour, minute, second] = mdy;
    return fromParts({ year, month, day, hour, minute, second });
  }

  return null;
}

export function toWire(bar: PriceBar): PriceBarWire {
  return {
    datetime: bar.ts.toISOString(),
    open: formatPrice(bar.open),
    high: formatPrice(bar.high),
    low: formatPrice(bar.low),
    close: formatPrice(bar.close),
    volume: bar.volume,
  };
}

/** Shape of a lean price_bars document. */
export interface PriceBarDoc {
  ts?: unknown;
  open?: unknown;
  high?: unknown;
  low?: unknown;
  close?: unknown;
  volume?: unknown;
}

export class BarMappingError extends Error {
  constructor(field: string, value: unknown) {
    super(`Stored bar has invalid ${field}: ${String(value)}`);
    this.name = 'BarMappingError';
  }
}

function finite(field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new BarMappingError(field, value);
  }
  return value;
}

/**
 * Map a stored document into a PriceBar, checking every field once.
 */
export function fromDoc(doc: PriceBarDoc): PriceBar {
  if (!(doc.ts instanceof Date) || Number.isNaN(doc.ts.getTime())) {
    throw new BarMappingError('ts', doc.ts);
  }

  const volume = finite('volume', doc.volume);
  if (!Number.isInteger(volume) || volume < 0) {
    throw new BarMappingError('volume', doc.volume);
  }

  return {
    ts: doc.ts,
    open: finite('open', doc.open),
    high: finite('high', doc.high),
    low: finite('low', doc.low),
    close: finite('close', doc.close),
    volume,
  };
}
