/**
 * PRICE BARS — Input validation
 *
 * Prices: finite, at most two fractional digits (number or numeric string).
 * Volume: non-negative safe integer. Datetime: ISO-8601 or a spreadsheet
 * layout (see parseTimestamp), UTC when no offset is given.
 */

import { z } from 'zod';
import { parseOrThrow } from '../../common/validation.js';
import { parseTimestamp, roundPrice } from './price-bars.mapper.js';
import type { PriceBar } from './price-bars.types.js';

const PLAIN_DECIMAL = /^[+-]?(\d+)(?:\.(\d+))?$/;

/**
 * Count fractional digits of a plain decimal literal, ignoring trailing
 * zeros. Returns null for anything that is not a plain decimal.
 */
export function fractionalDigits(literal: string): number | null {
  const m = PLAIN_DECIMAL.exec(literal.trim());
  if (!m) return null;
  const fraction = (m[2] ?? '').replace(/0+$/, '');
  return fraction.length;
}

const priceSchema = z
  .union([z.number(), z.string()])
  .superRefine((value, ctx) => {
    const literal = typeof value === 'number' ? String(value) : value;
    if (typeof value === 'number' && !Number.isFinite(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a finite number' });
      return;
    }
    const digits = fractionalDigits(literal);
    if (digits === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a decimal number' });
    } else if (digits > 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'must have no more than 2 decimal places',
      });
    }
  })
  .transform((value) => roundPrice(Number(value)));

const volumeSchema = z.preprocess(
  (value) => (typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value) : value),
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)
);

const datetimeSchema = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    const ts = parseTimestamp(value);
    if (ts === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a valid datetime' });
      return z.NEVER;
    }
    return ts;
  });

export const PriceBarInputSchema = z.object({
  datetime: datetimeSchema,
  open: priceSchema,
  high: priceSchema,
  low: priceSchema,
  close: priceSchema,
  volume: volumeSchema,
});

export function parsePriceBarInput(body: unknown): PriceBar {
  const input = parseOrThrow(PriceBarInputSchema, body);
  return {
    ts: input.datetime,
    open: input.open,
    high: input.high,
    low: input.low,
    close: input.close,
    volume: input.volume,
  };
}
