/**
 * STRATEGY — Rolling window helpers
 *
 * Entries before the first full window are null.
 */

export function rollingSum(values: readonly number[], window: number): (number | null)[] {
  if (!Number.isInteger(window) || window <= 0) {
    throw new RangeError(`window must be a positive integer, got ${window}`);
  }

  const result: (number | null)[] = [];
  let sum = 0;

  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= window) sum -= values[i - window];
    result.push(i >= window - 1 ? sum : null);
  }

  return result;
}

export function rollingMean(values: readonly number[], window: number): (number | null)[] {
  return rollingSum(values, window).map((s) => (s === null ? null : s / window));
}

/** Prices carry two fractional digits, so integer cents are exact. */
export function toCents(price: number): number {
  return Math.round(price * 100);
}
