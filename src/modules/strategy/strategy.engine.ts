/**
 * STRATEGY — Moving-average crossover engine
 *
 * Pure: no I/O, no shared state. Input bars must be ascending by ts with
 * unique timestamps.
 *
 * Pipeline:
 *   closes -> short/long rolling means -> keep rows with both means
 *   -> signal (+1 / -1 / 0) -> position = previous row's signal, drop first row
 *   -> period return against the previous *kept* row -> compound.
 *
 * A zero previous close leaves that row's return undefined; the row is left
 * out of the product but still counts toward data points and signal counts.
 */

import { rollingSum, toCents } from './strategy.rolling.js';
import type {
  ClosePoint,
  CrossoverOutcome,
  CrossoverParams,
  PerformanceSummary,
  PositionedRow,
  Signal,
  WindowedRow,
} from './strategy.types.js';

// ═══════════════════════════════════════════════════════════════
// PARAMS
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_SHORT_WINDOW = 5;
export const DEFAULT_LONG_WINDOW = 20;

function assertWindow(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

// ═══════════════════════════════════════════════════════════════
// SERIES
// ═══════════════════════════════════════════════════════════════

/**
 * Rolling means and signals for every bar where both windows are full.
 */
export function buildWindowedSeries(
  bars: readonly ClosePoint[],
  params: CrossoverParams
): WindowedRow[] {
  const { shortWindow, longWindow } = params;
  assertWindow('shortWindow', shortWindow);
  assertWindow('longWindow', longWindow);

  const cents = bars.map((b) => toCents(b.close));
  const shortSums = rollingSum(cents, shortWindow);
  const longSums = rollingSum(cents, longWindow);

  const rows: WindowedRow[] = [];
  for (let i = 0; i < bars.length; i++) {
    const shortSum = shortSums[i];
    const longSum = longSums[i];
    if (shortSum === null || longSum === null) continue;

    // shortSum/shortWindow vs longSum/longWindow, compared without division
    const lhs = shortSum * longWindow;
    const rhs = longSum * shortWindow;
    const signal: Signal = lhs > rhs ? 1 : lhs < rhs ? -1 : 0;

    rows.push({
      ts: bars[i].ts,
      close: bars[i].close,
      shortMa: shortSum / shortWindow / 100,
      longMa: longSum / longWindow / 100,
      signal,
    });
  }

  return rows;
}

/**
 * Shift signals by one row into positions and attach returns.
 * The first windowed row has no position and is dropped.
 */
export function applyPositionLag(rows: readonly WindowedRow[]): PositionedRow[] {
  const positioned: PositionedRow[] = [];

  for (let i = 1; i < rows.length; i++) {
    const position = rows[i - 1].signal;
    const prev = positioned.length > 0 ? positioned[positioned.length - 1] : null;

    let periodReturn: number | null = null;
    if (prev !== null && prev.close !== 0) {
      periodReturn = (rows[i].close - prev.close) / prev.close;
    }

    positioned.push({
      ...rows[i],
      position,
      periodReturn,
      strategyReturn: periodReturn === null ? null : position * periodReturn,
    });
  }

  return positioned;
}

// ═══════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════

/** Half away from zero; -0 comes back as 0. */
export function roundTo(value: number, digits: number): number {
  const f = 10 ** digits;
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * f)) / f;
  return rounded === 0 ? 0 : rounded;
}

export function summarize(rows: readonly PositionedRow[]): PerformanceSummary {
  let growth = 1;
  let buySignals = 0;
  let sellSignals = 0;

  for (const row of rows) {
    if (row.position === 1) buySignals++;
    else if (row.position === -1) sellSignals++;

    if (row.strategyReturn !== null) {
      growth *= 1 + row.strategyReturn;
    }
  }

  return {
    buySignals,
    sellSignals,
    totalTrades: buySignals + sellSignals,
    cumulativeReturn: roundTo(growth - 1, 4),
    dataPoints: rows.length,
  };
}

/**
 * Run the crossover backtest over an ordered series.
 * Too little data is a normal outcome, not an error.
 */
export function evaluateCrossover(
  bars: readonly ClosePoint[],
  params: CrossoverParams
): CrossoverOutcome {
  const { longWindow } = params;

  if (bars.length < longWindow) {
    return {
      kind: 'insufficient',
      reason: 'BELOW_LONG_WINDOW',
      message: `Not enough valid data. Need at least ${longWindow} rows.`,
      available: bars.length,
    };
  }

  const windowed = buildWindowedSeries(bars, params);
  if (windowed.length === 0) {
    return {
      kind: 'insufficient',
      reason: 'EMPTY_AFTER_WINDOWING',
      message: `Not enough valid data after filtering. Have ${windowed.length} rows.`,
      available: windowed.length,
    };
  }

  const positioned = applyPositionLag(windowed);
  if (positioned.length === 0) {
    return {
      kind: 'insufficient',
      reason: 'EMPTY_AFTER_LAG',
      message: `Not enough data to derive positions. Have ${windowed.length} rows after windowing.`,
      available: windowed.length,
    };
  }

  return { kind: 'summary', summary: summarize(positioned) };
}
