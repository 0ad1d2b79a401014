/**
 * STRATEGY — Types
 *
 * Dual moving-average crossover with a one-bar position lag.
 */

export type Signal = -1 | 0 | 1;

export interface CrossoverParams {
  shortWindow: number;
  longWindow: number;
}

/** Minimal bar shape the engine reads. */
export interface ClosePoint {
  ts: Date;
  close: number;
}

/** A bar with both rolling means defined. */
export interface WindowedRow {
  ts: Date;
  close: number;
  shortMa: number;
  longMa: number;
  signal: Signal;
}

/** A windowed row that also has a position (the previous row's signal). */
export interface PositionedRow extends WindowedRow {
  position: Signal;
  /** null on the first row and when the previous close is zero */
  periodReturn: number | null;
  strategyReturn: number | null;
}

export interface PerformanceSummary {
  buySignals: number;
  sellSignals: number;
  totalTrades: number;
  cumulativeReturn: number;
  dataPoints: number;
}

export type InsufficientReason = 'BELOW_LONG_WINDOW' | 'EMPTY_AFTER_WINDOWING' | 'EMPTY_AFTER_LAG';

export type CrossoverOutcome =
  | { kind: 'summary'; summary: PerformanceSummary }
  | { kind: 'insufficient'; reason: InsufficientReason; message: string; available: number };

/** Wire form of the summary. */
export interface PerformanceSummaryWire {
  buy_signals: number;
  sell_signals: number;
  total_trades: number;
  cumulative_return: number;
  data_points: number;
}

export interface InsufficientDataWire {
  message: string;
}
