/**
 * STRATEGY — HTTP Endpoints
 *
 * - GET /strategy/performance?short_window=5&long_window=20
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseOrThrow } from '../../common/validation.js';
import type { PriceBarStore } from '../price-bars/price-bars.types.js';
import { DEFAULT_LONG_WINDOW, DEFAULT_SHORT_WINDOW, evaluateCrossover } from './strategy.engine.js';
import type {
  CrossoverOutcome,
  CrossoverParams,
  InsufficientDataWire,
  PerformanceSummaryWire,
} from './strategy.types.js';

export const PerformanceQuerySchema = z.object({
  short_window: z.coerce.number().int().positive().default(DEFAULT_SHORT_WINDOW),
  long_window: z.coerce.number().int().positive().default(DEFAULT_LONG_WINDOW),
});

export function parsePerformanceQuery(query: unknown): CrossoverParams {
  const q = parseOrThrow(PerformanceQuerySchema, query ?? {});
  return { shortWindow: q.short_window, longWindow: q.long_window };
}

export function toOutcomeWire(
  outcome: CrossoverOutcome
): PerformanceSummaryWire | InsufficientDataWire {
  if (outcome.kind === 'insufficient') {
    return { message: outcome.message };
  }

  const s = outcome.summary;
  return {
    buy_signals: s.buySignals,
    sell_signals: s.sellSignals,
    total_trades: s.totalTrades,
    cumulative_return: s.cumulativeReturn,
    data_points: s.dataPoints,
  };
}

export interface StrategyRoutesDeps {
  store: PriceBarStore;
}

export async function registerStrategyRoutes(
  app: FastifyInstance,
  deps: StrategyRoutesDeps
): Promise<void> {
  const { store } = deps;

  app.get('/strategy/performance', async (request) => {
    const params = parsePerformanceQuery(request.query);
    const bars = await store.scanAscending();
    const outcome = evaluateCrossover(bars, params);

    if (outcome.kind === 'insufficient') {
      request.log.info(
        { reason: outcome.reason, available: outcome.available, ...params },
        '[Strategy] Insufficient data'
      );
    }

    return toOutcomeWire(outcome);
  });
}
