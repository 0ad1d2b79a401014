/**
 * PRICE BARS — HTTP Endpoints
 *
 * - GET  /data   - All bars, oldest first
 * - POST /data   - Add one bar (duplicate timestamp is a no-op)
 */

import type { FastifyInstance } from 'fastify';
import { toWire } from './price-bars.mapper.js';
import { parsePriceBarInput } from './price-bars.validation.js';
import type { AddPriceBarResult, PriceBarStore, PriceBarWire } from './price-bars.types.js';

export interface PriceBarRoutesDeps {
  store: PriceBarStore;
}

export async function registerPriceBarRoutes(
  app: FastifyInstance,
  deps: PriceBarRoutesDeps
): Promise<void> {
  const { store } = deps;

  app.get('/data', async (): Promise<PriceBarWire[]> => {
    const bars = await store.scanAscending();
    return bars.map(toWire);
  });

  app.post('/data', async (request): Promise<AddPriceBarResult> => {
    const bar = parsePriceBarInput(request.body);
    const inserted = await store.appendIfAbsent(bar);

    if (!inserted) {
      request.log.info({ ts: bar.ts.toISOString() }, '[PriceBars] Duplicate timestamp, nothing inserted');
    }

    return {
      message: inserted ? 'Price bar added successfully' : 'Price bar already exists',
      inserted,
    };
  });
}
