/**
 * INGEST — HTTP Endpoints
 *
 * - GET /init   - Load the configured spreadsheet into the store
 */

import type { FastifyInstance } from 'fastify';
import { IngestService, toReportWire } from './ingest.service.js';
import type { IngestReportWire } from './ingest.types.js';

export interface IngestRoutesDeps {
  ingest: IngestService;
}

export async function registerIngestRoutes(
  app: FastifyInstance,
  deps: IngestRoutesDeps
): Promise<void> {
  app.get('/init', async (): Promise<IngestReportWire> => {
    const report = await deps.ingest.run();
    return toReportWire(report);
  });
}
