/**
 * INGEST MODULE — Index
 */

export * from './ingest.types.js';
export { IngestService, toReportWire } from './ingest.service.js';
export { registerIngestRoutes } from './ingest.routes.js';
