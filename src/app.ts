import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config/env.js';
import { AppError, ValidationError } from './common/errors.js';
import { registerPriceBarRoutes, type PriceBarStore } from './modules/price-bars/index.js';
import { registerStrategyRoutes } from './modules/strategy/index.js';
import { IngestService, registerIngestRoutes } from './modules/ingest/index.js';

export interface AppDeps {
  config: AppConfig;
  store: PriceBarStore;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const { config, store } = deps;

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // CORS
  app.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) request.log.error(err);
      else request.log.info({ code: err.code }, err.message);

      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...(err instanceof ValidationError ? { details: err.details } : {}),
      });
    }

    request.log.error(err);

    // Fastify validation / body parse errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    const statusCode = err.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        ok: false,
        error: 'BAD_REQUEST',
        message: err.message,
      });
    }

    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: config.nodeEnv === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/health', async () => ({
    ok: true,
    ts: new Date().toISOString(),
    bars: await store.count(),
  }));

  const ingest = new IngestService({
    store,
    sourcePath: config.ingest.sourcePath,
    logger: app.log,
  });

  app.register(async (fastify) => {
    await registerPriceBarRoutes(fastify, { store });
    await registerStrategyRoutes(fastify, { store });
    await registerIngestRoutes(fastify, { ingest });
  });

  return app;
}
