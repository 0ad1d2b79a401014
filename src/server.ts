/**
 * Entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { loadConfig } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { MongoPriceBarStore } from './modules/price-bars/index.js';
import { buildApp } from './app.js';

async function main(): Promise<void> {
  const config = loadConfig(process.env);

  await connectMongo(config.mongo);
  const store = new MongoPriceBarStore();
  await store.ensureIndexes();

  const app = buildApp({ config, store });

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info(`[BOOT] ${signal} received, shutting down`);
    try {
      await app.close();
      await disconnectMongo();
      process.exit(0);
    } catch (err) {
      app.log.error(err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`[BOOT] Listening on ${config.host}:${config.port}`);
}

main().catch((err) => {
  console.error('[BOOT] Fatal:', err);
  process.exit(1);
});
