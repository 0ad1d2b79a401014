/**
 * APP CONFIG — Environment
 *
 * Parsed once at start-up and handed to the store, the ingestion
 * adapter and the HTTP app. Nothing else reads process.env.
 */

import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CORS_ORIGINS: z.string().default('*'),
  MONGO_URL: z.string().min(1).default('mongodb://localhost:27017'),
  DB_NAME: z.string().min(1).default('prices'),
  INGEST_SOURCE_PATH: z.string().min(1).default('data/prices.csv'),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface MongoConfig {
  readonly url: string;
  readonly dbName: string;
}

export interface AppConfig {
  readonly nodeEnv: 'development' | 'test' | 'production';
  readonly port: number;
  readonly host: string;
  readonly logLevel: LogLevel;
  readonly corsOrigins: true | string[];
  readonly mongo: MongoConfig;
  readonly ingest: {
    readonly sourcePath: string;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the app config from an environment map (process.env in production).
 */
export function loadConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    );
  }

  const env = parsed.data;

  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    corsOrigins:
      env.CORS_ORIGINS === '*'
        ? true
        : env.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    mongo: { url: env.MONGO_URL, dbName: env.DB_NAME },
    ingest: { sourcePath: env.INGEST_SOURCE_PATH },
  };

  return Object.freeze(config);
}
