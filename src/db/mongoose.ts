/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';
import type { MongoConfig } from '../config/env.js';

export { mongoose };

export async function connectMongo(config: MongoConfig): Promise<typeof mongoose> {
  if (mongoose.connection.readyState === 1) {
    return mongoose;
  }

  await mongoose.connect(config.url, {
    dbName: config.dbName,
    serverSelectionTimeoutMS: 5000,
  });

  console.log(`[DB] Connected to MongoDB (${config.dbName})`);
  return mongoose;
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  console.log('[DB] Disconnected from MongoDB');
}
