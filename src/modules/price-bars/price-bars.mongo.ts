/**
 * PRICE BARS — MongoDB Model + Store
 *
 * Collection:
 * - price_bars: OHLCV rows, unique on ts
 */

import mongoose, { Schema, Model } from 'mongoose';
import { StorageError, errorMessage } from '../../common/errors.js';
import { fromDoc } from './price-bars.mapper.js';
import type { PriceBar, PriceBarStore } from './price-bars.types.js';

const PriceBarSchema = new Schema<PriceBar>(
  {
    ts: { type: Date, required: true },
    open: { type: Number, required: true },
    high: { type: Number, required: true },
    low: { type: Number, required: true },
    close: { type: Number, required: true },
    volume: { type: Number, required: true, min: 0 },
  },
  {
    collection: 'price_bars',
    versionKey: false,
  }
);

PriceBarSchema.index({ ts: 1 }, { unique: true, name: 'uniq_ts' });

export const PriceBarModel: Model<PriceBar> =
  mongoose.models.PriceBar || mongoose.model<PriceBar>('PriceBar', PriceBarSchema);

function isDuplicateKey(err: unknown): boolean {
  return err instanceof mongoose.mongo.MongoServerError && err.code === 11000;
}

export class MongoPriceBarStore implements PriceBarStore {
  constructor(private readonly model: Model<PriceBar> = PriceBarModel) {}

  async appendIfAbsent(bar: PriceBar): Promise<boolean> {
    try {
      const res = await this.model
        .updateOne({ ts: bar.ts }, { $setOnInsert: bar }, { upsert: true })
        .exec();
      return res.upsertedCount === 1;
    } catch (err) {
      // A concurrent writer won the upsert race on the unique index.
      if (isDuplicateKey(err)) return false;
      console.error('[PriceBars] Write failed:', errorMessage(err));
      throw new StorageError('Failed to store price bar');
    }
  }

  async scanAscending(): Promise<PriceBar[]> {
    const docs = await this.model.find().sort({ ts: 1 }).lean().exec();
    return docs.map(fromDoc);
  }

  async count(): Promise<number> {
    return this.model.countDocuments().exec();
  }

  async ensureIndexes(): Promise<void> {
    await this.model.createIndexes();
    console.log('[PriceBars] price_bars indexes ensured');
  }
}
