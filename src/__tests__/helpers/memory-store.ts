import { StorageError } from '../../common/errors.js';
import type { PriceBar, PriceBarStore } from '../../modules/price-bars/price-bars.types.js';

/**
 * In-process stand-in for the Mongo store.
 */
export class MemoryPriceBarStore implements PriceBarStore {
  private readonly bars = new Map<number, PriceBar>();
  public failOn: ((bar: PriceBar) => boolean) | null = null;

  async appendIfAbsent(bar: PriceBar): Promise<boolean> {
    if (this.failOn?.(bar)) {
      throw new StorageError('Failed to store price bar');
    }
    const key = bar.ts.getTime();
    if (this.bars.has(key)) return false;
    this.bars.set(key, { ...bar });
    return true;
  }

  async scanAscending(): Promise<PriceBar[]> {
    return [...this.bars.values()].sort((a, b) => a.ts.getTime() - b.ts.getTime());
  }

  async count(): Promise<number> {
    return this.bars.size;
  }
}

/** Daily bars starting 2024-01-01 UTC with the given closes. */
export function barsFromCloses(closes: readonly number[]): PriceBar[] {
  const start = Date.UTC(2024, 0, 1);
  return closes.map((close, i) => ({
    ts: new Date(start + i * 86_400_000),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  }));
}
