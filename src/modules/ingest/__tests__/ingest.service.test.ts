/**
 * Ingest service tests
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  MissingColumnsError,
  NoValidRowsError,
  SourceUnreadableError,
} from '../../../common/errors.js';
import { IngestService, toReportWire } from '../ingest.service.js';
import { MemoryPriceBarStore } from '../../../__tests__/helpers/memory-store.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const fixture = (name: string): string => path.join(__dirname, 'fixtures', name);

describe('IngestService', () => {
  let store: MemoryPriceBarStore;
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
  };

  const service = (file: string): IngestService =>
    new IngestService({ store, sourcePath: fixture(file), logger: mockLogger });

  beforeEach(() => {
    vi.clearAllMocks();
    store = new MemoryPriceBarStore();
  });

  it('inserts clean rows and reports rejected ones', async () => {
    const report = await service('prices.csv').run();

    expect(report.rowsRead).toBe(9);
    expect(report.rowsInserted).toBe(5);
    expect(report.rowsSkipped).toBe(1);
    expect(report.failures).toEqual([
      { row: 4, reason: 'repeated header row' },
      { row: 6, reason: 'invalid datetime: not a date' },
      { row: 8, reason: 'invalid close: (empty)' },
    ]);
    expect(report.sample.map((b) => b.ts.toISOString())).toEqual([
      '2024-03-01T00:00:00.000Z',
      '2024-03-02T00:00:00.000Z',
      '2024-03-03T00:00:00.000Z',
    ]);
    expect(report.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('stores rounded prices and integer volume', async () => {
    await service('prices.csv').run();
    const bars = await store.scanAscending();

    expect(bars.map((b) => b.ts.toISOString().slice(0, 10))).toEqual([
      '2024-03-01',
      '2024-03-02',
      '2024-03-03',
      '2024-03-04',
      '2024-03-06',
    ]);
    expect(bars[3]).toMatchObject({ high: 104.33, close: 104, volume: 15000 });
    expect(bars[4].volume).toBe(0);
  });

  it('keeps inserted rows and records storage failures per row', async () => {
    const failing = new Date(Date.UTC(2024, 2, 3)).getTime();
    store.failOn = (bar) => bar.ts.getTime() === failing;

    const report = await service('prices.csv').run();

    expect(report.rowsInserted).toBe(4);
    expect(report.failures).toContainEqual({
      row: 5,
      reason: 'storage error: Failed to store price bar',
    });
    expect(report.failures.map((f) => f.row)).toEqual([4, 5, 6, 8]);
    expect(await store.count()).toBe(4);
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it('skips everything on a second run', async () => {
    await service('prices.csv').run();
    const second = await service('prices.csv').run();

    expect(second.rowsInserted).toBe(0);
    expect(second.rowsSkipped).toBe(6);
    expect(await store.count()).toBe(5);
  });

  it('fails when the source cannot be read', async () => {
    await expect(service('missing.csv').run()).rejects.toBeInstanceOf(SourceUnreadableError);
  });

  it('fails when required columns are absent', async () => {
    await expect(service('missing-columns.csv').run()).rejects.toBeInstanceOf(MissingColumnsError);
  });

  it('fails when no row survives cleaning', async () => {
    await expect(service('no-valid-rows.csv').run()).rejects.toBeInstanceOf(NoValidRowsError);
    expect(await store.count()).toBe(0);
  });
});

describe('toReportWire', () => {
  it('renders snake_case fields and two-digit prices', () => {
    const wire = toReportWire({
      runId: 'run-1',
      rowsRead: 2,
      rowsInserted: 1,
      rowsSkipped: 0,
      sample: [
        {
          ts: new Date(Date.UTC(2024, 0, 2)),
          open: 1,
          high: 2.5,
          low: 0.5,
          close: 2,
          volume: 10,
        },
      ],
      failures: [{ row: 3, reason: 'invalid open: x' }],
      durationMs: 5,
    });

    expect(wire).toEqual({
      status: 'success',
      run_id: 'run-1',
      rows_read: 2,
      rows_inserted: 1,
      rows_skipped: 0,
      sample_data: [
        {
          datetime: '2024-01-02T00:00:00.000Z',
          open: '1.00',
          high: '2.50',
          low: '0.50',
          close: '2.00',
          volume: 10,
        },
      ],
      failures: [{ row: 3, reason: 'invalid open: x' }],
    });
  });
});
