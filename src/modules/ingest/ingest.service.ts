/**
 * INGEST — Service
 *
 * Spreadsheet -> cleaned rows -> append-if-absent, one row at a time.
 * Rows already written stay written when a later row fails; every failure
 * is reported with its row number.
 */

import { randomUUID } from 'crypto';
import { NoValidRowsError, errorMessage } from '../../common/errors.js';
import { toWire } from '../price-bars/price-bars.mapper.js';
import type { PriceBar, PriceBarStore } from '../price-bars/price-bars.types.js';
import { cleanRows } from './ingest.cleaner.js';
import { readTabularSource } from './ingest.reader.js';
import type { IngestLogger, IngestReport, IngestReportWire, RowFailure } from './ingest.types.js';

const SAMPLE_SIZE = 3;

export interface IngestServiceOptions {
  store: PriceBarStore;
  sourcePath: string;
  logger: IngestLogger;
}

export class IngestService {
  private readonly store: PriceBarStore;
  private readonly sourcePath: string;
  private readonly logger: IngestLogger;

  constructor(options: IngestServiceOptions) {
    this.store = options.store;
    this.sourcePath = options.sourcePath;
    this.logger = options.logger;
  }

  async run(): Promise<IngestReport> {
    const runId = randomUUID();
    const startTime = Date.now();

    this.logger.info(`[Ingest] ${runId} reading ${this.sourcePath}`);
    const table = await readTabularSource(this.sourcePath);
    const results = cleanRows(table);

    const failures: RowFailure[] = [];
    const clean: PriceBar[] = [];
    for (const r of results) {
      if (r.ok) clean.push(r.bar);
      else failures.push({ row: r.row, reason: r.reason });
    }

    this.logger.info(
      `[Ingest] ${runId} rows=${results.length} clean=${clean.length} rejected=${failures.length}`
    );

    if (clean.length === 0) {
      throw new NoValidRowsError();
    }

    let rowsInserted = 0;
    let rowsSkipped = 0;

    for (const r of results) {
      if (!r.ok) continue;
      try {
        const inserted = await this.store.appendIfAbsent(r.bar);
        if (inserted) rowsInserted++;
        else rowsSkipped++;
      } catch (err) {
        const reason = `storage error: ${errorMessage(err)}`;
        failures.push({ row: r.row, reason });
        this.logger.warn(`[Ingest] ${runId} row ${r.row} ${reason}`);
      }
    }

    failures.sort((a, b) => a.row - b.row);

    const report: IngestReport = {
      runId,
      rowsRead: results.length,
      rowsInserted,
      rowsSkipped,
      sample: clean.slice(0, SAMPLE_SIZE),
      failures,
      durationMs: Date.now() - startTime,
    };

    this.logger.info(
      `[Ingest] ${runId} inserted=${rowsInserted} skipped=${rowsSkipped} failed=${failures.length} in ${report.durationMs}ms`
    );

    return report;
  }
}

export function toReportWire(report: IngestReport): IngestReportWire {
  return {
    status: 'success',
    run_id: report.runId,
    rows_read: report.rowsRead,
    rows_inserted: report.rowsInserted,
    rows_skipped: report.rowsSkipped,
    sample_data: report.sample.map(toWire),
    failures: report.failures,
  };
}
