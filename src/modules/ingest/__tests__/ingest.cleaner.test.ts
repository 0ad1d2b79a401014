import { describe, it, expect } from 'vitest';
import { MissingColumnsError } from '../../../common/errors.js';
import { cleanRows, parseNumericCell, resolveColumns } from '../ingest.cleaner.js';
import { parseTabularText } from '../ingest.reader.js';

describe('parseNumericCell', () => {
  it('parses plain and exponent numbers', () => {
    expect(parseNumericCell('101.5')).toBe(101.5);
    expect(parseNumericCell(' 7 ')).toBe(7);
    expect(parseNumericCell('1.2e3')).toBe(1200);
    expect(parseNumericCell('-.5')).toBe(-0.5);
  });

  it('rejects blanks and non-numbers', () => {
    expect(parseNumericCell('')).toBeNull();
    expect(parseNumericCell('0x10')).toBeNull();
    expect(parseNumericCell('1,000')).toBeNull();
    expect(parseNumericCell('NaN')).toBeNull();
  });
});

describe('resolveColumns', () => {
  it('matches column names case-insensitively', () => {
    expect(resolveColumns(['Volume', ' CLOSE', 'low', 'High', 'open', 'DateTime'])).toEqual({
      datetime: 5,
      open: 4,
      high: 3,
      low: 2,
      close: 1,
      volume: 0,
    });
  });

  it('lists needed and found columns when some are missing', () => {
    const columns = ['Date', 'Open', 'High', 'Low', 'Close'];

    expect(() => resolveColumns(columns)).toThrow(MissingColumnsError);
    expect(() => resolveColumns(columns)).toThrow(
      'Missing required columns. Needed: datetime, open, high, low, close, volume. Found: date, open, high, low, close'
    );
  });
});

describe('cleanRows', () => {
  const table = parseTabularText(
    [
      'Datetime,Open,High,Low,Close,Volume',
      '2024-03-01,100,101.5,99.254,101,12000.9',
      'datetime,open,high,low,close,volume',
      'yesterday,1,1,1,1,1',
      '2024-03-02,1,abc,1,1,1',
      '2024-03-03,1,1,1,1,-4',
      '2024-03-04T10:00:00+01:00,5,6,4,5.5,0',
    ].join('\n')
  );

  it('returns one result per data row with spreadsheet row numbers', () => {
    const results = cleanRows(table);

    expect(results.map((r) => r.row)).toEqual([2, 3, 4, 5, 6, 7]);
    expect(results.map((r) => r.ok)).toEqual([true, false, false, false, false, true]);
  });

  it('rounds prices and truncates volume', () => {
    const [first] = cleanRows(table);
    expect(first).toEqual({
      ok: true,
      row: 2,
      bar: {
        ts: new Date(Date.UTC(2024, 2, 1)),
        open: 100,
        high: 101.5,
        low: 99.25,
        close: 101,
        volume: 12000,
      },
    });
  });

  it('explains each rejected row', () => {
    const reasons = cleanRows(table).flatMap((r) => (r.ok ? [] : [r.reason]));
    expect(reasons).toEqual([
      'repeated header row',
      'invalid datetime: yesterday',
      'invalid high: abc',
      'negative volume: -4',
    ]);
  });

  it('reads slash-separated dates as UTC and rejects unsafe volumes', () => {
    const results = cleanRows(
      parseTabularText(
        [
          'datetime,open,high,low,close,volume',
          '3/5/2024 9:30,1,1,1,1,1',
          '2024/03/06,1,1,1,1,9007199254740993',
        ].join('\n')
      )
    );
    const [first, second] = results;
    expect(first.ok && first.bar.ts.toISOString()).toBe('2024-03-05T09:30:00.000Z');
    expect(second).toEqual({ ok: false, row: 3, reason: 'invalid volume: 9007199254740993' });
  });

  it('honours an explicit offset', () => {
    const last = cleanRows(table)[5];
    expect(last.ok && last.bar.ts.toISOString()).toBe('2024-03-04T09:00:00.000Z');
  });
});
