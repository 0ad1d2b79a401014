/**
 * INGEST — Spreadsheet reader
 *
 * Reads the price sheet from an .xlsx workbook (first worksheet) or a CSV
 * export. The first record is the header.
 */

import fs from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import ExcelJS from 'exceljs';
import { SourceUnreadableError, errorMessage } from '../../common/errors.js';
import type { RawTable } from './ingest.types.js';

function isRecordList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((r) => Array.isArray(r) && r.every((c) => typeof c === 'string'))
  );
}

function toTable(records: string[][]): RawTable {
  if (records.length === 0) {
    return { columns: [], rows: [] };
  }
  const [header, ...rows] = records;
  return { columns: header, rows };
}

export function parseTabularText(text: string): RawTable {
  const records: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  return isRecordList(records) ? toTable(records) : { columns: [], rows: [] };
}

/**
 * Cell text as the cleaner expects it. Date cells become ISO strings (exceljs
 * reads them as UTC); formulas contribute their cached result.
 */
export function cellText(value: ExcelJS.CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value !== 'object') return String(value);

  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return typeof value.text === 'string' ? value.text : '';
  if ('result' in value) return cellText(value.result);
  return '';
}

export function parseWorksheet(sheet: ExcelJS.Worksheet): RawTable {
  const records: string[][] = [];

  sheet.eachRow({ includeEmpty: false }, (row) => {
    const cells: string[] = [];
    for (let col = 1; col <= row.cellCount; col++) {
      cells.push(cellText(row.getCell(col).value).trim());
    }
    if (cells.some((cell) => cell !== '')) records.push(cells);
  });

  return toTable(records);
}

async function readWorkbook(sourcePath: string): Promise<RawTable> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(sourcePath);

  const [sheet] = workbook.worksheets;
  return sheet ? parseWorksheet(sheet) : { columns: [], rows: [] };
}

async function readCsv(sourcePath: string): Promise<RawTable> {
  const text = await fs.readFile(sourcePath, 'utf-8');
  return parseTabularText(text);
}

/** Picks the reader by file extension: .xlsx is a workbook, anything else CSV. */
export async function readTabularSource(sourcePath: string): Promise<RawTable> {
  const isWorkbook = path.extname(sourcePath).toLowerCase() === '.xlsx';
  try {
    return isWorkbook ? await readWorkbook(sourcePath) : await readCsv(sourcePath);
  } catch (err) {
    throw new SourceUnreadableError(sourcePath, errorMessage(err));
  }
}
