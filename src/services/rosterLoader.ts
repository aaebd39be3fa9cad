/**
 * Roster Loader Service
 * Reads the performer spreadsheet into PerformerRecords in sheet row order.
 * Row order is the order of the final video.
 */

import ExcelJS from 'exceljs';
import type { CellRichTextValue, CellValue, Worksheet } from 'exceljs';
import path from 'path';
import { REQUIRED_COLUMNS } from '../types/compilation.js';
import type { PerformerRecord, RosterColumn } from '../types/compilation.js';
import { FileFormatError, MissingColumnError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * One worksheet data row with its cells already converted to text
 */
export interface RosterRow {
  /** 1-based worksheet row number */
  rowNumber: number;
  /** Cell text indexed by 1-based column number */
  cells: ReadonlyMap<number, string>;
}

/**
 * Convert an ExcelJS cell value to the text shown on the title card
 *
 * Numbers and booleans are stringified, dates become YYYY-MM-DD,
 * rich text is concatenated and formulas use their cached result.
 */
export function cellToText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);

  if ('richText' in value) {
    return value.richText.map(run => run.text).join('');
  }
  if ('hyperlink' in value) {
    // Link text with mixed formatting is stored as rich text
    const text: string | CellRichTextValue = value.text;
    return typeof text === 'string' ? text : cellToText(text);
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? '' : cellToText(value.result);
  }
  if ('error' in value) {
    return value.error;
  }
  return '';
}

/**
 * Map each required header to its column number
 *
 * @param headers - Header text indexed by 1-based column number
 * @throws MissingColumnError listing every absent header
 */
export function mapRequiredColumns(headers: ReadonlyMap<number, string>): Record<RosterColumn, number> {
  const columnByHeader = new Map<string, number>();
  for (const [column, header] of headers) {
    // First occurrence wins when a header is duplicated
    if (!columnByHeader.has(header)) {
      columnByHeader.set(header, column);
    }
  }

  const missing = REQUIRED_COLUMNS.filter(required => !columnByHeader.has(required));
  if (missing.length > 0) {
    throw new MissingColumnError([...missing]);
  }

  const lookup = (column: RosterColumn): number => columnByHeader.get(column) ?? 0;
  return {
    Name: lookup('Name'),
    Location: lookup('Location'),
    Composition: lookup('Composition'),
    Raag: lookup('Raag'),
    Taal: lookup('Taal'),
    Description: lookup('Description'),
  };
}

/**
 * Build performer records from a header row and data rows
 *
 * Rows whose six required cells are all empty are skipped; any other row
 * becomes a record, with '' for its empty cells.
 */
export function parseRosterRows(
  headers: ReadonlyMap<number, string>,
  rows: readonly RosterRow[]
): PerformerRecord[] {
  const columns = mapRequiredColumns(headers);
  const records: PerformerRecord[] = [];

  for (const row of rows) {
    const cell = (column: RosterColumn): string => row.cells.get(columns[column]) ?? '';

    const record: PerformerRecord = Object.freeze({
      rowNumber: row.rowNumber,
      name: cell('Name'),
      location: cell('Location'),
      composition: cell('Composition'),
      raag: cell('Raag'),
      taal: cell('Taal'),
      description: cell('Description'),
    });

    const isBlank = REQUIRED_COLUMNS.every(column => cell(column) === '');
    if (isBlank) {
      logger.debug(`[RosterLoader] Skipping blank row ${row.rowNumber}`);
      continue;
    }

    records.push(record);
  }

  return records;
}

function readRowCells(worksheet: Worksheet, rowNumber: number): Map<number, string> {
  const cells = new Map<number, string>();
  worksheet.getRow(rowNumber).eachCell({ includeEmpty: false }, (cell, colNumber) => {
    cells.set(colNumber, cellToText(cell.value));
  });
  return cells;
}

/**
 * Load the roster spreadsheet
 *
 * Uses the first worksheet; row 1 is the header row.
 *
 * @param spreadsheetPath - Path to the .xlsx file
 * @returns Records in sheet row order
 * @throws FileFormatError if the file cannot be parsed as a spreadsheet
 * @throws MissingColumnError if a required header is absent
 */
export async function loadRoster(spreadsheetPath: string): Promise<PerformerRecord[]> {
  logger.info(`[RosterLoader] 📋 Reading roster from ${path.basename(spreadsheetPath)}`);

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(spreadsheetPath);
  } catch (error) {
    const reason = path.extname(spreadsheetPath).toLowerCase() === '.xls'
      ? 'legacy .xls workbooks are not supported, save the file as .xlsx'
      : error instanceof Error ? error.message : String(error);
    throw new FileFormatError(spreadsheetPath, reason, error);
  }

  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new FileFormatError(spreadsheetPath, 'workbook contains no worksheets');
  }

  const headers = readRowCells(worksheet, 1);
  const rows: RosterRow[] = [];
  worksheet.eachRow({ includeEmpty: false }, (_row, rowNumber) => {
    if (rowNumber === 1) return;
    rows.push({ rowNumber, cells: readRowCells(worksheet, rowNumber) });
  });

  const records = parseRosterRows(headers, rows);
  logger.info(`[RosterLoader] ✅ Loaded ${records.length} performer(s) from worksheet "${worksheet.name}"`);
  return records;
}
