/**
 * Workbook Writer
 *
 * Persists a set of named tables as one .xlsx workbook, one sheet per table
 * with a header row in column order, and reads filled workbooks back.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { logFlow } from '../utils/logging.js';
import { ArtifactWriteError, describeError } from '../utils/errors.js';
import type { RawRow } from './row-schemas.js';
import type { Cell, ReportTable } from '../types/report.js';

export const GAP_WORKBOOK_NAME = 'insert_mapping.xlsx';

export function reportWorkbookName(reportDate: string): string {
  return `report_${reportDate}.xlsx`;
}

export function buildWorkbook(tables: readonly ReportTable[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const table of tables) {
    const headers = table.columns.map(column => column.header);
    const body: Cell[][] = table.rows.map(row => headers.map(header => row[header] ?? null));
    const worksheet = XLSX.utils.aoa_to_sheet([headers, ...body]);
    XLSX.utils.book_append_sheet(workbook, worksheet, table.name);
  }
  return workbook;
}

export function workbookToBuffer(tables: readonly ReportTable[]): Buffer {
  const buffer: Buffer = XLSX.write(buildWorkbook(tables), { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

/**
 * Reads every sheet of a workbook into rows keyed by header. Empty cells read
 * as null.
 */
export function readWorkbook(contents: Buffer): Map<string, RawRow[]> {
  const workbook = XLSX.read(contents, { type: 'buffer' });
  const sheets = new Map<string, RawRow[]>();
  for (const sheetName of workbook.SheetNames) {
    const worksheet = workbook.Sheets[sheetName];
    if (!worksheet) {
      continue;
    }
    sheets.set(sheetName, XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, { defval: null }));
  }
  return sheets;
}

export class WorkbookWriter {
  /**
   * Writes the workbook into the first candidate directory that accepts it and
   * returns the path written.
   */
  async write(tables: readonly ReportTable[], candidateDirs: readonly string[], fileName: string): Promise<string> {
    logFlow('WORKBOOK_WRITER', 'ENTRY', `Writing ${fileName}`, {
      sheets: tables.map(table => table.name),
      candidateDirs
    });

    const contents = workbookToBuffer(tables);
    const tried: string[] = [];

    for (const dir of candidateDirs) {
      const filePath = path.join(dir, fileName);
      tried.push(filePath);
      try {
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(filePath, contents);
        logFlow('WORKBOOK_WRITER', 'EXIT', `Workbook written to ${filePath}`, { bytes: contents.length });
        return filePath;
      } catch (error) {
        logFlow('WORKBOOK_WRITER', 'WARN', `Could not write ${filePath}`, { error: describeError(error) });
      }
    }

    logFlow('WORKBOOK_WRITER', 'ERROR', 'All candidate paths failed', { tried });
    throw new ArtifactWriteError(tried);
  }
}
