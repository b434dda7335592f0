/**
 * Mapping Importer
 *
 * Loads a filled-in gap workbook back into the mapping tables. Each known
 * sheet is validated against its mapping table schema before anything is
 * written; rows without a key are rejected.
 *
 * A gap sheet can hold several variant rows for one key (they differ in the
 * fact columns copied into it). Those rows collapse into one mapping row; the
 * attribute columns filled in on them must agree.
 */

import * as fs from 'fs/promises';
import { logFlow } from '../utils/logging.js';
import { SchemaViolationError } from '../utils/errors.js';
import { GAP_SHEET_NAMES } from './mapping-reconciler.js';
import { readWorkbook } from './workbook-writer.js';
import {
  INVESTMENT_MAPPING_ROWS,
  INVESTMENT_TYPE_MAPPING_ROWS,
  LEDGER_ACCOUNT_MAPPING_ROWS,
  POSITION_MAPPING_ROWS,
  TRANSACTION_TYPE_MAPPING_ROWS,
  readRows,
  type RawRow,
  type RowSchema
} from './row-schemas.js';
import type { MappingTableId } from './data-loader.js';
import { KEY_SPACES, type KeySpace } from '../types/mapping.js';
import type { Cell } from '../types/report.js';

/**
 * Appends validated rows, keyed by warehouse column, to a mapping table
 */
export interface MappingWriter {
  appendRows(table: MappingTableId, rows: readonly Record<string, Cell>[]): Promise<void>;
}

export type ImportSummary = Partial<Record<MappingTableId, { inserted: number; rejected: number; collapsed: number }>>;

interface SheetTarget {
  table: MappingTableId;
  convert: (rows: readonly RawRow[], sheetName: string) => PreparedRows;
}

interface PreparedRows {
  rows: Record<string, Cell>[];
  rejected: number;
  /** variant rows folded into an earlier row with the same key */
  collapsed: number;
}

function toCell(value: unknown): Cell {
  return typeof value === 'string' || typeof value === 'number' ? value : null;
}

/**
 * Folds rows sharing a key into the first of them. Context columns keep the
 * first row's value; any other column takes the first non-empty value, and two
 * different non-empty values are a SchemaViolationError.
 */
export function collapseByKey(
  rows: readonly Record<string, Cell>[],
  keyColumn: string,
  contextColumns: readonly string[],
  sheetName: string
): Record<string, Cell>[] {
  const byKey = new Map<Cell, Record<string, Cell>>();

  for (const row of rows) {
    const key = row[keyColumn] ?? null;
    const first = byKey.get(key);
    if (!first) {
      byKey.set(key, { ...row });
      continue;
    }
    for (const [column, value] of Object.entries(row)) {
      if (contextColumns.includes(column) || value === null) {
        continue;
      }
      const current = first[column] ?? null;
      if (current === null) {
        first[column] = value;
      } else if (current !== value) {
        throw new SchemaViolationError(
          sheetName,
          column,
          `conflicting values for key '${String(key)}': '${String(current)}' and '${String(value)}'`
        );
      }
    }
  }

  return [...byKey.values()];
}

/**
 * Validates sheet rows and converts them back to warehouse columns, one row
 * per key
 */
export function prepareRows<M extends { key: string }>(
  rowSchema: RowSchema<M>,
  rows: readonly RawRow[],
  sheetName: string,
  contextFields: readonly (keyof M & string)[] = []
): PreparedRows {
  const entities = readRows(rowSchema, rows, sheetName);
  const keyed = entities.filter(entity => entity.key.trim() !== '');
  const rejected = entities.length - keyed.length;
  if (rejected > 0) {
    logFlow('MAPPING_IMPORTER', 'WARN', `Rejected ${rejected} row(s) without a key in sheet '${sheetName}'`);
  }

  const columns: Readonly<Record<string, string>> = rowSchema.columns;
  const converted = keyed.map(entity => {
    const row: Record<string, Cell> = {};
    for (const [field, value] of Object.entries(entity)) {
      const column = columns[field];
      if (column) {
        row[column] = toCell(value);
      }
    }
    return row;
  });

  const contextColumns = contextFields.map(field => rowSchema.columns[field]);
  const prepared = collapseByKey(converted, rowSchema.columns.key, contextColumns, sheetName);
  const collapsed = converted.length - prepared.length;
  if (collapsed > 0) {
    logFlow('MAPPING_IMPORTER', 'INFO', `Collapsed ${collapsed} variant row(s) into their key in sheet '${sheetName}'`);
  }

  return { rows: prepared, rejected, collapsed };
}

/**
 * Sheet target. Context fields are the fact columns the gap sheet copies in
 * beside the key.
 */
function target<M extends { key: string }>(
  table: MappingTableId,
  rowSchema: RowSchema<M>,
  contextFields: readonly (keyof M & string)[]
): SheetTarget {
  return { table, convert: (rows, sheetName) => prepareRows(rowSchema, rows, sheetName, contextFields) };
}

const KEY_SPACE_TARGETS: Readonly<Record<KeySpace, SheetTarget>> = {
  transactionType: target('transactionTypes', TRANSACTION_TYPE_MAPPING_ROWS, [
    'groupAccount',
    'securityType',
    'investments'
  ]),
  investmentType: target('investmentTypes', INVESTMENT_TYPE_MAPPING_ROWS, ['securityType', 'ltSt']),
  investment: target('investments', INVESTMENT_MAPPING_ROWS, ['securityId', 'securityType', 'purpose']),
  ledgerAccount: target('ledgerAccounts', LEDGER_ACCOUNT_MAPPING_ROWS, ['accountNo', 'accountNo2', 'accountName']),
  position: target('positions', POSITION_MAPPING_ROWS, [])
};

/**
 * Gap sheet name to mapping table
 */
export const SHEET_TARGETS: ReadonlyMap<string, SheetTarget> = new Map(
  KEY_SPACES.map(keySpace => [GAP_SHEET_NAMES[keySpace], KEY_SPACE_TARGETS[keySpace]] as const)
);

export class MappingImporter {
  constructor(private readonly writer: MappingWriter) {}

  async importFile(filePath: string): Promise<ImportSummary> {
    logFlow('MAPPING_IMPORTER', 'INFO', `Reading mapping workbook ${filePath}`);
    return this.importWorkbook(await fs.readFile(filePath));
  }

  /**
   * Validates every known sheet first, then appends the rows table by table
   */
  async importWorkbook(contents: Buffer): Promise<ImportSummary> {
    logFlow('MAPPING_IMPORTER', 'ENTRY', 'Importing mapping workbook');

    const batches: { table: MappingTableId; prepared: PreparedRows }[] = [];
    for (const [sheetName, rows] of readWorkbook(contents)) {
      const sheetTarget = SHEET_TARGETS.get(sheetName);
      if (!sheetTarget) {
        logFlow('MAPPING_IMPORTER', 'INFO', `Skipping sheet '${sheetName}': no mapping table`);
        continue;
      }
      batches.push({ table: sheetTarget.table, prepared: sheetTarget.convert(rows, sheetName) });
    }

    const summary: ImportSummary = {};
    for (const { table, prepared } of batches) {
      await this.writer.appendRows(table, prepared.rows);
      const previous = summary[table];
      summary[table] = {
        inserted: (previous?.inserted ?? 0) + prepared.rows.length,
        rejected: (previous?.rejected ?? 0) + prepared.rejected,
        collapsed: (previous?.collapsed ?? 0) + prepared.collapsed
      };
    }

    logFlow('MAPPING_IMPORTER', 'EXIT', 'Mapping workbook imported', summary);
    return summary;
  }
}
