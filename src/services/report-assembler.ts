/**
 * Report Assembler
 *
 * Turns source rows into named, rectangular report tables following a typed
 * column definition, and appends the synthetic totals row.
 */

import { logFlow } from '../utils/logging.js';
import { normalizeZero } from '../utils/numeric.js';
import {
  TOTAL_LABEL,
  type Cell,
  type ReportColumn,
  type ReportRow,
  type ReportTable,
  type TableDefinition
} from '../types/report.js';

export function projectRow<R>(definition: TableDefinition<R>, source: R): ReportRow {
  const row: Record<string, Cell> = {};
  for (const column of definition.columns) {
    row[column.header] = column.value(source);
  }
  return row;
}

/**
 * Totals row for a table: number columns hold the column-wise sum of the data
 * rows (empty cells count as 0), every other column holds the total label.
 * Returns null when the table has no number columns.
 */
export function buildTotalsRow(columns: readonly ReportColumn[], rows: readonly ReportRow[]): ReportRow | null {
  if (!columns.some(column => column.kind === 'number')) {
    return null;
  }

  const totals: Record<string, Cell> = {};
  for (const column of columns) {
    if (column.kind !== 'number') {
      totals[column.header] = TOTAL_LABEL;
      continue;
    }
    let sum = 0;
    for (const row of rows) {
      const value = row[column.header];
      sum += typeof value === 'number' ? value : 0;
    }
    totals[column.header] = normalizeZero(sum);
  }
  return totals;
}

/**
 * Builds the data rows in source order, then appends the totals row
 */
export function assembleTable<R>(definition: TableDefinition<R>, sources: readonly R[]): ReportTable {
  const columns: ReportColumn[] = definition.columns.map(({ header, kind }) => ({ header, kind }));
  const rows = sources.map(source => projectRow(definition, source));
  return withTotals({ name: definition.name, columns, rows });
}

/**
 * Appends the totals row to an already projected table
 */
export function withTotals(table: ReportTable): ReportTable {
  const totals = buildTotalsRow(table.columns, table.rows);
  logFlow('REPORT_ASSEMBLER', 'INFO', `Assembled table ${table.name}`, {
    rows: table.rows.length,
    totalsRow: totals !== null
  });
  return {
    name: table.name,
    columns: table.columns,
    rows: totals ? [...table.rows, totals] : table.rows
  };
}
