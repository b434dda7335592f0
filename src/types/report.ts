/**
 * Report output structures and the reporting period context.
 */

export type Cell = string | number | null;

export type ColumnKind = 'text' | 'number' | 'date';

export interface ReportColumn {
  header: string;
  kind: ColumnKind;
}

export type ReportRow = Readonly<Record<string, Cell>>;

/**
 * A rectangular, named table with a fixed column order
 */
export interface ReportTable {
  name: string;
  columns: readonly ReportColumn[];
  rows: readonly ReportRow[];
}

/**
 * Column of a table definition: how one cell is read from a source row
 */
export interface ColumnSpec<R> extends ReportColumn {
  value: (row: R) => Cell;
}

export interface TableDefinition<R> {
  name: string;
  columns: readonly ColumnSpec<R>[];
}

/**
 * Report date and the window boundaries derived from it. All dates are ISO
 * `YYYY-MM-DD` strings, so lexical comparison is chronological.
 */
export interface ReportPeriod {
  reportDate: string;
  yearStart: string;
  previousQuarterEnd: string;
  quarterStart: string;
}

/**
 * How descriptive attributes are resolved when several rows share a tag
 */
export type TagAttributePolicy = 'first-wins' | 'require-agreement';

/** Literal written into the non-numeric cells of a totals row */
export const TOTAL_LABEL = 'Total';
