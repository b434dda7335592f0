/**
 * Data Loader
 *
 * Reads one immutable snapshot of facts and mapping tables for a reporting
 * period through the source interfaces, validates every row, and checks that
 * the upstream systems have delivered data for the report month.
 */

import { logFlow } from '../utils/logging.js';
import { DataAbsenceError, SchemaViolationError } from '../utils/errors.js';
import { normalizeZero } from '../utils/numeric.js';
import { isInReportMonth } from '../utils/report-calendar.js';
import {
  CODE_LABEL_ROWS,
  HOLDING_ROWS,
  INVESTMENT_MAPPING_ROWS,
  INVESTMENT_TYPE_MAPPING_ROWS,
  LEDGER_ACCOUNT_BALANCE_ROWS,
  LEDGER_ACCOUNT_MAPPING_ROWS,
  LEDGER_ACCOUNT_POSTING_ROWS,
  LEDGER_ENTRY_ROWS,
  POSITION_MAPPING_ROWS,
  POSITION_ROWS,
  TRANSACTION_TYPE_MAPPING_ROWS,
  readRows,
  type RawRow,
  type RowSchema
} from './row-schemas.js';
import type { FactSnapshot, LedgerEntry, LedgerEntryRecord } from '../types/ledger.js';
import type { MappingSnapshot } from '../types/mapping.js';
import type { ReportPeriod } from '../types/report.js';

// ============================================================================
// SOURCE INTERFACES
// ============================================================================

/**
 * Fact tables of the accounting and investment systems. Every method returns
 * rows keyed by warehouse column name, in a deterministic order.
 */
export interface FactSource {
  /** ledger entries booked on or before the report date */
  ledgerEntries(reportDate: string): Promise<RawRow[]>;
  /** per-security nominal quantities at the report date */
  holdings(reportDate: string): Promise<RawRow[]>;
  /** investment positions at the report date */
  positions(reportDate: string): Promise<RawRow[]>;
  /** ledger-account balances summed up to the report date */
  ledgerAccountBalances(reportDate: string): Promise<RawRow[]>;
  /** distinct posting dates of ledger-account entries up to the report date */
  ledgerAccountPostings(reportDate: string): Promise<RawRow[]>;
}

export type MappingTableId =
  | 'transactionTypes'
  | 'investmentTypes'
  | 'investments'
  | 'ledgerAccounts'
  | 'positions'
  | 'codeLabels';

export interface MappingSource {
  mappingTable(table: MappingTableId): Promise<RawRow[]>;
}

export interface LoadedSnapshot {
  facts: FactSnapshot;
  mappings: MappingSnapshot;
}

// ============================================================================
// CHECKS
// ============================================================================

/**
 * Fails when none of the dates falls in the report date's year and month
 */
export function assertReportMonthData(table: string, column: string, dates: readonly string[], reportDate: string): void {
  if (!dates.some(date => isInReportMonth(date, reportDate))) {
    const [year, month] = reportDate.split('-').map(Number);
    throw new DataAbsenceError(table, column, year ?? 0, month ?? 0);
  }
  logFlow('DATA_LOADER', 'INFO', `Data check passed: data found in table ${table} for ${reportDate.slice(0, 7)} in column ${column}`);
}

export function assertUniqueKeys(table: string, keyColumn: string, rows: readonly { key: string }[]): void {
  const seen = new Set<string>();
  for (const row of rows) {
    if (seen.has(row.key)) {
      throw new SchemaViolationError(table, keyColumn, `duplicate key '${row.key}'`);
    }
    seen.add(row.key);
  }
}

/**
 * Adds the two measures summed by the aggregation windows
 */
export function withMeasures(record: LedgerEntryRecord): LedgerEntry {
  const balance = normalizeZero(record.debitForeign - record.creditForeign);
  return { ...record, balance, delta: normalizeZero(-balance) };
}

// ============================================================================
// LOADER
// ============================================================================

export class DataLoader {
  constructor(
    private readonly factSource: FactSource,
    private readonly mappingSource: MappingSource
  ) {}

  async loadSnapshot(period: ReportPeriod): Promise<LoadedSnapshot> {
    logFlow('DATA_LOADER', 'ENTRY', 'Loading snapshot', { reportDate: period.reportDate });

    const facts = await this.loadFacts(period.reportDate);
    const mappings = await this.loadMappings();

    logFlow('DATA_LOADER', 'EXIT', 'Snapshot loaded', {
      ledgerEntries: facts.ledgerEntries.length,
      holdings: facts.holdings.length,
      positions: facts.positions.length,
      ledgerAccountBalances: facts.ledgerAccountBalances.length,
      transactionTypes: mappings.transactionTypes.length,
      investmentTypes: mappings.investmentTypes.length,
      investments: mappings.investments.length,
      ledgerAccountMappings: mappings.ledgerAccounts.length,
      positionMappings: mappings.positions.length,
      codeLabels: mappings.codeLabels.length
    });
    return { facts, mappings };
  }

  async loadFacts(reportDate: string): Promise<FactSnapshot> {
    const ledgerRecords = readRows(LEDGER_ENTRY_ROWS, await this.factSource.ledgerEntries(reportDate));
    assertReportMonthData(
      LEDGER_ENTRY_ROWS.table,
      LEDGER_ENTRY_ROWS.columns.bookingDate,
      ledgerRecords.map(entry => entry.bookingDate),
      reportDate
    );

    const holdings = readRows(HOLDING_ROWS, await this.factSource.holdings(reportDate));
    assertReportMonthData(
      HOLDING_ROWS.table,
      HOLDING_ROWS.columns.reportDate,
      holdings.map(holding => holding.reportDate),
      reportDate
    );

    const positions = readRows(POSITION_ROWS, await this.factSource.positions(reportDate));
    assertReportMonthData(
      POSITION_ROWS.table,
      POSITION_ROWS.columns.reportDate,
      positions.map(position => position.reportDate),
      reportDate
    );

    const ledgerAccountBalances = readRows(
      LEDGER_ACCOUNT_BALANCE_ROWS,
      await this.factSource.ledgerAccountBalances(reportDate)
    );
    const postings = readRows(LEDGER_ACCOUNT_POSTING_ROWS, await this.factSource.ledgerAccountPostings(reportDate));
    assertReportMonthData(
      LEDGER_ACCOUNT_POSTING_ROWS.table,
      LEDGER_ACCOUNT_POSTING_ROWS.columns.postingDate,
      postings.map(posting => posting.postingDate),
      reportDate
    );

    return {
      ledgerEntries: ledgerRecords.map(withMeasures),
      holdings,
      positions,
      ledgerAccountBalances
    };
  }

  async loadMappings(): Promise<MappingSnapshot> {
    const transactionTypes = await this.loadMappingTable('transactionTypes', TRANSACTION_TYPE_MAPPING_ROWS);
    const investmentTypes = await this.loadMappingTable('investmentTypes', INVESTMENT_TYPE_MAPPING_ROWS);
    const investments = await this.loadMappingTable('investments', INVESTMENT_MAPPING_ROWS);
    const ledgerAccounts = await this.loadMappingTable('ledgerAccounts', LEDGER_ACCOUNT_MAPPING_ROWS);
    const positions = await this.loadMappingTable('positions', POSITION_MAPPING_ROWS);

    const codeLabels = readRows(CODE_LABEL_ROWS, await this.mappingSource.mappingTable('codeLabels'));
    assertUniqueKeys(
      CODE_LABEL_ROWS.table,
      CODE_LABEL_ROWS.columns.code,
      codeLabels.map(label => ({ key: label.code }))
    );

    return { transactionTypes, investmentTypes, investments, ledgerAccounts, positions, codeLabels };
  }

  private async loadMappingTable<M extends { key: string }>(tableId: MappingTableId, rowSchema: RowSchema<M>): Promise<M[]> {
    const table = `${tableId} mapping`;
    const rows = readRows(rowSchema, await this.mappingSource.mappingTable(tableId), table);
    assertUniqueKeys(table, rowSchema.columns.key, rows);
    logFlow('DATA_LOADER', 'INFO', `Loaded ${table}`, { rows: rows.length });
    return rows;
  }
}
