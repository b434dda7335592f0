/**
 * Warehouse Sources
 *
 * BigQuery implementations of the fact and mapping source interfaces and of
 * the mapping writer. Queries bind the report date as a named parameter and
 * order their rows explicitly.
 */

import { logFlow } from '../utils/logging.js';
import { HOLDING_COLUMNS, LEDGER_ENTRY_COLUMNS, POSITION_COLUMNS } from '../types/ledger.js';
import type { ConnectionManager, WarehouseTable } from './connection-manager.js';
import type { QueryRunner, RowInserter } from './bigquery-client.js';
import type { FactSource, MappingSource, MappingTableId } from './data-loader.js';
import type { MappingWriter } from './mapping-importer.js';
import type { RawRow } from './row-schemas.js';
import type { Cell } from '../types/report.js';

const MAPPING_TABLES: Readonly<Record<MappingTableId, { table: WarehouseTable; keyColumn: string }>> = {
  transactionTypes: { table: 'transactionTypeMapping', keyColumn: 'KEY' },
  investmentTypes: { table: 'investmentTypeMapping', keyColumn: 'INVEST_KEY' },
  investments: { table: 'investmentMapping', keyColumn: 'KEY' },
  ledgerAccounts: { table: 'ledgerAccountMapping', keyColumn: 'KEY' },
  positions: { table: 'positionMapping', keyColumn: 'SCD_ID' },
  codeLabels: { table: 'codeLabels', keyColumn: 'KEY' }
};

const LEDGER_ENTRY_ORDER = ['BOOKING_DATE', 'GROUP_ACCOUNT', 'SECURITY_ID', 'SECURITY_TYPE', 'TRANSACTION_CODE'];
const HOLDING_ORDER = ['SECURITY_ID', 'SECTYPE', 'LT_ST'];
const POSITION_ORDER = ['SECURITY_ID', 'INVESTMENT_TYPE', 'LT_ST'];

/**
 * ORDER BY list that leads with the given columns and breaks ties on every
 * remaining selected column, so only fully identical rows can trade places
 */
export function totalOrder(leading: readonly string[], columns: Readonly<Record<string, string>>): string {
  const rest = Object.values(columns).filter(column => !leading.includes(column));
  return [...leading, ...rest].join(', ');
}

/**
 * Builds the SQL of every fact query. Separated from execution so the text
 * can be checked without a warehouse.
 */
export class FactQueryBuilder {
  constructor(private readonly connections: ConnectionManager) {}

  ledgerEntries(): string {
    return `
      SELECT ${Object.values(LEDGER_ENTRY_COLUMNS).join(', ')}
      FROM ${this.connections.getFullyQualifiedTableId('ledgerEntries')}
      WHERE BOOKING_DATE <= DATE(@reportDate)
      ORDER BY ${totalOrder(LEDGER_ENTRY_ORDER, LEDGER_ENTRY_COLUMNS)}
    `;
  }

  holdings(): string {
    return `
      SELECT DISTINCT ${Object.values(HOLDING_COLUMNS).join(', ')}
      FROM ${this.connections.getFullyQualifiedTableId('holdings')}
      WHERE REPORT_DATE = DATE(@reportDate)
      ORDER BY ${totalOrder(HOLDING_ORDER, HOLDING_COLUMNS)}
    `;
  }

  positions(): string {
    return `
      SELECT ${Object.values(POSITION_COLUMNS).join(', ')}
      FROM ${this.connections.getFullyQualifiedTableId('positions')}
      WHERE REPORT_DATE = DATE(@reportDate)
      ORDER BY ${totalOrder(POSITION_ORDER, POSITION_COLUMNS)}
    `;
  }

  ledgerAccountBalances(): string {
    return `
      SELECT B.NO_, B.NO_2, B.NAME, SUM(A.AMOUNT) AS SALDO
      FROM ${this.connections.getFullyQualifiedTableId('ledgerAccountEntries')} AS A
      LEFT JOIN (
        SELECT DISTINCT NO_2, NO_, NAME
        FROM ${this.connections.getFullyQualifiedTableId('ledgerAccounts')}
      ) AS B ON A.G_L_ACCOUNT_NO_ = B.NO_
      WHERE A.POSTING_DATE <= DATE(@reportDate)
      GROUP BY B.NO_, B.NO_2, B.NAME
      ORDER BY B.NO_, B.NO_2, B.NAME
    `;
  }

  ledgerAccountPostings(): string {
    return `
      SELECT DISTINCT A.POSTING_DATE
      FROM ${this.connections.getFullyQualifiedTableId('ledgerAccountEntries')} AS A
      WHERE A.POSTING_DATE <= DATE(@reportDate)
      ORDER BY A.POSTING_DATE
    `;
  }

  mappingTable(table: MappingTableId): string {
    const { table: warehouseTable, keyColumn } = MAPPING_TABLES[table];
    return `
      SELECT DISTINCT *
      FROM ${this.connections.getFullyQualifiedTableId(warehouseTable)}
      ORDER BY ${keyColumn}
    `;
  }
}

export class BigQueryFactSource implements FactSource {
  private readonly queries: FactQueryBuilder;

  constructor(
    private readonly runner: QueryRunner,
    connections: ConnectionManager
  ) {
    this.queries = new FactQueryBuilder(connections);
  }

  ledgerEntries(reportDate: string): Promise<RawRow[]> {
    return this.run('ledgerEntries', this.queries.ledgerEntries(), reportDate);
  }

  holdings(reportDate: string): Promise<RawRow[]> {
    return this.run('holdings', this.queries.holdings(), reportDate);
  }

  positions(reportDate: string): Promise<RawRow[]> {
    return this.run('positions', this.queries.positions(), reportDate);
  }

  ledgerAccountBalances(reportDate: string): Promise<RawRow[]> {
    return this.run('ledgerAccountBalances', this.queries.ledgerAccountBalances(), reportDate);
  }

  ledgerAccountPostings(reportDate: string): Promise<RawRow[]> {
    return this.run('ledgerAccountPostings', this.queries.ledgerAccountPostings(), reportDate);
  }

  private async run(source: string, sql: string, reportDate: string): Promise<RawRow[]> {
    logFlow('FACT_SOURCE', 'ENTRY', `Querying ${source}`, { reportDate });
    const rows = await this.runner.runQuery(sql, { reportDate });
    logFlow('FACT_SOURCE', 'EXIT', `Fetched ${source}`, { rowCount: rows.length });
    return rows;
  }
}

export class BigQueryMappingSource implements MappingSource {
  private readonly queries: FactQueryBuilder;

  constructor(
    private readonly runner: QueryRunner,
    connections: ConnectionManager
  ) {
    this.queries = new FactQueryBuilder(connections);
  }

  async mappingTable(table: MappingTableId): Promise<RawRow[]> {
    const rows = await this.runner.runQuery(this.queries.mappingTable(table));
    logFlow('MAPPING_SOURCE', 'INFO', `Fetched ${table} mapping`, { rowCount: rows.length });
    return rows;
  }
}

export class BigQueryMappingWriter implements MappingWriter {
  constructor(
    private readonly inserter: RowInserter,
    private readonly connections: ConnectionManager
  ) {}

  async appendRows(table: MappingTableId, rows: readonly Record<string, Cell>[]): Promise<void> {
    const warehouseTable = MAPPING_TABLES[table].table;
    await this.inserter.insertRows(
      this.connections.getDatasetId(warehouseTable),
      this.connections.getTableId(warehouseTable),
      rows
    );
  }
}
