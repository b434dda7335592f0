/**
 * Realized Profit Report Generator
 *
 * Year-to-date realized figures, booked from year start through the report
 * date:
 * - Number of securities: holding nominal quantities at the report date
 * - Accounting value: balance of accounting value rows
 * - Realized profit (loss): negated balance of realized profit rows
 * - Sell value: accounting value + realized profit (loss)
 */

import { logFlow } from '../utils/logging.js';
import { assembleTable } from '../services/report-assembler.js';
import { allCategories, InvestmentCategory } from '../types/investment-taxonomy.js';
import type { RealizedFigures, RealizedTagFigures } from '../services/category-aggregator.js';
import type { ReportTable, TableDefinition } from '../types/report.js';
import type { ReportContext, ReportGenerator } from '../services/report-registry.js';

export const REALIZED_TABLES = {
  ALL: 'REALIZED_PROFIT_ALL',
  EQUITY: 'REALIZED_PROFIT_EQUITY'
} as const;

interface CategoryRealized extends RealizedFigures {
  category: string;
}

const ALL_CATEGORIES_TABLE: TableDefinition<CategoryRealized> = {
  name: REALIZED_TABLES.ALL,
  columns: [
    { header: 'Tags', kind: 'text', value: row => row.category },
    { header: 'Number of securities', kind: 'number', value: row => row.shareCount },
    { header: 'Accounting value', kind: 'number', value: row => row.accountingValue },
    { header: 'Sell value', kind: 'number', value: row => row.sellValue },
    { header: 'Realized profit (loss)', kind: 'number', value: row => row.realizedProfitLoss }
  ]
};

const EQUITY_TABLE: TableDefinition<RealizedTagFigures> = {
  name: REALIZED_TABLES.EQUITY,
  columns: [
    { header: 'Tags', kind: 'text', value: row => row.tag },
    { header: 'IFRS classification', kind: 'text', value: row => row.attributes.ifrsClassification },
    { header: 'Number of securities', kind: 'number', value: row => row.shareCount },
    { header: 'Accounting value', kind: 'number', value: row => row.accountingValue },
    { header: 'Sell value (formula)', kind: 'number', value: row => row.sellValue },
    { header: 'Realized profit (loss)', kind: 'number', value: row => row.realizedProfitLoss },
    { header: 'Funding source', kind: 'text', value: row => row.attributes.fundingSource }
  ]
};

export class RealizedProfitReportGenerator implements ReportGenerator {
  constructor(private readonly context: ReportContext) {}

  generateTables(): ReportTable[] {
    logFlow('REALIZED_PROFIT', 'ENTRY', 'Generating realized profit tables', {
      yearStart: this.context.period.yearStart,
      reportDate: this.context.period.reportDate
    });

    const tables = [this.generateAllCategoriesTable(), this.generateEquityTable()];

    logFlow('REALIZED_PROFIT', 'EXIT', 'Realized profit tables generated', {
      tables: tables.map(table => ({ name: table.name, rows: table.rows.length }))
    });
    return tables;
  }

  generateAllCategoriesTable(): ReportTable {
    const { aggregator } = this.context;
    const lines = allCategories().map(category => ({
      category,
      ...aggregator.realizedForCategory(category)
    }));
    return assembleTable(ALL_CATEGORIES_TABLE, lines);
  }

  generateEquityTable(): ReportTable {
    const lines = this.context.aggregator.realizedByTag(InvestmentCategory.INVESTMENT_FUND_SHARES);
    return assembleTable(EQUITY_TABLE, lines);
  }
}
