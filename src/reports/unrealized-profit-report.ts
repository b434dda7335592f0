/**
 * Unrealized Profit Report Generator
 *
 * Quarter-over-quarter unrealized profit line items:
 * - Total acquisition cost/accounting value = status + change
 * - Revaluation effect = reserve change + revaluation change
 * - Revaluation reserve = (negated) reserve status + reserve change
 * - Net exchange rate difference = status + change
 * - Amortisation = status + change
 * - Objective value = accounting value + revaluation effect + FX + amortisation
 *
 * One summary table over all nine categories, and detailed per-tag tables for
 * fund shares and for short- and long-term debt securities.
 */

import { logFlow } from '../utils/logging.js';
import { assembleTable } from '../services/report-assembler.js';
import { allCategories, InvestmentCategory } from '../types/investment-taxonomy.js';
import type { LineItems, TagAggregate } from '../services/category-aggregator.js';
import type { ColumnSpec, ReportTable, TableDefinition } from '../types/report.js';
import type { ReportContext, ReportGenerator } from '../services/report-registry.js';

export const UNREALIZED_TABLES = {
  ALL: 'UNREALIZED_PROFIT_ALL',
  EQUITY: 'UNREALIZED_PROFIT_EQUITY',
  BONDS_UNDER_1Y: 'UNREALIZED_BONDS_UNDER_1Y',
  BONDS_OVER_1Y: 'UNREALIZED_BONDS_OVER_1Y'
} as const;

/** Reserved column, never populated */
export const VALUE_ADJUSTMENTS_HEADER =
  'Value adjustments (unrealized gains, write-down to objective value) recognised directly in P&L';

interface CategoryLine {
  category: string;
  items: LineItems;
}

interface DetailedLine extends TagAggregate {
  lastValuationDate: string;
}

/**
 * Line item columns shared by the summary and detailed tables. The headers of
 * the first two differ between them.
 */
function lineItemColumns<R>(
  items: (row: R) => LineItems,
  headers: { accountingValue: string; objectiveValue: string }
): ColumnSpec<R>[] {
  return [
    { header: headers.accountingValue, kind: 'number', value: row => items(row).accountingValue },
    { header: headers.objectiveValue, kind: 'number', value: row => items(row).objectiveValue },
    { header: 'Revaluation effect', kind: 'number', value: row => items(row).revaluationEffect },
    { header: 'Revaluation reserve (status)', kind: 'number', value: row => items(row).revaluationReserve },
    { header: VALUE_ADJUSTMENTS_HEADER, kind: 'number', value: () => null },
    { header: 'Net exchange rate difference', kind: 'number', value: row => items(row).fxDifference },
    {
      header: 'Amortisation of discount/premium on fixed-maturity instruments',
      kind: 'number',
      value: row => items(row).amortization
    }
  ];
}

const ALL_CATEGORIES_TABLE: TableDefinition<CategoryLine> = {
  name: UNREALIZED_TABLES.ALL,
  columns: [
    { header: 'Tags', kind: 'text', value: row => row.category },
    ...lineItemColumns<CategoryLine>(row => row.items, {
      accountingValue: 'Total acquisition cost/accounting value (to the last valuation date)',
      objectiveValue: 'Objective value at the last valuation date (formula)'
    })
  ]
};

function detailedTable(name: string): TableDefinition<DetailedLine> {
  return {
    name,
    columns: [
      { header: 'Tags', kind: 'text', value: row => row.tag },
      { header: 'IFRS classification', kind: 'text', value: row => row.attributes.ifrsClassification },
      { header: 'Valuation method', kind: 'text', value: row => row.attributes.valuationMethod },
      { header: 'Valuation method (if different)', kind: 'text', value: row => row.attributes.valuationMethodAlt },
      { header: 'Last valuation date', kind: 'date', value: row => row.lastValuationDate },
      ...lineItemColumns<DetailedLine>(row => row.lineItems, {
        accountingValue: 'Total acquisition cost/accounting value',
        objectiveValue: 'Objective value at the last valuation date'
      }),
      { header: 'Funding source', kind: 'text', value: row => row.attributes.fundingSource }
    ]
  };
}

export class UnrealizedProfitReportGenerator implements ReportGenerator {
  constructor(private readonly context: ReportContext) {}

  generateTables(): ReportTable[] {
    logFlow('UNREALIZED_PROFIT', 'ENTRY', 'Generating unrealized profit tables', {
      reportDate: this.context.period.reportDate
    });

    const tables = [
      this.generateAllCategoriesTable(),
      this.generateDetailedTable(UNREALIZED_TABLES.EQUITY, InvestmentCategory.INVESTMENT_FUND_SHARES),
      this.generateDetailedTable(UNREALIZED_TABLES.BONDS_UNDER_1Y, InvestmentCategory.DEBT_SECURITIES_UNDER_ONE_YEAR),
      this.generateDetailedTable(UNREALIZED_TABLES.BONDS_OVER_1Y, InvestmentCategory.DEBT_SECURITIES_OVER_ONE_YEAR)
    ];

    logFlow('UNREALIZED_PROFIT', 'EXIT', 'Unrealized profit tables generated', {
      tables: tables.map(table => ({ name: table.name, rows: table.rows.length }))
    });
    return tables;
  }

  generateAllCategoriesTable(): ReportTable {
    const { aggregator } = this.context;
    const lines = allCategories().map(category => ({
      category,
      items: aggregator.lineItemsForCategory(category)
    }));
    return assembleTable(ALL_CATEGORIES_TABLE, lines);
  }

  generateDetailedTable(name: string, category: string): ReportTable {
    const lastValuationDate = this.context.period.reportDate;
    const lines = this.context.aggregator
      .aggregateTags(category)
      .map(aggregate => ({ ...aggregate, lastValuationDate }));
    return assembleTable(detailedTable(name), lines);
  }
}
