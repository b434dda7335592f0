/**
 * Report Registry Service
 *
 * Central registry for the report generators of the quarterly regulatory
 * report. Generators run in registration order, which is the sheet order of
 * the report workbook.
 */

import { logFlow } from '../utils/logging.js';
import { ConfigurationError } from '../utils/errors.js';
import type { ReportSettings } from '../utils/report-settings.js';
import type { CategoryAggregator } from './category-aggregator.js';
import type { EnrichedFactSnapshot } from '../types/ledger.js';
import type { ReportPeriod, ReportTable } from '../types/report.js';

// Import report generators
import { RealizedProfitReportGenerator, REALIZED_TABLES } from '../reports/realized-profit-report.js';
import { UnrealizedProfitReportGenerator, UNREALIZED_TABLES } from '../reports/unrealized-profit-report.js';
import { SupervisoryLookupReportGenerator, LOOKUP_TABLES } from '../reports/supervisory-lookup-report.js';

/**
 * Everything a generator reads. Shared by all generators of one run and never
 * modified.
 */
export interface ReportContext {
  period: ReportPeriod;
  facts: EnrichedFactSnapshot;
  aggregator: CategoryAggregator;
  /** currency and rating agency code labels */
  codeLabels: ReadonlyMap<string, string>;
  settings: Pick<ReportSettings, 'zeroAcquisitionAccounts' | 'zeroQuantityNameFragments' | 'perHundredLotNominal'>;
}

export interface ReportGenerator {
  generateTables(): ReportTable[];
}

/**
 * Constructor type for report generator classes
 */
export type ReportGeneratorConstructor = new (context: ReportContext) => ReportGenerator;

/**
 * Metadata for a report
 */
export interface ReportMetadata {
  id: string;
  name: string;
  description: string;
  /** names of the tables the generator produces, in order */
  tables: readonly string[];
}

interface RegisteredReport {
  metadata: ReportMetadata;
  generatorClass: ReportGeneratorConstructor;
}

export class ReportRegistry {
  private reports: Map<string, RegisteredReport> = new Map();

  constructor() {
    this.registerBuiltInReports();
    logFlow('REPORT_REGISTRY', 'INFO', 'Report Registry initialized', {
      reportCount: this.reports.size,
      reportIds: Array.from(this.reports.keys())
    });
  }

  private registerBuiltInReports(): void {
    this.registerReport({
      id: 'realized-profit',
      name: 'Realized Profit Report',
      description: 'Year-to-date realized profit (loss), accounting and sell values per category and per fund share tag',
      tables: Object.values(REALIZED_TABLES)
    }, RealizedProfitReportGenerator);

    this.registerReport({
      id: 'unrealized-profit',
      name: 'Unrealized Profit Report',
      description: 'Quarter-over-quarter unrealized profit line items per category, with per-tag detail for fund shares and debt securities',
      tables: Object.values(UNREALIZED_TABLES)
    }, UnrealizedProfitReportGenerator);

    this.registerReport({
      id: 'supervisory-lookup',
      name: 'Supervisory Lookup Report',
      description: 'Ledger-account balances and investment positions in the supervisory lookup column set',
      tables: Object.values(LOOKUP_TABLES)
    }, SupervisoryLookupReportGenerator);
  }

  public registerReport(metadata: ReportMetadata, generatorClass: ReportGeneratorConstructor): void {
    this.reports.set(metadata.id, { metadata, generatorClass });
    logFlow('REPORT_REGISTRY', 'INFO', `Registered report: ${metadata.id}`, {
      name: metadata.name,
      tables: metadata.tables
    });
  }

  public getAllReports(): ReportMetadata[] {
    return Array.from(this.reports.values()).map(entry => entry.metadata);
  }

  /**
   * Runs the selected generators (all of them when no selection is given) in
   * registration order and returns their tables.
   */
  public generateTables(context: ReportContext, enabledReports?: readonly string[]): ReportTable[] {
    if (enabledReports) {
      const unknown = enabledReports.filter(id => !this.reports.has(id));
      if (unknown.length > 0) {
        throw new ConfigurationError('enabledReports', `unknown report id(s): ${unknown.join(', ')}`);
      }
    }

    const selected = Array.from(this.reports.values()).filter(
      entry => !enabledReports || enabledReports.includes(entry.metadata.id)
    );

    const tables: ReportTable[] = [];
    for (const { metadata, generatorClass } of selected) {
      logFlow('REPORT_REGISTRY', 'ENTRY', `Generating report: ${metadata.id}`);
      const generator = new generatorClass(context);
      tables.push(...generator.generateTables());
    }
    return tables;
  }
}
