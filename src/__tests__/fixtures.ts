/**
 * Shared test fixtures
 *
 * The sample snapshot covers one quarter ending 2025-06-30: two fund shares
 * (SEC1 tagged "Fund Alpha", SEC2 tagged "Fund Beta"), one ledger account
 * with a funding source and one without, and one bond position.
 */

import { withMeasures, type FactSource, type LoadedSnapshot, type MappingSource, type MappingTableId } from '../services/data-loader.js';
import type { RawRow } from '../services/row-schemas.js';
import { deriveKeys } from '../services/key-builder.js';
import { enrichFacts } from '../services/fact-enricher.js';
import { CategoryAggregator } from '../services/category-aggregator.js';
import type { ReportContext } from '../services/report-registry.js';
import { resolveReportPeriod } from '../utils/report-calendar.js';
import type { ReportSettings } from '../utils/report-settings.js';
import { InvestmentCategory, RealizedKind, TransactionKind } from '../types/investment-taxonomy.js';
import {
  HOLDING_COLUMNS,
  LEDGER_ACCOUNT_BALANCE_COLUMNS,
  LEDGER_ENTRY_COLUMNS,
  POSITION_COLUMNS,
  type EnrichedLedgerEntry,
  type Holding,
  type LedgerEntry,
  type LedgerEntryRecord,
  type Position,
  type WarehouseColumns
} from '../types/ledger.js';
import {
  CODE_LABEL_COLUMNS,
  INVESTMENT_MAPPING_COLUMNS,
  INVESTMENT_TYPE_MAPPING_COLUMNS,
  LEDGER_ACCOUNT_MAPPING_COLUMNS,
  POSITION_MAPPING_COLUMNS,
  TRANSACTION_TYPE_MAPPING_COLUMNS,
  type InvestmentMapping,
  type InvestmentTypeMapping,
  type LedgerAccountMapping,
  type MappingSnapshot,
  type PositionMapping,
  type SupervisoryAttributes,
  type TransactionTypeMapping
} from '../types/mapping.js';

export const REPORT_DATE = '2025-06-30';
export const PERIOD = resolveReportPeriod(REPORT_DATE);

export const TEST_SETTINGS: ReportSettings = {
  zeroAcquisitionAccounts: ['020300'],
  zeroQuantityNameFragments: [],
  perHundredLotNominal: 100,
  tagAttributePolicy: 'first-wins',
  reportOutputDirs: ['output'],
  mappingOutputDirs: ['output/mapping']
};

// ============================================================================
// ROW BUILDERS
// ============================================================================

export function ledgerRecord(overrides: Partial<LedgerEntryRecord> = {}): LedgerEntryRecord {
  return {
    bookingDate: REPORT_DATE,
    groupAccount: 'A100',
    securityType: 'FUND',
    investments: 'X',
    ltSt: 'LT',
    securityId: 'SEC1',
    purpose: null,
    transactionCode: null,
    debitForeign: 0,
    creditForeign: 0,
    debitBase: 0,
    creditBase: 0,
    ...overrides
  };
}

export function ledgerEntry(overrides: Partial<LedgerEntryRecord> = {}): LedgerEntry {
  return withMeasures(ledgerRecord(overrides));
}

/**
 * Enriched ledger row carrying `balance` as its debit amount
 */
export function enrichedEntry(
  overrides: Partial<Omit<EnrichedLedgerEntry, 'delta' | 'debitForeign' | 'creditForeign'>> = {}
): EnrichedLedgerEntry {
  const balance = overrides.balance ?? 0;
  return {
    ...ledgerRecord(),
    transactionTypeKey: '',
    investmentTypeKey: '',
    investmentKey: '',
    isStatus: false,
    isChange: false,
    unrealizedKind: null,
    realizedKind: null,
    category: InvestmentCategory.INVESTMENT_FUND_SHARES,
    tag: null,
    ifrsClassification: null,
    valuationMethod: null,
    valuationMethodAlt: null,
    fundingSource: null,
    ...overrides,
    debitForeign: balance,
    creditForeign: 0,
    balance,
    delta: balance === 0 ? 0 : -balance
  };
}

export function position(overrides: Partial<Position> = {}): Position {
  return {
    reportDate: REPORT_DATE,
    investmentType: 'BOND',
    ifrsGroup: 'AC',
    investmentName: 'Gov Bond 2030',
    isin: 'XS0000000001',
    nominalValueOfLot: 100,
    numberOfLots: 2500,
    quotationCurrency: 'EUR',
    acquisitionValueQc: 2400,
    acquisitionValuePc: 2400,
    balanceBookValueQc: 2450,
    balanceBookValuePc: 2450,
    couponRate: 2.5,
    effectiveInterestRate: 2.7,
    accruedInterestQc: 30,
    accruedInterestPc: 30,
    purchaseDate: '2023-05-02',
    maturityDate: '2030-05-02',
    issuerRating: 'AA',
    issuerRatingAgency: 'SP',
    dirtyMarketValueQc: 2500,
    dirtyMarketValuePc: 2500,
    securityId: 'BOND1',
    ltSt: 'LT',
    couponFrequency: 1,
    ...overrides
  };
}

export function holding(overrides: Partial<Holding> = {}): Holding {
  return { reportDate: REPORT_DATE, securityId: 'SEC1', securityType: 'FUND', ltSt: 'LT', nominal: 0, ...overrides };
}

export function transactionType(overrides: Partial<TransactionTypeMapping> & { key: string }): TransactionTypeMapping {
  return {
    groupAccount: null,
    securityType: null,
    investments: null,
    statusMapping: null,
    changeMapping: null,
    unrealizedKind: null,
    realizedKind: null,
    ...overrides
  };
}

export function investmentMapping(overrides: Partial<InvestmentMapping> & { key: string }): InvestmentMapping {
  return {
    securityId: null,
    securityType: null,
    purpose: null,
    tag: null,
    ifrsClassification: null,
    valuationMethod: null,
    valuationMethodAlt: null,
    fundingSource: null,
    ...overrides
  };
}

export function supervisoryAttributes(overrides: Partial<SupervisoryAttributes> = {}): SupervisoryAttributes {
  return {
    fundingSource: null,
    employeesInBs: null,
    companyType: null,
    companySubtype: null,
    guarantee: null,
    issuerName: null,
    issuerNameAlt: null,
    sector: null,
    ownership: null,
    ifrsClassification: null,
    valuationMethod: null,
    issuerCountry: null,
    tradingCountry: null,
    regulatedMarket: null,
    valuationSource: null,
    couponType: null,
    ...overrides
  };
}

export function ledgerAccountMapping(overrides: Partial<LedgerAccountMapping> & { key: string }): LedgerAccountMapping {
  return {
    ...supervisoryAttributes(),
    accountNo: null,
    accountNo2: null,
    accountName: null,
    isin: null,
    quantity: null,
    accruedInterest: null,
    amortizedExpenses: null,
    currency: null,
    couponFrequency: null,
    interestRate: null,
    effectiveInterestRate: null,
    investmentDate: null,
    maturityDate: null,
    ratings: null,
    ratingAgency: null,
    ...overrides
  };
}

export function positionMapping(overrides: Partial<PositionMapping> & { key: string }): PositionMapping {
  return { ...supervisoryAttributes(), ...overrides };
}

// ============================================================================
// SAMPLE SNAPSHOT
// ============================================================================

export function sampleMappings(): MappingSnapshot {
  const investmentTypes: InvestmentTypeMapping[] = [
    { key: 'FUNDLT', securityType: 'FUND', ltSt: 'LT', category: InvestmentCategory.INVESTMENT_FUND_SHARES }
  ];

  return {
    transactionTypes: [
      transactionType({
        key: 'A100FUNDX',
        statusMapping: 'Status',
        changeMapping: 'Change',
        unrealizedKind: TransactionKind.ACCOUNTING_VALUE,
        realizedKind: RealizedKind.ACCOUNTING_VALUE
      }),
      transactionType({
        key: 'R300FUNDX',
        statusMapping: 'Status',
        changeMapping: 'Change',
        unrealizedKind: TransactionKind.REVALUATION_RESERVE
      }),
      transactionType({ key: 'E200FUNDX', changeMapping: 'Change', unrealizedKind: TransactionKind.REVALUATION_EFFECT }),
      transactionType({ key: 'P900FUNDX', realizedKind: RealizedKind.REALIZED_PROFIT_LOSS })
    ],
    investmentTypes,
    investments: [
      investmentMapping({
        key: 'SEC1FUND',
        tag: 'Fund Alpha',
        ifrsClassification: 'FVTPL',
        valuationMethod: 'Market',
        fundingSource: 'Own funds'
      }),
      investmentMapping({
        key: 'SEC2FUND',
        tag: 'Fund Beta',
        ifrsClassification: 'FVOCI',
        valuationMethod: 'Market',
        fundingSource: 'Technical provisions'
      })
    ],
    ledgerAccounts: [
      ledgerAccountMapping({
        key: '020300BANKDeposit A',
        accountNo: '020300',
        accountNo2: 'BANK',
        accountName: 'Deposit A',
        fundingSource: 'Own funds',
        issuerName: 'Bank One',
        quantity: 1,
        accruedInterest: 12.5,
        currency: 'EUR',
        investmentDate: '2024-01-15'
      }),
      ledgerAccountMapping({ key: '030100LOANLoan B', accountNo: '030100', accountNo2: 'LOAN', accountName: 'Loan B' })
    ],
    positions: [
      positionMapping({ key: 'BOND1BONDLT', fundingSource: 'Own funds', issuerName: 'Treasury', couponType: 'Fixed' })
    ],
    codeLabels: [
      { code: 'EUR', label: 'Euro' },
      { code: 'SP', label: 'S&P' }
    ]
  };
}

export function sampleSnapshot(): LoadedSnapshot {
  return {
    facts: {
      ledgerEntries: [
        ledgerEntry({ bookingDate: '2024-12-31', securityId: 'SEC2', debitForeign: 300 }),
        ledgerEntry({ bookingDate: '2025-02-15', securityId: 'SEC2', debitForeign: 500 }),
        ledgerEntry({ bookingDate: '2025-03-31', debitForeign: 1000 }),
        ledgerEntry({ bookingDate: '2025-03-31', groupAccount: 'R300', creditForeign: 50 }),
        ledgerEntry({ bookingDate: '2025-05-15', debitForeign: 200 }),
        ledgerEntry({ bookingDate: '2025-06-10', groupAccount: 'E200', creditForeign: 30 }),
        ledgerEntry({ bookingDate: '2025-06-20', groupAccount: 'R300', debitForeign: 10 }),
        ledgerEntry({ bookingDate: '2025-06-25', groupAccount: 'P900', creditForeign: 80 })
      ],
      holdings: [holding({ securityId: 'SEC1', nominal: 40 }), holding({ securityId: 'SEC2', nominal: 60 })],
      positions: [position()],
      ledgerAccountBalances: [
        { accountNo: '020300', accountNo2: 'BANK', accountName: 'Deposit A', balance: 2500 },
        { accountNo: '030100', accountNo2: 'LOAN', accountName: 'Loan B', balance: 700 }
      ]
    },
    mappings: sampleMappings()
  };
}

/**
 * Report context over the enriched sample snapshot
 */
export function sampleContext(settings: ReportContext['settings'] = TEST_SETTINGS): ReportContext {
  const snapshot = sampleSnapshot();
  const facts = enrichFacts(deriveKeys(snapshot.facts), snapshot.mappings);
  return {
    period: PERIOD,
    facts,
    aggregator: new CategoryAggregator(facts, PERIOD),
    codeLabels: new Map(snapshot.mappings.codeLabels.map(entry => [entry.code, entry.label] as const)),
    settings
  };
}

// ============================================================================
// IN-PROCESS SOURCES
// ============================================================================

/**
 * Lays entities out as warehouse rows, keyed by warehouse column
 */
export function rawRows<T extends object>(
  columns: WarehouseColumns<T> & Readonly<Record<string, string>>,
  entities: readonly T[]
): RawRow[] {
  return entities.map(entity => {
    const values = new Map<string, unknown>(Object.entries(entity));
    const row: Record<string, unknown> = {};
    for (const [field, column] of Object.entries(columns)) {
      row[column] = values.get(field) ?? null;
    }
    return row;
  });
}

export interface FactTables {
  ledgerEntries: RawRow[];
  holdings: RawRow[];
  positions: RawRow[];
  ledgerAccountBalances: RawRow[];
  ledgerAccountPostings: RawRow[];
}

export class InMemoryFactSource implements FactSource {
  readonly requestedDates: string[] = [];

  constructor(private readonly tables: FactTables) {}

  static fromSnapshot(snapshot: LoadedSnapshot, postingDates: readonly string[] = [REPORT_DATE]): InMemoryFactSource {
    const { facts } = snapshot;
    return new InMemoryFactSource({
      ledgerEntries: rawRows<LedgerEntryRecord>(LEDGER_ENTRY_COLUMNS, facts.ledgerEntries),
      holdings: rawRows(HOLDING_COLUMNS, facts.holdings),
      positions: rawRows(POSITION_COLUMNS, facts.positions),
      ledgerAccountBalances: rawRows(LEDGER_ACCOUNT_BALANCE_COLUMNS, facts.ledgerAccountBalances),
      ledgerAccountPostings: postingDates.map(date => ({ POSTING_DATE: date }))
    });
  }

  async ledgerEntries(reportDate: string): Promise<RawRow[]> {
    this.requestedDates.push(reportDate);
    return this.tables.ledgerEntries;
  }

  async holdings(): Promise<RawRow[]> {
    return this.tables.holdings;
  }

  async positions(): Promise<RawRow[]> {
    return this.tables.positions;
  }

  async ledgerAccountBalances(): Promise<RawRow[]> {
    return this.tables.ledgerAccountBalances;
  }

  async ledgerAccountPostings(): Promise<RawRow[]> {
    return this.tables.ledgerAccountPostings;
  }
}

export class InMemoryMappingSource implements MappingSource {
  constructor(private readonly tables: Readonly<Record<MappingTableId, RawRow[]>>) {}

  static fromSnapshot(mappings: MappingSnapshot): InMemoryMappingSource {
    return new InMemoryMappingSource({
      transactionTypes: rawRows(TRANSACTION_TYPE_MAPPING_COLUMNS, mappings.transactionTypes),
      investmentTypes: rawRows(INVESTMENT_TYPE_MAPPING_COLUMNS, mappings.investmentTypes),
      investments: rawRows(INVESTMENT_MAPPING_COLUMNS, mappings.investments),
      ledgerAccounts: rawRows(LEDGER_ACCOUNT_MAPPING_COLUMNS, mappings.ledgerAccounts),
      positions: rawRows(POSITION_MAPPING_COLUMNS, mappings.positions),
      codeLabels: rawRows(CODE_LABEL_COLUMNS, mappings.codeLabels)
    });
  }

  async mappingTable(table: MappingTableId): Promise<RawRow[]> {
    return this.tables[table];
  }
}
