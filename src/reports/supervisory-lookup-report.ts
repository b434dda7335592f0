/**
 * Supervisory Lookup Report Generator
 *
 * Lists the investment holdings of both source systems in the supervisory
 * column set: ledger-account balances from the main accounting system, and
 * investment positions from the investment system. The combined table is the
 * ledger-account rows followed by the position rows.
 *
 * Rows whose mapping leaves the funding source blank are not reported.
 */

import { logFlow } from '../utils/logging.js';
import { normalizeZero } from '../utils/numeric.js';
import { assembleTable } from '../services/report-assembler.js';
import type { MappedLedgerAccount, MappedPosition } from '../types/ledger.js';
import type { SupervisoryAttributes } from '../types/mapping.js';
import type { ReportTable, TableDefinition } from '../types/report.js';
import type { ReportContext, ReportGenerator } from '../services/report-registry.js';

export const LOOKUP_TABLES = {
  LEDGER_ACCOUNTS: 'LEDGER_ACCOUNT_LOOKUP',
  POSITIONS: 'POSITION_LOOKUP',
  COMBINED: 'COMBINED_LOOKUP'
} as const;

export interface SupervisoryLookupLine extends SupervisoryAttributes {
  isin: string | null;
  quantity: number | null;
  acquisitionValue: number | null;
  accruedInterest: number | null;
  amortizedExpenses: number | null;
  objectiveValue: number | null;
  accountingValue: number | null;
  accountingValueOriginalCurrency: number | null;
  currency: string | null;
  couponFrequency: number | null;
  interestRate: number | null;
  effectiveInterestRate: number | null;
  investmentDate: string | null;
  maturityDate: string | null;
  ratings: string | null;
  ratingAgency: string | null;
}

function lookupTable(name: string): TableDefinition<SupervisoryLookupLine> {
  return {
    name,
    columns: [
      { header: 'Funding source', kind: 'text', value: row => row.fundingSource },
      { header: 'Number of employees in BS', kind: 'text', value: row => row.employeesInBs },
      { header: 'Company type', kind: 'text', value: row => row.companyType },
      { header: 'Company subtype', kind: 'text', value: row => row.companySubtype },
      { header: 'Guarantee', kind: 'text', value: row => row.guarantee },
      { header: 'Issuer name', kind: 'text', value: row => row.issuerName },
      { header: 'Issuer name (if different)', kind: 'text', value: row => row.issuerNameAlt },
      { header: 'Sector', kind: 'text', value: row => row.sector },
      { header: 'ISIN', kind: 'text', value: row => row.isin },
      { header: 'Ownership', kind: 'text', value: row => row.ownership },
      { header: 'Quantity', kind: 'number', value: row => row.quantity },
      { header: 'IFRS classification', kind: 'text', value: row => row.ifrsClassification },
      { header: 'Valuation method', kind: 'text', value: row => row.valuationMethod },
      { header: 'Issuer country', kind: 'text', value: row => row.issuerCountry },
      { header: 'Trading country', kind: 'text', value: row => row.tradingCountry },
      { header: 'Regulated market', kind: 'text', value: row => row.regulatedMarket },
      { header: 'Valuation source', kind: 'text', value: row => row.valuationSource },
      { header: 'Acquisition value', kind: 'number', value: row => row.acquisitionValue },
      { header: 'Accrued interest', kind: 'number', value: row => row.accruedInterest },
      { header: 'Amortized expenses', kind: 'number', value: row => row.amortizedExpenses },
      { header: 'Objective value', kind: 'number', value: row => row.objectiveValue },
      { header: 'Accounting value', kind: 'number', value: row => row.accountingValue },
      {
        header: 'Accounting value in original currency',
        kind: 'number',
        value: row => row.accountingValueOriginalCurrency
      },
      { header: 'Currency', kind: 'text', value: row => row.currency },
      { header: 'Coupon type', kind: 'text', value: row => row.couponType },
      { header: 'Coupon frequency', kind: 'number', value: row => row.couponFrequency },
      { header: 'Interest rate', kind: 'number', value: row => row.interestRate },
      { header: 'Effective interest rate', kind: 'number', value: row => row.effectiveInterestRate },
      { header: 'Investment date', kind: 'date', value: row => row.investmentDate },
      { header: 'Maturity date', kind: 'date', value: row => row.maturityDate },
      { header: 'Ratings', kind: 'text', value: row => row.ratings },
      { header: 'Rating agency', kind: 'text', value: row => row.ratingAgency }
    ]
  };
}

function supervisoryAttributes(source: SupervisoryAttributes): SupervisoryAttributes {
  return {
    fundingSource: source.fundingSource,
    employeesInBs: source.employeesInBs,
    companyType: source.companyType,
    companySubtype: source.companySubtype,
    guarantee: source.guarantee,
    issuerName: source.issuerName,
    issuerNameAlt: source.issuerNameAlt,
    sector: source.sector,
    ownership: source.ownership,
    ifrsClassification: source.ifrsClassification,
    valuationMethod: source.valuationMethod,
    issuerCountry: source.issuerCountry,
    tradingCountry: source.tradingCountry,
    regulatedMarket: source.regulatedMarket,
    valuationSource: source.valuationSource,
    couponType: source.couponType
  };
}

export class SupervisoryLookupReportGenerator implements ReportGenerator {
  private readonly zeroAcquisitionAccounts: ReadonlySet<string>;

  constructor(private readonly context: ReportContext) {
    this.zeroAcquisitionAccounts = new Set(context.settings.zeroAcquisitionAccounts);
  }

  generateTables(): ReportTable[] {
    logFlow('SUPERVISORY_LOOKUP', 'ENTRY', 'Generating supervisory lookup tables');

    const ledgerAccountLines = this.ledgerAccountLines();
    const positionLines = this.positionLines();

    const tables = [
      assembleTable(lookupTable(LOOKUP_TABLES.LEDGER_ACCOUNTS), ledgerAccountLines),
      assembleTable(lookupTable(LOOKUP_TABLES.POSITIONS), positionLines),
      assembleTable(lookupTable(LOOKUP_TABLES.COMBINED), [...ledgerAccountLines, ...positionLines])
    ];

    logFlow('SUPERVISORY_LOOKUP', 'EXIT', 'Supervisory lookup tables generated', {
      ledgerAccountRows: ledgerAccountLines.length,
      positionRows: positionLines.length
    });
    return tables;
  }

  ledgerAccountLines(): SupervisoryLookupLine[] {
    const accounts = this.context.facts.ledgerAccounts;
    const lines = accounts
      .map(account => this.toLedgerAccountLine(account))
      .filter(line => line.fundingSource !== null);
    this.logDropped('ledger accounts', accounts.length, lines.length);
    return lines;
  }

  positionLines(): SupervisoryLookupLine[] {
    const positions = this.context.facts.positions;
    const lines = positions
      .map(position => this.toPositionLine(position))
      .filter(line => line.fundingSource !== null);
    this.logDropped('positions', positions.length, lines.length);
    return lines;
  }

  /**
   * Amounts of a ledger account all read its balance, except the acquisition
   * value of the accounts configured to report none.
   */
  toLedgerAccountLine(account: MappedLedgerAccount): SupervisoryLookupLine {
    const mapping = account.attributes;
    return {
      ...supervisoryAttributes(mapping),
      isin: mapping.isin,
      quantity: mapping.quantity,
      acquisitionValue: this.zeroAcquisitionAccounts.has(account.accountNo) ? 0 : account.balance,
      accruedInterest: mapping.accruedInterest,
      amortizedExpenses: mapping.amortizedExpenses,
      objectiveValue: account.balance,
      accountingValue: account.balance,
      accountingValueOriginalCurrency: account.balance,
      currency: mapping.currency,
      couponFrequency: mapping.couponFrequency,
      interestRate: mapping.interestRate,
      effectiveInterestRate: mapping.effectiveInterestRate,
      investmentDate: mapping.investmentDate,
      maturityDate: mapping.maturityDate,
      ratings: mapping.ratings,
      ratingAgency: mapping.ratingAgency
    };
  }

  toPositionLine(position: MappedPosition): SupervisoryLookupLine {
    const { codeLabels } = this.context;
    const label = (code: string | null): string | null => (code === null ? null : (codeLabels.get(code) ?? null));
    const carryingValue = normalizeZero(position.balanceBookValuePc + position.accruedInterestPc);

    return {
      ...supervisoryAttributes(position.attributes),
      isin: position.isin,
      quantity: this.positionQuantity(position),
      acquisitionValue: position.acquisitionValuePc,
      accruedInterest: position.accruedInterestPc,
      amortizedExpenses: null,
      objectiveValue: carryingValue,
      accountingValue: carryingValue,
      accountingValueOriginalCurrency: normalizeZero(position.balanceBookValueQc + position.accruedInterestQc),
      currency: label(position.quotationCurrency),
      couponFrequency: position.couponFrequency,
      interestRate: position.couponRate,
      effectiveInterestRate: position.effectiveInterestRate,
      investmentDate: position.purchaseDate,
      maturityDate: position.maturityDate,
      ratings: position.issuerRating,
      ratingAgency: label(position.issuerRatingAgency)
    };
  }

  /**
   * Number of lots, zeroed for positions whose name matches a configured
   * fragment, and counted in hundreds where the lot nominal is quoted per
   * hundred.
   */
  positionQuantity(position: MappedPosition): number {
    const { zeroQuantityNameFragments, perHundredLotNominal } = this.context.settings;
    let quantity = position.numberOfLots;
    if (zeroQuantityNameFragments.some(fragment => position.investmentName.includes(fragment))) {
      quantity = 0;
    }
    if (position.nominalValueOfLot === perHundredLotNominal) {
      quantity /= 100;
    }
    return normalizeZero(quantity);
  }

  private logDropped(source: string, total: number, kept: number): void {
    if (kept < total) {
      logFlow('SUPERVISORY_LOOKUP', 'INFO', `Skipped ${total - kept} ${source} without a funding source`);
    }
  }
}
