/**
 * Fact entities read from the accounting and investment systems, and the
 * derived shapes they take on the way through the pipeline.
 *
 * Each `*_COLUMNS` dictionary maps an entity field to its warehouse column.
 */

import type { TransactionKindId } from './investment-taxonomy.js';
import type { LedgerAccountMapping, PositionMapping } from './mapping.js';

export type WarehouseColumns<T> = { readonly [K in keyof T]-?: string };

// ============================================================================
// LEDGER ENTRIES (general-ledger export of the investment system)
// ============================================================================

export interface LedgerEntryRecord {
  bookingDate: string;
  groupAccount: string;
  securityType: string;
  investments: string;
  ltSt: string;
  securityId: string;
  purpose: string | null;
  transactionCode: string | null;
  debitForeign: number;
  creditForeign: number;
  debitBase: number;
  creditBase: number;
}

export const LEDGER_ENTRY_COLUMNS: WarehouseColumns<LedgerEntryRecord> = {
  bookingDate: 'BOOKING_DATE',
  groupAccount: 'GROUP_ACCOUNT',
  securityType: 'SECURITY_TYPE',
  investments: 'INVESTMENTS',
  ltSt: 'LT_ST',
  securityId: 'SECURITY_ID',
  purpose: 'PURPOSE',
  transactionCode: 'TRANSACTION_CODE',
  debitForeign: 'DEBIT_AMOUNT_FOREIGN_CUR',
  creditForeign: 'CREDIT_AMOUNT_FOREIGN_CUR',
  debitBase: 'DEBIT_AMOUNT_BASE_CUR',
  creditBase: 'CREDIT_AMOUNT_BASE_CUR'
};

export interface LedgerEntry extends LedgerEntryRecord {
  /** debit minus credit, the measure summed for status windows */
  balance: number;
  /** negated balance, the measure summed for change windows */
  delta: number;
}

export interface KeyedLedgerEntry extends LedgerEntry {
  transactionTypeKey: string;
  investmentTypeKey: string;
  investmentKey: string;
}

export interface EnrichedLedgerEntry extends KeyedLedgerEntry {
  isStatus: boolean;
  isChange: boolean;
  unrealizedKind: TransactionKindId | null;
  realizedKind: string | null;
  category: string | null;
  tag: string | null;
  ifrsClassification: string | null;
  valuationMethod: string | null;
  valuationMethodAlt: string | null;
  fundingSource: string | null;
}

// ============================================================================
// HOLDINGS (per-security nominal quantities at the report date)
// ============================================================================

export interface Holding {
  reportDate: string;
  securityId: string;
  securityType: string;
  ltSt: string;
  nominal: number;
}

export const HOLDING_COLUMNS: WarehouseColumns<Holding> = {
  reportDate: 'REPORT_DATE',
  securityId: 'SECURITY_ID',
  securityType: 'SECTYPE',
  ltSt: 'LT_ST',
  nominal: 'NOMINAL'
};

export interface KeyedHolding extends Holding {
  investmentTypeKey: string;
  investmentKey: string;
}

export interface EnrichedHolding extends KeyedHolding {
  category: string | null;
  tag: string | null;
}

// ============================================================================
// INVESTMENT POSITIONS (list of investments at the report date)
// ============================================================================

export interface Position {
  reportDate: string;
  investmentType: string;
  ifrsGroup: string | null;
  investmentName: string;
  isin: string | null;
  nominalValueOfLot: number;
  numberOfLots: number;
  quotationCurrency: string | null;
  acquisitionValueQc: number;
  acquisitionValuePc: number;
  balanceBookValueQc: number;
  balanceBookValuePc: number;
  couponRate: number | null;
  effectiveInterestRate: number | null;
  accruedInterestQc: number;
  accruedInterestPc: number;
  purchaseDate: string | null;
  maturityDate: string | null;
  issuerRating: string | null;
  issuerRatingAgency: string | null;
  dirtyMarketValueQc: number;
  dirtyMarketValuePc: number;
  securityId: string;
  ltSt: string;
  couponFrequency: number | null;
}

export const POSITION_COLUMNS: WarehouseColumns<Position> = {
  reportDate: 'REPORT_DATE',
  investmentType: 'INVESTMENT_TYPE',
  ifrsGroup: 'IFRS_GROUP',
  investmentName: 'INVESTMENT_NAME',
  isin: 'ISIN',
  nominalValueOfLot: 'NOMINAL_VALUE_OF_LOT_QC',
  numberOfLots: 'NUMBER_OF_LOTS',
  quotationCurrency: 'QUOTATION_CURRENCY',
  acquisitionValueQc: 'ACQUISITION_VALUE_IN_QC',
  acquisitionValuePc: 'ACQUISITION_VALUE_IN_PC',
  balanceBookValueQc: 'BALANCE_BOOK_VALUE_IN_QC',
  balanceBookValuePc: 'BALANCE_BOOK_VALUE_IN_PC',
  couponRate: 'COUPON_RATE',
  effectiveInterestRate: 'EFFECTIVE_INTEREST_RATE',
  accruedInterestQc: 'ACCRUED_INTEREST_IN_QC',
  accruedInterestPc: 'ACCRUED_INTEREST_IN_PC',
  purchaseDate: 'PURCHASE_DATE',
  maturityDate: 'MATURITY_DATE',
  issuerRating: 'ISSUER_RATING_SECOND_BEST',
  issuerRatingAgency: 'ISSUER_RATING_AGENCY_SECOND_BEST',
  dirtyMarketValueQc: 'DIRTY_MARKET_VALUE_IN_QC',
  dirtyMarketValuePc: 'DIRTY_MARKET_VALUE_IN_PC',
  securityId: 'SECURITY_ID',
  ltSt: 'LT_ST',
  couponFrequency: 'COUPON_FREQUENCY'
};

export interface KeyedPosition extends Position {
  positionKey: string;
}

export interface MappedPosition extends KeyedPosition {
  attributes: PositionMapping;
}

// ============================================================================
// LEDGER ACCOUNT BALANCES (main accounting system)
// ============================================================================

export interface LedgerAccountBalance {
  accountNo: string;
  accountNo2: string;
  accountName: string;
  balance: number;
}

export const LEDGER_ACCOUNT_BALANCE_COLUMNS: WarehouseColumns<LedgerAccountBalance> = {
  accountNo: 'NO_',
  accountNo2: 'NO_2',
  accountName: 'NAME',
  balance: 'SALDO'
};

export interface LedgerAccountPosting {
  postingDate: string;
}

export interface KeyedLedgerAccountBalance extends LedgerAccountBalance {
  ledgerAccountKey: string;
}

export interface MappedLedgerAccount extends KeyedLedgerAccountBalance {
  attributes: LedgerAccountMapping;
}

// ============================================================================
// SNAPSHOTS
// ============================================================================

export interface FactSnapshot {
  ledgerEntries: readonly LedgerEntry[];
  holdings: readonly Holding[];
  positions: readonly Position[];
  ledgerAccountBalances: readonly LedgerAccountBalance[];
}

export interface KeyedFactSnapshot {
  ledgerEntries: readonly KeyedLedgerEntry[];
  holdings: readonly KeyedHolding[];
  positions: readonly KeyedPosition[];
  ledgerAccountBalances: readonly KeyedLedgerAccountBalance[];
}

export interface EnrichedFactSnapshot {
  ledgerEntries: readonly EnrichedLedgerEntry[];
  holdings: readonly EnrichedHolding[];
  positions: readonly MappedPosition[];
  ledgerAccounts: readonly MappedLedgerAccount[];
}
