/**
 * Hand-maintained mapping tables. Each table is keyed by a unique `key`
 * column; the remaining columns are the attributes it contributes.
 */

import type { WarehouseColumns } from './ledger.js';

export interface TransactionTypeMapping {
  key: string;
  groupAccount: string | null;
  securityType: string | null;
  investments: string | null;
  statusMapping: string | null;
  changeMapping: string | null;
  unrealizedKind: string | null;
  realizedKind: string | null;
}

export const TRANSACTION_TYPE_MAPPING_COLUMNS: WarehouseColumns<TransactionTypeMapping> = {
  key: 'KEY',
  groupAccount: 'GROUP_ACCOUNT',
  securityType: 'SECURITY_TYPE',
  investments: 'INVESTMENTS',
  statusMapping: 'STATUS_MAPPING',
  changeMapping: 'CHANGE_MAPPING',
  unrealizedKind: 'UNREALIZED_TRANSACTION_KIND',
  realizedKind: 'REALIZED_TRANSACTION_KIND'
};

export interface InvestmentTypeMapping {
  key: string;
  securityType: string | null;
  ltSt: string | null;
  category: string | null;
}

export const INVESTMENT_TYPE_MAPPING_COLUMNS: WarehouseColumns<InvestmentTypeMapping> = {
  key: 'INVEST_KEY',
  securityType: 'SECURITY_TYPE',
  ltSt: 'LT_ST',
  category: 'VALUE'
};

export interface InvestmentMapping {
  key: string;
  securityId: string | null;
  securityType: string | null;
  purpose: string | null;
  tag: string | null;
  ifrsClassification: string | null;
  valuationMethod: string | null;
  valuationMethodAlt: string | null;
  fundingSource: string | null;
}

export const INVESTMENT_MAPPING_COLUMNS: WarehouseColumns<InvestmentMapping> = {
  key: 'KEY',
  securityId: 'SECURITY_ID',
  securityType: 'SECURITY_TYPE',
  purpose: 'PURPOSE',
  tag: 'TAGS',
  ifrsClassification: 'IFRS_CLASSIFICATION',
  valuationMethod: 'VALUATION_METHOD',
  valuationMethodAlt: 'VALUATION_METHOD_ALT',
  fundingSource: 'FUNDING_SOURCE'
};

/**
 * Descriptive attributes of the supervisory lookup shared by ledger-account
 * and position mappings.
 */
export interface SupervisoryAttributes {
  fundingSource: string | null;
  employeesInBs: string | null;
  companyType: string | null;
  companySubtype: string | null;
  guarantee: string | null;
  issuerName: string | null;
  issuerNameAlt: string | null;
  sector: string | null;
  ownership: string | null;
  ifrsClassification: string | null;
  valuationMethod: string | null;
  issuerCountry: string | null;
  tradingCountry: string | null;
  regulatedMarket: string | null;
  valuationSource: string | null;
  couponType: string | null;
}

const SUPERVISORY_ATTRIBUTE_COLUMNS: WarehouseColumns<SupervisoryAttributes> = {
  fundingSource: 'FUNDING_SOURCE',
  employeesInBs: 'EMPLOYEES_IN_BS',
  companyType: 'COMPANY_TYPE',
  companySubtype: 'COMPANY_SUBTYPE',
  guarantee: 'GUARANTEE',
  issuerName: 'ISSUER_NAME',
  issuerNameAlt: 'ISSUER_NAME_ALT',
  sector: 'SECTOR',
  ownership: 'OWNERSHIP',
  ifrsClassification: 'IFRS_CLASSIFICATION',
  valuationMethod: 'VALUATION_METHOD',
  issuerCountry: 'ISSUER_COUNTRY',
  tradingCountry: 'TRADING_COUNTRY',
  regulatedMarket: 'REGULATED_MARKET',
  valuationSource: 'VALUATION_SOURCE',
  couponType: 'COUPON_TYPE'
};

export interface PositionMapping extends SupervisoryAttributes {
  key: string;
}

export const POSITION_MAPPING_COLUMNS: WarehouseColumns<PositionMapping> = {
  key: 'SCD_ID',
  ...SUPERVISORY_ATTRIBUTE_COLUMNS
};

export interface LedgerAccountMapping extends SupervisoryAttributes {
  key: string;
  accountNo: string | null;
  accountNo2: string | null;
  accountName: string | null;
  isin: string | null;
  quantity: number | null;
  accruedInterest: number | null;
  amortizedExpenses: number | null;
  currency: string | null;
  couponFrequency: number | null;
  interestRate: number | null;
  effectiveInterestRate: number | null;
  investmentDate: string | null;
  maturityDate: string | null;
  ratings: string | null;
  ratingAgency: string | null;
}

export const LEDGER_ACCOUNT_MAPPING_COLUMNS: WarehouseColumns<LedgerAccountMapping> = {
  key: 'KEY',
  accountNo: 'NO_',
  accountNo2: 'NO_2',
  accountName: 'NAME',
  ...SUPERVISORY_ATTRIBUTE_COLUMNS,
  isin: 'ISIN',
  quantity: 'QUANTITY',
  accruedInterest: 'ACCRUED_INTEREST',
  amortizedExpenses: 'AMORTIZED_EXPENSES',
  currency: 'CURRENCY',
  couponFrequency: 'COUPON_FREQUENCY',
  interestRate: 'INTEREST_RATE',
  effectiveInterestRate: 'EFFECTIVE_INTEREST_RATE',
  investmentDate: 'INVESTMENT_DATE',
  maturityDate: 'MATURITY_DATE',
  ratings: 'RATINGS',
  ratingAgency: 'RATING_AGENCY'
};

/**
 * Code to label dictionary (currency codes, rating agency codes).
 */
export interface CodeLabel {
  code: string;
  label: string;
}

export const CODE_LABEL_COLUMNS: WarehouseColumns<CodeLabel> = {
  code: 'KEY',
  label: 'VALUE'
};

export interface MappingSnapshot {
  transactionTypes: readonly TransactionTypeMapping[];
  investmentTypes: readonly InvestmentTypeMapping[];
  investments: readonly InvestmentMapping[];
  ledgerAccounts: readonly LedgerAccountMapping[];
  positions: readonly PositionMapping[];
  codeLabels: readonly CodeLabel[];
}

/**
 * The five key spaces checked for coverage
 */
export type KeySpace = 'transactionType' | 'investmentType' | 'investment' | 'ledgerAccount' | 'position';

export const KEY_SPACES: readonly KeySpace[] = [
  'transactionType',
  'investmentType',
  'investment',
  'ledgerAccount',
  'position'
];
