/**
 * Closed enumerations of the regulatory investment report.
 *
 * The labels are the exact values stored in the mapping tables; list order is
 * the row order of every per-category report.
 */

// ============================================================================
// INVESTMENT CATEGORIES
// ============================================================================

export const InvestmentCategory = {
  LAND_BUILDINGS_FOR_OPERATIONS: 'I. Land and buildings used for operations',
  LAND_BUILDINGS_NOT_FOR_OPERATIONS: 'II. Land and buildings not used for operations',
  SHARES_IN_GROUP_UNDERTAKINGS:
    'III. Shares, stakes and other equity instruments in subsidiaries, associates and joint ventures',
  DEBT_SECURITIES_IN_GROUP:
    'IV. Debt securities issued by group undertakings, associates and joint ventures',
  DEBT_SECURITIES_UNDER_ONE_YEAR: 'V. Debt securities maturing within one year (other than under IV)',
  DEBT_SECURITIES_OVER_ONE_YEAR: 'VI. Debt securities maturing after more than one year (other than under IV)',
  OTHER_EQUITY_INSTRUMENTS: 'VII. Shares, stakes and other equity instruments (other than under III)',
  INVESTMENT_FUND_SHARES: 'VIII. Shares and units in investment funds (other than under III)',
  DERIVATIVES: 'IX. Derivatives'
} as const;

export type InvestmentCategoryId = keyof typeof InvestmentCategory;
export type InvestmentCategory = (typeof InvestmentCategory)[InvestmentCategoryId];

const CATEGORY_ORDER: readonly InvestmentCategoryId[] = [
  'LAND_BUILDINGS_FOR_OPERATIONS',
  'LAND_BUILDINGS_NOT_FOR_OPERATIONS',
  'SHARES_IN_GROUP_UNDERTAKINGS',
  'DEBT_SECURITIES_IN_GROUP',
  'DEBT_SECURITIES_UNDER_ONE_YEAR',
  'DEBT_SECURITIES_OVER_ONE_YEAR',
  'OTHER_EQUITY_INSTRUMENTS',
  'INVESTMENT_FUND_SHARES',
  'DERIVATIVES'
];

/**
 * All investment categories in report order
 */
export function allCategories(): readonly InvestmentCategory[] {
  return CATEGORY_ORDER.map(id => InvestmentCategory[id]);
}

// ============================================================================
// TRANSACTION KINDS (unrealized profit line items)
// ============================================================================

export const TransactionKind = {
  ACCOUNTING_VALUE: '01 Total acquisition cost/accounting value (to the last valuation date)',
  REVALUATION_EFFECT: '03 Revaluation effect',
  REVALUATION_RESERVE: '04 Revaluation reserve (status)',
  EXCHANGE_RATE_DIFFERENCE: '06 Net exchange rate difference',
  AMORTIZATION: '07 Amortisation of discount/premium on fixed-maturity instruments'
} as const;

export type TransactionKindId = keyof typeof TransactionKind;
export type TransactionKind = (typeof TransactionKind)[TransactionKindId];

const KIND_ORDER: readonly TransactionKindId[] = [
  'ACCOUNTING_VALUE',
  'REVALUATION_EFFECT',
  'REVALUATION_RESERVE',
  'EXCHANGE_RATE_DIFFERENCE',
  'AMORTIZATION'
];

/**
 * Looks up the kind id for a label read from the transaction-type mapping.
 * Labels outside the enumeration (other ledger movements) yield null.
 */
export function transactionKindOf(label: string | null): TransactionKindId | null {
  if (label === null) {
    return null;
  }
  return KIND_ORDER.find(id => TransactionKind[id] === label) ?? null;
}

// ============================================================================
// REALIZED PROFIT KINDS
// ============================================================================

export const RealizedKind = {
  ACCOUNTING_VALUE: 'Accounting value',
  REALIZED_PROFIT_LOSS: 'Realized profit (loss)'
} as const;

export type RealizedKind = (typeof RealizedKind)[keyof typeof RealizedKind];

// ============================================================================
// WINDOW MARKERS
// ============================================================================

/** Value of the transaction-type status flag column for balance rows */
export const STATUS_MARKER = 'Status';
/** Value of the transaction-type change flag column for period-delta rows */
export const CHANGE_MARKER = 'Change';
