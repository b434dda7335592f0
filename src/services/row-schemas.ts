/**
 * Row Schemas
 *
 * Validates raw warehouse rows (keyed by warehouse column name) and converts
 * them into the typed entities the pipeline works on:
 * - DATE and TIMESTAMP wrappers (`{ value }`) and Date objects become ISO
 *   `YYYY-MM-DD` strings
 * - NUMERIC wrappers and numeric strings become numbers; absent amounts read 0
 * - blank descriptive attributes read as absent (null)
 *
 * A column missing from a row, or a value that cannot be converted, is a
 * SchemaViolationError naming the table and the warehouse column.
 */

import { z } from 'zod';
import { SchemaViolationError } from '../utils/errors.js';
import { parseNumeric } from '../utils/numeric.js';
import { formatIsoDate } from '../utils/report-calendar.js';
import {
  HOLDING_COLUMNS,
  LEDGER_ACCOUNT_BALANCE_COLUMNS,
  LEDGER_ENTRY_COLUMNS,
  POSITION_COLUMNS,
  type Holding,
  type LedgerAccountBalance,
  type LedgerAccountPosting,
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
  type CodeLabel,
  type InvestmentMapping,
  type InvestmentTypeMapping,
  type LedgerAccountMapping,
  type PositionMapping,
  type TransactionTypeMapping
} from '../types/mapping.js';

export type RawRow = Readonly<Record<string, unknown>>;

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

// ============================================================================
// VALUE CONVERSIONS
// ============================================================================

/**
 * Unwraps the `{ value }` objects the warehouse client returns for DATE,
 * TIMESTAMP and NUMERIC columns
 */
export function unwrapValue(value: unknown): unknown {
  if (value !== null && typeof value === 'object' && !(value instanceof Date) && 'value' in value) {
    return value.value;
  }
  return value;
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

export function toIsoDate(value: unknown): unknown {
  const unwrapped = unwrapValue(value);
  if (unwrapped instanceof Date) {
    return isNaN(unwrapped.getTime()) ? unwrapped : formatIsoDate(unwrapped);
  }
  if (typeof unwrapped === 'string' && ISO_DATE_PREFIX.test(unwrapped)) {
    return unwrapped.slice(0, 10);
  }
  return unwrapped;
}

function toText(value: unknown): unknown {
  const unwrapped = unwrapValue(value);
  return unwrapped === null || unwrapped === undefined ? '' : String(unwrapped);
}

function toOptionalText(value: unknown): unknown {
  const unwrapped = unwrapValue(value);
  return isBlank(unwrapped) ? null : String(unwrapped);
}

function toOptionalNumber(value: unknown): unknown {
  const unwrapped = unwrapValue(value);
  if (isBlank(unwrapped)) {
    return null;
  }
  return typeof unwrapped === 'number' ? unwrapped : Number(String(unwrapped));
}

const text = z.preprocess(toText, z.string());
const optionalText = z.preprocess(toOptionalText, z.string().nullable());
const amount = z.preprocess(value => parseNumeric(unwrapValue(value)), z.number());
const optionalNumber = z.preprocess(toOptionalNumber, z.number().nullable());
const isoDate = z.preprocess(toIsoDate, z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a date'));
const optionalIsoDate = z.preprocess(
  value => (isBlank(unwrapValue(value)) ? null : toIsoDate(value)),
  z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a date').nullable()
);

// ============================================================================
// ENTITY SCHEMAS
// ============================================================================

/**
 * A table's warehouse name, its column dictionary and the schema of its
 * converted rows
 */
export interface RowSchema<T> {
  table: string;
  columns: WarehouseColumns<T> & Readonly<Record<string, string>>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const LEDGER_ENTRY_ROWS: RowSchema<LedgerEntryRecord> = {
  table: 'ledgerEntries',
  columns: LEDGER_ENTRY_COLUMNS,
  schema: z.object({
    bookingDate: isoDate,
    groupAccount: text,
    securityType: text,
    investments: text,
    ltSt: text,
    securityId: text,
    purpose: optionalText,
    transactionCode: optionalText,
    debitForeign: amount,
    creditForeign: amount,
    debitBase: amount,
    creditBase: amount
  })
};

export const HOLDING_ROWS: RowSchema<Holding> = {
  table: 'holdings',
  columns: HOLDING_COLUMNS,
  schema: z.object({
    reportDate: isoDate,
    securityId: text,
    securityType: text,
    ltSt: text,
    nominal: amount
  })
};

export const POSITION_ROWS: RowSchema<Position> = {
  table: 'positions',
  columns: POSITION_COLUMNS,
  schema: z.object({
    reportDate: isoDate,
    investmentType: text,
    ifrsGroup: optionalText,
    investmentName: text,
    isin: optionalText,
    nominalValueOfLot: amount,
    numberOfLots: amount,
    quotationCurrency: optionalText,
    acquisitionValueQc: amount,
    acquisitionValuePc: amount,
    balanceBookValueQc: amount,
    balanceBookValuePc: amount,
    couponRate: optionalNumber,
    effectiveInterestRate: optionalNumber,
    accruedInterestQc: amount,
    accruedInterestPc: amount,
    purchaseDate: optionalIsoDate,
    maturityDate: optionalIsoDate,
    issuerRating: optionalText,
    issuerRatingAgency: optionalText,
    dirtyMarketValueQc: amount,
    dirtyMarketValuePc: amount,
    securityId: text,
    ltSt: text,
    couponFrequency: optionalNumber
  })
};

export const LEDGER_ACCOUNT_BALANCE_ROWS: RowSchema<LedgerAccountBalance> = {
  table: 'ledgerAccountBalances',
  columns: LEDGER_ACCOUNT_BALANCE_COLUMNS,
  schema: z.object({
    accountNo: text,
    accountNo2: text,
    accountName: text,
    balance: amount
  })
};

export const LEDGER_ACCOUNT_POSTING_ROWS: RowSchema<LedgerAccountPosting> = {
  table: 'ledgerAccountPostings',
  columns: { postingDate: 'POSTING_DATE' },
  schema: z.object({ postingDate: isoDate })
};

export const TRANSACTION_TYPE_MAPPING_ROWS: RowSchema<TransactionTypeMapping> = {
  table: 'transactionTypes',
  columns: TRANSACTION_TYPE_MAPPING_COLUMNS,
  schema: z.object({
    key: text,
    groupAccount: optionalText,
    securityType: optionalText,
    investments: optionalText,
    statusMapping: optionalText,
    changeMapping: optionalText,
    unrealizedKind: optionalText,
    realizedKind: optionalText
  })
};

export const INVESTMENT_TYPE_MAPPING_ROWS: RowSchema<InvestmentTypeMapping> = {
  table: 'investmentTypes',
  columns: INVESTMENT_TYPE_MAPPING_COLUMNS,
  schema: z.object({
    key: text,
    securityType: optionalText,
    ltSt: optionalText,
    category: optionalText
  })
};

export const INVESTMENT_MAPPING_ROWS: RowSchema<InvestmentMapping> = {
  table: 'investments',
  columns: INVESTMENT_MAPPING_COLUMNS,
  schema: z.object({
    key: text,
    securityId: optionalText,
    securityType: optionalText,
    purpose: optionalText,
    tag: optionalText,
    ifrsClassification: optionalText,
    valuationMethod: optionalText,
    valuationMethodAlt: optionalText,
    fundingSource: optionalText
  })
};

const supervisoryAttributeShape = {
  fundingSource: optionalText,
  employeesInBs: optionalText,
  companyType: optionalText,
  companySubtype: optionalText,
  guarantee: optionalText,
  issuerName: optionalText,
  issuerNameAlt: optionalText,
  sector: optionalText,
  ownership: optionalText,
  ifrsClassification: optionalText,
  valuationMethod: optionalText,
  issuerCountry: optionalText,
  tradingCountry: optionalText,
  regulatedMarket: optionalText,
  valuationSource: optionalText,
  couponType: optionalText
};

export const LEDGER_ACCOUNT_MAPPING_ROWS: RowSchema<LedgerAccountMapping> = {
  table: 'ledgerAccounts',
  columns: LEDGER_ACCOUNT_MAPPING_COLUMNS,
  schema: z.object({
    key: text,
    accountNo: optionalText,
    accountNo2: optionalText,
    accountName: optionalText,
    ...supervisoryAttributeShape,
    isin: optionalText,
    quantity: optionalNumber,
    accruedInterest: optionalNumber,
    amortizedExpenses: optionalNumber,
    currency: optionalText,
    couponFrequency: optionalNumber,
    interestRate: optionalNumber,
    effectiveInterestRate: optionalNumber,
    investmentDate: optionalIsoDate,
    maturityDate: optionalIsoDate,
    ratings: optionalText,
    ratingAgency: optionalText
  })
};

export const POSITION_MAPPING_ROWS: RowSchema<PositionMapping> = {
  table: 'positions',
  columns: POSITION_MAPPING_COLUMNS,
  schema: z.object({
    key: text,
    ...supervisoryAttributeShape
  })
};

export const CODE_LABEL_ROWS: RowSchema<CodeLabel> = {
  table: 'codeLabels',
  columns: CODE_LABEL_COLUMNS,
  schema: z.object({
    code: text,
    label: text
  })
};

// ============================================================================
// ROW READER
// ============================================================================

/**
 * Converts raw rows into entities. `table` overrides the schema's table name
 * in error messages.
 */
export function readRows<T>(rowSchema: RowSchema<T>, rows: readonly RawRow[], table: string = rowSchema.table): T[] {
  const columnEntries = Object.entries(rowSchema.columns);

  return rows.map((row, index) => {
    const input: Record<string, unknown> = {};
    for (const [field, column] of columnEntries) {
      if (!(column in row)) {
        throw new SchemaViolationError(table, column, 'column missing from result set');
      }
      input[field] = row[column];
    }

    const parsed = rowSchema.schema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue ? String(issue.path[0]) : '';
      const column = columnEntries.find(([name]) => name === field)?.[1] ?? field;
      throw new SchemaViolationError(table, column, `row ${index + 1}: ${issue ? issue.message : 'invalid value'}`);
    }
    return parsed.data;
  });
}
