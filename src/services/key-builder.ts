/**
 * Key Builder
 *
 * Derives composite classification keys from fact rows. A key is the
 * concatenation of the listed fields' string forms, in list order, with no
 * separator, trimmed of surrounding whitespace. Absent values contribute an
 * empty string.
 */

import { logFlow } from '../utils/logging.js';
import type {
  FactSnapshot,
  Holding,
  KeyedFactSnapshot,
  KeyedHolding,
  KeyedLedgerAccountBalance,
  KeyedLedgerEntry,
  KeyedPosition,
  LedgerAccountBalance,
  LedgerEntry,
  Position
} from '../types/ledger.js';

export type KeyFields<T> = readonly (keyof T & string)[];

export function buildKey<T>(row: T, fields: KeyFields<T>): string {
  let key = '';
  for (const field of fields) {
    const value = row[field];
    key += value === null || value === undefined ? '' : String(value);
  }
  return key.trim();
}

// ============================================================================
// KEY SPACE FIELD LISTS
// ============================================================================

export const TRANSACTION_TYPE_KEY_FIELDS: KeyFields<LedgerEntry> = ['groupAccount', 'securityType', 'investments'];
export const INVESTMENT_TYPE_KEY_FIELDS: KeyFields<LedgerEntry> = ['securityType', 'ltSt'];
export const INVESTMENT_KEY_FIELDS: KeyFields<LedgerEntry> = ['securityId', 'securityType'];
export const HOLDING_INVESTMENT_TYPE_KEY_FIELDS: KeyFields<Holding> = ['securityType', 'ltSt'];
export const HOLDING_INVESTMENT_KEY_FIELDS: KeyFields<Holding> = ['securityId', 'securityType'];
export const LEDGER_ACCOUNT_KEY_FIELDS: KeyFields<LedgerAccountBalance> = ['accountNo', 'accountNo2', 'accountName'];
export const POSITION_KEY_FIELDS: KeyFields<Position> = ['securityId', 'investmentType', 'ltSt'];

// ============================================================================
// DERIVED KEY COLUMNS
// ============================================================================

export function keyLedgerEntry(entry: LedgerEntry): KeyedLedgerEntry {
  return {
    ...entry,
    transactionTypeKey: buildKey(entry, TRANSACTION_TYPE_KEY_FIELDS),
    investmentTypeKey: buildKey(entry, INVESTMENT_TYPE_KEY_FIELDS),
    investmentKey: buildKey(entry, INVESTMENT_KEY_FIELDS)
  };
}

export function keyHolding(holding: Holding): KeyedHolding {
  return {
    ...holding,
    investmentTypeKey: buildKey(holding, HOLDING_INVESTMENT_TYPE_KEY_FIELDS),
    investmentKey: buildKey(holding, HOLDING_INVESTMENT_KEY_FIELDS)
  };
}

export function keyPosition(position: Position): KeyedPosition {
  return { ...position, positionKey: buildKey(position, POSITION_KEY_FIELDS) };
}

export function keyLedgerAccountBalance(balance: LedgerAccountBalance): KeyedLedgerAccountBalance {
  return { ...balance, ledgerAccountKey: buildKey(balance, LEDGER_ACCOUNT_KEY_FIELDS) };
}

/**
 * Adds every key column to a fact snapshot. The raw rows are left untouched.
 */
export function deriveKeys(facts: FactSnapshot): KeyedFactSnapshot {
  logFlow('KEY_BUILDER', 'ENTRY', 'Deriving classification keys', {
    ledgerEntries: facts.ledgerEntries.length,
    holdings: facts.holdings.length,
    positions: facts.positions.length,
    ledgerAccountBalances: facts.ledgerAccountBalances.length
  });

  const keyed: KeyedFactSnapshot = {
    ledgerEntries: facts.ledgerEntries.map(keyLedgerEntry),
    holdings: facts.holdings.map(keyHolding),
    positions: facts.positions.map(keyPosition),
    ledgerAccountBalances: facts.ledgerAccountBalances.map(keyLedgerAccountBalance)
  };

  logFlow('KEY_BUILDER', 'EXIT', 'Classification keys derived');
  return keyed;
}
