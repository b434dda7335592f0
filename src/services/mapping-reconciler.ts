/**
 * Mapping Reconciler
 *
 * For each key space, finds the keys observed among facts that no mapping row
 * covers, and collects the offending fact rows into a named gap table. Any
 * gap halts the run before aggregation.
 *
 * Gap table headers are the mapping table's own warehouse columns, so the
 * sheet can be filled in and imported back. Attribute columns that the
 * maintainer has to supply are emitted blank.
 */

import { logFlow } from '../utils/logging.js';
import type {
  KeyedFactSnapshot,
  KeyedLedgerAccountBalance,
  KeyedLedgerEntry,
  KeyedPosition,
  WarehouseColumns
} from '../types/ledger.js';
import {
  INVESTMENT_MAPPING_COLUMNS,
  INVESTMENT_TYPE_MAPPING_COLUMNS,
  LEDGER_ACCOUNT_MAPPING_COLUMNS,
  POSITION_MAPPING_COLUMNS,
  TRANSACTION_TYPE_MAPPING_COLUMNS,
  type InvestmentMapping,
  type InvestmentTypeMapping,
  type KeySpace,
  type LedgerAccountMapping,
  type MappingSnapshot,
  type PositionMapping,
  type TransactionTypeMapping
} from '../types/mapping.js';
import type { Cell, ReportRow, ReportTable } from '../types/report.js';

export const GAP_SHEET_NAMES: Readonly<Record<KeySpace, string>> = {
  transactionType: 'Missing Transaction Types',
  investmentType: 'Missing Investment Types',
  investment: 'Missing Investment Mappings',
  ledgerAccount: 'Missing Ledger Account Mappings',
  position: 'Missing Position Mappings'
};

interface GapColumn<R> {
  header: string;
  value: (row: R) => Cell;
}

interface KeySpaceCheck<R> {
  keySpace: KeySpace;
  facts: readonly R[];
  factKey: (row: R) => string;
  mappingKeys: ReadonlySet<string>;
  columns: readonly GapColumn<R>[];
}

export interface ReconciliationResult {
  passed: boolean;
  /** Non-empty gap tables, in key space order */
  gaps: ReportTable[];
  /** Uncovered keys per key space, sorted */
  gapKeys: Readonly<Record<KeySpace, readonly string[]>>;
}

/**
 * Lays out gap columns in the mapping table's column order. Fields with a
 * filler are copied from the fact row; the rest stay blank.
 */
function templateColumns<M, R>(
  mappingColumns: WarehouseColumns<M> & Readonly<Record<string, string>>,
  fill: Partial<Record<keyof M & string, (row: R) => Cell>>,
  context: readonly GapColumn<R>[] = []
): GapColumn<R>[] {
  const fillers: Partial<Record<string, (row: R) => Cell>> = fill;
  const columns: GapColumn<R>[] = Object.entries(mappingColumns).map(([field, header]) => ({
    header,
    value: fillers[field] ?? (() => null)
  }));
  return [...columns, ...context];
}

/**
 * Keys present among facts but absent from the mapping table
 */
export function findGapKeys<R>(facts: readonly R[], factKey: (row: R) => string, mappingKeys: ReadonlySet<string>): Set<string> {
  const gap = new Set<string>();
  for (const row of facts) {
    const key = factKey(row);
    if (!mappingKeys.has(key)) {
      gap.add(key);
    }
  }
  return gap;
}

/**
 * Fact rows whose key is in the gap, projected onto the gap columns and
 * de-duplicated on that projection. Rows that differ only in columns outside
 * the projection collapse; variants inside it stay visible.
 */
export function collectGapRows<R>(check: KeySpaceCheck<R>, gapKeys: ReadonlySet<string>): ReportRow[] {
  const seen = new Set<string>();
  const rows: ReportRow[] = [];

  for (const fact of check.facts) {
    if (!gapKeys.has(check.factKey(fact))) {
      continue;
    }
    const values = check.columns.map(column => column.value(fact));
    const signature = JSON.stringify(values);
    if (seen.has(signature)) {
      continue;
    }
    seen.add(signature);

    const row: Record<string, Cell> = {};
    check.columns.forEach((column, index) => {
      row[column.header] = values[index] ?? null;
    });
    rows.push(row);
  }

  return rows;
}

function evaluate<R>(check: KeySpaceCheck<R>): { keys: string[]; table: ReportTable | null } {
  const gapKeys = findGapKeys(check.facts, check.factKey, check.mappingKeys);
  const keys = [...gapKeys].sort();

  if (gapKeys.size === 0) {
    return { keys, table: null };
  }

  return {
    keys,
    table: {
      name: GAP_SHEET_NAMES[check.keySpace],
      columns: check.columns.map(column => ({ header: column.header, kind: 'text' as const })),
      rows: collectGapRows(check, gapKeys)
    }
  };
}

/**
 * Runs the coverage check over all five key spaces. The run may proceed to
 * aggregation only when `passed` is true.
 */
export function reconcileMappings(facts: KeyedFactSnapshot, mappings: MappingSnapshot): ReconciliationResult {
  logFlow('MAPPING_RECONCILER', 'ENTRY', 'Checking mapping coverage');

  const transactionType = evaluate<KeyedLedgerEntry>({
    keySpace: 'transactionType',
    facts: facts.ledgerEntries,
    factKey: entry => entry.transactionTypeKey,
    mappingKeys: new Set(mappings.transactionTypes.map(mapping => mapping.key)),
    columns: templateColumns<TransactionTypeMapping, KeyedLedgerEntry>(TRANSACTION_TYPE_MAPPING_COLUMNS, {
      key: entry => entry.transactionTypeKey,
      groupAccount: entry => entry.groupAccount,
      securityType: entry => entry.securityType,
      investments: entry => entry.investments
    })
  });

  const investmentType = evaluate<KeyedLedgerEntry>({
    keySpace: 'investmentType',
    facts: facts.ledgerEntries,
    factKey: entry => entry.investmentTypeKey,
    mappingKeys: new Set(mappings.investmentTypes.map(mapping => mapping.key)),
    columns: templateColumns<InvestmentTypeMapping, KeyedLedgerEntry>(INVESTMENT_TYPE_MAPPING_COLUMNS, {
      key: entry => entry.investmentTypeKey,
      securityType: entry => entry.securityType,
      ltSt: entry => entry.ltSt
    })
  });

  const investment = evaluate<KeyedLedgerEntry>({
    keySpace: 'investment',
    facts: facts.ledgerEntries,
    factKey: entry => entry.investmentKey,
    mappingKeys: new Set(mappings.investments.map(mapping => mapping.key)),
    columns: templateColumns<InvestmentMapping, KeyedLedgerEntry>(INVESTMENT_MAPPING_COLUMNS, {
      key: entry => entry.investmentKey,
      securityId: entry => entry.securityId,
      securityType: entry => entry.securityType,
      purpose: entry => entry.purpose
    })
  });

  const ledgerAccount = evaluate<KeyedLedgerAccountBalance>({
    keySpace: 'ledgerAccount',
    facts: facts.ledgerAccountBalances,
    factKey: balance => balance.ledgerAccountKey,
    mappingKeys: new Set(mappings.ledgerAccounts.map(mapping => mapping.key)),
    columns: templateColumns<LedgerAccountMapping, KeyedLedgerAccountBalance>(LEDGER_ACCOUNT_MAPPING_COLUMNS, {
      key: balance => balance.ledgerAccountKey,
      accountNo: balance => balance.accountNo,
      accountNo2: balance => balance.accountNo2,
      accountName: balance => balance.accountName
    })
  });

  const position = evaluate<KeyedPosition>({
    keySpace: 'position',
    facts: facts.positions,
    factKey: row => row.positionKey,
    mappingKeys: new Set(mappings.positions.map(mapping => mapping.key)),
    columns: templateColumns<PositionMapping, KeyedPosition>(
      POSITION_MAPPING_COLUMNS,
      { key: row => row.positionKey },
      [{ header: 'ISIN', value: row => row.isin }]
    )
  });

  const results = { transactionType, investmentType, investment, ledgerAccount, position };
  const gaps: ReportTable[] = [];
  for (const result of Object.values(results)) {
    if (result.table) {
      gaps.push(result.table);
    }
  }

  const gapKeys: Record<KeySpace, readonly string[]> = {
    transactionType: transactionType.keys,
    investmentType: investmentType.keys,
    investment: investment.keys,
    ledgerAccount: ledgerAccount.keys,
    position: position.keys
  };

  const passed = gaps.length === 0;
  if (passed) {
    logFlow('MAPPING_RECONCILER', 'EXIT', 'All mapping up to date');
  } else {
    logFlow('MAPPING_RECONCILER', 'EXIT', 'Mapping gaps found, update mapping', {
      gapTables: gaps.map(table => ({ name: table.name, rows: table.rows.length })),
      gapKeys
    });
  }

  return { passed, gaps, gapKeys };
}
