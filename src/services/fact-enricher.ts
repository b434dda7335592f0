/**
 * Fact Enricher
 *
 * Joins keyed facts with their mapping tables once reconciliation has passed.
 * Every join is a lookup on a named key into a unique-keyed table; the output
 * entities carry the attributes under their own names, so no column
 * collides.
 */

import { logFlow } from '../utils/logging.js';
import { CHANGE_MARKER, STATUS_MARKER, transactionKindOf } from '../types/investment-taxonomy.js';
import type {
  EnrichedFactSnapshot,
  EnrichedHolding,
  EnrichedLedgerEntry,
  KeyedFactSnapshot,
  KeyedHolding,
  KeyedLedgerAccountBalance,
  KeyedLedgerEntry,
  KeyedPosition,
  MappedLedgerAccount,
  MappedPosition
} from '../types/ledger.js';
import type {
  InvestmentMapping,
  InvestmentTypeMapping,
  LedgerAccountMapping,
  MappingSnapshot,
  PositionMapping,
  TransactionTypeMapping
} from '../types/mapping.js';

export function indexByKey<M extends { key: string }>(rows: readonly M[]): ReadonlyMap<string, M> {
  return new Map(rows.map(row => [row.key, row]));
}

interface MappingIndex {
  transactionTypes: ReadonlyMap<string, TransactionTypeMapping>;
  investmentTypes: ReadonlyMap<string, InvestmentTypeMapping>;
  investments: ReadonlyMap<string, InvestmentMapping>;
  ledgerAccounts: ReadonlyMap<string, LedgerAccountMapping>;
  positions: ReadonlyMap<string, PositionMapping>;
}

function enrichLedgerEntry(entry: KeyedLedgerEntry, index: MappingIndex): EnrichedLedgerEntry {
  const transactionType = index.transactionTypes.get(entry.transactionTypeKey);
  const investmentType = index.investmentTypes.get(entry.investmentTypeKey);
  const investment = index.investments.get(entry.investmentKey);

  return {
    ...entry,
    isStatus: transactionType?.statusMapping === STATUS_MARKER,
    isChange: transactionType?.changeMapping === CHANGE_MARKER,
    unrealizedKind: transactionKindOf(transactionType?.unrealizedKind ?? null),
    realizedKind: transactionType?.realizedKind ?? null,
    category: investmentType?.category ?? null,
    tag: investment?.tag ?? null,
    ifrsClassification: investment?.ifrsClassification ?? null,
    valuationMethod: investment?.valuationMethod ?? null,
    valuationMethodAlt: investment?.valuationMethodAlt ?? null,
    fundingSource: investment?.fundingSource ?? null
  };
}

function enrichHolding(holding: KeyedHolding, index: MappingIndex): EnrichedHolding {
  return {
    ...holding,
    category: index.investmentTypes.get(holding.investmentTypeKey)?.category ?? null,
    tag: index.investments.get(holding.investmentKey)?.tag ?? null
  };
}

function mapPosition(position: KeyedPosition, index: MappingIndex): MappedPosition {
  const attributes = index.positions.get(position.positionKey);
  if (!attributes) {
    throw new Error(`Position key '${position.positionKey}' has no mapping; reconcile before enriching`);
  }
  return { ...position, attributes };
}

function mapLedgerAccount(balance: KeyedLedgerAccountBalance, index: MappingIndex): MappedLedgerAccount {
  const attributes = index.ledgerAccounts.get(balance.ledgerAccountKey);
  if (!attributes) {
    throw new Error(`Ledger account key '${balance.ledgerAccountKey}' has no mapping; reconcile before enriching`);
  }
  return { ...balance, attributes };
}

export function enrichFacts(facts: KeyedFactSnapshot, mappings: MappingSnapshot): EnrichedFactSnapshot {
  logFlow('FACT_ENRICHER', 'ENTRY', 'Joining facts with mapping tables');

  const index: MappingIndex = {
    transactionTypes: indexByKey(mappings.transactionTypes),
    investmentTypes: indexByKey(mappings.investmentTypes),
    investments: indexByKey(mappings.investments),
    ledgerAccounts: indexByKey(mappings.ledgerAccounts),
    positions: indexByKey(mappings.positions)
  };

  const enriched: EnrichedFactSnapshot = {
    ledgerEntries: facts.ledgerEntries.map(entry => enrichLedgerEntry(entry, index)),
    holdings: facts.holdings.map(holding => enrichHolding(holding, index)),
    positions: facts.positions.map(position => mapPosition(position, index)),
    ledgerAccounts: facts.ledgerAccountBalances.map(balance => mapLedgerAccount(balance, index))
  };

  logFlow('FACT_ENRICHER', 'EXIT', 'Facts enriched', {
    ledgerEntries: enriched.ledgerEntries.length,
    holdings: enriched.holdings.length,
    positions: enriched.positions.length,
    ledgerAccounts: enriched.ledgerAccounts.length
  });
  return enriched;
}
