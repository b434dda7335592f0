import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { DataLoader, assertReportMonthData, assertUniqueKeys, withMeasures } from '../data-loader.js';
import { DataAbsenceError, SchemaViolationError } from '../../utils/errors.js';
import { LEDGER_ENTRY_COLUMNS, type LedgerEntryRecord } from '../../types/ledger.js';
import {
  InMemoryFactSource,
  InMemoryMappingSource,
  PERIOD,
  REPORT_DATE,
  investmentMapping,
  ledgerRecord,
  rawRows,
  sampleMappings,
  sampleSnapshot
} from '../../__tests__/fixtures.js';

function sampleLoader(factSource = InMemoryFactSource.fromSnapshot(sampleSnapshot())): DataLoader {
  return new DataLoader(factSource, InMemoryMappingSource.fromSnapshot(sampleMappings()));
}

describe('withMeasures', () => {
  it('computes balance as debit minus credit and delta as its negation', () => {
    const entry = withMeasures(ledgerRecord({ debitForeign: 10, creditForeign: 25 }));
    assert.equal(entry.balance, -15);
    assert.equal(entry.delta, 15);
  });

  it('never stores negative zero', () => {
    const entry = withMeasures(ledgerRecord({ debitForeign: 10, creditForeign: 10 }));
    assert.ok(Object.is(entry.balance, 0));
    assert.ok(Object.is(entry.delta, 0));
  });
});

describe('assertReportMonthData', () => {
  it('passes when any date falls in the report month', () => {
    assert.doesNotThrow(() => assertReportMonthData('t', 'c', ['2025-01-01', '2025-06-12'], REPORT_DATE));
  });

  it('names table, column, year and month when none does', () => {
    assert.throws(
      () => assertReportMonthData('holdings', 'REPORT_DATE', ['2025-05-31'], REPORT_DATE),
      (error: unknown) =>
        error instanceof DataAbsenceError &&
        error.message === "No data found in table holdings for year 2025 and month 6 in column 'REPORT_DATE'."
    );
  });
});

describe('assertUniqueKeys', () => {
  it('rejects a repeated key', () => {
    assert.throws(
      () => assertUniqueKeys('investments mapping', 'KEY', [{ key: 'a' }, { key: 'b' }, { key: 'a' }]),
      (error: unknown) => error instanceof SchemaViolationError && error.detail === "duplicate key 'a'"
    );
  });
});

describe('DataLoader', () => {
  it('loads a validated snapshot for the report date', async () => {
    const factSource = InMemoryFactSource.fromSnapshot(sampleSnapshot());
    const snapshot = await sampleLoader(factSource).loadSnapshot(PERIOD);

    assert.deepEqual(factSource.requestedDates, [REPORT_DATE]);
    assert.equal(snapshot.facts.ledgerEntries.length, 8);
    assert.deepEqual(
      snapshot.facts.ledgerEntries.map(entry => entry.balance),
      [300, 500, 1000, -50, 200, -30, 10, -80]
    );
    assert.equal(snapshot.facts.positions[0]?.purchaseDate, '2023-05-02');
    assert.equal(snapshot.facts.ledgerAccountBalances[0]?.balance, 2500);
    assert.equal(snapshot.mappings.transactionTypes.length, 4);
    assert.equal(snapshot.mappings.codeLabels[1]?.label, 'S&P');
  });

  it('fails when the ledger has no entry in the report month', async () => {
    const early = sampleSnapshot().facts.ledgerEntries.filter(entry => entry.bookingDate < '2025-06-01');
    const factSource = InMemoryFactSource.fromSnapshot(sampleSnapshot());
    const loader = sampleLoader(
      new InMemoryFactSource({
        ledgerEntries: rawRows<LedgerEntryRecord>(LEDGER_ENTRY_COLUMNS, early),
        holdings: await factSource.holdings(),
        positions: await factSource.positions(),
        ledgerAccountBalances: await factSource.ledgerAccountBalances(),
        ledgerAccountPostings: await factSource.ledgerAccountPostings()
      })
    );

    await assert.rejects(
      loader.loadSnapshot(PERIOD),
      (error: unknown) =>
        error instanceof DataAbsenceError && error.table === 'ledgerEntries' && error.column === 'BOOKING_DATE'
    );
  });

  it('fails when the accounting system has no posting in the report month', async () => {
    const loader = sampleLoader(InMemoryFactSource.fromSnapshot(sampleSnapshot(), ['2025-05-30']));
    await assert.rejects(
      loader.loadSnapshot(PERIOD),
      (error: unknown) =>
        error instanceof DataAbsenceError &&
        error.table === 'ledgerAccountPostings' &&
        error.year === 2025 &&
        error.month === 6
    );
  });

  it('rejects a mapping table with a duplicate key', async () => {
    const mappings = sampleMappings();
    const duplicated = {
      ...mappings,
      investments: [...mappings.investments, investmentMapping({ key: 'SEC1FUND', tag: 'Other' })]
    };
    const loader = new DataLoader(
      InMemoryFactSource.fromSnapshot(sampleSnapshot()),
      InMemoryMappingSource.fromSnapshot(duplicated)
    );

    await assert.rejects(
      loader.loadMappings(),
      (error: unknown) =>
        error instanceof SchemaViolationError && error.table === 'investments mapping' && error.column === 'KEY'
    );
  });

  it('rejects duplicate code labels', async () => {
    const mappings = sampleMappings();
    const duplicated = { ...mappings, codeLabels: [...mappings.codeLabels, { code: 'EUR', label: 'Euro (old)' }] };
    const loader = new DataLoader(
      InMemoryFactSource.fromSnapshot(sampleSnapshot()),
      InMemoryMappingSource.fromSnapshot(duplicated)
    );

    await assert.rejects(
      loader.loadMappings(),
      (error: unknown) => error instanceof SchemaViolationError && error.table === 'codeLabels'
    );
  });
});
