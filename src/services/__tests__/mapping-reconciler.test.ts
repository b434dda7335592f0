import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { GAP_SHEET_NAMES, findGapKeys, reconcileMappings } from '../mapping-reconciler.js';
import { deriveKeys } from '../key-builder.js';
import {
  ledgerEntry,
  position,
  sampleMappings,
  sampleSnapshot
} from '../../__tests__/fixtures.js';
import type { MappingSnapshot } from '../../types/mapping.js';

describe('findGapKeys', () => {
  it('returns the fact keys missing from the mapping', () => {
    const gap = findGapKeys(['a', 'b', 'c', 'b'], key => key, new Set(['a']));
    assert.deepEqual([...gap], ['b', 'c']);
  });
});

describe('reconcileMappings', () => {
  it('passes when every key space is covered', () => {
    const snapshot = sampleSnapshot();
    const result = reconcileMappings(deriveKeys(snapshot.facts), snapshot.mappings);

    assert.equal(result.passed, true);
    assert.deepEqual(result.gaps, []);
    assert.deepEqual(result.gapKeys, {
      transactionType: [],
      investmentType: [],
      investment: [],
      ledgerAccount: [],
      position: []
    });
  });

  it('reports an unmapped transaction type as a gap row', () => {
    const snapshot = sampleSnapshot();
    const facts = {
      ...snapshot.facts,
      ledgerEntries: [
        ...snapshot.facts.ledgerEntries,
        ledgerEntry({ groupAccount: 'Z999', debitForeign: 5 }),
        ledgerEntry({ groupAccount: 'Z999', debitForeign: 7 })
      ]
    };

    const result = reconcileMappings(deriveKeys(facts), snapshot.mappings);

    assert.equal(result.passed, false);
    assert.deepEqual(result.gapKeys.transactionType, ['Z999FUNDX']);
    assert.equal(result.gaps.length, 1);

    const [table] = result.gaps;
    assert.ok(table);
    assert.equal(table.name, 'Missing Transaction Types');
    assert.deepEqual(
      table.columns.map(column => column.header),
      [
        'KEY',
        'GROUP_ACCOUNT',
        'SECURITY_TYPE',
        'INVESTMENTS',
        'STATUS_MAPPING',
        'CHANGE_MAPPING',
        'UNREALIZED_TRANSACTION_KIND',
        'REALIZED_TRANSACTION_KIND'
      ]
    );
    // the two rows differ only in amounts, outside the projection
    assert.deepEqual(table.rows, [
      {
        KEY: 'Z999FUNDX',
        GROUP_ACCOUNT: 'Z999',
        SECURITY_TYPE: 'FUND',
        INVESTMENTS: 'X',
        STATUS_MAPPING: null,
        CHANGE_MAPPING: null,
        UNREALIZED_TRANSACTION_KIND: null,
        REALIZED_TRANSACTION_KIND: null
      }
    ]);
  });

  it('keeps distinct projections of the same gap key', () => {
    const snapshot = sampleSnapshot();
    const facts = {
      ...snapshot.facts,
      ledgerEntries: [
        ledgerEntry({ securityId: 'SEC7', purpose: 'Trading' }),
        ledgerEntry({ securityId: 'SEC7', purpose: 'Hold' })
      ]
    };

    const result = reconcileMappings(deriveKeys(facts), snapshot.mappings);
    const table = result.gaps.find(gap => gap.name === GAP_SHEET_NAMES.investment);

    assert.ok(table);
    assert.deepEqual(
      table.rows.map(row => [row['KEY'], row['PURPOSE']]),
      [
        ['SEC7FUND', 'Trading'],
        ['SEC7FUND', 'Hold']
      ]
    );
  });

  it('lists position gaps with their ISIN after the mapping columns', () => {
    const snapshot = sampleSnapshot();
    const facts = { ...snapshot.facts, positions: [position({ securityId: 'BOND2', isin: 'XS0000000002' })] };

    const result = reconcileMappings(deriveKeys(facts), snapshot.mappings);
    const table = result.gaps.find(gap => gap.name === GAP_SHEET_NAMES.position);

    assert.ok(table);
    assert.equal(table.columns[0]?.header, 'SCD_ID');
    assert.equal(table.columns[table.columns.length - 1]?.header, 'ISIN');
    assert.equal(table.rows[0]?.['SCD_ID'], 'BOND2BONDLT');
    assert.equal(table.rows[0]?.['ISIN'], 'XS0000000002');
    assert.equal(table.rows[0]?.['FUNDING_SOURCE'], null);
  });

  it('orders gap tables by key space and sorts the keys', () => {
    const snapshot = sampleSnapshot();
    const mappings: MappingSnapshot = { ...sampleMappings(), investmentTypes: [], ledgerAccounts: [] };

    const result = reconcileMappings(deriveKeys(snapshot.facts), mappings);

    assert.deepEqual(
      result.gaps.map(table => table.name),
      ['Missing Investment Types', 'Missing Ledger Account Mappings']
    );
    assert.deepEqual(result.gapKeys.ledgerAccount, ['020300BANKDeposit A', '030100LOANLoan B']);
    assert.deepEqual(result.gapKeys.investmentType, ['FUNDLT']);
  });

  it('keeps every gap sheet name within the workbook limit', () => {
    for (const name of Object.values(GAP_SHEET_NAMES)) {
      assert.ok(name.length <= 31, name);
    }
  });
});
