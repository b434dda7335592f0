import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { RealizedProfitReportGenerator } from '../realized-profit-report.js';
import { InvestmentCategory } from '../../types/investment-taxonomy.js';
import { sampleContext } from '../../__tests__/fixtures.js';

describe('RealizedProfitReportGenerator', () => {
  const generator = new RealizedProfitReportGenerator(sampleContext());

  it('produces the all-categories and equity tables', () => {
    assert.deepEqual(
      generator.generateTables().map(table => table.name),
      ['REALIZED_PROFIT_ALL', 'REALIZED_PROFIT_EQUITY']
    );
  });

  it('reports year-to-date figures per category', () => {
    const table = generator.generateAllCategoriesTable();

    assert.equal(table.rows.length, 10);
    assert.deepEqual(table.rows[7], {
      Tags: InvestmentCategory.INVESTMENT_FUND_SHARES,
      'Number of securities': 100,
      'Accounting value': 1700,
      'Sell value': 1780,
      'Realized profit (loss)': 80
    });
    assert.deepEqual(table.rows[0], {
      Tags: InvestmentCategory.LAND_BUILDINGS_FOR_OPERATIONS,
      'Number of securities': 0,
      'Accounting value': 0,
      'Sell value': 0,
      'Realized profit (loss)': 0
    });
  });

  it('reports fund share tags with their holdings', () => {
    const table = generator.generateEquityTable();

    assert.deepEqual(table.rows, [
      {
        Tags: 'Fund Alpha',
        'IFRS classification': 'FVTPL',
        'Number of securities': 40,
        'Accounting value': 1200,
        'Sell value (formula)': 1280,
        'Realized profit (loss)': 80,
        'Funding source': 'Own funds'
      },
      {
        Tags: 'Fund Beta',
        'IFRS classification': 'FVOCI',
        'Number of securities': 60,
        'Accounting value': 500,
        'Sell value (formula)': 500,
        'Realized profit (loss)': 0,
        'Funding source': 'Technical provisions'
      },
      {
        Tags: 'Total',
        'IFRS classification': 'Total',
        'Number of securities': 100,
        'Accounting value': 1700,
        'Sell value (formula)': 1780,
        'Realized profit (loss)': 80,
        'Funding source': 'Total'
      }
    ]);
  });
});
