import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ConnectionManager, resolveConnectionDetails } from '../connection-manager.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('resolveConnectionDetails', () => {
  it('applies the defaults around a project id', () => {
    const details = resolveConnectionDetails({ GOOGLE_CLOUD_PROJECT_ID: 'test-project' });

    assert.equal(details.projectId, 'test-project');
    assert.equal(details.location, 'US');
    assert.equal(details.keyFilename, undefined);
    assert.deepEqual(details.datasets, {
      investment: 'investment_system',
      accounting: 'accounting_system',
      mapping: 'regulatory_mapping'
    });
    assert.equal(details.tables.positions, 'list_of_investments_positions_hist');
    assert.equal(details.tables.codeLabels, 'code_labels');
  });

  it('requires a project id', () => {
    assert.throws(
      () => resolveConnectionDetails({}),
      (error: unknown) => error instanceof ConfigurationError && error.setting === 'GOOGLE_CLOUD_PROJECT_ID'
    );
  });

  it('treats blank variables as unset', () => {
    const details = resolveConnectionDetails({
      GOOGLE_CLOUD_PROJECT_ID: 'test-project',
      BIGQUERY_LOCATION: ' ',
      GOOGLE_APPLICATION_CREDENTIALS: ''
    });
    assert.equal(details.location, 'US');
    assert.equal(details.keyFilename, undefined);
  });

  it('rejects a table id that is not an identifier', () => {
    assert.throws(
      () =>
        resolveConnectionDetails({
          GOOGLE_CLOUD_PROJECT_ID: 'test-project',
          BIGQUERY_POSITIONS_TABLE: 'positions; DROP TABLE x'
        }),
      (error: unknown) => error instanceof ConfigurationError && error.setting === 'BIGQUERY_POSITIONS_TABLE'
    );
  });
});

describe('ConnectionManager', () => {
  const manager = ConnectionManager.fromEnvironment({
    GOOGLE_CLOUD_PROJECT_ID: 'test-project',
    GOOGLE_APPLICATION_CREDENTIALS: '/secrets/test-key.json',
    BIGQUERY_LOCATION: 'EU',
    BIGQUERY_MAPPING_DATASET_ID: 'mapping_test'
  });

  it('places each table in its dataset', () => {
    assert.equal(manager.getDatasetId('ledgerEntries'), 'investment_system');
    assert.equal(manager.getDatasetId('ledgerAccounts'), 'accounting_system');
    assert.equal(manager.getDatasetId('holdings'), 'mapping_test');
  });

  it('builds fully qualified table ids', () => {
    assert.equal(
      manager.getFullyQualifiedTableId('transactionTypeMapping'),
      '`test-project.mapping_test.transaction_type_mapping`'
    );
  });

  it('logs the connection without the credentials path', () => {
    assert.deepEqual(manager.logConnectionDetails(), {
      projectId: 'test-project',
      location: 'EU',
      datasets: { investment: 'investment_system', accounting: 'accounting_system', mapping: 'mapping_test' },
      hasKeyFile: true
    });
    assert.equal(manager.getKeyFilename(), '/secrets/test-key.json');
  });
});
