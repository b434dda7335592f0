import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { SETTINGS_FILE_NAME, loadReportSettings, parseReportSettings, resolveDataDir } from '../report-settings.js';
import { ConfigurationError } from '../errors.js';

describe('parseReportSettings', () => {
  it('fills every default', () => {
    assert.deepEqual(parseReportSettings({}, 'test'), {
      zeroAcquisitionAccounts: [],
      zeroQuantityNameFragments: [],
      perHundredLotNominal: 100,
      tagAttributePolicy: 'first-wins',
      reportOutputDirs: ['output'],
      mappingOutputDirs: ['output/mapping']
    });
  });

  it('keeps an explicit report selection', () => {
    const settings = parseReportSettings({ enabledReports: ['supervisory-lookup'] }, 'test');
    assert.deepEqual(settings.enabledReports, ['supervisory-lookup']);
  });

  it('names the offending setting', () => {
    assert.throws(
      () => parseReportSettings({ tagAttributePolicy: 'last-wins' }, 'test'),
      (error: unknown) => error instanceof ConfigurationError && error.setting === 'tagAttributePolicy'
    );
  });

  it('rejects an empty output directory list', () => {
    assert.throws(() => parseReportSettings({ reportOutputDirs: [] }, 'test'), ConfigurationError);
  });
});

describe('resolveDataDir', () => {
  it('prefers DATA_DIR', () => {
    assert.equal(resolveDataDir({ DATA_DIR: '/srv/report' }), '/srv/report');
  });

  it('falls back to ./data', () => {
    assert.equal(resolveDataDir({}), path.join(process.cwd(), 'data'));
  });
});

describe('loadReportSettings', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'report-settings-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('uses the defaults when no file exists', async () => {
    const settings = await loadReportSettings(dataDir);
    assert.equal(settings.tagAttributePolicy, 'first-wins');
    assert.deepEqual(settings.reportOutputDirs, ['output']);
  });

  it('reads the settings file', async () => {
    await fs.writeFile(
      path.join(dataDir, SETTINGS_FILE_NAME),
      JSON.stringify({ zeroAcquisitionAccounts: ['020300'], tagAttributePolicy: 'require-agreement' })
    );
    const settings = await loadReportSettings(dataDir);
    assert.deepEqual(settings.zeroAcquisitionAccounts, ['020300']);
    assert.equal(settings.tagAttributePolicy, 'require-agreement');
    assert.equal(settings.perHundredLotNominal, 100);
  });

  it('fails on a file that is not JSON', async () => {
    await fs.writeFile(path.join(dataDir, SETTINGS_FILE_NAME), '{ not json');
    await assert.rejects(loadReportSettings(dataDir), ConfigurationError);
  });

  it('loads the shipped settings', async () => {
    const settings = await loadReportSettings(path.join(process.cwd(), 'data'));
    assert.deepEqual(settings.zeroAcquisitionAccounts, ['020300', '020380', '021307', '021387', '0213901']);
    assert.equal(settings.perHundredLotNominal, 100);
  });
});
