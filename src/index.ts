/**
 * Quarterly report run
 *
 * Environment:
 * - REPORT_DATE: report date (YYYY-MM-DD); defaults to the latest quarter end
 * - DATA_DIR: directory holding report-settings.json
 * - LOG_LEVEL: debug (default), info, warn or error
 * - GOOGLE_CLOUD_PROJECT_ID and the BIGQUERY_* variables: warehouse location
 *
 * Exit codes: 0 report written, 2 mapping gaps found (gap workbook written),
 * 1 the run failed.
 */

import { logFlow } from './utils/logging.js';
import { describeError } from './utils/errors.js';
import { latestQuarterEnd } from './utils/report-calendar.js';
import { loadReportSettings } from './utils/report-settings.js';
import { ConnectionManager } from './services/connection-manager.js';
import { BigQueryClient } from './services/bigquery-client.js';
import { BigQueryFactSource, BigQueryMappingSource } from './services/warehouse-sources.js';
import { DataLoader } from './services/data-loader.js';
import { generateQuarterlyReport } from './pipeline.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_MAPPING_GAP = 2;

async function main(): Promise<number> {
  const reportDate = process.env.REPORT_DATE || latestQuarterEnd(new Date());
  const settings = await loadReportSettings();

  const connections = ConnectionManager.getInstance();
  connections.logConnectionDetails();

  const client = new BigQueryClient();
  await client.configure({
    projectId: connections.getProjectId(),
    location: connections.getLocation(),
    keyFilename: connections.getKeyFilename()
  });

  const loader = new DataLoader(
    new BigQueryFactSource(client, connections),
    new BigQueryMappingSource(client, connections)
  );

  const result = await generateQuarterlyReport({ reportDate, loader, settings });
  if (result.status === 'mapping-gap') {
    logFlow('MAIN', 'WARN', `Update mapping: fill in ${result.artifactPath} and import it before rerunning`);
    return EXIT_MAPPING_GAP;
  }
  logFlow('MAIN', 'INFO', `Report for ${reportDate} written to ${result.artifactPath}`);
  return EXIT_SUCCESS;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logFlow('MAIN', 'ERROR', 'Quarterly report run failed', { error: describeError(error) });
    process.exitCode = EXIT_FAILURE;
  });
